import { CancellationToken } from 'vscode-languageserver-protocol';
import { throwIfCancellationRequested } from '../../../domain/cancellation';
import { DocumentId } from '../../../domain/entities';
import { InvariantViolationError } from '../../../domain/errors';
import { CodeSymbol } from '../../../domain/symbols';
import { TextSpan } from '../../../domain/TextSpan';
import { ISemanticModelProvider, SemanticModel } from '../../../usecases/ports/ISemanticModelProvider';
import { findTouchingNodes } from './nodes';
import { TsSemanticModel } from './TsProgramContext';
import { TsWorkspace } from './TsWorkspace';

export class TsSemanticModelProvider implements ISemanticModelProvider {
  constructor(private readonly workspace: TsWorkspace) {}

  /**
   * Reuses the last program built when it already contains the document's
   * current text, even if other documents changed since.
   */
  async getSpeculativeModel(
    documentId: DocumentId,
    _span: TextSpan,
    token: CancellationToken,
  ): Promise<SemanticModel> {
    throwIfCancellationRequested(token);
    const last = this.workspace.getLastProgramContext();
    if (last.versionOf(documentId) === this.workspace.getVersion(documentId)) {
      return last.getModel(documentId);
    }
    return this.workspace.getProgramContext().getModel(documentId);
  }

  async getSemanticModel(documentId: DocumentId, token: CancellationToken): Promise<SemanticModel> {
    throwIfCancellationRequested(token);
    return this.workspace.getProgramContext().getModel(documentId);
  }

  async findSymbolAtPosition(
    model: SemanticModel,
    position: number,
    token: CancellationToken,
  ): Promise<CodeSymbol | undefined> {
    throwIfCancellationRequested(token);
    if (!(model instanceof TsSemanticModel)) {
      throw new InvariantViolationError('Semantic model was not created by this provider');
    }

    const sourceFile = model.sourceFile;
    if (!sourceFile) {
      return undefined;
    }

    const { checker, symbols } = model.context;
    for (const node of findTouchingNodes(sourceFile, position)) {
      const symbol = checker.getSymbolAtLocation(node);
      if (symbol) {
        return symbols.map(symbol);
      }
    }
    return undefined;
  }
}
