import { CancellationToken } from 'vscode-languageserver-protocol';
import { throwIfCancellationRequested } from '../../domain/cancellation';
import { DocumentId } from '../../domain/entities';
import { DocumentNotFoundError, InvalidPositionError } from '../../domain/errors';
import { CodeSymbol } from '../../domain/symbols';
import { createTextSpan } from '../../domain/TextSpan';
import { ISemanticModelProvider } from '../ports/ISemanticModelProvider';
import { ISolution } from '../ports/ISolution';

export class SymbolResolver {
  constructor(
    private readonly solution: ISolution,
    private readonly semanticModels: ISemanticModelProvider,
  ) {}

  async resolve(
    documentId: DocumentId,
    position: number,
    token: CancellationToken,
  ): Promise<CodeSymbol | undefined> {
    const textLength = this.solution.getTextLength(documentId);
    if (textLength === undefined) {
      throw new DocumentNotFoundError(documentId);
    }
    if (!Number.isInteger(position) || position < 0 || position > textLength) {
      throw new InvalidPositionError(documentId, position);
    }

    // The speculative model tells us cheaply whether there is anything to highlight.
    const speculativeModel = await this.semanticModels.getSpeculativeModel(
      documentId,
      createTextSpan(position, 0),
      token,
    );
    throwIfCancellationRequested(token);

    const symbol = await this.semanticModels.findSymbolAtPosition(speculativeModel, position, token);
    if (!symbol) {
      return undefined;
    }

    const currentModel = await this.semanticModels.getSemanticModel(documentId, token);
    throwIfCancellationRequested(token);
    if (currentModel === speculativeModel) {
      return symbol;
    }

    // The speculative answer may be stale; the full model is the source of truth.
    return this.semanticModels.findSymbolAtPosition(currentModel, position, token);
  }
}
