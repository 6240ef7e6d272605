import { CancellationToken } from 'vscode-languageserver-protocol';
import { DocumentId } from '../../domain/entities';
import { CodeSymbol } from '../../domain/symbols';
import { TextSpan } from '../../domain/TextSpan';

/**
 * Opaque handle to a semantic analysis. Two handles are the same model only
 * when they are the same object.
 */
export interface SemanticModel {
  readonly documentId: DocumentId;
}

export interface ISemanticModelProvider {
  /** A model valid for `span`; may be cheaper than, and stale relative to, the full model. */
  getSpeculativeModel(
    documentId: DocumentId,
    span: TextSpan,
    token: CancellationToken,
  ): Promise<SemanticModel>;

  /** The authoritative model for the document's current text. */
  getSemanticModel(documentId: DocumentId, token: CancellationToken): Promise<SemanticModel>;

  findSymbolAtPosition(
    model: SemanticModel,
    position: number,
    token: CancellationToken,
  ): Promise<CodeSymbol | undefined>;
}
