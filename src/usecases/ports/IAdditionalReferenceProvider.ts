import { CancellationToken } from 'vscode-languageserver-protocol';
import { DocumentId } from '../../domain/entities';
import { CodeSymbol, SourceLocation } from '../../domain/symbols';

/** Language-specific occurrences the generic reference search does not report. */
export interface IAdditionalReferenceProvider {
  getAdditionalReferences(
    documentId: DocumentId,
    symbol: CodeSymbol,
    token: CancellationToken,
  ): Promise<SourceLocation[]>;
}
