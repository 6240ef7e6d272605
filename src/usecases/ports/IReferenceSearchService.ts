import { CancellationToken } from 'vscode-languageserver-protocol';
import { DocumentId, ReferencedSymbol } from '../../domain/entities';
import { CodeSymbol } from '../../domain/symbols';

export interface IReferenceSearchService {
  /** References to `symbol` (and the symbols it cascades to) inside `documentIds`. */
  findReferences(
    symbol: CodeSymbol,
    documentIds: ReadonlySet<DocumentId>,
    token: CancellationToken,
  ): Promise<ReferencedSymbol[]>;
}
