import { CancellationToken } from 'vscode-languageserver-protocol';
import { isCancellationError, throwIfCancellationRequested } from '../../domain/cancellation';
import { DocumentId, ReferencedSymbol } from '../../domain/entities';
import { CodeSymbol, MethodKind, SourceLocation, SymbolKind } from '../../domain/symbols';
import { IAdditionalReferenceProvider } from '../ports/IAdditionalReferenceProvider';
import { IReferenceSearchService } from '../ports/IReferenceSearchService';

export interface CollectedReferences {
  references: ReferencedSymbol[];
  additionalReferences: SourceLocation[];
}

/** Accessors and lambdas have no name of their own in source to highlight. */
export function shouldConsiderSymbol(symbol: CodeSymbol): boolean {
  switch (symbol.kind) {
    case SymbolKind.Method:
      switch (symbol.methodKind) {
        case MethodKind.AnonymousFunction:
        case MethodKind.PropertyGet:
        case MethodKind.PropertySet:
        case MethodKind.EventAdd:
        case MethodKind.EventRaise:
        case MethodKind.EventRemove:
          return false;
        default:
          return true;
      }
    default:
      return true;
  }
}

export class ReferenceCollector {
  constructor(
    private readonly referenceSearch: IReferenceSearchService,
    private readonly additionalReferenceProvider: IAdditionalReferenceProvider,
  ) {}

  async collect(
    symbol: CodeSymbol,
    documentIds: ReadonlySet<DocumentId>,
    token: CancellationToken,
  ): Promise<CollectedReferences> {
    if (!shouldConsiderSymbol(symbol) || documentIds.size === 0) {
      return { references: [], additionalReferences: [] };
    }

    const references = await this.referenceSearch.findReferences(symbol, documentIds, token);
    throwIfCancellationRequested(token);

    const perDocument = await Promise.all(
      [...documentIds].map((documentId) => this.getAdditionalReferences(documentId, symbol, token)),
    );
    throwIfCancellationRequested(token);

    return { references, additionalReferences: perDocument.flat() };
  }

  private async getAdditionalReferences(
    documentId: DocumentId,
    symbol: CodeSymbol,
    token: CancellationToken,
  ): Promise<SourceLocation[]> {
    try {
      return await this.additionalReferenceProvider.getAdditionalReferences(documentId, symbol, token);
    } catch (e) {
      if (isCancellationError(e)) {
        throw e;
      }
      console.warn(`Failed to get additional references in ${documentId}:`, e);
      return [];
    }
  }
}
