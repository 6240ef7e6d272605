import { CancellationToken } from 'vscode-languageserver-protocol';
import { throwIfCancellationRequested } from '../../domain/cancellation';
import { DocumentHighlights, DocumentId } from '../../domain/entities';
import { IReferenceFilters } from '../ports/IReferenceFilters';
import { IReferenceSearchService } from '../ports/IReferenceSearchService';
import { ILanguageServices } from '../ports/ILanguageServices';
import { ISemanticModelProvider } from '../ports/ISemanticModelProvider';
import { ISolution } from '../ports/ISolution';
import { HighlightSpanBuilder } from './HighlightSpanBuilder';
import { ReferenceCollector } from './ReferenceCollector';
import { ReferenceFilter } from './ReferenceFilter';
import { SpanResolver } from './SpanResolver';
import { SymbolResolver } from './SymbolResolver';

export interface DocumentHighlightsDependencies<TRoot, TNode> {
  solution: ISolution;
  semanticModels: ISemanticModelProvider;
  referenceSearch: IReferenceSearchService;
  filters: IReferenceFilters;
  language: ILanguageServices<TRoot, TNode>;
}

/**
 * Finds the symbol at a position and every occurrence of it in the given
 * documents, tagged as definition or reference. Holds no state between calls.
 */
export class GetDocumentHighlightsUseCase<TRoot, TNode> {
  private readonly symbolResolver: SymbolResolver;
  private readonly referenceCollector: ReferenceCollector;
  private readonly referenceFilter: ReferenceFilter;
  private readonly spanBuilder: HighlightSpanBuilder<TRoot, TNode>;

  constructor(deps: DocumentHighlightsDependencies<TRoot, TNode>) {
    this.symbolResolver = new SymbolResolver(deps.solution, deps.semanticModels);
    this.referenceCollector = new ReferenceCollector(
      deps.referenceSearch,
      deps.language.additionalReferences,
    );
    this.referenceFilter = new ReferenceFilter(deps.filters);
    this.spanBuilder = new HighlightSpanBuilder(
      deps.solution,
      new SpanResolver(deps.solution, deps.language),
    );
  }

  async execute(
    documentId: DocumentId,
    position: number,
    documentsToSearch: Iterable<DocumentId>,
    token: CancellationToken,
  ): Promise<DocumentHighlights[]> {
    throwIfCancellationRequested(token);

    const symbol = await this.symbolResolver.resolve(documentId, position, token);
    if (!symbol) {
      return [];
    }
    throwIfCancellationRequested(token);

    const documentIds = new Set(documentsToSearch);
    const { references, additionalReferences } = await this.referenceCollector.collect(
      symbol,
      documentIds,
      token,
    );
    throwIfCancellationRequested(token);

    const filtered = this.referenceFilter.filter(references, symbol);
    return this.spanBuilder.build(symbol, filtered, additionalReferences, documentIds, token);
  }
}
