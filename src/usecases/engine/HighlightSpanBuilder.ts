import { CancellationToken } from 'vscode-languageserver-protocol';
import { isCancellationError, throwIfCancellationRequested } from '../../domain/cancellation';
import { DocumentHighlights, DocumentId, HighlightSpan, ReferencedSymbol } from '../../domain/entities';
import { CodeSymbol, isAlias, isIndexer, SourceLocation, SymbolKind } from '../../domain/symbols';
import { spanKey } from '../../domain/TextSpan';
import { ISolution } from '../ports/ISolution';
import { DocumentSpan, SpanResolver } from './SpanResolver';

interface SpanCandidate {
  location: SourceLocation;
  isDefinition: boolean;
}

export function shouldIncludeDefinition(symbol: CodeSymbol): boolean {
  switch (symbol.kind) {
    case SymbolKind.Namespace:
      return false;
    case SymbolKind.NamedType:
      return !symbol.isScriptClass;
    case SymbolKind.Parameter:
      // The indexer's accessor parameter already receives the references.
      return !isIndexer(symbol.containingSymbol);
    default:
      return true;
  }
}

export class HighlightSpanBuilder<TRoot, TNode> {
  constructor(
    private readonly solution: ISolution,
    private readonly spanResolver: SpanResolver<TRoot, TNode>,
  ) {}

  async build(
    symbol: CodeSymbol,
    references: readonly ReferencedSymbol[],
    additionalReferences: readonly SourceLocation[],
    documentIds: ReadonlySet<DocumentId>,
    token: CancellationToken,
  ): Promise<DocumentHighlights[]> {
    const candidates = this.collectCandidates(symbol, references, additionalReferences, documentIds);

    const resolved = await Promise.all(candidates.map((c) => this.tryResolveSpan(c.location, token)));
    throwIfCancellationRequested(token);

    // Merge in candidate order: definitions always precede references, so the
    // first classification recorded for a span is the one that is kept.
    const seen = new Set<string>();
    const byDocument = new Map<DocumentId, HighlightSpan[]>();
    resolved.forEach((documentSpan, index) => {
      if (!documentSpan) {
        return;
      }
      const key = `${documentSpan.documentId}\u0000${spanKey(documentSpan.span)}`;
      if (seen.has(key)) {
        return;
      }
      seen.add(key);

      const spans = byDocument.get(documentSpan.documentId) ?? [];
      spans.push({ span: documentSpan.span, isDefinition: candidates[index].isDefinition });
      byDocument.set(documentSpan.documentId, spans);
    });

    return [...byDocument].map(([documentId, highlightSpans]) => ({ documentId, highlightSpans }));
  }

  private collectCandidates(
    symbol: CodeSymbol,
    references: readonly ReferencedSymbol[],
    additionalReferences: readonly SourceLocation[],
    documentIds: ReadonlySet<DocumentId>,
  ): SpanCandidate[] {
    const candidates: SpanCandidate[] = [];
    let addAllDefinitions = true;

    // An alias highlights its own declaration, never the declaration of its target.
    if (isAlias(symbol) && symbol.locations.length > 0) {
      candidates.push({ location: symbol.locations[0], isDefinition: true });
      addAllDefinitions = false;
    }

    for (const reference of references) {
      if (addAllDefinitions && shouldIncludeDefinition(reference.definition)) {
        for (const location of reference.definition.locations) {
          if (location.isInSource && this.isInScope(location, documentIds)) {
            candidates.push({ location, isDefinition: true });
          }
        }
      }
    }

    for (const reference of references) {
      for (const referenceLocation of reference.locations) {
        candidates.push({ location: referenceLocation.location, isDefinition: false });
      }
    }

    for (const location of additionalReferences) {
      candidates.push({ location, isDefinition: false });
    }

    return candidates;
  }

  private isInScope(location: SourceLocation, documentIds: ReadonlySet<DocumentId>): boolean {
    const documentId = this.solution.getDocumentIdForTree(location.treeId);
    return documentId !== undefined && documentIds.has(documentId);
  }

  private async tryResolveSpan(
    location: SourceLocation,
    token: CancellationToken,
  ): Promise<DocumentSpan | undefined> {
    try {
      return await this.spanResolver.resolveSpan(location, token);
    } catch (e) {
      if (isCancellationError(e)) {
        throw e;
      }
      console.warn(`Failed to resolve highlight span in ${location.treeId}:`, e);
      return undefined;
    }
  }
}
