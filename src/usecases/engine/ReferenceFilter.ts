import { ReferencedSymbol } from '../../domain/entities';
import { throwIfNull } from '../../domain/contract';
import { CodeSymbol, getOriginalDefinition, isAlias, isConstructor } from '../../domain/symbols';
import { IReferenceFilters } from '../ports/IReferenceFilters';

export class ReferenceFilter {
  constructor(private readonly filters: IReferenceFilters) {}

  /** Each step narrows the previous result, so the order is fixed. */
  filter(references: ReferencedSymbol[], symbol: CodeSymbol | undefined): ReferencedSymbol[] {
    throwIfNull(symbol, 'A resolved symbol is required to filter references');

    let result = this.filters.filterUnreferencedSyntheticDefinitions(references);
    result = this.filters.filterNonMatchingMethodNames(result, symbol);
    result = this.filters.filterToAliasMatches(result, isAlias(symbol) ? symbol : undefined);

    if (isConstructor(symbol)) {
      const original = getOriginalDefinition(symbol);
      result = result.filter((r) => getOriginalDefinition(r.definition) === original);
    }

    return result;
  }
}
