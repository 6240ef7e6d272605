import { ReferencedSymbol } from '../../domain/entities';
import { AliasSymbol, CodeSymbol } from '../../domain/symbols';

export interface IReferenceFilters {
  filterUnreferencedSyntheticDefinitions(references: ReferencedSymbol[]): ReferencedSymbol[];
  filterNonMatchingMethodNames(references: ReferencedSymbol[], symbol: CodeSymbol): ReferencedSymbol[];
  filterToAliasMatches(references: ReferencedSymbol[], alias: AliasSymbol | undefined): ReferencedSymbol[];
}
