import { ReferencedSymbol } from '../../domain/entities';
import { AliasSymbol, CodeSymbol, isOrdinaryMethod, symbolsEqual } from '../../domain/symbols';
import { IReferenceFilters } from '../ports/IReferenceFilters';
import { ISyntaxFacts } from '../ports/ISyntaxFacts';

export class ReferenceFilters implements IReferenceFilters {
  constructor(private readonly syntaxFacts: Pick<ISyntaxFacts<unknown>, 'isCaseSensitive'>) {}

  filterUnreferencedSyntheticDefinitions(references: ReferencedSymbol[]): ReferencedSymbol[] {
    return references.filter((r) => r.locations.length > 0 || !r.definition.isImplicitlyDeclared);
  }

  /**
   * The search cascades from a method to related methods (overrides,
   * interface implementations); only those sharing the name are highlighted.
   */
  filterNonMatchingMethodNames(references: ReferencedSymbol[], symbol: CodeSymbol): ReferencedSymbol[] {
    if (!isOrdinaryMethod(symbol)) {
      return references;
    }

    return references.filter(
      (r) => !isOrdinaryMethod(r.definition) || this.namesEqual(r.definition.name, symbol.name),
    );
  }

  filterToAliasMatches(references: ReferencedSymbol[], alias: AliasSymbol | undefined): ReferencedSymbol[] {
    if (!alias) {
      return references;
    }

    const result: ReferencedSymbol[] = [];
    for (const reference of references) {
      const aliasLocations = reference.locations.filter(
        (l) => l.alias !== undefined && symbolsEqual(l.alias, alias),
      );
      if (aliasLocations.length > 0) {
        result.push({ definition: reference.definition, locations: aliasLocations });
      }
    }
    return result;
  }

  private namesEqual(a: string, b: string): boolean {
    return this.syntaxFacts.isCaseSensitive
      ? a === b
      : a.localeCompare(b, undefined, { sensitivity: 'accent' }) === 0;
  }
}
