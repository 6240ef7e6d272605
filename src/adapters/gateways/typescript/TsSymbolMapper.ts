import * as ts from 'typescript';
import {
  AliasSymbol,
  CodeSymbol,
  MethodKind,
  PropertySymbol,
  SourceLocation,
  SymbolKind,
} from '../../../domain/symbols';
import { getDeclarationNameNode, getNodeSpan } from './nodes';

/**
 * Maps compiler symbols of one program to engine symbols. The cache makes
 * mapping idempotent, so identity comparisons between mapped symbols hold.
 */
export class TsSymbolMapper {
  private readonly symbols = new Map<ts.Symbol, CodeSymbol>();
  private readonly tsSymbols = new Map<CodeSymbol, ts.Symbol>();
  private readonly indexers = new Map<ts.Node, PropertySymbol>();

  constructor(
    private readonly checker: ts.TypeChecker,
    private readonly isInSource: (fileName: string) => boolean,
  ) {}

  map(symbol: ts.Symbol): CodeSymbol {
    const cached = this.symbols.get(symbol);
    if (cached) {
      return cached;
    }

    const mapped = this.create(symbol);
    this.symbols.set(symbol, mapped);
    this.tsSymbols.set(mapped, symbol);
    return mapped;
  }

  /** The compiler symbol a mapped symbol came from, if it came from this mapper. */
  getTsSymbol(symbol: CodeSymbol): ts.Symbol | undefined {
    return this.tsSymbols.get(symbol);
  }

  private create(symbol: ts.Symbol): CodeSymbol {
    const flags = symbol.flags;
    const declarations = symbol.declarations ?? [];
    const base = {
      name: symbol.getName(),
      locations: declarations.map((d) => this.toLocation(d)),
      isImplicitlyDeclared: declarations.length === 0,
      originalDefinition: this.getOriginalDefinition(symbol),
    };

    if (flags & ts.SymbolFlags.Alias) {
      const alias: AliasSymbol = { ...base, kind: SymbolKind.Alias };
      return alias;
    }
    if (flags & ts.SymbolFlags.Constructor) {
      return { ...base, kind: SymbolKind.Method, methodKind: MethodKind.Constructor };
    }
    if (flags & (ts.SymbolFlags.Method | ts.SymbolFlags.Function)) {
      return { ...base, kind: SymbolKind.Method, methodKind: getMethodKind(declarations[0]) };
    }
    if (flags & (ts.SymbolFlags.Class | ts.SymbolFlags.Interface | ts.SymbolFlags.Enum | ts.SymbolFlags.TypeAlias)) {
      return { ...base, kind: SymbolKind.NamedType, isScriptClass: false };
    }
    if (flags & ts.SymbolFlags.Module) {
      return { ...base, kind: SymbolKind.Namespace };
    }
    if (flags & ts.SymbolFlags.TypeParameter) {
      return { ...base, kind: SymbolKind.TypeParameter };
    }
    if (flags & ts.SymbolFlags.Signature) {
      return { ...base, kind: SymbolKind.Property, isIndexer: symbol.getName() === ts.InternalSymbolName.Index };
    }
    // Accessors belong to the property they declare, which is what gets highlighted.
    if (flags & (ts.SymbolFlags.Property | ts.SymbolFlags.Accessor)) {
      return { ...base, kind: SymbolKind.Property, isIndexer: false };
    }
    if (flags & ts.SymbolFlags.EnumMember) {
      return { ...base, kind: SymbolKind.Field };
    }

    const parameter = declarations.find(ts.isParameter);
    if (parameter) {
      return {
        ...base,
        kind: SymbolKind.Parameter,
        containingSymbol: ts.isIndexSignatureDeclaration(parameter.parent)
          ? this.getIndexer(parameter.parent)
          : undefined,
      };
    }
    if (flags & ts.SymbolFlags.Variable) {
      return { ...base, kind: SymbolKind.Local };
    }
    return { ...base, kind: SymbolKind.Other };
  }

  private toLocation(declaration: ts.Declaration): SourceLocation {
    const sourceFile = declaration.getSourceFile();
    return {
      treeId: sourceFile.fileName,
      span: getNodeSpan(getDeclarationNameNode(declaration, sourceFile), sourceFile),
      isInSource: this.isInSource(sourceFile.fileName),
    };
  }

  private getOriginalDefinition(symbol: ts.Symbol): CodeSymbol | undefined {
    // Instantiated members of generic types point back at their declared symbol.
    const roots = this.checker.getRootSymbols(symbol);
    if (roots.length === 1 && roots[0] !== symbol) {
      return this.map(roots[0]);
    }
    return undefined;
  }

  private getIndexer(signature: ts.IndexSignatureDeclaration): PropertySymbol {
    const cached = this.indexers.get(signature);
    if (cached) {
      return cached;
    }
    const indexer: PropertySymbol = {
      kind: SymbolKind.Property,
      name: ts.InternalSymbolName.Index,
      locations: [this.toLocation(signature)],
      isImplicitlyDeclared: false,
      isIndexer: true,
    };
    this.indexers.set(signature, indexer);
    return indexer;
  }
}

function getMethodKind(declaration: ts.Declaration | undefined): MethodKind {
  if (declaration && (ts.isArrowFunction(declaration) || (ts.isFunctionExpression(declaration) && !declaration.name))) {
    return MethodKind.AnonymousFunction;
  }
  return MethodKind.Ordinary;
}
