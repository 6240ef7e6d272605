import { TextSpan } from './TextSpan';

export enum SymbolKind {
  Alias = 'Alias',
  Event = 'Event',
  Field = 'Field',
  Local = 'Local',
  Method = 'Method',
  NamedType = 'NamedType',
  Namespace = 'Namespace',
  Parameter = 'Parameter',
  Property = 'Property',
  TypeParameter = 'TypeParameter',
  Other = 'Other',
}

export enum MethodKind {
  Ordinary = 'Ordinary',
  Constructor = 'Constructor',
  AnonymousFunction = 'AnonymousFunction',
  PropertyGet = 'PropertyGet',
  PropertySet = 'PropertySet',
  EventAdd = 'EventAdd',
  EventRemove = 'EventRemove',
  EventRaise = 'EventRaise',
}

/**
 * A position in a syntax tree. `treeId` is resolved to a document by the
 * solution; locations in metadata or library files have `isInSource = false`.
 */
export interface SourceLocation {
  readonly treeId: string;
  readonly span: TextSpan;
  readonly isInSource: boolean;
}

interface SymbolBase {
  readonly name: string;
  readonly locations: readonly SourceLocation[];
  /** Compiler-synthesized, with no declaration written by the user. */
  readonly isImplicitlyDeclared: boolean;
  readonly containingSymbol?: CodeSymbol;
  /** Unconstructed form of a generic instantiation; absent when the symbol is its own definition. */
  readonly originalDefinition?: CodeSymbol;
}

export interface MethodSymbol extends SymbolBase {
  readonly kind: SymbolKind.Method;
  readonly methodKind: MethodKind;
}

export interface NamedTypeSymbol extends SymbolBase {
  readonly kind: SymbolKind.NamedType;
  /** Implicit container a script file's top-level code is compiled into. */
  readonly isScriptClass: boolean;
}

export interface PropertySymbol extends SymbolBase {
  readonly kind: SymbolKind.Property;
  readonly isIndexer: boolean;
}

export interface AliasSymbol extends SymbolBase {
  readonly kind: SymbolKind.Alias;
}

export interface OtherSymbol extends SymbolBase {
  readonly kind:
    | SymbolKind.Event
    | SymbolKind.Field
    | SymbolKind.Local
    | SymbolKind.Namespace
    | SymbolKind.Parameter
    | SymbolKind.TypeParameter
    | SymbolKind.Other;
}

export type CodeSymbol = MethodSymbol | NamedTypeSymbol | PropertySymbol | AliasSymbol | OtherSymbol;

export function getOriginalDefinition(symbol: CodeSymbol): CodeSymbol {
  return symbol.originalDefinition ?? symbol;
}

export function symbolsEqual(a: CodeSymbol, b: CodeSymbol): boolean {
  return getOriginalDefinition(a) === getOriginalDefinition(b);
}

export function isAlias(symbol: CodeSymbol): symbol is AliasSymbol {
  return symbol.kind === SymbolKind.Alias;
}

export function isConstructor(symbol: CodeSymbol): symbol is MethodSymbol {
  return symbol.kind === SymbolKind.Method && symbol.methodKind === MethodKind.Constructor;
}

export function isOrdinaryMethod(symbol: CodeSymbol): symbol is MethodSymbol {
  return symbol.kind === SymbolKind.Method && symbol.methodKind === MethodKind.Ordinary;
}

export function isIndexer(symbol: CodeSymbol | undefined): boolean {
  return symbol?.kind === SymbolKind.Property && symbol.isIndexer;
}
