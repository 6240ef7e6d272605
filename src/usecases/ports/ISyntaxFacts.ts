export interface ISyntaxFacts<TNode> {
  readonly isCaseSensitive: boolean;
  isGenericName(node: TNode | undefined): boolean;
  isIndexerMemberCref(node: TNode | undefined): boolean;
}
