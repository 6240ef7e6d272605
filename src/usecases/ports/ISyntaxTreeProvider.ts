import { CancellationToken } from 'vscode-languageserver-protocol';
import { TextSpan } from '../../domain/TextSpan';

export interface SyntaxToken<TNode> {
  readonly span: TextSpan;
  readonly parent: TNode | undefined;
}

export interface ISyntaxTreeProvider<TRoot, TNode> {
  getRoot(treeId: string, token: CancellationToken): Promise<TRoot>;
  /**
   * Token containing `position`. With `findInsideTrivia` the search descends
   * into structured trivia such as documentation comments.
   */
  findToken(root: TRoot, position: number, findInsideTrivia: boolean): SyntaxToken<TNode>;
}
