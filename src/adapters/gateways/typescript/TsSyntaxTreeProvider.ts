import * as ts from 'typescript';
import { CancellationToken } from 'vscode-languageserver-protocol';
import { throwIfCancellationRequested } from '../../../domain/cancellation';
import { ISyntaxTreeProvider, SyntaxToken } from '../../../usecases/ports/ISyntaxTreeProvider';
import { findTokenNode, getNodeSpan } from './nodes';
import { TsWorkspace } from './TsWorkspace';

export class TsSyntaxTreeProvider implements ISyntaxTreeProvider<ts.SourceFile, ts.Node> {
  constructor(private readonly workspace: TsWorkspace) {}

  async getRoot(treeId: string, token: CancellationToken): Promise<ts.SourceFile> {
    throwIfCancellationRequested(token);
    const sourceFile = this.workspace.getProgramContext().program.getSourceFile(treeId);
    if (!sourceFile) {
      throw new Error(`No syntax tree for ${treeId}`);
    }
    return sourceFile;
  }

  findToken(root: ts.SourceFile, position: number, findInsideTrivia: boolean): SyntaxToken<ts.Node> {
    const node = findTokenNode(root, position, findInsideTrivia);
    return {
      span: getNodeSpan(node, root),
      parent: node === root ? undefined : node.parent,
    };
  }
}
