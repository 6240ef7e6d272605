import * as ts from 'typescript';
import { CancellationToken } from 'vscode-languageserver-protocol';
import { throwIfCancellationRequested } from '../../../domain/cancellation';
import { DocumentId } from '../../../domain/entities';
import { CodeSymbol, SourceLocation, SymbolKind } from '../../../domain/symbols';
import { IAdditionalReferenceProvider } from '../../../usecases/ports/IAdditionalReferenceProvider';
import { getNodeSpan } from './nodes';
import { TsWorkspace } from './TsWorkspace';

/**
 * A search started from a class name does not report the `constructor`
 * keywords of the class, which still stand for it in source.
 */
export class TsAdditionalReferenceProvider implements IAdditionalReferenceProvider {
  constructor(private readonly workspace: TsWorkspace) {}

  async getAdditionalReferences(
    documentId: DocumentId,
    symbol: CodeSymbol,
    token: CancellationToken,
  ): Promise<SourceLocation[]> {
    throwIfCancellationRequested(token);
    if (symbol.kind !== SymbolKind.NamedType) {
      return [];
    }

    const context = this.workspace.getProgramContext();
    const classSymbol = context.symbols.getTsSymbol(symbol);
    const sourceFile = context.program.getSourceFile(documentId);
    if (!classSymbol || !sourceFile || !(classSymbol.flags & ts.SymbolFlags.Class)) {
      return [];
    }

    const constructorSymbol = classSymbol.members?.get(ts.InternalSymbolName.Constructor);
    const locations: SourceLocation[] = [];
    for (const declaration of constructorSymbol?.declarations ?? []) {
      if (!ts.isConstructorDeclaration(declaration) || declaration.getSourceFile() !== sourceFile) {
        continue;
      }
      const keyword = declaration
        .getChildren(sourceFile)
        .find((child) => child.kind === ts.SyntaxKind.ConstructorKeyword);
      if (keyword) {
        locations.push({ treeId: documentId, span: getNodeSpan(keyword, sourceFile), isInSource: true });
      }
    }
    return locations;
  }
}
