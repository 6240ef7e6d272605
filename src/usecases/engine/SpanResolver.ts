import { CancellationToken } from 'vscode-languageserver-protocol';
import { DocumentId } from '../../domain/entities';
import { SourceLocation } from '../../domain/symbols';
import { TextSpan } from '../../domain/TextSpan';
import { ILanguageServices } from '../ports/ILanguageServices';
import { ISolution } from '../ports/ISolution';

export interface DocumentSpan {
  documentId: DocumentId;
  span: TextSpan;
}

export class SpanResolver<TRoot, TNode> {
  constructor(
    private readonly solution: ISolution,
    private readonly language: ILanguageServices<TRoot, TNode>,
  ) {}

  async resolveSpan(location: SourceLocation, token: CancellationToken): Promise<DocumentSpan | undefined> {
    const documentId = this.solution.getDocumentIdForTree(location.treeId);
    if (documentId === undefined) {
      return undefined;
    }

    const { syntaxTrees, syntaxFacts } = this.language;
    const root = await syntaxTrees.getRoot(location.treeId, token);
    // Search inside trivia too, so references in doc comments land on a token.
    const found = syntaxTrees.findToken(root, location.span.start, true);

    // Generic names and indexer crefs span more than the identifier itself.
    const span =
      syntaxFacts.isGenericName(found.parent) || syntaxFacts.isIndexerMemberCref(found.parent)
        ? found.span
        : location.span;

    return { documentId, span };
  }
}
