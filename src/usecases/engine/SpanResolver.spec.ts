import { CancellationToken } from 'vscode-languageserver-protocol';
import { loc } from '../../test/builders';
import { ILanguageServices } from '../ports/ILanguageServices';
import { ISolution } from '../ports/ISolution';
import { SpanResolver } from './SpanResolver';

type FakeNode = 'generic-name' | 'indexer-cref' | 'identifier';

describe('SpanResolver', () => {
  let resolver: SpanResolver<string, FakeNode>;
  let solution: ISolution;
  let language: ILanguageServices<string, FakeNode>;
  let parent: FakeNode;
  const token = CancellationToken.None;

  beforeEach(() => {
    parent = 'identifier';
    solution = {
      getDocumentIdForTree: (treeId) => (treeId === 'lib.d.ts' ? undefined : treeId),
      getTextLength: () => 100,
    };
    language = {
      syntaxFacts: {
        isCaseSensitive: true,
        isGenericName: (node) => node === 'generic-name',
        isIndexerMemberCref: (node) => node === 'indexer-cref',
      },
      syntaxTrees: {
        getRoot: jest.fn(async (treeId: string) => `root:${treeId}`),
        findToken: jest.fn(() => ({ span: { start: 10, length: 12 }, parent })),
      },
      additionalReferences: { getAdditionalReferences: jest.fn() },
    };
    resolver = new SpanResolver(solution, language);
  });

  it('should keep the location span for plain identifiers', async () => {
    const result = await resolver.resolveSpan(loc('a.ts', 10, 4), token);

    expect(result).toEqual({ documentId: 'a.ts', span: { start: 10, length: 4 } });
    expect(language.syntaxTrees.findToken).toHaveBeenCalledWith('root:a.ts', 10, true);
  });

  it('should use the token span for generic names', async () => {
    parent = 'generic-name';

    const result = await resolver.resolveSpan(loc('a.ts', 10, 4), token);

    expect(result).toEqual({ documentId: 'a.ts', span: { start: 10, length: 12 } });
  });

  it('should use the token span for indexer member crefs', async () => {
    parent = 'indexer-cref';

    const result = await resolver.resolveSpan(loc('a.ts', 10, 4), token);

    expect(result).toEqual({ documentId: 'a.ts', span: { start: 10, length: 12 } });
  });

  it('should return undefined for trees outside the solution', async () => {
    const result = await resolver.resolveSpan(loc('lib.d.ts', 10, 4), token);

    expect(result).toBeUndefined();
    expect(language.syntaxTrees.getRoot).not.toHaveBeenCalled();
  });
});
