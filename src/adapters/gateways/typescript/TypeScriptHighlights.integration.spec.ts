import { CancellationToken } from 'vscode-languageserver-protocol';
import { DocumentHighlights } from '../../../domain/entities';
import { SymbolKind } from '../../../domain/symbols';
import { GetDocumentHighlightsUseCase } from '../../../usecases/engine/GetDocumentHighlightsUseCase';
import { createTypeScriptHighlightDependencies } from './index';
import { TsSemanticModelProvider } from './TsSemanticModelProvider';
import { DEFAULT_COMPILER_OPTIONS, TsWorkspace } from './TsWorkspace';

const token = CancellationToken.None;

function createWorkspace(files: Record<string, string>): TsWorkspace {
  return new TsWorkspace('/proj', { ...DEFAULT_COMPILER_OPTIONS, noLib: true, types: [] }, Object.entries(files));
}

function spansOf(result: DocumentHighlights[], documentId: string) {
  const document = result.find((d) => d.documentId === documentId);
  return [...(document?.highlightSpans ?? [])]
    .map((h) => ({ start: h.span.start, length: h.span.length, isDefinition: h.isDefinition }))
    .sort((a, b) => a.start - b.start);
}

describe('TypeScript document highlights', () => {
  it('should highlight a local variable', async () => {
    const workspace = createWorkspace({ 'src/a.ts': 'const x = 1;\nconst y = x + x;\n' });
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));

    const result = await engine.execute('/proj/src/a.ts', 6, ['/proj/src/a.ts'], token);

    expect(result.map((d) => d.documentId)).toEqual(['/proj/src/a.ts']);
    expect(spansOf(result, '/proj/src/a.ts')).toEqual([
      { start: 6, length: 1, isDefinition: true },
      { start: 23, length: 1, isDefinition: false },
      { start: 27, length: 1, isDefinition: false },
    ]);
  });

  it('should find the symbol when the position is just past the identifier', async () => {
    const workspace = createWorkspace({ 'src/a.ts': 'const x = 1;\nconst y = x + x;\n' });
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));

    const result = await engine.execute('/proj/src/a.ts', 24, ['/proj/src/a.ts'], token);

    expect(spansOf(result, '/proj/src/a.ts')).toHaveLength(3);
  });

  it('should return nothing on whitespace', async () => {
    const workspace = createWorkspace({ 'src/a.ts': 'const x = 1;\n\n\nconst y = x;\n' });
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));

    await expect(engine.execute('/proj/src/a.ts', 14, ['/proj/src/a.ts'], token)).resolves.toEqual([]);
  });

  it('should highlight a renamed import through its alias only', async () => {
    const workspace = createWorkspace({
      'src/a.ts': "import { Foo as Bar } from './b';\nconst v = new Bar();\n",
      'src/b.ts': 'export class Foo {}\n',
    });
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));

    const result = await engine.execute('/proj/src/a.ts', 16, ['/proj/src/a.ts', '/proj/src/b.ts'], token);
    const spans = spansOf(result, '/proj/src/a.ts');

    expect(spans).toEqual([
      { start: 16, length: 3, isDefinition: true },
      { start: 48, length: 3, isDefinition: false },
    ]);
    expect(spansOf(result, '/proj/src/b.ts')).toEqual([]);
  });

  it('should add the constructor keyword to the highlights of a class', async () => {
    const workspace = createWorkspace({
      'src/a.ts': 'class Foo {\n  constructor() {}\n}\nconst f = new Foo();\n',
    });
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));

    const result = await engine.execute('/proj/src/a.ts', 6, ['/proj/src/a.ts'], token);

    expect(spansOf(result, '/proj/src/a.ts')).toEqual([
      { start: 6, length: 3, isDefinition: true },
      { start: 14, length: 11, isDefinition: false },
      { start: 47, length: 3, isDefinition: false },
    ]);
  });

  it('should follow an import into another document in scope', async () => {
    const workspace = createWorkspace({
      'src/a.ts': 'export function f() {}\nf();\n',
      'src/b.ts': "import { f } from './a';\nf();\n",
    });
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));

    const result = await engine.execute('/proj/src/a.ts', 16, ['/proj/src/a.ts', '/proj/src/b.ts'], token);

    expect(spansOf(result, '/proj/src/a.ts')).toContainEqual({ start: 16, length: 1, isDefinition: true });
    expect(spansOf(result, '/proj/src/b.ts')).toContainEqual({ start: 25, length: 1, isDefinition: false });
  });

  it('should only search the documents in scope', async () => {
    const workspace = createWorkspace({
      'src/a.ts': 'export function f() {}\nf();\n',
      'src/b.ts': "import { f } from './a';\nf();\n",
    });
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));

    const result = await engine.execute('/proj/src/a.ts', 16, ['/proj/src/a.ts'], token);

    expect(result.map((d) => d.documentId)).toEqual(['/proj/src/a.ts']);
    expect(spansOf(result, '/proj/src/a.ts')).toEqual([
      { start: 16, length: 1, isDefinition: true },
      { start: 23, length: 1, isDefinition: false },
    ]);
  });

  it('should see edits made after the first query', async () => {
    const workspace = createWorkspace({ 'src/a.ts': 'const x = 1;\nconst y = x + x;\n' });
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));
    await engine.execute('/proj/src/a.ts', 6, ['/proj/src/a.ts'], token);

    workspace.updateDocument('/proj/src/a.ts', 'const x = 1;\nconst y = x;\n');
    const result = await engine.execute('/proj/src/a.ts', 6, ['/proj/src/a.ts'], token);

    expect(spansOf(result, '/proj/src/a.ts')).toEqual([
      { start: 6, length: 1, isDefinition: true },
      { start: 23, length: 1, isDefinition: false },
    ]);
  });
});

describe('TsSemanticModelProvider', () => {
  let workspace: TsWorkspace;
  let provider: TsSemanticModelProvider;
  const a = '/proj/src/a.ts';
  const span = { start: 6, length: 0 };

  beforeEach(() => {
    workspace = createWorkspace({
      'src/a.ts': 'const x = 1;\nconst y = x + x;\n',
      'src/b.ts': 'export const z = 2;\n',
    });
    provider = new TsSemanticModelProvider(workspace);
  });

  it('should use the current model when nothing changed', async () => {
    const speculative = await provider.getSpeculativeModel(a, span, token);

    expect(await provider.getSemanticModel(a, token)).toBe(speculative);
  });

  it('should keep a stale speculative model while only other documents changed', async () => {
    const before = await provider.getSemanticModel(a, token);
    workspace.updateDocument('/proj/src/b.ts', 'export const z = 3;\n');

    const speculative = await provider.getSpeculativeModel(a, span, token);
    const current = await provider.getSemanticModel(a, token);

    expect(speculative).toBe(before);
    expect(current).not.toBe(speculative);
  });

  it('should drop the speculative model once the document itself changed', async () => {
    await provider.getSemanticModel(a, token);
    workspace.updateDocument(a, 'const x = 2;\n');

    const speculative = await provider.getSpeculativeModel(a, span, token);

    expect(await provider.getSemanticModel(a, token)).toBe(speculative);
  });

  it('should map the symbol at a position', async () => {
    const model = await provider.getSemanticModel(a, token);

    const symbol = await provider.findSymbolAtPosition(model, 6, token);

    expect(symbol).toMatchObject({ kind: SymbolKind.Local, name: 'x' });
    expect(await provider.findSymbolAtPosition(model, 23, token)).toBe(symbol);
  });
});
