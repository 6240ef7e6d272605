import { DocumentNotFoundError, InvalidPositionError } from '../../../domain/errors';
import { DEFAULT_COMPILER_OPTIONS, TsWorkspace } from './TsWorkspace';

describe('TsWorkspace', () => {
  let workspace: TsWorkspace;

  beforeEach(() => {
    workspace = new TsWorkspace('/proj', { ...DEFAULT_COMPILER_OPTIONS, noLib: true, types: [] }, [
      ['src/a.ts', 'const x = 1;\nconst y = x + x;\n'],
      ['/proj/src/b.ts', 'export const z = 2;\r\n'],
    ]);
  });

  it('should key documents by absolute path', () => {
    expect(workspace.listDocuments()).toEqual(['/proj/src/a.ts', '/proj/src/b.ts']);
    expect(workspace.resolveDocumentId('src/a.ts')).toBe('/proj/src/a.ts');
    expect(workspace.toRelativePath('/proj/src/a.ts')).toBe('src/a.ts');
  });

  it('should map documents to their own trees only', () => {
    expect(workspace.getDocumentIdForTree('/proj/src/a.ts')).toBe('/proj/src/a.ts');
    expect(workspace.getDocumentIdForTree('/lib/lib.d.ts')).toBeUndefined();
    expect(workspace.getTextLength('/proj/src/a.ts')).toBe(30);
    expect(workspace.getTextLength('/proj/src/missing.ts')).toBeUndefined();
  });

  it('should convert 1-based line and character to offsets and back', () => {
    expect(workspace.getOffset('/proj/src/a.ts', 2, 11)).toBe(23);
    expect(workspace.getLineAndCharacter('/proj/src/a.ts', 23)).toEqual({ line: 2, character: 11 });
    expect(workspace.getOffset('/proj/src/a.ts', 1, 13)).toBe(12);
  });

  it('should reject positions outside the document', () => {
    expect(() => workspace.getOffset('/proj/src/a.ts', 4, 1)).toThrow(InvalidPositionError);
    expect(() => workspace.getOffset('/proj/src/a.ts', 1, 15)).toThrow(
      'Position 1:15 is outside of /proj/src/a.ts',
    );
  });

  it('should keep a line break on its own line', () => {
    expect(() => workspace.getOffset('/proj/src/a.ts', 1, 14)).toThrow(InvalidPositionError);
    expect(workspace.getOffset('/proj/src/a.ts', 3, 1)).toBe(30);
    expect(() => workspace.getOffset('/proj/src/a.ts', 3, 2)).toThrow(InvalidPositionError);
    expect(workspace.getOffset('/proj/src/b.ts', 1, 21)).toBe(20);
    expect(() => workspace.getOffset('/proj/src/b.ts', 1, 22)).toThrow(InvalidPositionError);
    expect(workspace.getLineAndCharacter('/proj/src/b.ts', 21)).toEqual({ line: 2, character: 1 });
  });

  it('should see directories of in-memory documents', () => {
    expect(workspace.directoryExists('/proj/src')).toBe(true);
    expect(workspace.directoryExists('/proj')).toBe(true);
    expect(workspace.directoryExists('src/')).toBe(true);
    expect(workspace.directoryExists('/proj/lib')).toBe(false);
    expect(workspace.getDirectories('/proj')).toContain('src');
    expect(workspace.getDirectories('/proj/src')).toEqual([]);
  });

  it('should reject unknown documents', () => {
    expect(() => workspace.getOffset('/proj/src/missing.ts', 1, 1)).toThrow(DocumentNotFoundError);
  });

  it('should bump the version of an updated document', () => {
    workspace.updateDocument('/proj/src/a.ts', 'let x;\n');
    workspace.updateDocument('/proj/src/c.ts', 'let c;\n');

    expect(workspace.getVersion('/proj/src/a.ts')).toBe(2);
    expect(workspace.getVersion('/proj/src/c.ts')).toBe(1);
    expect(workspace.getTextLength('/proj/src/a.ts')).toBe(7);
    expect(workspace.getLineAndCharacter('/proj/src/a.ts', 4)).toEqual({ line: 1, character: 5 });
  });

  it('should reuse the program context until a document changes', () => {
    const first = workspace.getProgramContext();

    expect(workspace.getProgramContext()).toBe(first);

    workspace.updateDocument('/proj/src/b.ts', 'export const z = 3;\n');
    const second = workspace.getProgramContext();

    expect(second).not.toBe(first);
    expect(second.versionOf('/proj/src/b.ts')).toBe(2);
    expect(first.versionOf('/proj/src/b.ts')).toBe(1);
  });
});
