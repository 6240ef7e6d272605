import * as fs from 'fs/promises';
import * as path from 'path';
import * as ts from 'typescript';
import { DocumentId } from '../../../domain/entities';
import { DocumentNotFoundError, InvalidPositionError } from '../../../domain/errors';
import { ProjectFileScanner } from '../../../infrastructure/file/ProjectFileScanner';
import { IDocumentRepository } from '../../../usecases/ports/IDocumentRepository';
import { ISolution } from '../../../usecases/ports/ISolution';
import { TsProgramContext } from './TsProgramContext';

/** Also the line map source for `ts.getLineAndCharacterOfPosition`, which caches on it. */
interface WorkspaceDocument extends ts.SourceFileLike {
  readonly text: string;
  readonly version: number;
}

export const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2020,
  module: ts.ModuleKind.CommonJS,
  moduleResolution: ts.ModuleResolutionKind.Node10,
  allowJs: true,
  jsx: ts.JsxEmit.Preserve,
};

export function readCompilerOptions(rootPath: string): ts.CompilerOptions {
  const configPath = ts.findConfigFile(rootPath, ts.sys.fileExists, 'tsconfig.json');
  if (!configPath) {
    return DEFAULT_COMPILER_OPTIONS;
  }

  const { config, error } = ts.readConfigFile(configPath, ts.sys.readFile);
  if (error) {
    console.warn(
      `Failed to read ${configPath}, using default compiler options:`,
      ts.flattenDiagnosticMessageText(error.messageText, '\n'),
    );
    return DEFAULT_COMPILER_OPTIONS;
  }

  const parsed = ts.parseJsonConfigFileContent(config, ts.sys, path.dirname(configPath));
  return { ...parsed.options, allowJs: parsed.options.allowJs ?? true, noEmit: true };
}

/**
 * Documents of one project held in memory, with a TypeScript language
 * service over them. Document ids are absolute file names.
 */
export class TsWorkspace implements ISolution, IDocumentRepository {
  readonly languageService: ts.LanguageService;
  private readonly documents = new Map<DocumentId, WorkspaceDocument>();
  private readonly contexts = new WeakMap<ts.Program, TsProgramContext>();
  private lastContext: TsProgramContext | null = null;

  constructor(
    readonly rootPath: string,
    private readonly compilerOptions: ts.CompilerOptions,
    files: Iterable<[string, string]>,
  ) {
    for (const [fileName, text] of files) {
      this.documents.set(this.resolveDocumentId(fileName), { text, version: 1 });
    }

    const host: ts.LanguageServiceHost = {
      getCompilationSettings: () => this.compilerOptions,
      getScriptFileNames: () => [...this.documents.keys()],
      getScriptVersion: (fileName) => String(this.documents.get(fileName)?.version ?? 0),
      getScriptSnapshot: (fileName) => {
        const text = this.documents.get(fileName)?.text ?? ts.sys.readFile(fileName);
        return text === undefined ? undefined : ts.ScriptSnapshot.fromString(text);
      },
      getCurrentDirectory: () => this.rootPath,
      getDefaultLibFileName: (options) => ts.getDefaultLibFilePath(options),
      fileExists: (fileName) => this.documents.has(fileName) || ts.sys.fileExists(fileName),
      readFile: (fileName, encoding) => this.documents.get(fileName)?.text ?? ts.sys.readFile(fileName, encoding),
      readDirectory: ts.sys.readDirectory,
      directoryExists: (directoryName) => this.directoryExists(directoryName),
      getDirectories: (directoryName) => this.getDirectories(directoryName),
    };
    this.languageService = ts.createLanguageService(host, ts.createDocumentRegistry());
  }

  static async load(rootPath: string, scanner: ProjectFileScanner): Promise<TsWorkspace> {
    const compilerOptions = readCompilerOptions(rootPath);
    const fileNames = await scanner.scan(rootPath);

    const files: [string, string][] = [];
    for (const fileName of fileNames) {
      try {
        files.push([fileName, await fs.readFile(fileName, 'utf-8')]);
      } catch (e) {
        console.warn(`Failed to read ${fileName}:`, e);
      }
    }

    return new TsWorkspace(rootPath, compilerOptions, files);
  }

  /** Context of the program for the current document versions; rebuilds when needed. */
  getProgramContext(): TsProgramContext {
    const program = this.languageService.getProgram();
    if (!program) {
      throw new Error('TypeScript language service has no program');
    }

    let context = this.contexts.get(program);
    if (!context) {
      const versions = new Map([...this.documents].map(([id, doc]) => [id, doc.version] as const));
      context = new TsProgramContext(program, versions, (fileName) => this.documents.has(fileName));
      this.contexts.set(program, context);
    }
    this.lastContext = context;
    return context;
  }

  /** Context of the last program built, without checking whether documents changed since. */
  getLastProgramContext(): TsProgramContext {
    return this.lastContext ?? this.getProgramContext();
  }

  getVersion(documentId: DocumentId): number | undefined {
    return this.documents.get(documentId)?.version;
  }

  // ISolution

  getDocumentIdForTree(treeId: string): DocumentId | undefined {
    return this.documents.has(treeId) ? treeId : undefined;
  }

  getTextLength(documentId: DocumentId): number | undefined {
    return this.documents.get(documentId)?.text.length;
  }

  // IDocumentRepository

  resolveDocumentId(filePath: string): DocumentId {
    return path.resolve(this.rootPath, filePath).split(path.sep).join('/');
  }

  hasDocument(documentId: DocumentId): boolean {
    return this.documents.has(documentId);
  }

  listDocuments(): DocumentId[] {
    return [...this.documents.keys()];
  }

  updateDocument(documentId: DocumentId, text: string): void {
    const document = this.documents.get(documentId);
    if (document) {
      this.documents.set(documentId, { text, version: document.version + 1 });
    } else {
      this.documents.set(documentId, { text, version: 1 });
    }
  }

  getOffset(documentId: DocumentId, line: number, character: number): number {
    const document = this.requireDocument(documentId);
    const lastLine = ts.getLineAndCharacterOfPosition(document, document.text.length).line;
    if (!Number.isInteger(line) || !Number.isInteger(character) || line < 1 || line - 1 > lastLine || character < 1) {
      throw new InvalidPositionError(documentId, `${line}:${character}`);
    }

    const offset = ts.getPositionOfLineAndCharacter(document, line - 1, 0) + character - 1;
    // The line break belongs to its line; the offset after it is the next line's.
    const isPastEnd =
      line - 1 < lastLine
        ? offset >= ts.getPositionOfLineAndCharacter(document, line, 0)
        : offset > document.text.length;
    if (isPastEnd) {
      throw new InvalidPositionError(documentId, `${line}:${character}`);
    }
    return offset;
  }

  getLineAndCharacter(documentId: DocumentId, offset: number): { line: number; character: number } {
    const document = this.requireDocument(documentId);
    const { line, character } = ts.getLineAndCharacterOfPosition(document, offset);
    return { line: line + 1, character: character + 1 };
  }

  /** Directories holding a document count as existing, even with nothing on disk. */
  directoryExists(directoryName: string): boolean {
    const prefix = this.toDirectoryPrefix(directoryName);
    for (const documentId of this.documents.keys()) {
      if (documentId.startsWith(prefix)) {
        return true;
      }
    }
    return ts.sys.directoryExists(directoryName);
  }

  getDirectories(directoryName: string): string[] {
    const names = new Set(ts.sys.directoryExists(directoryName) ? ts.sys.getDirectories(directoryName) : []);
    const prefix = this.toDirectoryPrefix(directoryName);
    for (const documentId of this.documents.keys()) {
      if (!documentId.startsWith(prefix)) {
        continue;
      }
      const rest = documentId.slice(prefix.length);
      const slash = rest.indexOf('/');
      if (slash > 0) {
        names.add(rest.slice(0, slash));
      }
    }
    return [...names];
  }

  toRelativePath(documentId: DocumentId): string {
    return path.relative(this.rootPath, documentId).split(path.sep).join('/');
  }

  private requireDocument(documentId: DocumentId): WorkspaceDocument {
    const document = this.documents.get(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    return document;
  }

  private toDirectoryPrefix(directoryName: string): string {
    const directory = this.resolveDocumentId(directoryName);
    return directory.endsWith('/') ? directory : `${directory}/`;
  }
}
