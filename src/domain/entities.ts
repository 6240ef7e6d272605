import { CodeSymbol, SourceLocation } from './symbols';
import { TextSpan } from './TextSpan';

/** Document ids are the file names the workspace was loaded with. */
export type DocumentId = string;

export interface ReferenceLocation {
  readonly location: SourceLocation;
  /** Alias the reference was written through, e.g. `Bar` in `import { Foo as Bar }`. */
  readonly alias?: CodeSymbol;
}

export interface ReferencedSymbol {
  readonly definition: CodeSymbol;
  readonly locations: readonly ReferenceLocation[];
}

export interface HighlightSpan {
  readonly span: TextSpan;
  readonly isDefinition: boolean;
}

export interface DocumentHighlights {
  readonly documentId: DocumentId;
  readonly highlightSpans: readonly HighlightSpan[];
}

export type HighlightRole = 'definition' | 'reference';

export interface HighlightRef {
  id: string; // e.g., "src/index.ts:45:10"
  filePath: string;
  line: number; // 1-based
  character: number; // 1-based
  endLine: number;
  endCharacter: number;
  role: HighlightRole;
}

export interface DocumentHighlightsView {
  filePath: string;
  highlights: HighlightRef[];
}

export interface HighlightResult {
  documents: DocumentHighlightsView[];
}
