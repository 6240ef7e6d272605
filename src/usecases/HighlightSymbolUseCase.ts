import { CancellationToken } from 'vscode-languageserver-protocol';
import { DocumentHighlights, HighlightRef, HighlightResult } from '../domain/entities';
import { DocumentNotFoundError, InvalidIdError } from '../domain/errors';
import { PositionId } from '../domain/PositionId';
import { textSpanEnd } from '../domain/TextSpan';
import { sortById } from '../utils/sorter';
import { IDocumentRepository } from './ports/IDocumentRepository';

export interface IDocumentHighlightsEngine {
  execute(
    documentId: string,
    position: number,
    documentsToSearch: Iterable<string>,
    token: CancellationToken,
  ): Promise<DocumentHighlights[]>;
}

export class HighlightSymbolUseCase {
  constructor(
    private readonly engine: IDocumentHighlightsEngine,
    private readonly documents: IDocumentRepository,
  ) {}

  async execute(
    id: string,
    scope: string[] | undefined,
    token: CancellationToken,
  ): Promise<HighlightResult> {
    let positionId: PositionId;
    try {
      positionId = PositionId.parse(id);
    } catch (e) {
      throw new InvalidIdError(id, e instanceof Error ? e.message : undefined);
    }

    const documentId = this.requireDocument(positionId.filePath);
    const offset = this.documents.getOffset(documentId, positionId.line, positionId.character);

    // Like an editor, highlight within the queried document unless told otherwise.
    const documentsToSearch =
      scope && scope.length > 0 ? scope.map((filePath) => this.requireDocument(filePath)) : [documentId];

    const highlights = await this.engine.execute(documentId, offset, documentsToSearch, token);

    const documents = highlights.map((h) => ({
      filePath: this.documents.toRelativePath(h.documentId),
      highlights: sortById(h.highlightSpans.map((span) => this.toHighlightRef(h.documentId, span))),
    }));
    documents.sort((a, b) => a.filePath.localeCompare(b.filePath));

    return { documents };
  }

  private requireDocument(filePath: string): string {
    const documentId = this.documents.resolveDocumentId(filePath);
    if (!this.documents.hasDocument(documentId)) {
      throw new DocumentNotFoundError(filePath);
    }
    return documentId;
  }

  private toHighlightRef(
    documentId: string,
    highlight: DocumentHighlights['highlightSpans'][number],
  ): HighlightRef {
    const filePath = this.documents.toRelativePath(documentId);
    const start = this.documents.getLineAndCharacter(documentId, highlight.span.start);
    const end = this.documents.getLineAndCharacter(documentId, textSpanEnd(highlight.span));
    return {
      id: new PositionId(filePath, start.line, start.character).toString(),
      filePath,
      line: start.line,
      character: start.character,
      endLine: end.line,
      endCharacter: end.character,
      role: highlight.isDefinition ? 'definition' : 'reference',
    };
  }
}
