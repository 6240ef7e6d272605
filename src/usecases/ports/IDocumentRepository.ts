import { DocumentId } from '../../domain/entities';

export interface IDocumentRepository {
  resolveDocumentId(filePath: string): DocumentId;
  hasDocument(documentId: DocumentId): boolean;
  listDocuments(): DocumentId[];
  updateDocument(documentId: DocumentId, text: string): void;

  /** 1-based line and character to offset. */
  getOffset(documentId: DocumentId, line: number, character: number): number;
  /** Offset to 1-based line and character. */
  getLineAndCharacter(documentId: DocumentId, offset: number): { line: number; character: number };
  toRelativePath(documentId: DocumentId): string;
}
