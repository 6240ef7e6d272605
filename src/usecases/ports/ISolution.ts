import { DocumentId } from '../../domain/entities';

/** Snapshot view of the documents the engine works on. */
export interface ISolution {
  /** Undefined when the tree belongs to no document (library or metadata files). */
  getDocumentIdForTree(treeId: string): DocumentId | undefined;
  /** Undefined when the document is unknown. */
  getTextLength(documentId: DocumentId): number | undefined;
}
