import { IDocumentRepository } from './ports/IDocumentRepository';

export class SyncDocumentUseCase {
  constructor(private readonly documents: IDocumentRepository) {}

  execute(filePath: string, text: string): { documentId: string; created: boolean } {
    const documentId = this.documents.resolveDocumentId(filePath);
    const created = !this.documents.hasDocument(documentId);
    this.documents.updateDocument(documentId, text);
    return { documentId, created };
  }
}
