import { IDocumentRepository } from './ports/IDocumentRepository';
import { SyncDocumentUseCase } from './SyncDocumentUseCase';

describe('SyncDocumentUseCase', () => {
  let mockDocuments: jest.Mocked<IDocumentRepository>;
  let useCase: SyncDocumentUseCase;

  beforeEach(() => {
    mockDocuments = {
      resolveDocumentId: jest.fn((filePath: string) => `/p/${filePath}`),
      hasDocument: jest.fn((documentId: string) => documentId === '/p/src/a.ts'),
      listDocuments: jest.fn(),
      updateDocument: jest.fn(),
      getOffset: jest.fn(),
      getLineAndCharacter: jest.fn(),
      toRelativePath: jest.fn(),
    };
    useCase = new SyncDocumentUseCase(mockDocuments);
  });

  it('should update a known document', () => {
    const result = useCase.execute('src/a.ts', 'let a = 2;');

    expect(result).toEqual({ documentId: '/p/src/a.ts', created: false });
    expect(mockDocuments.updateDocument).toHaveBeenCalledWith('/p/src/a.ts', 'let a = 2;');
  });

  it('should add a new document', () => {
    const result = useCase.execute('src/new.ts', 'export {};');

    expect(result).toEqual({ documentId: '/p/src/new.ts', created: true });
    expect(mockDocuments.updateDocument).toHaveBeenCalledWith('/p/src/new.ts', 'export {};');
  });
});
