import { CancellationToken, CancellationTokenSource } from 'vscode-languageserver-protocol';
import { DocumentNotFoundError, InvalidPositionError, OperationCanceledError } from '../../domain/errors';
import { local } from '../../test/builders';
import { ISemanticModelProvider, SemanticModel } from '../ports/ISemanticModelProvider';
import { ISolution } from '../ports/ISolution';
import { SymbolResolver } from './SymbolResolver';

describe('SymbolResolver', () => {
  let resolver: SymbolResolver;
  let mockSolution: jest.Mocked<ISolution>;
  let mockModels: jest.Mocked<ISemanticModelProvider>;
  const speculativeModel: SemanticModel = { documentId: 'a.ts' };
  const currentModel: SemanticModel = { documentId: 'a.ts' };
  const token = CancellationToken.None;

  beforeEach(() => {
    mockSolution = {
      getDocumentIdForTree: jest.fn(),
      getTextLength: jest.fn().mockReturnValue(20),
    };
    mockModels = {
      getSpeculativeModel: jest.fn().mockResolvedValue(speculativeModel),
      getSemanticModel: jest.fn().mockResolvedValue(speculativeModel),
      findSymbolAtPosition: jest.fn(),
    };
    resolver = new SymbolResolver(mockSolution, mockModels);
  });

  it('should return the symbol found in the speculative model when it is current', async () => {
    const x = local('x');
    mockModels.findSymbolAtPosition.mockResolvedValue(x);

    const result = await resolver.resolve('a.ts', 6, token);

    expect(result).toBe(x);
    expect(mockModels.getSpeculativeModel).toHaveBeenCalledWith('a.ts', { start: 6, length: 0 }, token);
    expect(mockModels.findSymbolAtPosition).toHaveBeenCalledTimes(1);
  });

  it('should re-resolve against the full model when the models differ', async () => {
    const stale = local('x');
    const fresh = local('x');
    mockModels.getSemanticModel.mockResolvedValue(currentModel);
    mockModels.findSymbolAtPosition.mockImplementation(async (model) =>
      model === speculativeModel ? stale : fresh,
    );

    const result = await resolver.resolve('a.ts', 6, token);

    expect(result).toBe(fresh);
    expect(mockModels.findSymbolAtPosition).toHaveBeenLastCalledWith(currentModel, 6, token);
  });

  it('should return undefined when the full model has no symbol there', async () => {
    mockModels.getSemanticModel.mockResolvedValue(currentModel);
    mockModels.findSymbolAtPosition.mockImplementation(async (model) =>
      model === speculativeModel ? local('x') : undefined,
    );

    await expect(resolver.resolve('a.ts', 6, token)).resolves.toBeUndefined();
  });

  it('should not build the full model when there is nothing at the position', async () => {
    mockModels.findSymbolAtPosition.mockResolvedValue(undefined);

    await expect(resolver.resolve('a.ts', 6, token)).resolves.toBeUndefined();
    expect(mockModels.getSemanticModel).not.toHaveBeenCalled();
  });

  it('should accept the end-of-document position', async () => {
    mockModels.findSymbolAtPosition.mockResolvedValue(undefined);

    await expect(resolver.resolve('a.ts', 20, token)).resolves.toBeUndefined();
  });

  it('should reject positions outside the document', async () => {
    await expect(resolver.resolve('a.ts', 21, token)).rejects.toThrow(InvalidPositionError);
    await expect(resolver.resolve('a.ts', -1, token)).rejects.toThrow(InvalidPositionError);
    expect(mockModels.getSpeculativeModel).not.toHaveBeenCalled();
  });

  it('should reject unknown documents', async () => {
    mockSolution.getTextLength.mockReturnValue(undefined);

    await expect(resolver.resolve('missing.ts', 0, token)).rejects.toThrow(DocumentNotFoundError);
  });

  it('should stop when canceled after the speculative model is built', async () => {
    const source = new CancellationTokenSource();
    mockModels.getSpeculativeModel.mockImplementation(async () => {
      source.cancel();
      return speculativeModel;
    });

    await expect(resolver.resolve('a.ts', 6, source.token)).rejects.toThrow(OperationCanceledError);
    expect(mockModels.findSymbolAtPosition).not.toHaveBeenCalled();
  });
});
