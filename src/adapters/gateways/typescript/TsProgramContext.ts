import * as ts from 'typescript';
import { DocumentId } from '../../../domain/entities';
import { SemanticModel } from '../../../usecases/ports/ISemanticModelProvider';
import { TsSymbolMapper } from './TsSymbolMapper';

export class TsSemanticModel implements SemanticModel {
  constructor(
    readonly documentId: DocumentId,
    readonly context: TsProgramContext,
  ) {}

  get sourceFile(): ts.SourceFile | undefined {
    return this.context.program.getSourceFile(this.documentId);
  }
}

/** Everything derived from one immutable program. */
export class TsProgramContext {
  readonly checker: ts.TypeChecker;
  readonly symbols: TsSymbolMapper;
  private readonly models = new Map<DocumentId, TsSemanticModel>();

  constructor(
    readonly program: ts.Program,
    /** Document versions the program was built from. */
    private readonly versions: ReadonlyMap<DocumentId, number>,
    isInSource: (fileName: string) => boolean,
  ) {
    this.checker = program.getTypeChecker();
    this.symbols = new TsSymbolMapper(this.checker, isInSource);
  }

  getModel(documentId: DocumentId): TsSemanticModel {
    let model = this.models.get(documentId);
    if (!model) {
      model = new TsSemanticModel(documentId, this);
      this.models.set(documentId, model);
    }
    return model;
  }

  versionOf(documentId: DocumentId): number | undefined {
    return this.versions.get(documentId);
  }
}
