import * as ts from 'typescript';
import { ILanguageServices } from '../../../usecases/ports/ILanguageServices';
import { DocumentHighlightsDependencies } from '../../../usecases/engine/GetDocumentHighlightsUseCase';
import { ReferenceFilters } from '../../../usecases/engine/ReferenceFilters';
import { TsAdditionalReferenceProvider } from './TsAdditionalReferenceProvider';
import { TsReferenceSearchService } from './TsReferenceSearchService';
import { TsSemanticModelProvider } from './TsSemanticModelProvider';
import { TsSyntaxFacts } from './TsSyntaxFacts';
import { TsSyntaxTreeProvider } from './TsSyntaxTreeProvider';
import { TsWorkspace } from './TsWorkspace';

export { TsWorkspace } from './TsWorkspace';

export function createTypeScriptLanguageServices(
  workspace: TsWorkspace,
): ILanguageServices<ts.SourceFile, ts.Node> {
  return {
    syntaxFacts: new TsSyntaxFacts(),
    syntaxTrees: new TsSyntaxTreeProvider(workspace),
    additionalReferences: new TsAdditionalReferenceProvider(workspace),
  };
}

export function createTypeScriptHighlightDependencies(
  workspace: TsWorkspace,
): DocumentHighlightsDependencies<ts.SourceFile, ts.Node> {
  const language = createTypeScriptLanguageServices(workspace);
  return {
    solution: workspace,
    semanticModels: new TsSemanticModelProvider(workspace),
    referenceSearch: new TsReferenceSearchService(workspace),
    filters: new ReferenceFilters(language.syntaxFacts),
    language,
  };
}
