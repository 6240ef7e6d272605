import { IAdditionalReferenceProvider } from './IAdditionalReferenceProvider';
import { ISyntaxFacts } from './ISyntaxFacts';
import { ISyntaxTreeProvider } from './ISyntaxTreeProvider';

export interface ILanguageServices<TRoot, TNode> {
  readonly syntaxFacts: ISyntaxFacts<TNode>;
  readonly syntaxTrees: ISyntaxTreeProvider<TRoot, TNode>;
  readonly additionalReferences: IAdditionalReferenceProvider;
}
