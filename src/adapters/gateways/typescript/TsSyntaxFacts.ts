import * as ts from 'typescript';
import { ISyntaxFacts } from '../../../usecases/ports/ISyntaxFacts';

export class TsSyntaxFacts implements ISyntaxFacts<ts.Node> {
  readonly isCaseSensitive = true;

  /** `Foo<Bar>` in a type position or a heritage clause. */
  isGenericName(node: ts.Node | undefined): boolean {
    if (!node) {
      return false;
    }
    if (ts.isTypeReferenceNode(node) || ts.isExpressionWithTypeArguments(node)) {
      return (node.typeArguments?.length ?? 0) > 0;
    }
    return false;
  }

  /** The member part of a doc link such as `{@link Foo#bar}`. */
  isIndexerMemberCref(node: ts.Node | undefined): boolean {
    return node !== undefined && ts.isJSDocMemberName(node);
  }
}
