import * as ts from 'typescript';

/**
 * Innermost node whose full range (leading trivia included) contains
 * `position`. JSDoc comments are entered only when `includeJsDoc` is set.
 */
export function findTokenNode(sourceFile: ts.SourceFile, position: number, includeJsDoc: boolean): ts.Node {
  let current: ts.Node = sourceFile;
  for (;;) {
    let next: ts.Node | undefined;
    for (const child of current.getChildren(sourceFile)) {
      if (ts.isJSDoc(child) && !includeJsDoc) {
        continue;
      }
      if (child.pos <= position && position < child.end) {
        next = child;
        break;
      }
    }
    if (!next) {
      return current;
    }
    current = next;
  }
}

/**
 * Node whose text (trivia excluded) contains or ends at `position`,
 * preferring the one starting there.
 */
export function findTouchingNodes(sourceFile: ts.SourceFile, position: number): ts.Node[] {
  const candidates = [findTokenNode(sourceFile, position, false)];
  if (position > 0) {
    candidates.push(findTokenNode(sourceFile, position - 1, false));
  }
  return candidates.filter(
    (node, index) =>
      node !== sourceFile &&
      candidates.indexOf(node) === index &&
      node.getStart(sourceFile) <= position &&
      position <= node.end,
  );
}

export function getNodeSpan(node: ts.Node, sourceFile: ts.SourceFile): { start: number; length: number } {
  const start = node.getStart(sourceFile);
  return { start, length: node.end - start };
}

/** The node naming a declaration, e.g. the identifier of a class or the `constructor` keyword. */
export function getDeclarationNameNode(declaration: ts.Declaration, sourceFile: ts.SourceFile): ts.Node {
  const name = ts.getNameOfDeclaration(declaration);
  if (name) {
    return name;
  }
  if (ts.isConstructorDeclaration(declaration)) {
    const keyword = declaration
      .getChildren(sourceFile)
      .find((child) => child.kind === ts.SyntaxKind.ConstructorKeyword);
    if (keyword) {
      return keyword;
    }
  }
  return declaration;
}
