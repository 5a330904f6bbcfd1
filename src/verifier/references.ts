/**
 * Reference collection: every place inside a function literal that reads a
 * binding, plus the `this`/`super` keywords and the shapes no static pass
 * can see through.
 */

import * as ts from "typescript";

export type Reference =
  | { kind: "identifier"; node: ts.Identifier }
  | { kind: "this"; node: ts.Node }
  | { kind: "super"; node: ts.Node }
  | { kind: "unverifiable"; node: ts.Node; reason: string };

/**
 * The name a declaration or access introduces, which is not a read of any
 * binding in scope.
 */
function introducedNames(node: ts.Node): (ts.Node | undefined)[] {
  if (
    ts.isVariableDeclaration(node) ||
    ts.isParameter(node) ||
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isClassDeclaration(node) ||
    ts.isClassExpression(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isPropertyDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node) ||
    ts.isEnumDeclaration(node) ||
    ts.isEnumMember(node) ||
    ts.isModuleDeclaration(node) ||
    ts.isImportEqualsDeclaration(node) ||
    ts.isPropertyAssignment(node) ||
    ts.isPropertySignature(node) ||
    ts.isMethodSignature(node) ||
    ts.isImportClause(node) ||
    ts.isNamespaceImport(node) ||
    ts.isJsxAttribute(node) ||
    ts.isPropertyAccessExpression(node) ||
    ts.isMetaProperty(node)
  ) {
    return [node.name];
  }
  if (ts.isBindingElement(node) || ts.isImportSpecifier(node) || ts.isExportSpecifier(node)) {
    return [node.name, node.propertyName];
  }
  if (ts.isLabeledStatement(node) || ts.isBreakStatement(node) || ts.isContinueStatement(node)) {
    return [node.label];
  }
  return [];
}

function isJsxIntrinsicTag(id: ts.Identifier): boolean {
  const parent = id.parent;
  const isTag =
    (ts.isJsxOpeningElement(parent) || ts.isJsxSelfClosingElement(parent) || ts.isJsxClosingElement(parent)) &&
    parent.tagName === id;
  return isTag && /^[a-z]/.test(id.text);
}

export function isReferencePosition(id: ts.Identifier): boolean {
  if (introducedNames(id.parent).includes(id)) return false;
  return !isJsxIntrinsicTag(id);
}

/**
 * Subtrees that only ever mention types. A class `extends` clause is the
 * exception: its expression is evaluated.
 */
export function isTypeOnly(node: ts.Node): boolean {
  if (ts.isExpressionWithTypeArguments(node)) {
    const clause = node.parent;
    return !(
      ts.isHeritageClause(clause) &&
      clause.token === ts.SyntaxKind.ExtendsKeyword &&
      ts.isClassLike(clause.parent)
    );
  }
  return (
    ts.isTypeNode(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isTypeParameterDeclaration(node)
  );
}

function isDirectEval(node: ts.Node): node is ts.CallExpression {
  return ts.isCallExpression(node) && ts.isIdentifier(node.expression) && node.expression.text === "eval";
}

export function collectReferences(root: ts.Node): Reference[] {
  const references: Reference[] = [];

  function visit(node: ts.Node): void {
    if (isTypeOnly(node)) return;

    if (ts.isExpressionWithTypeArguments(node)) {
      // class extends: the type arguments are types
      visit(node.expression);
      return;
    }

    if (ts.isIdentifier(node)) {
      if (isReferencePosition(node)) {
        references.push({ kind: "identifier", node });
      }
      return;
    }

    switch (node.kind) {
      case ts.SyntaxKind.ThisKeyword:
        references.push({ kind: "this", node });
        return;
      case ts.SyntaxKind.SuperKeyword:
        references.push({ kind: "super", node });
        return;
    }

    if (ts.isWithStatement(node)) {
      references.push({ kind: "unverifiable", node, reason: "a `with` statement" });
      return;
    }
    if (isDirectEval(node)) {
      references.push({ kind: "unverifiable", node, reason: "a direct `eval` call" });
      return;
    }

    ts.forEachChild(node, visit);
  }

  visit(root);
  return references;
}
