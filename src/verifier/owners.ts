/**
 * Owner chains: where a declaration lives relative to the literal being
 * checked and to the module it belongs to.
 */

import * as ts from "typescript";

/**
 * Singletons may sit inside at most this many namespaces, which admits
 * `Namespace.Singleton.member`.
 */
export const MAX_NAMESPACE_DEPTH = 2;

export function isWithin(node: ts.Node, ancestor: ts.Node): boolean {
  for (let current: ts.Node | undefined = node; current; current = current.parent) {
    if (current === ancestor) return true;
  }
  return false;
}

/**
 * `declare module "x" {}` and `declare global {}` are modules, not
 * namespaces a value is nested in.
 */
function isModuleLike(node: ts.ModuleDeclaration): boolean {
  return ts.isStringLiteral(node.name) || (node.flags & ts.NodeFlags.GlobalAugmentation) !== 0;
}

/**
 * Nodes between a module-level declaration and its source file.
 */
function isModuleStructure(node: ts.Node): boolean {
  return (
    ts.isVariableDeclarationList(node) ||
    ts.isVariableStatement(node) ||
    ts.isModuleBlock(node) ||
    ts.isImportDeclaration(node) ||
    ts.isImportClause(node) ||
    ts.isNamedImports(node) ||
    ts.isNamespaceImport(node) ||
    ts.isEnumDeclaration(node) ||
    ts.isObjectBindingPattern(node) ||
    ts.isArrayBindingPattern(node) ||
    ts.isBindingElement(node)
  );
}

/**
 * A `var` binding, scoped to its function or module rather than to the block
 * or loop it is written in.
 */
function isVarScoped(declaration: ts.Node): boolean {
  const variable = ts.isBindingElement(declaration) ? ts.walkUpBindingElementsAndPatterns(declaration) : declaration;
  return (
    ts.isVariableDeclaration(variable) &&
    ts.isVariableDeclarationList(variable.parent) &&
    (variable.parent.flags & ts.NodeFlags.BlockScoped) === 0
  );
}

function isScopeBoundary(node: ts.Node): boolean {
  return ts.isFunctionLike(node) || ts.isClassLike(node) || ts.isClassStaticBlockDeclaration(node);
}

/**
 * Number of namespaces enclosing a module-level declaration, or `undefined`
 * when a function, class or block stands between it and its source file.
 * Blocks and loops do not enclose a `var`.
 */
export function namespaceDepth(declaration: ts.Node): number | undefined {
  const varScoped = isVarScoped(declaration);
  let depth = 0;
  for (let current = declaration.parent; current; current = current.parent) {
    if (ts.isSourceFile(current)) return depth;
    if (ts.isModuleDeclaration(current)) {
      if (!isModuleLike(current)) depth++;
      continue;
    }
    if (isModuleStructure(current)) continue;
    if (!varScoped || isScopeBoundary(current)) return undefined;
  }
  return undefined;
}

export function isSingleton(declaration: ts.Node): boolean {
  const depth = namespaceDepth(declaration);
  return depth !== undefined && depth <= MAX_NAMESPACE_DEPTH;
}

/**
 * The node that binds `this` (and `super`) at `node`: the closest enclosing
 * function that is not an arrow function, class, or the source file.
 */
export function thisBinder(node: ts.Node): ts.Node | undefined {
  for (let current = node.parent; current; current = current.parent) {
    if (ts.isArrowFunction(current)) continue;
    if (ts.isFunctionLike(current) || ts.isClassLike(current) || ts.isSourceFile(current)) {
      return current;
    }
  }
  return undefined;
}

/**
 * The node that binds `arguments` at `node`: the closest enclosing function
 * that is not an arrow function, or the source file.
 */
export function argumentsBinder(node: ts.Node): ts.Node | undefined {
  for (let current = node.parent; current; current = current.parent) {
    if (ts.isArrowFunction(current)) continue;
    if (ts.isFunctionLike(current) || ts.isSourceFile(current)) {
      return current;
    }
  }
  return undefined;
}
