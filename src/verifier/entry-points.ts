/**
 * Entry points: the library functions and methods that turn a literal into a
 * verified body, and the places in a source file that refer to them.
 *
 * An entry point is recognized by the declaration its name resolves to, not by
 * the text of the name: the library tags each entry point declaration with
 * `@blockEntryPoint`, a tag that survives into the emitted `.d.ts` files.
 */

import * as ts from "typescript";
import type { LiteralShape } from "../literal-shape";

export type FunctionLiteral = ts.ArrowFunction | ts.FunctionExpression;

export const ENTRY_POINT_TAG = "blockEntryPoint";

interface EntryPointRule {
  callee: string;
  /** Number of arguments, when it selects between overloads */
  arity?: number;
  /** Index of the literal argument */
  argument: number;
  shape: LiteralShape;
}

const ENTRY_POINTS: readonly EntryPointRule[] = [
  { callee: "checkNoEnv", argument: 0, shape: "single" },
  { callee: "checkWithEnv", argument: 0, shape: "curried" },
  { callee: "checkThunk", argument: 0, shape: "single" },
  { callee: "Block.of", arity: 1, argument: 0, shape: "single" },
  { callee: "Block.of", arity: 2, argument: 1, shape: "curried" },
  { callee: "Block.thunk", argument: 1, shape: "single" },
];

const ENTRY_NAMES = new Set(ENTRY_POINTS.map((rule) => rule.callee));

export interface EntryPointCall {
  callee: string;
  argument: ts.Expression;
  shape: LiteralShape;
}

// ============================================================================
// Declarations
// ============================================================================

function hasEntryPointTag(declaration: ts.Node): boolean {
  return ts.getJSDocTags(declaration).some((tag) => tag.tagName.text === ENTRY_POINT_TAG);
}

/**
 * `checkNoEnv` for a function, `Block.of` for a static method.
 */
function declaredName(declaration: ts.Declaration): string | undefined {
  if (ts.isFunctionDeclaration(declaration) && declaration.name) {
    return declaration.name.text;
  }
  if (ts.isMethodDeclaration(declaration) && ts.isIdentifier(declaration.name)) {
    const owner = declaration.parent;
    if (ts.isClassLike(owner) && owner.name) {
      return `${owner.name.text}.${declaration.name.text}`;
    }
  }
  return undefined;
}

/**
 * The entry point a symbol stands for, when one of its declarations is a
 * tagged entry point declaration.
 */
export function entryPointName(symbol: ts.Symbol): string | undefined {
  for (const declaration of symbol.declarations ?? []) {
    if (!hasEntryPointTag(declaration)) continue;
    const name = declaredName(declaration);
    if (name !== undefined && ENTRY_NAMES.has(name)) return name;
  }
  return undefined;
}

// ============================================================================
// Call sites
// ============================================================================

/**
 * A name that may refer to an entry point: an identifier, or the string key of
 * an element access such as `Block["of"]`.
 */
export type EntryPointSite = ts.Identifier | ts.StringLiteralLike;

/**
 * The site naming the function a call invokes.
 */
export function calleeSite(callee: ts.Expression): EntryPointSite | undefined {
  const expr = unwrapParentheses(callee);
  if (ts.isIdentifier(expr)) return expr;
  if (ts.isPropertyAccessExpression(expr) && ts.isIdentifier(expr.name)) return expr.name;
  if (ts.isElementAccessExpression(expr) && ts.isStringLiteralLike(expr.argumentExpression)) {
    return expr.argumentExpression;
  }
  return undefined;
}

/**
 * The call whose callee `site` names, or `undefined` when the site is used as
 * a value.
 */
export function callOf(site: EntryPointSite): ts.CallExpression | undefined {
  let expr: ts.Node = site;
  const parent = site.parent;
  if (
    (ts.isPropertyAccessExpression(parent) && parent.name === site) ||
    (ts.isElementAccessExpression(parent) && parent.argumentExpression === site)
  ) {
    expr = parent;
  }
  while (ts.isParenthesizedExpression(expr.parent)) {
    expr = expr.parent;
  }
  const call = expr.parent;
  return ts.isCallExpression(call) && call.expression === expr ? call : undefined;
}

export function matchEntryPoint(callee: string, call: ts.CallExpression): EntryPointCall | undefined {
  for (const rule of ENTRY_POINTS) {
    if (rule.callee !== callee) continue;
    if (rule.arity !== undefined && rule.arity !== call.arguments.length) continue;
    const argument = call.arguments[rule.argument];
    if (argument === undefined) continue;
    return { callee, argument, shape: rule.shape };
  }
  return undefined;
}

// ============================================================================
// Literal shape
// ============================================================================

export function unwrapParentheses(expr: ts.Expression): ts.Expression {
  let current = expr;
  while (ts.isParenthesizedExpression(current)) {
    current = current.expression;
  }
  return current;
}

export function asFunctionLiteral(expr: ts.Expression): FunctionLiteral | undefined {
  const inner = unwrapParentheses(expr);
  return ts.isArrowFunction(inner) || ts.isFunctionExpression(inner) ? inner : undefined;
}

/**
 * The literal a curried literal returns: its expression body, or the operand
 * of a block body consisting of one return statement.
 */
export function returnedLiteral(fn: FunctionLiteral): FunctionLiteral | undefined {
  const body = fn.body;
  if (!ts.isBlock(body)) {
    return asFunctionLiteral(body);
  }
  if (body.statements.length !== 1) return undefined;
  const statement = body.statements[0];
  if (!ts.isReturnStatement(statement) || statement.expression === undefined) return undefined;
  return asFunctionLiteral(statement.expression);
}
