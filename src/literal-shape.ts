/**
 * Literal shape check
 *
 * Confirms at run time that a function handed to a verification entry point
 * was written as a function literal. The function's own source text is parsed
 * with @lezer/javascript in expression mode; the capture analysis proper runs
 * at build time (see ./verifier).
 *
 * Usage:
 *   checkLiteralShape((x: number) => x + 1, "single");
 *   checkLiteralShape((x: number) => (env: Env) => x + env.base, "curried");
 */

import { parser } from "@lezer/javascript";
import type { SyntaxNode, Tree } from "@lezer/common";
import { NotALiteralError } from "./errors";

/**
 * `single`: `x => ...`; `curried`: `x => env => ...`.
 */
export type LiteralShape = "single" | "curried";

// Expression top, TypeScript dialect: toString() of code that was never
// compiled (eval'd TS in a REPL, say) may still carry annotations.
const exprParser = parser.configure({
  dialect: "ts",
  top: "SingleExpression",
});

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;

const shapeCache = new Map<string, LiteralShape[]>();

// ============================================================================
// Syntax helpers
// ============================================================================

function isFunctionLiteral(node: SyntaxNode | null): node is SyntaxNode {
  return node !== null && (node.type.name === "ArrowFunction" || node.type.name === "FunctionExpression");
}

/**
 * Strip any number of parentheses around an expression.
 */
function unwrapParens(node: SyntaxNode): SyntaxNode {
  let current = node;
  while (current.type.name === "ParenthesizedExpression") {
    let inner: SyntaxNode | null = null;
    for (let child = current.firstChild; child; child = child.nextSibling) {
      if (child.type.name !== "(" && child.type.name !== ")") {
        inner = child;
        break;
      }
    }
    if (!inner) return current;
    current = inner;
  }
  return current;
}

function hasSyntaxError(tree: Tree): boolean {
  let found = false;
  tree.iterate({
    enter: (node) => {
      if (node.type.isError) found = true;
      return !found;
    },
  });
  return found;
}

/**
 * The function a literal returns: its expression body, or the operand of the
 * only statement of a block body when that statement is a return.
 */
function returnedLiteral(fnNode: SyntaxNode): SyntaxNode | null {
  const body = fnNode.lastChild;
  if (!body) return null;

  if (body.type.name !== "Block") {
    const expr = unwrapParens(body);
    return isFunctionLiteral(expr) ? expr : null;
  }

  const statements: SyntaxNode[] = [];
  for (let child = body.firstChild; child; child = child.nextSibling) {
    const name = child.type.name;
    if (name !== "{" && name !== "}" && name !== ";" && !child.type.isSkipped) {
      statements.push(child);
    }
  }
  if (statements.length !== 1 || statements[0].type.name !== "ReturnStatement") return null;

  for (let child = statements[0].firstChild; child; child = child.nextSibling) {
    const expr = unwrapParens(child);
    if (isFunctionLiteral(expr)) return expr;
  }
  return null;
}

// ============================================================================
// Shape detection
// ============================================================================

/**
 * Every shape the source text satisfies; empty when it is not a function
 * literal at all. A curried literal also satisfies `single`.
 */
export function literalShapes(source: string): LiteralShape[] {
  const cached = shapeCache.get(source);
  if (cached) return cached;

  const shapes: LiteralShape[] = [];
  if (!NATIVE_CODE.test(source)) {
    const tree = exprParser.parse(source);
    const top = tree.topNode.firstChild;
    if (top && !hasSyntaxError(tree) && top.to === tree.topNode.to) {
      const literal = unwrapParens(top);
      if (isFunctionLiteral(literal)) {
        shapes.push("single");
        if (returnedLiteral(literal)) shapes.push("curried");
      }
    }
  }

  shapeCache.set(source, shapes);
  return shapes;
}

/**
 * Throws `NotALiteralError` unless `fn` was written as a function literal of
 * the given shape.
 */
export function checkLiteralShape(fn: (...args: never[]) => unknown, shape: LiteralShape): void {
  const source = Function.prototype.toString.call(fn);
  const shapes = literalShapes(source);

  if (shapes.length === 0) {
    throw new NotALiteralError("Argument must be a function literal", source);
  }
  if (!shapes.includes(shape)) {
    throw new NotALiteralError(
      "Argument must be a curried function literal of the form `x => env => ...`",
      source
    );
  }
}
