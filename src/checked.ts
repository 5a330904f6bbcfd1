/**
 * Verified-body tokens.
 *
 * A token is the only way into a builder or a block. Its constructor asks for
 * a key that never leaves this module, so the entry points below are the only
 * code able to produce one. The capture analysis of each call site runs at
 * build time (`blocks-check`); at run time the entry points confirm the
 * literal shape.
 */

import { checkLiteralShape } from "./literal-shape";

const tokenKey: unique symbol = Symbol("sealed-blocks.token");

/**
 * A checked body for a block without environment.
 */
export class CheckedFunction<T, R> {
  readonly kind = "noEnv";

  constructor(
    key: typeof tokenKey,
    readonly body: (x: T) => R
  ) {
    if (key !== tokenKey) {
      throw new TypeError("CheckedFunction can only be created by checkNoEnv");
    }
  }
}

/**
 * A checked curried body `x => env => result` for a block whose environment
 * has type `E`.
 */
export class CheckedClosure<E, T, R> {
  readonly kind = "withEnv";

  constructor(
    key: typeof tokenKey,
    readonly body: (x: T) => (env: E) => R
  ) {
    if (key !== tokenKey) {
      throw new TypeError("CheckedClosure can only be created by checkWithEnv");
    }
  }
}

// ============================================================================
// Entry points
// ============================================================================

/**
 * Checks a function literal that captures nothing.
 *
 * @example
 * const inc = checkNoEnv((x: number) => x + 1);
 *
 * @blockEntryPoint
 */
export function checkNoEnv<T, R>(fun: (x: T) => R): CheckedFunction<T, R> {
  checkLiteralShape(fun, "single");
  return new CheckedFunction(tokenKey, fun);
}

/**
 * Checks a curried function literal whose second parameter receives the
 * block's environment.
 *
 * @example
 * const addBase = checkWithEnv((x: number) => (env: { base: number }) => x + env.base);
 *
 * @blockEntryPoint
 */
export function checkWithEnv<E, T, R>(fun: (x: T) => (env: E) => R): CheckedClosure<E, T, R> {
  checkLiteralShape(fun, "curried");
  return new CheckedClosure(tokenKey, fun);
}

/**
 * Checks a literal taking only the environment, for blocks applied to no
 * argument.
 *
 * @blockEntryPoint
 */
export function checkThunk<E, R>(fun: (env: E) => R): CheckedClosure<E, void, R> {
  checkLiteralShape(fun, "single");
  return new CheckedClosure(tokenKey, (_: void) => fun);
}
