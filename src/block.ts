/**
 * Blocks: closures with an explicit environment.
 *
 * A block pairs a checked body with at most one environment value. The body
 * reaches no state of the scope it was written in; everything it needs from
 * outside comes through the environment, which makes the block safe to hand
 * to another execution context once its environment has been duplicated.
 */

import {
  CheckedClosure,
  CheckedFunction,
  checkNoEnv,
  checkThunk,
  checkWithEnv,
} from "./checked";
import { NoEnvironmentError } from "./errors";

// ============================================================================
// Environment
// ============================================================================

export type Environment<E> = WithEnv<E> | NoEnv;

export interface WithEnv<E> {
  tag: "withEnv";
  value: E;
}

export interface NoEnv {
  tag: "noEnv";
}

export const noEnv: NoEnv = { tag: "noEnv" };

export const withEnv = <E>(value: E): WithEnv<E> => ({ tag: "withEnv", value });

// ============================================================================
// Block state
// ============================================================================

/**
 * The body of a block, taken from its checked token.
 */
export type BlockBody<T, R, E> =
  | { readonly kind: "noEnv"; call(x: T): R }
  | { readonly kind: "withEnv"; call(x: T, env: E): R };

export interface BlockState<T, R, E> {
  readonly body: BlockBody<T, R, E>;
  readonly environment: Environment<E>;
}

/**
 * Keys reserved to builders and duplication; neither is exported from the
 * package entry point.
 */
export const blockState: unique symbol = Symbol("sealed-blocks.state");
export const makeBlock: unique symbol = Symbol("sealed-blocks.make");

// ============================================================================
// Block
// ============================================================================

/**
 * What a block offers once its environment type no longer matters: a list of
 * blocks over different environments is an `AppliedBlock<T, R>[]`.
 */
export interface AppliedBlock<in T, out R> {
  apply(x: T): R;
  readonly hasEnvironment: boolean;
}

/**
 * A closure with parameter type `T`, result type `R` and environment type `E`
 * (`never` for a block without environment).
 *
 * Like a function type, a block is contravariant in `T` and covariant in `R`.
 * It is invariant in `E`: duplication copies the environment with a
 * `Duplicable<E>`, which must cover the whole environment the body reads.
 */
export class Block<in T, out R, in out E = never> implements AppliedBlock<T, R> {
  readonly [blockState]: BlockState<T, R, E>;

  private constructor(state: BlockState<T, R, E>) {
    this[blockState] = state;
  }

  /**
   * Applies the block to the given argument.
   */
  apply(x: T): R {
    const { body, environment } = this[blockState];
    if (body.kind === "noEnv") {
      return body.call(x);
    }
    if (environment.tag === "noEnv") {
      throw new NoEnvironmentError();
    }
    return applyInternal(this, x, environment.value);
  }

  get hasEnvironment(): boolean {
    return this[blockState].environment.tag === "withEnv";
  }

  static [makeBlock]<T, R, E>(state: BlockState<T, R, E>): Block<T, R, E> {
    return new Block(state);
  }

  /**
   * Block from a checked body without environment.
   */
  static fromChecked<T, R>(checked: CheckedFunction<T, R>): Block<T, R> {
    const fun = checked.body;
    return new Block<T, R>({
      body: { kind: "noEnv", call: (x) => fun(x) },
      environment: noEnv,
    });
  }

  /**
   * Block from a checked curried body and the environment it runs with.
   */
  static fromClosure<E, T, R>(checked: CheckedClosure<E, T, R>, env: E): Block<T, R, E> {
    const fun = checked.body;
    return new Block<T, R, E>({
      body: { kind: "withEnv", call: (x, e) => fun(x)(e) },
      environment: withEnv(env),
    });
  }

  /**
   * Creates a block without environment. `body` must be a function literal
   * that captures nothing.
   *
   * @example
   * const inc = Block.of((x: number) => x + 1);
   * inc.apply(5); // 6
   *
   * @blockEntryPoint
   */
  static of<T, R>(body: (x: T) => R): Block<T, R>;
  /**
   * Creates a block from an environment and a curried function literal whose
   * second parameter receives that environment.
   *
   * @example
   * const add = Block.of(10, (x: number) => (base: number) => x + base);
   * add.apply(5); // 15
   *
   * @blockEntryPoint
   */
  static of<E, T, R>(env: E, body: (x: T) => (env: E) => R): Block<T, R, E>;
  static of<E, T, R>(
    ...args: [body: (x: T) => R] | [env: E, body: (x: T) => (env: E) => R]
  ): Block<T, R> | Block<T, R, E> {
    if (args.length === 1) {
      return Block.fromChecked(checkNoEnv(args[0]));
    }
    return Block.fromClosure(checkWithEnv(args[1]), args[0]);
  }

  /**
   * Creates a block taking no argument; the literal receives only the
   * environment.
   *
   * @example
   * const total = Block.thunk([1, 2, 3], (xs: number[]) => xs.reduce((a, b) => a + b, 0));
   * total.apply(); // 6
   *
   * @blockEntryPoint
   */
  static thunk<E, R>(env: E, body: (env: E) => R): Block<void, R, E> {
    return Block.fromClosure(checkThunk(body), env);
  }
}

// ============================================================================
// Internal operations
// ============================================================================

/**
 * The block's environment. Throws `NoEnvironmentError` for a block built
 * without one.
 */
export function environmentOf<T, R, E>(block: Block<T, R, E>): E {
  const environment = block[blockState].environment;
  if (environment.tag === "noEnv") {
    throw new NoEnvironmentError();
  }
  return environment.value;
}

/**
 * Runs the block's body with `env` in place of its own environment. A body
 * without environment ignores `env`.
 */
export function applyInternal<T, R, E>(block: Block<T, R, E>, x: T, env: E): R {
  const body = block[blockState].body;
  return body.kind === "noEnv" ? body.call(x) : body.call(x, env);
}

/**
 * The same body, with the environment (if any) replaced by `copyEnv` of it.
 */
export function rebind<T, R, E>(block: Block<T, R, E>, copyEnv: (env: E) => E): Block<T, R, E> {
  const { body, environment } = block[blockState];
  return Block[makeBlock]({
    body,
    environment: environment.tag === "noEnv" ? noEnv : withEnv(copyEnv(environment.value)),
  });
}
