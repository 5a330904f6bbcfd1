/**
 * Duplication: independent copies of environments and of the blocks holding
 * them.
 *
 * How deep a copy goes is up to each `Duplicable` instance. Duplicating a
 * block copies its environment with the instance given for the environment
 * type and rebinds the same checked body; the body is never checked again.
 */

import { Block, rebind } from "./block";

export interface Duplicable<X> {
  duplicate(x: X): X;
}

export function duplicable<X>(copy: (x: X) => X): Duplicable<X> {
  return { duplicate: copy };
}

// ============================================================================
// Instances
// ============================================================================

export type Primitive = string | number | boolean | bigint | symbol | null | undefined;

/**
 * Values that cannot be mutated are their own copy.
 */
export function immutable<X extends Primitive>(): Duplicable<X> {
  return duplicable<X>((x) => x);
}

/**
 * Deep copy with `structuredClone`. Functions, class prototypes and other
 * values structured cloning does not support are not handled.
 */
export function cloned<X>(): Duplicable<X> {
  return duplicable<X>((x) => structuredClone(x));
}

export function arrayOf<X>(element: Duplicable<X>): Duplicable<X[]> {
  return duplicable<X[]>((xs) => xs.map((x) => element.duplicate(x)));
}

/**
 * Shallow copy of a record whose listed fields are copied with their own
 * instance.
 *
 * @example
 * const counterDup = recordOf<Counter>({ count: immutable(), history: arrayOf(immutable()) });
 */
export function recordOf<X extends object>(fields: { [K in keyof X]: Duplicable<X[K]> }): Duplicable<X> {
  return duplicable<X>((value) => {
    const copy = { ...value };
    for (const key in fields) {
      copy[key] = fields[key].duplicate(value[key]);
    }
    return copy;
  });
}

// ============================================================================
// Blocks
// ============================================================================

/**
 * Blocks with an environment of type `E` are duplicable when `E` is.
 */
export function blockDuplicable<T, R, E>(env: Duplicable<E>): Duplicable<Block<T, R, E>> {
  return duplicable<Block<T, R, E>>((block) => rebind(block, (e) => env.duplicate(e)));
}

/**
 * Blocks without environment are always duplicable; the copy shares the body.
 */
export function plainBlockDuplicable<T, R>(): Duplicable<Block<T, R>> {
  return duplicable<Block<T, R>>((block) => rebind(block, (e) => e));
}

/**
 * Duplicates a block without environment.
 */
export function duplicate<T, R>(block: Block<T, R>): Block<T, R>;
/**
 * Duplicates a block and its environment.
 */
export function duplicate<T, R, E>(block: Block<T, R, E>, env: Duplicable<E>): Block<T, R, E>;
export function duplicate<T, R, E>(block: Block<T, R, E>, env?: Duplicable<E>): Block<T, R, E> {
  if (env !== undefined) {
    return blockDuplicable<T, R, E>(env).duplicate(block);
  }
  if (block.hasEnvironment) {
    throw new TypeError("duplicating a block with an environment needs a Duplicable for that environment");
  }
  return rebind(block, (e) => e);
}
