/**
 * Block builders.
 *
 * A builder is usually a top-level declaration binding one checked body; it
 * makes blocks from environments, and rebuilds them from the text form of an
 * environment when a block arrives from another execution context.
 *
 *   const addBase = new TypedBuilder(
 *     checkWithEnv((x: number) => (env: Base) => x + env.base),
 *     jsonCodec(baseSchema)
 *   );
 *   const block = addBase.build({ base: 10 });
 *   const copy = addBase.createBlock(addBase.serializeEnvironment(block));
 */

import { AppliedBlock, Block, environmentOf } from "./block";
import { CheckedClosure, CheckedFunction } from "./checked";
import type { EnvCodec } from "./codec";
import { EnvironmentMismatchError } from "./errors";

/**
 * A builder whose environment type is hidden; what a transport layer holds
 * to rebuild blocks from received data.
 */
export interface PackedBuilder<T, R> {
  /**
   * Rebuilds a block. `serializedEnv` is the text form of the environment,
   * or `undefined` for builders without environment.
   *
   * Throws `EnvironmentMismatchError` when its presence does not match the
   * builder, and lets the codec's `DeserializationError` through.
   */
  createBlock(serializedEnv: string | undefined): AppliedBlock<T, R>;
}

/**
 * Builder for blocks without environment.
 */
export class Builder<T, R> implements PackedBuilder<T, R> {
  constructor(private readonly checked: CheckedFunction<T, R>) {}

  build(): Block<T, R> {
    return Block.fromChecked(this.checked);
  }

  createBlock(serializedEnv: string | undefined): Block<T, R> {
    if (serializedEnv !== undefined) {
      throw new EnvironmentMismatchError("no environment");
    }
    return this.build();
  }
}

/**
 * Builder for blocks with an environment of type `E`.
 */
export class TypedBuilder<E, T, R> implements PackedBuilder<T, R> {
  constructor(
    private readonly checked: CheckedClosure<E, T, R>,
    private readonly codec: EnvCodec<E>
  ) {}

  build(env: E): Block<T, R, E> {
    return Block.fromClosure(this.checked, env);
  }

  createBlock(serializedEnv: string | undefined): Block<T, R, E> {
    if (serializedEnv === undefined) {
      throw new EnvironmentMismatchError("environment");
    }
    return this.build(this.codec.read(serializedEnv));
  }

  /**
   * Text form of the block's environment, readable by `createBlock`.
   */
  serializeEnvironment(block: Block<T, R, E>): string {
    return this.codec.write(environmentOf(block));
  }
}
