/**
 * Environment codecs: the text form of an environment used when a block is
 * rebuilt in another execution context.
 */

import { z } from "zod";
import { DeserializationError } from "./errors";

export interface EnvDeserializer<E> {
  /**
   * Throws `DeserializationError` when `text` is not a valid `E`.
   */
  read(text: string): E;
}

export interface EnvCodec<E> extends EnvDeserializer<E> {
  write(value: E): string;
}

/**
 * JSON text checked against a zod schema.
 *
 * @example
 * const counterCodec = jsonCodec(z.object({ count: z.number() }));
 * counterCodec.read('{"count":3}'); // { count: 3 }
 */
export function jsonCodec<E>(schema: z.ZodType<E, z.ZodTypeDef, unknown>): EnvCodec<E> {
  return {
    read(text: string): E {
      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (err) {
        throw new DeserializationError(
          `Environment is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
          text,
          err
        );
      }

      const result = schema.safeParse(raw);
      if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new DeserializationError(
          `Environment does not match its schema${where}: ${issue ? issue.message : "invalid value"}`,
          text,
          result.error
        );
      }
      return result.data;
    },

    write(value: E): string {
      return JSON.stringify(value);
    },
  };
}
