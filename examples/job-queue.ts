/**
 * Blocks travelling between a producer and a worker.
 *
 * The producer builds blocks, serializes their environments and queues
 * `(builder, environment, argument)` messages. The worker looks the builder up
 * by name and rebuilds each block from the text it received.
 */
import { z } from "zod";
import {
  Block,
  Builder,
  PackedBuilder,
  TypedBuilder,
  checkNoEnv,
  checkWithEnv,
  cloned,
  duplicate,
  formatDiagnostic,
  jsonCodec,
  verifySource,
} from "../src/index";

// ============================================================================
// Builders, shared by producer and worker
// ============================================================================

const discountSchema = z.object({ percent: z.number(), cap: z.number() });
type Discount = z.infer<typeof discountSchema>;

const applyDiscount = new TypedBuilder(
  checkWithEnv((price: number) => (env: Discount) => price - Math.min(env.cap, (price * env.percent) / 100)),
  jsonCodec(discountSchema)
);

const roundPrice = new Builder(checkNoEnv((price: number) => Math.round(price * 100) / 100));

const builders: Record<string, PackedBuilder<number, number>> = {
  applyDiscount,
  roundPrice,
};

interface Message {
  builder: string;
  env: string | undefined;
  argument: number;
}

// ============================================================================
// Producer
// ============================================================================

const queue: Message[] = [];

const summer = applyDiscount.build({ percent: 20, cap: 15 });
queue.push({ builder: "applyDiscount", env: applyDiscount.serializeEnvironment(summer), argument: 120 });
queue.push({ builder: "roundPrice", env: undefined, argument: 19.987 });

// A local copy can change without touching the queued environment
const local = duplicate(summer, cloned<Discount>());
console.log("local copy:", local.apply(50));

// ============================================================================
// Worker
// ============================================================================

for (const message of queue) {
  const block = builders[message.builder].createBlock(message.env);
  console.log(`${message.builder}(${message.argument}) = ${block.apply(message.argument)}`);
}

const inline = Block.of({ rate: 1.2 }, (amount: number) => (env: { rate: number }) => amount * env.rate);
console.log("inline:", inline.apply(10));

// ============================================================================
// Build-time check
// ============================================================================

const leaky = `
/** @blockEntryPoint */
declare function checkNoEnv<T, R>(body: (x: T) => R): unknown;
export function withTax(rate: number) {
  return checkNoEnv((price: number) => price * rate);
}
`;

for (const diagnostic of verifySource("/virtual/pricing.ts", leaky)) {
  console.log(formatDiagnostic(diagnostic));
}
