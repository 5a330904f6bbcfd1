import { describe, it, expect } from "vitest";
import {
  CaptureDiagnostic,
  CaptureViolationError,
  VerifierOptions,
  assertNoCaptures,
  formatDiagnostic,
  verifySource,
} from "../src/index";

const FILE = "/virtual/blocks.ts";

const PRELUDE = `
/** @blockEntryPoint */
declare function checkNoEnv<T, R>(body: (x: T) => R): unknown;
/** @blockEntryPoint */
declare function checkWithEnv<E, T, R>(body: (x: T) => (env: E) => R): unknown;
/** @blockEntryPoint */
declare function checkThunk<E, R>(body: (env: E) => R): unknown;
declare class Block {
  /** @blockEntryPoint */
  static of<T, R>(body: (x: T) => R): unknown;
  /** @blockEntryPoint */
  static of<E, T, R>(env: E, body: (x: T) => (env: E) => R): unknown;
  /** @blockEntryPoint */
  static thunk<E, R>(env: E, body: (env: E) => R): unknown;
}
`;

function check(body: string, options?: VerifierOptions): CaptureDiagnostic[] {
  return verifySource(FILE, PRELUDE + body, options);
}

/**
 * 1-based line and column of the last occurrence of `needle` in the checked
 * source.
 */
function positionOf(body: string, needle: string): { line: number; column: number } {
  const text = PRELUDE + body;
  const index = text.lastIndexOf(needle);
  return {
    line: text.slice(0, index).split("\n").length,
    column: index - text.lastIndexOf("\n", index - 1),
  };
}

function violations(diagnostics: CaptureDiagnostic[]): (string | undefined)[] {
  return diagnostics.map((d) => d.identifier);
}

describe("capture verifier", () => {
  describe("clean literals", () => {
    it("accepts a literal that only uses its parameter", () => {
      expect(check(`export const inc = checkNoEnv((x: number) => x + 1);`)).toEqual([]);
    });

    it("accepts locals, nested functions and catch bindings declared in the literal", () => {
      const body = `
export const sum = checkNoEnv(({ xs, scale }: { xs: number[]; scale: number }) => {
  let total = 0;
  for (const x of xs) {
    total += x;
  }
  const times = (n: number) => n * scale;
  try {
    return times(total);
  } catch (err) {
    return String(err);
  }
});
export const fact = checkNoEnv(function fact(n: number): number {
  return n <= 1 ? 1 : n * fact(n - 1);
});
export const pairs = checkNoEnv((x: number) => [1, 2].map((y) => x + y));
`;
      expect(check(body)).toEqual([]);
    });

    it("accepts module-level declarations and globals", () => {
      const body = `
import { readFileSync } from "fs";
const factor = 3;
let calls = 0;
function double(n: number): number {
  return n * 2;
}
class Registry {
  static size = 1;
}
enum Mode {
  Fast,
  Slow,
}
export const uses = checkNoEnv(
  (x: number) => double(x) * factor + calls + Registry.size + Mode.Fast + Math.max(x, 0) + JSON.stringify(undefined).length
);
export const reader = checkNoEnv((p: string) => readFileSync(p));
`;
      expect(check(body)).toEqual([]);
    });

    it("accepts var declarations in module-level blocks and loops", () => {
      const body = `
declare const ready: boolean;
for (var i = 0; i < 3; i++) {}
if (ready) {
  var { mode } = { mode: "fast" };
}
export const hoisted = checkNoEnv((x: number) => x + i + mode.length);
`;
      expect(check(body)).toEqual([]);
    });

    it("accepts members of nested namespaces two levels deep", () => {
      const body = `
namespace Config {
  export namespace Defaults {
    export const retries = 3;
    export const withRetries = checkNoEnv((x: number) => x + retries);
  }
}
export const viaPath = checkNoEnv((x: number) => x + Config.Defaults.retries);
`;
      expect(check(body)).toEqual([]);
    });

    it("ignores names in type positions", () => {
      const body = `
export function typed() {
  type Local = { n: number };
  interface Shape {
    n: number;
  }
  const sample: Local = { n: 1 };
  return checkNoEnv((x: Local): Shape => ({ n: x.n } as typeof sample));
}
`;
      expect(check(body)).toEqual([]);
    });

    it("accepts environment literals that read only their parameters", () => {
      const body = `
export function build() {
  const counter = { n: 0 };
  const viaOf = Block.of(counter, (x: number) => (c: { n: number }) => x + c.n);
  const viaCheck = checkWithEnv((x: number) => function (c: { n: number }) {
    return x + c.n;
  });
  const viaBlockBody = checkWithEnv(function (x: number) {
    return (c: { n: number }) => x * c.n;
  });
  const thunk = Block.thunk([1, 2], (xs: number[]) => xs.length);
  return [viaOf, viaCheck, viaBlockBody, thunk];
}
`;
      expect(check(body)).toEqual([]);
    });

    it("accepts this inside methods of objects built by the literal", () => {
      const body = `
export const wrapped = checkNoEnv((x: number) => ({
  n: x,
  get() {
    return this.n;
  },
}));
`;
      expect(check(body)).toEqual([]);
    });
  });

  describe("captures", () => {
    it("reports a local of the enclosing function", () => {
      const body = `
export function makeCounter() {
  const localCount = 3;
  return checkNoEnv((x: number) => x + localCount);
}
`;
      const diagnostics = check(body);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        code: "CaptureViolation",
        identifier: "localCount",
        fileName: FILE,
        ...positionOf(body, "localCount"),
        message: "Invalid capture of `localCount`. Pass it through the block's environment parameter instead.",
      });
    });

    it("reports a parameter of the enclosing function", () => {
      const body = `
export function scaled(factor: number) {
  return checkNoEnv((x: number) => x * factor);
}
`;
      expect(violations(check(body))).toEqual(["factor"]);
    });

    it("reports shorthand properties", () => {
      const body = `
export function wrap() {
  const label = "job";
  return checkNoEnv((x: number) => ({ label, x }));
}
`;
      const diagnostics = check(body);
      expect(violations(diagnostics)).toEqual(["label"]);
      expect(diagnostics[0]).toMatchObject(positionOf(body, "label"));
    });

    it("reports this of an enclosing method", () => {
      const body = `
export class Worker {
  limit = 10;
  task() {
    return checkNoEnv((x: number) => Math.min(x, this.limit));
  }
}
`;
      const diagnostics = check(body);
      expect(violations(diagnostics)).toEqual(["this"]);
      expect(diagnostics[0]).toMatchObject(positionOf(body, "this"));
    });

    it("reports arguments of an enclosing function", () => {
      const body = `
export function variadic() {
  return checkNoEnv((x: number) => x + arguments.length);
}
`;
      expect(violations(check(body))).toEqual(["arguments"]);
    });

    it("reports a class extended from an enclosing scope", () => {
      const body = `
export function subclass() {
  class Base {
    id = 1;
  }
  return checkNoEnv((x: number) => {
    class Child extends Base {}
    return new Child().id + x;
  });
}
`;
      const diagnostics = check(body);
      expect(violations(diagnostics)).toEqual(["Base"]);
      expect(diagnostics[0]).toMatchObject(positionOf(body, "Base"));
    });

    it("reports members of namespaces nested three deep", () => {
      const body = `
namespace A.B.C {
  export const deep = 1;
  export const tooDeep = checkNoEnv((x: number) => x + deep);
}
`;
      expect(violations(check(body))).toEqual(["deep"]);
    });

    it("reports block-scoped bindings of module-level blocks", () => {
      const body = `
let built: unknown;
{
  const scoped = 1;
  var hoisted = 2;
  built = checkNoEnv((x: number) => x + scoped + hoisted);
}
`;
      expect(violations(check(body))).toEqual(["scoped"]);
    });

    it("reports var declarations of an enclosing function", () => {
      const body = `
export function configured(ready: boolean) {
  if (ready) {
    var limit = 5;
  }
  return checkNoEnv((x: number) => x + (limit ?? 0));
}
`;
      expect(violations(check(body))).toEqual(["limit"]);
    });

    it("reports captures beside the environment parameter", () => {
      const body = `
export function leak() {
  const counter = { n: 0 };
  return Block.of(counter, (x: number) => (c: { n: number }) => x + counter.n);
}
`;
      const diagnostics = check(body);
      expect(violations(diagnostics)).toEqual(["counter"]);
      expect(diagnostics[0]).toMatchObject(positionOf(body, "counter"));
    });

    it("recognizes entry points reached through a namespace", () => {
      const body = `
declare namespace blocks {
  /** @blockEntryPoint */
  function checkNoEnv<T, R>(body: (x: T) => R): unknown;
}
export function qualified() {
  const hidden = 2;
  return blocks.checkNoEnv((x: number) => x * hidden);
}
`;
      expect(violations(check(body))).toEqual(["hidden"]);
    });

    it("recognizes entry points under another name", () => {
      const body = `
declare namespace blocks {
  /** @blockEntryPoint */
  function checkNoEnv<T, R>(body: (x: T) => R): unknown;
}
import seal = blocks.checkNoEnv;
export function renamed() {
  const hidden = 2;
  return seal((x: number) => x * hidden);
}
`;
      const diagnostics = check(body);
      expect(violations(diagnostics)).toEqual(["hidden"]);
      expect(diagnostics[0]).toMatchObject(positionOf(body, "hidden"));
    });

    it("recognizes static methods called through a string key", () => {
      const body = `
export function keyed() {
  const localCount = 3;
  return Block["of"]((x: number) => x + localCount);
}
`;
      expect(violations(check(body))).toEqual(["localCount"]);
    });

    it("ignores functions that share an entry point's name", () => {
      const body = `
function checkNoEnv<T, R>(body: (x: T) => R): R {
  return body(undefined as T);
}
export function lookalike() {
  const localCount = 3;
  return checkNoEnv((x: number) => x + localCount);
}
`;
      expect(verifySource(FILE, body)).toEqual([]);
    });

    it("lists diagnostics of several literals in source order", () => {
      const body = `
export function twice(a: number, b: number) {
  return [checkNoEnv((x: number) => x + b), checkNoEnv((x: number) => x + a)];
}
`;
      expect(violations(check(body))).toEqual(["b", "a"]);
    });
  });

  describe("literal shape", () => {
    it("reports arguments that are not literals", () => {
      const body = `
const existing = (x: number) => x + 1;
export const fromValue = checkNoEnv(existing);
export const notCurried = checkWithEnv((x: number) => x + 1);
`;
      const diagnostics = check(body);
      expect(diagnostics.map((d) => d.code)).toEqual(["NotALiteral", "NotALiteral"]);
      expect(diagnostics[0]).toMatchObject({
        ...positionOf(body, "existing"),
        message: "Argument of `checkNoEnv` must be a function literal",
      });
      expect(diagnostics[1]).toMatchObject({
        ...positionOf(body, "(x: number) => x + 1"),
        message: "Argument of `checkWithEnv` must be a curried function literal of the form `x => env => ...`",
      });
    });
  });

  describe("entry points used as values", () => {
    it("reports an entry point stored in a variable", () => {
      const body = `
const seal = checkNoEnv;
export function stored() {
  const localCount = 3;
  return seal((x: number) => x + localCount);
}
`;
      const diagnostics = check(body);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        code: "NotALiteral",
        ...positionOf(body, "checkNoEnv"),
        message: "`checkNoEnv` must be called directly with a function literal",
      });
    });

    it("reports an entry point passed as a callback", () => {
      const body = `
const checked = [(x: number) => x + 1].map(checkNoEnv);
`;
      const diagnostics = check(body);
      expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
        ["NotALiteral", "`checkNoEnv` must be called directly with a function literal"],
      ]);
      expect(diagnostics[0]).toMatchObject(positionOf(body, "checkNoEnv"));
    });

    it("reports entry points taken out of an object", () => {
      const body = `
declare namespace blocks {
  /** @blockEntryPoint */
  function checkNoEnv<T, R>(body: (x: T) => R): unknown;
}
const { checkNoEnv: seal } = blocks;
const { thunk } = Block;
`;
      const diagnostics = check(body);
      expect(diagnostics.map((d) => d.message)).toEqual([
        "`checkNoEnv` must be called directly with a function literal",
        "`Block.thunk` must be called directly with a function literal",
      ]);
    });

    it("reports calls that match no overload", () => {
      const body = `
export const none = Block.of();
`;
      const diagnostics = check(body);
      expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
        ["NotALiteral", "`Block.of` must be called with a function literal"],
      ]);
      expect(diagnostics[0]).toMatchObject(positionOf(body, "Block.of()"));
    });
  });

  describe("unverifiable code", () => {
    const evalBody = `
export function dynamic() {
  return checkNoEnv((x: string) => eval(x));
}
`;

    it("skips a direct eval and logs it", () => {
      const lines: string[] = [];
      expect(check(evalBody, { log: (line) => lines.push(line) })).toEqual([]);
      const { line, column } = positionOf(evalBody, "eval");
      expect(lines).toEqual([`${FILE}:${line}:${column}: skipped: Cannot check captures through a direct \`eval\` call`]);
    });

    it("reports a direct eval in strict mode", () => {
      const diagnostics = check(evalBody, { strict: true });
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        code: "UnverifiableSyntax",
        message: "Cannot check captures through a direct `eval` call",
        ...positionOf(evalBody, "eval"),
      });
    });

    it("reports unresolved names in strict mode only", () => {
      const body = `export const broken = checkNoEnv((x: number) => x + notDeclaredAnywhere);`;
      expect(check(body)).toEqual([]);
      const diagnostics = check(body, { strict: true });
      expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
        ["UnverifiableSyntax", "Cannot resolve `notDeclaredAnywhere`"],
      ]);
    });
  });

  describe("entry point declarations", () => {
    it("does not check calls that forward a parameter inside an entry point", () => {
      const source = `
/** @blockEntryPoint */
declare function checkWithEnv<E, T, R>(body: (x: T) => (env: E) => R): unknown;
/** @blockEntryPoint */
export function checkThunk<E, R>(fun: (env: E) => R) {
  return checkWithEnv((_: void) => fun);
}
`;
      expect(verifySource(FILE, source)).toEqual([]);
    });

    it("checks forwarding calls in untagged functions", () => {
      const source = `
/** @blockEntryPoint */
declare function checkWithEnv<E, T, R>(body: (x: T) => (env: E) => R): unknown;
export function checkThunk<E, R>(fun: (env: E) => R) {
  return checkWithEnv((_: void) => fun);
}
`;
      expect(violations(verifySource(FILE, source))).toEqual(["fun"]);
    });
  });

  describe("reporting", () => {
    const body = `
export function makeCounter() {
  const localCount = 3;
  return checkNoEnv((x: number) => x + localCount);
}
`;

    it("formats diagnostics the way tsc does", () => {
      const [diagnostic] = check(body);
      const { line, column } = positionOf(body, "localCount");
      expect(formatDiagnostic(diagnostic)).toBe(
        `${FILE}:${line}:${column} - error CaptureViolation: Invalid capture of \`localCount\`. Pass it through the block's environment parameter instead.`
      );
    });

    it("assertNoCaptures throws with every diagnostic", () => {
      const diagnostics = check(body);
      expect(() => assertNoCaptures([])).not.toThrow();
      try {
        assertNoCaptures(diagnostics);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(CaptureViolationError);
        if (err instanceof CaptureViolationError) {
          expect(err.diagnostics).toEqual(diagnostics);
          expect(err.message).toMatch(/^Capture check failed: \/virtual\/blocks\.ts:\d+:\d+: Invalid capture of `localCount`/);
        }
      }
    });
  });
});
