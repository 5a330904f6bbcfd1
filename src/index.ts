/**
 * Blocks: closures whose only link to the outside is an explicit
 * environment, checked at build time for captured variables.
 */

// Blocks
export { Block } from "./block";
export type { AppliedBlock, Environment } from "./block";

// Checked bodies
export { CheckedClosure, CheckedFunction, checkNoEnv, checkThunk, checkWithEnv } from "./checked";

// Builders
export { Builder, TypedBuilder } from "./builder";
export type { PackedBuilder } from "./builder";

// Duplication
export {
  arrayOf,
  blockDuplicable,
  cloned,
  duplicable,
  duplicate,
  immutable,
  plainBlockDuplicable,
  recordOf,
} from "./duplicable";
export type { Duplicable, Primitive } from "./duplicable";

// Environment codecs
export { jsonCodec } from "./codec";
export type { EnvCodec, EnvDeserializer } from "./codec";

// Errors
export {
  BlockError,
  CaptureViolationError,
  DeserializationError,
  EnvironmentMismatchError,
  NoEnvironmentError,
  NotALiteralError,
  ProjectConfigError,
} from "./errors";

// Capture verifier
export {
  CaptureVerifier,
  assertNoCaptures,
  formatDiagnostic,
  verifyProject,
  verifySource,
} from "./verifier";
export type { CaptureDiagnostic, CaptureDiagnosticCode, VerifierOptions } from "./verifier";
