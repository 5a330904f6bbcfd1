/**
 * Errors raised by blocks, builders and the capture verifier.
 */

import type { CaptureDiagnostic } from "./verifier/diagnostics";

// ============================================================================
// Base
// ============================================================================

export class BlockError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BlockError";
  }
}

// ============================================================================
// Definition-time errors
// ============================================================================

/**
 * Thrown by the verification entry points when the value handed to them is
 * not a function literal of the required shape.
 */
export class NotALiteralError extends BlockError {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    this.name = "NotALiteralError";
  }
}

/**
 * Thrown by `assertNoCaptures` when the static pass found violations.
 */
export class CaptureViolationError extends BlockError {
  readonly diagnostics: readonly CaptureDiagnostic[];

  constructor(diagnostics: readonly CaptureDiagnostic[]) {
    const first = diagnostics[0];
    const summary = first
      ? `${first.fileName}:${first.line}:${first.column}: ${first.message}`
      : "no diagnostics";
    const more = diagnostics.length > 1 ? ` (and ${diagnostics.length - 1} more)` : "";
    super(`Capture check failed: ${summary}${more}`);
    this.name = "CaptureViolationError";
    this.diagnostics = diagnostics;
  }
}

// ============================================================================
// Runtime errors
// ============================================================================

/**
 * The environment of a block built without one was read. This is a logic
 * error in the caller, never bad input.
 */
export class NoEnvironmentError extends BlockError {
  constructor() {
    super("block does not have an environment");
    this.name = "NoEnvironmentError";
  }
}

export class DeserializationError extends BlockError {
  constructor(
    message: string,
    public readonly text: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "DeserializationError";
  }
}

/**
 * `createBlock` received a serialized environment when its builder has none,
 * or no serialized environment when its builder needs one.
 */
export class EnvironmentMismatchError extends BlockError {
  constructor(
    public readonly expected: "environment" | "no environment"
  ) {
    super(
      expected === "environment"
        ? "builder expects a serialized environment, but none was given"
        : "builder has no environment, but a serialized environment was given"
    );
    this.name = "EnvironmentMismatchError";
  }
}

// ============================================================================
// Tooling errors
// ============================================================================

/**
 * A tsconfig.json the capture checker was pointed at could not be used.
 */
export class ProjectConfigError extends BlockError {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(`${configPath}: ${message}`);
    this.name = "ProjectConfigError";
  }
}
