/**
 * Capture verifier: the build-time check of block literals.
 */

export { CaptureVerifier } from "./verifier";
export type { VerifierOptions } from "./verifier";
export { createSourceProgram, loadProject, verifyProject, verifySource } from "./program";
export type { ProjectVerifierOptions } from "./program";
export { assertNoCaptures, formatDiagnostic, sortDiagnostics } from "./diagnostics";
export type { CaptureDiagnostic, CaptureDiagnosticCode } from "./diagnostics";
export { MAX_NAMESPACE_DEPTH } from "./owners";
