/**
 * Diagnostics reported by the capture verifier.
 */

import * as ts from "typescript";
import { CaptureViolationError } from "../errors";

export type CaptureDiagnosticCode = "NotALiteral" | "CaptureViolation" | "UnverifiableSyntax";

export interface CaptureDiagnostic {
  code: CaptureDiagnosticCode;
  message: string;
  fileName: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  start: number;
  length: number;
  /** The offending identifier, for capture violations */
  identifier?: string;
}

export function diagnosticAt(
  node: ts.Node,
  code: CaptureDiagnosticCode,
  message: string,
  identifier?: string
): CaptureDiagnostic {
  const sourceFile = node.getSourceFile();
  const start = node.getStart(sourceFile);
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(start);
  return {
    code,
    message,
    fileName: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    start,
    length: node.getEnd() - start,
    identifier,
  };
}

/**
 * `file:line:column - error Code: message`, the layout tsc uses.
 */
export function formatDiagnostic(diagnostic: CaptureDiagnostic): string {
  return `${diagnostic.fileName}:${diagnostic.line}:${diagnostic.column} - error ${diagnostic.code}: ${diagnostic.message}`;
}

/**
 * Diagnostics in file order, then by position.
 */
export function sortDiagnostics(diagnostics: CaptureDiagnostic[]): CaptureDiagnostic[] {
  return [...diagnostics].sort((a, b) =>
    a.fileName === b.fileName ? a.start - b.start : a.fileName < b.fileName ? -1 : 1
  );
}

export function assertNoCaptures(diagnostics: readonly CaptureDiagnostic[]): void {
  if (diagnostics.length > 0) {
    throw new CaptureViolationError(diagnostics);
  }
}
