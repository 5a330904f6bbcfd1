/**
 * Programs to verify: an in-memory source file, or a tsconfig.json project.
 */

import * as path from "path";
import * as ts from "typescript";
import { ProjectConfigError } from "../errors";
import { CaptureDiagnostic } from "./diagnostics";
import { CaptureVerifier, VerifierOptions } from "./verifier";

const SOURCE_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Node10,
  lib: ["lib.es2022.d.ts"],
  types: [],
  strict: true,
  noEmit: true,
  skipLibCheck: true,
};

/**
 * Program holding one virtual file next to the default library.
 */
export function createSourceProgram(
  fileName: string,
  source: string,
  options: ts.CompilerOptions = SOURCE_OPTIONS
): ts.Program {
  const host = ts.createCompilerHost(options);
  const originalGetSourceFile = host.getSourceFile;
  host.getSourceFile = (
    name: string,
    languageVersion: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void
  ) => {
    if (name === fileName) {
      return ts.createSourceFile(name, source, languageVersion, true);
    }
    return originalGetSourceFile(name, languageVersion, onError);
  };
  host.fileExists = (name: string) => {
    if (name === fileName) return true;
    return ts.sys.fileExists(name);
  };
  host.readFile = (name: string) => {
    if (name === fileName) return source;
    return ts.sys.readFile(name);
  };

  return ts.createProgram([fileName], options, host);
}

/**
 * Checks the entry point calls of one source text.
 *
 * @example
 * verifySource("/virtual/add.ts", "const add = checkNoEnv((x: number) => x + offset);")
 */
export function verifySource(
  fileName: string,
  source: string,
  options: VerifierOptions = {}
): CaptureDiagnostic[] {
  const program = createSourceProgram(fileName, source);
  const sourceFile = program.getSourceFile(fileName);
  if (!sourceFile) {
    return [];
  }
  return new CaptureVerifier(program, options).verifyFile(sourceFile);
}

// ============================================================================
// Projects
// ============================================================================

function messageOf(diagnostic: ts.Diagnostic): string {
  return ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
}

/**
 * Program for a tsconfig.json, with the files its `include`/`files` select.
 * Throws `ProjectConfigError` when the configuration cannot be read.
 */
export function loadProject(configPath: string): ts.Program {
  const absolutePath = path.resolve(configPath);
  const configFile = ts.readConfigFile(absolutePath, ts.sys.readFile);
  if (configFile.error) {
    throw new ProjectConfigError(messageOf(configFile.error), absolutePath);
  }

  const parsed = ts.parseJsonConfigFileContent(configFile.config, ts.sys, path.dirname(absolutePath));
  if (parsed.errors.length > 0) {
    throw new ProjectConfigError(parsed.errors.map(messageOf).join("\n"), absolutePath);
  }

  return ts.createProgram({
    rootNames: parsed.fileNames,
    options: parsed.options,
    projectReferences: parsed.projectReferences,
  });
}

export interface ProjectVerifierOptions extends VerifierOptions {
  /** Restrict the check to these files (paths relative to the cwd) */
  files?: readonly string[];
}

export function verifyProject(configPath: string, options: ProjectVerifierOptions = {}): CaptureDiagnostic[] {
  const program = loadProject(configPath);
  const files = options.files?.map((file) => path.resolve(file).split(path.sep).join("/"));
  return new CaptureVerifier(program, options).verifyProgram(files);
}
