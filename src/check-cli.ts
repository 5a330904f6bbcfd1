/**
 * blocks-check: runs the capture verifier over a TypeScript project.
 *
 * Usage:
 *   blocks-check [options] [files...]
 *
 * Options:
 *   -p, --project <file>   tsconfig.json to load (default: ./tsconfig.json)
 *   --strict               Report code the checker cannot see through
 *   --verbose              Log skipped code to stderr
 *   -h, --help             Show help
 *
 * Exit status: 0 clean, 1 diagnostics found, 2 usage or configuration error.
 */

import { ProjectConfigError } from "./errors";
import { CaptureDiagnostic, formatDiagnostic, verifyProject } from "./verifier";

export interface CliOptions {
  project: string;
  strict: boolean;
  verbose: boolean;
  files: string[];
}

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const HELP = `
blocks-check - check block literals for captured variables

Usage:
  blocks-check [options] [files...]

Options:
  -p, --project <file>   tsconfig.json to load (default: ./tsconfig.json)
  --strict               Report code the checker cannot see through
  --verbose              Log skipped code to stderr
  -h, --help             Show this help

Examples:
  blocks-check
  blocks-check -p tsconfig.build.json --strict
  blocks-check src/jobs.ts
`;

/**
 * `null` after printing a usage error, `"help"` when help was requested.
 */
export function parseArgs(args: string[], output: CliOutput = consoleOutput): CliOptions | "help" | null {
  const options: CliOptions = {
    project: "tsconfig.json",
    strict: false,
    verbose: false,
    files: [],
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return "help";
    } else if (arg === "-p" || arg === "--project") {
      i++;
      if (i >= args.length) {
        output.err("Error: --project requires a file path");
        return null;
      }
      options.project = args[i];
    } else if (arg === "--strict") {
      options.strict = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else if (arg.startsWith("-")) {
      output.err(`Error: Unknown option: ${arg}`);
      return null;
    } else {
      options.files.push(arg);
    }
    i++;
  }

  return options;
}

export function runCheck(args: string[], output: CliOutput = consoleOutput): number {
  const options = parseArgs(args, output);
  if (options === "help") {
    output.out(HELP);
    return 0;
  }
  if (!options) {
    return 2;
  }

  let diagnostics: CaptureDiagnostic[];
  try {
    diagnostics = verifyProject(options.project, {
      strict: options.strict,
      log: options.verbose ? (line) => output.err(line) : undefined,
      files: options.files.length > 0 ? options.files : undefined,
    });
  } catch (err) {
    if (err instanceof ProjectConfigError) {
      output.err(`Error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  for (const diagnostic of diagnostics) {
    output.out(formatDiagnostic(diagnostic));
  }

  if (diagnostics.length === 0) {
    output.out("No captures found.");
    return 0;
  }
  output.out(`Found ${diagnostics.length} ${diagnostics.length === 1 ? "error" : "errors"}.`);
  return 1;
}
