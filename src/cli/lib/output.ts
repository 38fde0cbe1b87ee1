/**
 * Console output for the CLI
 */

import pc from "picocolors";
import type { Diagnostic } from "../../core/types.js";
import { describeError, isTranspileError } from "../../core/errors.js";

export interface Reporter {
  verbose: boolean;
  /** `[DEBUG]` line on stderr, only with --verbose */
  debug(message: string): void;
  /** Progress and results on stdout */
  info(message: string): void;
  success(message: string): void;
  diagnostic(filename: string, diagnostic: Diagnostic): void;
  error(error: unknown): void;
}

const LEVEL_COLORS = {
  error: pc.red,
  warning: pc.yellow,
  info: pc.cyan,
} as const;

/** `file:line:col: level: message` */
export function formatDiagnostic(filename: string, diagnostic: Diagnostic): string {
  const where = diagnostic.location
    ? `${filename}:${diagnostic.location.line}:${diagnostic.location.column}`
    : filename;
  const level = LEVEL_COLORS[diagnostic.level](diagnostic.level);
  return `${where}: ${level}: ${diagnostic.message}`;
}

export function createReporter(verbose: boolean): Reporter {
  return {
    verbose,
    debug(message) {
      if (verbose) {
        console.error(pc.dim(`[DEBUG] ${message}`));
      }
    },
    info(message) {
      console.log(message);
    },
    success(message) {
      console.log(pc.green(`✓ ${message}`));
    },
    diagnostic(filename, diagnostic) {
      console.error(formatDiagnostic(filename, diagnostic));
    },
    error(error) {
      console.error(`${pc.red("Error:")} ${describeError(error)}`);
      if (isTranspileError(error) && error.suggestion) {
        console.error(pc.dim(`Hint: ${error.suggestion}`));
      }
    },
  };
}
