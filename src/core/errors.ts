/**
 * sh2go error types
 *
 * Every failure the transpiler surfaces is a TranspileError carrying a
 * stable code, a one-line message and an optional suggestion for the user.
 */

export type ErrorCode =
  | "MALFORMED_SOURCE"
  | "UNSUPPORTED_CONSTRUCT"
  | "BUILD_TOOL_FAILURE"
  | "CONFIG_ERROR"
  | "INTERNAL_ERROR";

/** Pipeline stage an error originated from */
export type Stage = "parse" | "build" | "generate" | "compile" | "config";

export interface SourceLocation {
  line: number;
  column: number;
}

export interface ErrorDetails {
  stage?: Stage;
  kind?: string;
  step?: string;
  output?: string;
  path?: string;
  location?: SourceLocation;
}

export class TranspileError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = "TranspileError";
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
    };
  }
}

export function isTranspileError(error: unknown): error is TranspileError {
  return error instanceof TranspileError;
}

function formatLocation(location?: SourceLocation): string {
  return location ? ` at ${location.line}:${location.column}` : "";
}

// Factory functions

export function malformedSource(
  message: string,
  location?: SourceLocation,
  path?: string,
): TranspileError {
  return new TranspileError(
    "MALFORMED_SOURCE",
    message,
    { stage: "parse", location, path },
  );
}

export function unsupportedConstruct(
  kind: string,
  stage: "build" | "generate",
  location?: SourceLocation,
): TranspileError {
  return new TranspileError(
    "UNSUPPORTED_CONSTRUCT",
    `Unsupported construct: ${kind}${formatLocation(location)}`,
    { stage, kind, location },
    "Rewrite this part of the script with commands, conditionals, loops or pipelines",
  );
}

export function buildToolFailure(step: string, output: string): TranspileError {
  const trimmed = output.trim();
  return new TranspileError(
    "BUILD_TOOL_FAILURE",
    trimmed ? `Build step '${step}' failed:\n${trimmed}` : `Build step '${step}' failed`,
    { stage: "compile", step, output },
    "Re-run with --keep-workspace to inspect the staged sources",
  );
}

export function configError(message: string, path?: string): TranspileError {
  return new TranspileError(
    "CONFIG_ERROR",
    message,
    { stage: "config", path },
    "Check your sh2go.config.json file",
  );
}

export function internalError(message: string): TranspileError {
  return new TranspileError("INTERNAL_ERROR", `Internal error: ${message}`);
}

/** Render any thrown value as a single line for the user, never a stack */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
