/**
 * Type definitions for the Go generator
 */

import type { BackendName } from "../core/types.js";
import type { Expr, Statement } from "../ir/types.js";
import type { ProcessBackend } from "./backend.js";
import type { FrameKind, Requirements } from "./lowering.js";
import type { HelperName } from "./runtime.js";

// =============================================================================
// Options
// =============================================================================

export interface GenerateOptions {
  /** Process-execution backend (default: "exec") */
  backend?: BackendName;
  /** Indentation unit (default: tab, as gofmt writes) */
  indent?: string;
}

export interface ResolvedGenerateOptions {
  backend: ProcessBackend;
  indent: string;
}

// =============================================================================
// Results
// =============================================================================

export interface GenerateResult {
  /** Complete main.go source */
  code: string;
  /** Sorted import paths and helpers, in emission order */
  requirements: Requirements;
}

export interface StatementResult {
  /** Output lines, indented for the current level */
  lines: string[];
}

/**
 * How a command lowers before indentation is applied.
 *
 * - status: error-valued calls, each checked and propagated
 * - bool: a boolean expression, usable directly as a condition;
 *   `statement()` gives its form as a standalone statement
 * - lines: plain statements with no status
 */
export type Lowering =
  | { kind: "status"; exprs: string[] }
  | { kind: "bool"; expr: string; statement: () => Lowering }
  | { kind: "lines"; lines: string[] };

// =============================================================================
// Visitor Context
// =============================================================================

/**
 * Interface handlers use to reach generator state and each other.
 */
export interface VisitorContext {
  getIndent(): string;
  indent(): void;
  dedent(): void;
  getOptions(): ResolvedGenerateOptions;
  /** Fresh identifier for generated code */
  getTempVar(prefix: string): string;

  /** Record an import and return its package qualifier */
  usePackage(path: string): string;
  /** Record a runtime helper and return its identifier */
  useHelper(name: HelperName): string;

  /** Go expression reading a shell variable */
  resolveVariable(name: string): string;
  /** Go identifier a shell variable is assigned through */
  variableTarget(name: string): string;
  /** Whether a shell variable has a Go identifier in the current scope */
  hasVariable(name: string): boolean;
  /** Go identifier of a script function */
  functionName(name: string): string;

  getFrames(): readonly FrameKind[];
  withFrame<T>(kind: FrameKind, fn: () => T): T;

  visitExpr(expr: Expr, options?: { escapes?: boolean }): string;
  visitStatement(stmt: Statement): StatementResult;
  visitStatements(stmts: Statement[]): string[];
  /** Condition expression; continuation lines are indented for the current level */
  visitCondition(stmts: Statement[]): string[];
}
