/**
 * Intermediate Representation
 *
 * The semantically explicit program model produced by the IR builder and
 * consumed by the Go generator. Statement is a closed tagged union: the
 * `kind` tag selects exactly one payload field.
 */

import type { SourceLocation } from "../core/errors.js";

// =============================================================================
// Values
// =============================================================================

/**
 * A value expression.
 *
 * Interpolated templates hold literal text with `\$` and `\\` escapes and
 * variable tokens: `$NAME`, `${NAME}`, `$0`-`$9`, `$@`, `$*`, `$#`, `$$`.
 */
export type Expr =
  | { kind: "literal"; value: string }
  | { kind: "interpolated"; template: string };

export type Capability =
  | "process"
  | "environment"
  | "filesystem"
  | "concurrency"
  | "input";

export type ConditionCategory =
  | "file-test"
  | "string-test"
  | "numeric-test"
  | "generic-command";

// =============================================================================
// Statement Payloads
// =============================================================================

export type CommandClassification = "builtin" | "function" | "external";

export interface Command {
  name: string;
  args: Expr[];
  classification: CommandClassification;
  /** Invocation goes through the process-execution helper */
  useHelper: boolean;
  /** `! cmd`, only inside conditions */
  negated?: boolean;
  location?: SourceLocation;
}

export interface Assignment {
  name: string;
  value: Expr;
  local: boolean;
  exported: boolean;
  append: boolean;
}

export interface ElifBranch {
  condition: Statement[];
  category: ConditionCategory;
  body: Statement[];
}

export interface Conditional {
  condition: Statement[];
  category: ConditionCategory;
  then: Statement[];
  elifs: ElifBranch[];
  else: Statement[];
}

export type ItemExpansion = "none" | "split" | "glob";

export interface LoopItem {
  value: Expr;
  expand: ItemExpansion;
}

export type Loop =
  | { type: "range"; variable: string; from: Expr; to: Expr; descending?: boolean; body: Statement[] }
  | { type: "list"; variable: string; items: LoopItem[]; body: Statement[] }
  | { type: "while" | "until"; condition: Statement[]; category: ConditionCategory; body: Statement[] };

export interface Pipeline {
  /** At least one command, in execution order */
  commands: Command[];
}

export interface Subshell {
  body: Statement[];
}

export type RedirectOperator = "truncate" | "append" | "read";

export interface Redirection {
  operator: RedirectOperator;
  target: Expr;
  /** Descriptor being replaced: 0 for input, 1 or 2 for output */
  fd: 0 | 1 | 2;
  statement: Statement;
}

export type BackgroundTarget = Extract<
  Statement,
  { kind: "Command" | "Pipeline" | "Redirection" | "Subshell" }
>;

export interface Background {
  statement: BackgroundTarget;
}

export interface Return {
  /** Literal exit status, null when absent or dynamic */
  code: number | null;
  /** Dynamic exit status */
  value: Expr | null;
}

// =============================================================================
// Statements
// =============================================================================

export type Statement =
  | { kind: "Command"; command: Command }
  | { kind: "Assignment"; assignment: Assignment }
  | { kind: "Conditional"; conditional: Conditional }
  | { kind: "Loop"; loop: Loop }
  | { kind: "Pipeline"; pipeline: Pipeline }
  | { kind: "Subshell"; subshell: Subshell }
  | { kind: "Redirection"; redirection: Redirection }
  | { kind: "Background"; background: Background }
  | { kind: "Return"; ret: Return }
  | { kind: "FunctionDecl"; name: string };

export type StatementKind = Statement["kind"];

// =============================================================================
// Program
// =============================================================================

export interface ShellFunction {
  name: string;
  body: Statement[];
  /** Positional parameter numbers referenced by the body, ascending */
  params: string[];
  /** Local name to last literal value (null when not literal) */
  locals: Map<string, string | null>;
}

export interface Program {
  statements: Statement[];
  /** Insertion-ordered; keys unique */
  functions: Map<string, ShellFunction>;
  /** Global name to last literal value (null when not literal) */
  variables: Map<string, string | null>;
  capabilities: Set<Capability>;
}

export const literal = (value: string): Expr => ({ kind: "literal", value });
