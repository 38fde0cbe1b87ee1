/**
 * Shell Syntax Tree
 *
 * A closed, normalized view over the parser's tree. Node names follow the
 * parser's own kinds; anything without a dedicated shape is kept as an
 * UnknownNode so consumers still see its kind.
 */

// =============================================================================
// Base Types
// =============================================================================

export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface BaseNode {
  type: string;
  pos?: Position;
}

/** A parser node kind with no dedicated shape (case, [[ ]], (( )), ...) */
export interface UnknownNode extends BaseNode {
  type: "Unknown";
  kind: string;
  /** Source text of the node */
  text: string;
}

// =============================================================================
// File and Statements
// =============================================================================

export interface File extends BaseNode {
  type: "File";
  name: string;
  stmts: Stmt[];
}

export interface Stmt extends BaseNode {
  type: "Stmt";
  /** Null for a statement made only of redirections */
  cmd: Command | null;
  negated: boolean;
  background: boolean;
  redirs: Redirect[];
}

export type Command =
  | CallExpr
  | BinaryCmd
  | IfClause
  | WhileClause
  | ForClause
  | Block
  | Subshell
  | FuncDecl
  | DeclClause
  | UnknownNode;

// =============================================================================
// Commands
// =============================================================================

export interface CallExpr extends BaseNode {
  type: "CallExpr";
  /** Environment prefix assignments (`FOO=1 cmd`) or bare assignments */
  assigns: Assign[];
  args: Word[];
}

export type BinaryOp = "&&" | "||" | "|" | "|&";

export interface BinaryCmd extends BaseNode {
  type: "BinaryCmd";
  op: BinaryOp;
  x: Stmt;
  y: Stmt;
}

export interface IfClause extends BaseNode {
  type: "IfClause";
  cond: Stmt[];
  then: Stmt[];
  /** A nested IfClause for `elif`, a statement list for `else` */
  alternate: IfClause | Stmt[] | null;
}

export interface WhileClause extends BaseNode {
  type: "WhileClause";
  until: boolean;
  cond: Stmt[];
  body: Stmt[];
}

export interface WordIter extends BaseNode {
  type: "WordIter";
  name: string;
  items: Word[];
}

export interface CStyleLoop extends BaseNode {
  type: "CStyleLoop";
}

export interface ForClause extends BaseNode {
  type: "ForClause";
  select: boolean;
  loop: WordIter | CStyleLoop;
  body: Stmt[];
}

export interface Block extends BaseNode {
  type: "Block";
  stmts: Stmt[];
}

export interface Subshell extends BaseNode {
  type: "Subshell";
  stmts: Stmt[];
}

export interface FuncDecl extends BaseNode {
  type: "FuncDecl";
  name: string;
  body: Stmt;
}

export interface DeclClause extends BaseNode {
  type: "DeclClause";
  /** export, local, declare, typeset, readonly, nameref */
  variant: string;
  assigns: Assign[];
}

export interface Assign extends BaseNode {
  type: "Assign";
  /** Null for a bare flag word such as `declare -x` */
  name: string | null;
  value: Word | null;
  append: boolean;
  naked: boolean;
  array: boolean;
  indexed: boolean;
}

export interface Redirect extends BaseNode {
  type: "Redirect";
  /** Operator text: ">", ">>", "<", "2>", "&>", "<<", ... */
  op: string;
  /** Explicit descriptor before the operator, e.g. "2" in `2>` */
  fd: string | null;
  word: Word | null;
}

// =============================================================================
// Words
// =============================================================================

export interface Word extends BaseNode {
  type: "Word";
  parts: WordPart[];
  text: string;
}

export type WordPart =
  | Lit
  | SglQuoted
  | DblQuoted
  | ParamExp
  | CmdSubst
  | UnknownNode;

/** Raw literal text, backslash escapes included */
export interface Lit extends BaseNode {
  type: "Lit";
  value: string;
}

export interface SglQuoted extends BaseNode {
  type: "SglQuoted";
  value: string;
  /** `$'...'` form */
  dollar: boolean;
}

export interface DblQuoted extends BaseNode {
  type: "DblQuoted";
  parts: WordPart[];
}

export interface ParamExp extends BaseNode {
  type: "ParamExp";
  name: string;
  /** `$X` rather than `${X}` */
  short: boolean;
  /** No operator, index, length or slice */
  plain: boolean;
  text: string;
}

export interface CmdSubst extends BaseNode {
  type: "CmdSubst";
  stmts: Stmt[];
  text: string;
}
