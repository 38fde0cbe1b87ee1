/**
 * Builders for syntax trees in unit tests
 */

import type {
  Assign,
  BinaryOp,
  CallExpr,
  CmdSubst,
  Command,
  DblQuoted,
  File,
  IfClause,
  Lit,
  ParamExp,
  Redirect,
  SglQuoted,
  Stmt,
  UnknownNode,
  Word,
  WordPart,
} from "./ast.js";

export const lit = (value: string): Lit => ({ type: "Lit", value });
export const sgl = (value: string): SglQuoted => ({ type: "SglQuoted", value, dollar: false });
export const dbl = (...parts: WordPart[]): DblQuoted => ({ type: "DblQuoted", parts });
export const param = (name: string, short = true): ParamExp => ({
  type: "ParamExp",
  name,
  short,
  plain: true,
  text: short ? `$${name}` : `\${${name}}`,
});
export const cmdSubst = (source: string, ...stmts: Stmt[]): CmdSubst => ({
  type: "CmdSubst",
  stmts,
  text: source,
});
export const unknown = (kind: string, source = ""): UnknownNode => ({
  type: "Unknown",
  kind,
  text: source,
});

export const wordParts = (...parts: WordPart[]): Word => ({ type: "Word", parts, text: "" });
export const word = (value: string): Word => wordParts(lit(value));

export const stmt = (
  cmd: Command | null,
  opts: { negated?: boolean; background?: boolean; redirs?: Redirect[] } = {},
): Stmt => ({
  type: "Stmt",
  cmd,
  negated: opts.negated ?? false,
  background: opts.background ?? false,
  redirs: opts.redirs ?? [],
});

export const call = (...args: (string | Word)[]): CallExpr => ({
  type: "CallExpr",
  assigns: [],
  args: args.map((arg) => typeof arg === "string" ? word(arg) : arg),
});

/** Statement wrapping a simple command */
export const simple = (...args: (string | Word)[]): Stmt => stmt(call(...args));

export const assign = (
  name: string | null,
  value?: Word,
  opts: { append?: boolean; naked?: boolean } = {},
): Assign => ({
  type: "Assign",
  name,
  value: value ?? null,
  append: opts.append ?? false,
  naked: opts.naked ?? false,
  array: false,
  indexed: false,
});

/** Statement made of bare assignments (`X=1`) */
export const assignStmt = (...assigns: Assign[]): Stmt =>
  stmt({ type: "CallExpr", assigns, args: [] });

export const decl = (variant: string, ...assigns: Assign[]): Stmt =>
  stmt({ type: "DeclClause", variant, assigns });

export const binary = (op: BinaryOp, x: Stmt, y: Stmt): Stmt =>
  stmt({ type: "BinaryCmd", op, x, y });

export const ifClause = (
  cond: Stmt[],
  then: Stmt[],
  alternate: IfClause | Stmt[] | null = null,
): IfClause => ({ type: "IfClause", cond, then, alternate });

export const whileLoop = (cond: Stmt[], body: Stmt[], until = false): Stmt =>
  stmt({ type: "WhileClause", until, cond, body });

export const forIn = (name: string, items: Word[], body: Stmt[]): Stmt =>
  stmt({
    type: "ForClause",
    select: false,
    loop: { type: "WordIter", name, items },
    body,
  });

export const subshell = (...stmts: Stmt[]): Stmt =>
  stmt({ type: "Subshell", stmts });

export const block = (...stmts: Stmt[]): Stmt => stmt({ type: "Block", stmts });

export const funcDecl = (name: string, ...body: Stmt[]): Stmt =>
  stmt({ type: "FuncDecl", name, body: block(...body) });

export const redirect = (op: string, target: string, fd: string | null = null): Redirect => ({
  type: "Redirect",
  op,
  fd,
  word: word(target),
});

export const file = (...stmts: Stmt[]): File => ({ type: "File", name: "test.sh", stmts });
