import { describe, expect, it } from "vitest";
import { TranspileError } from "../core/errors.js";
import type { Command, Stmt } from "./ast.js";
import { parse } from "./parse.js";

function command(stmt: Stmt | undefined): Command | null {
  return stmt?.cmd ?? null;
}

function callArgs(stmt: Stmt | undefined): string[] {
  const cmd = command(stmt);
  if (cmd?.type !== "CallExpr") {
    return [];
  }
  return cmd.args.map((arg) => arg.text);
}

describe("parse", () => {
  it("converts simple commands with their word text", () => {
    const file = parse("echo hello world\n", "greet.sh");
    expect(file.name).toBe("greet.sh");
    expect(file.stmts).toHaveLength(1);
    expect(callArgs(file.stmts[0])).toEqual(["echo", "hello", "world"]);
  });

  it("keeps quoting structure in word parts", () => {
    const file = parse(`echo "Hello, $NAME!" 'raw $X'`);
    const cmd = command(file.stmts[0]);
    expect(cmd?.type).toBe("CallExpr");
    const args = (cmd?.type === "CallExpr" ? cmd : null)?.args ?? [];
    expect(args[1]?.parts[0]?.type).toBe("DblQuoted");
    const dq = args[1]?.parts[0];
    const inner = dq?.type === "DblQuoted" ? dq.parts.map((part) => part.type) : [];
    expect(inner).toEqual(["Lit", "ParamExp", "Lit"]);
    expect(args[2]?.parts[0]).toMatchObject({ type: "SglQuoted", value: "raw $X" });
  });

  it("reads binary operators from the source", () => {
    const file = parse("a | b && c\n");
    const top = command(file.stmts[0]);
    expect(top).toMatchObject({ type: "BinaryCmd", op: "&&" });
    const left = top?.type === "BinaryCmd" ? command(top.x) : null;
    expect(left).toMatchObject({ type: "BinaryCmd", op: "|" });
  });

  it("normalizes elif chains and plain else", () => {
    const file = parse("if a; then b; elif c; then d; else e; fi\n");
    const top = command(file.stmts[0]);
    expect(top?.type).toBe("IfClause");
    const clause = top?.type === "IfClause" ? top : null;
    const elif = clause?.alternate;
    expect(elif && !Array.isArray(elif) ? elif.type : null).toBe("IfClause");
    const last = elif && !Array.isArray(elif) ? elif.alternate : null;
    expect(Array.isArray(last)).toBe(true);
    expect(Array.isArray(last) ? callArgs(last[0]) : []).toEqual(["e"]);
  });

  it("converts redirections with operator text", () => {
    const file = parse("echo hi >> log.txt\n");
    expect(file.stmts[0]?.redirs).toHaveLength(1);
    expect(file.stmts[0]?.redirs[0]).toMatchObject({ type: "Redirect", op: ">>", fd: null });
    expect(file.stmts[0]?.redirs[0]?.word?.text).toBe("log.txt");
  });

  it("marks background statements", () => {
    const file = parse("sleep 1 &\n");
    expect(file.stmts[0]?.background).toBe(true);
  });

  it("keeps unsupported kinds as unknown nodes", () => {
    const file = parse("case $x in a) echo a;; esac\n");
    expect(command(file.stmts[0])).toMatchObject({ type: "Unknown", kind: "CaseClause" });
  });

  it("converts function declarations", () => {
    const file = parse("greet() { echo hi; }\n");
    const fn = command(file.stmts[0]);
    expect(fn).toMatchObject({ type: "FuncDecl", name: "greet" });
    const body = fn?.type === "FuncDecl" ? command(fn.body) : null;
    expect(body?.type).toBe("Block");
  });

  it("converts declarations with their assignments", () => {
    const file = parse("export PATH_EXTRA=/opt/bin\n");
    const decl = command(file.stmts[0]);
    expect(decl).toMatchObject({ type: "DeclClause", variant: "export" });
    const assigns = decl?.type === "DeclClause" ? decl.assigns : [];
    expect(assigns[0]?.name).toBe("PATH_EXTRA");
    expect(assigns[0]?.value?.text).toBe("/opt/bin");
  });

  it("records bare assignments on call expressions", () => {
    const file = parse("COUNT=5\n");
    const cmd = command(file.stmts[0]);
    expect(cmd?.type).toBe("CallExpr");
    const call = cmd?.type === "CallExpr" ? cmd : null;
    expect(call?.args).toEqual([]);
    expect(call?.assigns[0]?.name).toBe("COUNT");
  });

  it("throws a malformed-source error for invalid syntax", () => {
    let caught: unknown;
    try {
      parse("echo 'unterminated\n", "bad.sh");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TranspileError);
    expect(caught).toMatchObject({ code: "MALFORMED_SOURCE" });
  });
});
