/**
 * Shell parser adapter
 *
 * Runs the mvdan-sh parser and converts its tree into the normalized syntax
 * tree of ./ast.ts. Operator text is read back from the source at the
 * operator's byte offset, so numeric operator codes never leak out.
 */

import { Buffer } from "node:buffer";
import mvdanSh from "mvdan-sh";
import type { Pos, ShellNode } from "mvdan-sh";
import { malformedSource } from "../core/errors.js";
import type * as AST from "./ast.js";

const { syntax } = mvdanSh;

// =============================================================================
// Node Access
// =============================================================================

function isNode(value: unknown): value is ShellNode {
  return typeof value === "object" && value !== null;
}

function isPos(value: unknown): value is Pos {
  return isNode(value) && typeof value.Offset === "function" && typeof value.Line === "function";
}

function isArrayLike(value: unknown): value is ArrayLike<unknown> {
  return isNode(value) && typeof value.length === "number";
}

function child(node: ShellNode, key: string): ShellNode | null {
  const value = node[key];
  return isNode(value) ? value : null;
}

function children(node: ShellNode, key: string): ShellNode[] {
  const value = node[key];
  if (!isArrayLike(value)) {
    return [];
  }
  return Array.from(value).filter(isNode);
}

function text(node: ShellNode | null, key: string): string {
  const value = node?.[key];
  return typeof value === "string" ? value : "";
}

function flag(node: ShellNode, key: string): boolean {
  return node[key] === true;
}

function litValue(node: ShellNode, key: string): string | null {
  const lit = child(node, key);
  return lit ? text(lit, "Value") : null;
}

function callPos(node: ShellNode, method: "Pos" | "End"): Pos | null {
  const fn = node[method];
  if (typeof fn !== "function") {
    return null;
  }
  const pos: unknown = fn.call(node);
  return isPos(pos) ? pos : null;
}

function toPosition(pos: Pos | null): AST.Position | undefined {
  if (!pos || !pos.IsValid()) {
    return undefined;
  }
  return { line: pos.Line(), column: pos.Col(), offset: pos.Offset() };
}

const BINARY_OPS: readonly AST.BinaryOp[] = ["&&", "||", "|&", "|"];

const REDIRECT_OPS = [
  "&>>", "<<<", "<<-", "&>", ">>", ">&", ">|", "<<", "<&", "<>", ">", "<",
] as const;

// =============================================================================
// Tree Converter
// =============================================================================

class TreeConverter {
  private readonly bytes: Buffer;

  constructor(source: string) {
    this.bytes = Buffer.from(source, "utf8");
  }

  convertFile(node: ShellNode, name: string): AST.File {
    return {
      type: "File",
      name,
      stmts: this.convertStmts(node, "Stmts"),
    };
  }

  private slice(start: number, end: number): string {
    return this.bytes.subarray(start, end).toString("utf8");
  }

  private sourceText(node: ShellNode): string {
    const start = callPos(node, "Pos");
    const end = callPos(node, "End");
    if (!start || !end || !start.IsValid() || !end.IsValid()) {
      return "";
    }
    return this.slice(start.Offset(), end.Offset());
  }

  /** Operator text at a position field, matched against the known operators */
  private operatorAt<T extends string>(
    node: ShellNode,
    key: string,
    candidates: readonly T[],
  ): T | null {
    const pos = node[key];
    if (!isPos(pos) || !pos.IsValid()) {
      return null;
    }
    const offset = pos.Offset();
    const head = this.slice(offset, offset + 3);
    return candidates.find((op) => head.startsWith(op)) ?? null;
  }

  private position(node: ShellNode): AST.Position | undefined {
    return toPosition(callPos(node, "Pos"));
  }

  private unknown(node: ShellNode): AST.UnknownNode {
    return {
      type: "Unknown",
      kind: syntax.NodeType(node),
      text: this.sourceText(node),
      pos: this.position(node),
    };
  }

  private convertStmts(node: ShellNode, key: string): AST.Stmt[] {
    return children(node, key).map((stmt) => this.convertStmt(stmt));
  }

  convertStmt(node: ShellNode): AST.Stmt {
    const cmd = child(node, "Cmd");
    return {
      type: "Stmt",
      cmd: cmd ? this.convertCommand(cmd) : null,
      negated: flag(node, "Negated"),
      background: flag(node, "Background"),
      redirs: children(node, "Redirs").map((redir) => this.convertRedirect(redir)),
      pos: this.position(node),
    };
  }

  private convertCommand(node: ShellNode): AST.Command {
    const pos = this.position(node);
    const kind = syntax.NodeType(node);

    switch (kind) {
      case "CallExpr":
        return {
          type: "CallExpr",
          assigns: children(node, "Assigns").map((assign) => this.convertAssign(assign)),
          args: children(node, "Args").map((word) => this.convertWord(word)),
          pos,
        };

      case "BinaryCmd": {
        const op = this.operatorAt(node, "OpPos", BINARY_OPS);
        const x = child(node, "X");
        const y = child(node, "Y");
        if (!op || !x || !y) {
          return this.unknown(node);
        }
        return {
          type: "BinaryCmd",
          op,
          x: this.convertStmt(x),
          y: this.convertStmt(y),
          pos,
        };
      }

      case "IfClause":
        return this.convertIf(node);

      case "WhileClause":
        return {
          type: "WhileClause",
          until: flag(node, "Until"),
          cond: this.convertStmts(node, "Cond"),
          body: this.convertStmts(node, "Do"),
          pos,
        };

      case "ForClause": {
        const loop = child(node, "Loop");
        return {
          type: "ForClause",
          select: flag(node, "Select"),
          loop: loop && syntax.NodeType(loop) === "WordIter"
            ? {
              type: "WordIter",
              name: litValue(loop, "Name") ?? "",
              items: children(loop, "Items").map((word) => this.convertWord(word)),
              pos: this.position(loop),
            }
            : { type: "CStyleLoop", pos },
          body: this.convertStmts(node, "Do"),
          pos,
        };
      }

      case "Block":
        return { type: "Block", stmts: this.convertStmts(node, "Stmts"), pos };

      case "Subshell":
        return { type: "Subshell", stmts: this.convertStmts(node, "Stmts"), pos };

      case "FuncDecl": {
        const body = child(node, "Body");
        if (!body) {
          return this.unknown(node);
        }
        return {
          type: "FuncDecl",
          name: litValue(node, "Name") ?? "",
          body: this.convertStmt(body),
          pos,
        };
      }

      case "DeclClause":
        return {
          type: "DeclClause",
          variant: litValue(node, "Variant") ?? "",
          assigns: children(node, "Args").map((assign) => this.convertAssign(assign)),
          pos,
        };

      default:
        return this.unknown(node);
    }
  }

  private convertIf(node: ShellNode): AST.IfClause {
    const next = child(node, "Else");
    let alternate: AST.IfClause | AST.Stmt[] | null = null;
    if (next) {
      // A plain `else` is an IfClause without a condition
      alternate = children(next, "Cond").length === 0
        ? this.convertStmts(next, "Then")
        : this.convertIf(next);
    }
    return {
      type: "IfClause",
      cond: this.convertStmts(node, "Cond"),
      then: this.convertStmts(node, "Then"),
      alternate,
      pos: this.position(node),
    };
  }

  private convertAssign(node: ShellNode): AST.Assign {
    const value = child(node, "Value");
    return {
      type: "Assign",
      name: litValue(node, "Name"),
      value: value ? this.convertWord(value) : null,
      append: flag(node, "Append"),
      naked: flag(node, "Naked"),
      array: child(node, "Array") !== null,
      indexed: child(node, "Index") !== null,
      pos: this.position(node),
    };
  }

  private convertRedirect(node: ShellNode): AST.Redirect {
    const word = child(node, "Word");
    return {
      type: "Redirect",
      op: this.operatorAt(node, "OpPos", REDIRECT_OPS) ?? "?",
      fd: litValue(node, "N"),
      word: word ? this.convertWord(word) : null,
      pos: this.position(node),
    };
  }

  convertWord(node: ShellNode): AST.Word {
    return {
      type: "Word",
      parts: children(node, "Parts").map((part) => this.convertWordPart(part)),
      text: this.sourceText(node),
      pos: this.position(node),
    };
  }

  private convertWordPart(node: ShellNode): AST.WordPart {
    const pos = this.position(node);

    switch (syntax.NodeType(node)) {
      case "Lit":
        return { type: "Lit", value: text(node, "Value"), pos };

      case "SglQuoted":
        return { type: "SglQuoted", value: text(node, "Value"), dollar: flag(node, "Dollar"), pos };

      case "DblQuoted":
        return {
          type: "DblQuoted",
          parts: children(node, "Parts").map((part) => this.convertWordPart(part)),
          pos,
        };

      case "ParamExp": {
        const plain = !flag(node, "Excl") && !flag(node, "Length") && !flag(node, "Width") &&
          child(node, "Index") === null && child(node, "Slice") === null &&
          child(node, "Repl") === null && child(node, "Exp") === null && !node.Names;
        return {
          type: "ParamExp",
          name: litValue(node, "Param") ?? "",
          short: flag(node, "Short"),
          plain,
          text: this.sourceText(node),
          pos,
        };
      }

      case "CmdSubst":
        return {
          type: "CmdSubst",
          stmts: this.convertStmts(node, "Stmts"),
          text: this.sourceText(node),
          pos,
        };

      default:
        return this.unknown(node);
    }
  }
}

// =============================================================================
// Parse Errors
// =============================================================================

function describeParseError(error: unknown, filename: string): {
  message: string;
  line?: number;
  column?: number;
} {
  if (!isNode(error)) {
    return { message: `${filename}: ${String(error)}` };
  }

  let line = typeof error.Line === "number" ? error.Line : undefined;
  let column = typeof error.Column === "number" ? error.Column : undefined;
  const pos = error.Pos;
  if (line === undefined && isPos(pos) && pos.IsValid()) {
    line = pos.Line();
    column = pos.Col();
  }

  if (typeof error.message === "string" && error.message) {
    return { message: error.message, line, column };
  }
  if (typeof error.Error === "function") {
    const described: unknown = error.Error.call(error);
    if (typeof described === "string") {
      return { message: described, line, column };
    }
  }
  const detail = typeof error.Text === "string" ? error.Text : String(error);
  const where = line !== undefined ? `:${line}:${column ?? 0}` : "";
  return { message: `${filename}${where}: ${detail}`, line, column };
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Parse shell source into a normalized syntax tree.
 *
 * @throws TranspileError (MALFORMED_SOURCE) carrying the parser's message
 */
export function parse(source: string, filename = "script.sh"): AST.File {
  let file: ShellNode;
  try {
    file = syntax.NewParser().Parse(source, filename);
  } catch (error) {
    const { message, line, column } = describeParseError(error, filename);
    throw malformedSource(
      message,
      line !== undefined ? { line, column: column ?? 0 } : undefined,
      filename,
    );
  }
  return new TreeConverter(source).convertFile(file, filename);
}
