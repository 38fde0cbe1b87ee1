/**
 * IR Builder
 *
 * Walks the shell syntax tree and lowers every node to IR statements.
 * Node kinds without a rule abort the build with UnsupportedConstruct;
 * a partial Program is never returned.
 */

import type { SourceLocation } from "../core/errors.js";
import { unsupportedConstruct } from "../core/errors.js";
import type { Diagnostic } from "../core/types.js";
import type * as AST from "../syntax/ast.js";
import {
  isBuiltin,
  isImpliedSetCommand,
  SHELL_BUILTINS,
  SHELL_ONLY_COMMANDS,
} from "./builtins.js";
import { conditionCategory } from "./conditions.js";
import { isIdentifier, literalValue } from "./template.js";
import type {
  BackgroundTarget,
  Capability,
  Command,
  Conditional,
  Expr,
  LoopItem,
  Program,
  Redirection,
  ShellFunction,
  Statement,
} from "./types.js";
import { literal } from "./types.js";
import type { WordContext } from "./words.js";
import { braceRange, fitsInt64, itemExpansion, wordLiteral, wordToExpr } from "./words.js";

// =============================================================================
// Types
// =============================================================================

export interface BuildResult {
  program: Program;
  diagnostics: Diagnostic[];
}

interface FunctionScope {
  locals: Map<string, string | null>;
  params: Set<number>;
}

interface AssignOptions {
  local?: boolean;
  exported?: boolean;
  append?: boolean;
}

const BACKGROUND_KINDS = new Set(["Command", "Pipeline", "Redirection", "Subshell"]);
const INTEGER = /^-?\d+$/;
/** Most items a brace range may expand to inside a longer item list */
const MAX_BRACE_ITEMS = 1024;

interface RangeBounds {
  from: Expr;
  to: Expr;
  descending: boolean;
}

function location(pos?: AST.Position): SourceLocation | undefined {
  return pos ? { line: pos.line, column: pos.column } : undefined;
}

function unsupported(kind: string, pos?: AST.Position) {
  return unsupportedConstruct(kind, "build", location(pos));
}

function isBackgroundTarget(statement: Statement): statement is BackgroundTarget {
  return BACKGROUND_KINDS.has(statement.kind);
}

/** A `&&` / `||` list node with no modifiers of its own */
function listNode(stmt: AST.Stmt): AST.BinaryCmd | null {
  const cmd = stmt.cmd;
  if (
    cmd?.type === "BinaryCmd" && (cmd.op === "&&" || cmd.op === "||") &&
    !stmt.negated && !stmt.background && stmt.redirs.length === 0
  ) {
    return cmd;
  }
  return null;
}

/** Child statement lists of a command, for the function pre-scan */
function childStatements(cmd: AST.Command | null): AST.Stmt[] {
  if (!cmd) {
    return [];
  }
  switch (cmd.type) {
    case "BinaryCmd":
      return [cmd.x, cmd.y];
    case "IfClause": {
      const alternate = cmd.alternate;
      const rest = alternate === null
        ? []
        : Array.isArray(alternate)
        ? alternate
        : [{ type: "Stmt" as const, cmd: alternate, negated: false, background: false, redirs: [] }];
      return [...cmd.cond, ...cmd.then, ...rest];
    }
    case "WhileClause":
      return [...cmd.cond, ...cmd.body];
    case "ForClause":
      return cmd.body;
    case "Block":
    case "Subshell":
      return cmd.stmts;
    case "FuncDecl":
      return [cmd.body];
    default:
      return [];
  }
}

// =============================================================================
// Builder
// =============================================================================

export class IRBuilder {
  private readonly functionNames = new Set<string>();
  private readonly functions = new Map<string, ShellFunction>();
  private readonly variables = new Map<string, string | null>();
  private readonly capabilities = new Set<Capability>();
  private readonly diagnostics: Diagnostic[] = [];
  private scope: FunctionScope | null = null;

  /** Else-branch that fails a condition closure */
  private readonly failure: Statement[] = [
    { kind: "Return", ret: { code: 1, value: null } },
  ];

  private readonly words: WordContext = {
    warn: (message, pos) => this.warn(message, pos),
    usePositional: (index) => this.scope?.params.add(index),
  };

  build(file: AST.File): BuildResult {
    this.prescan(file.stmts);
    const statements = this.buildStmts(file.stmts, false);
    return {
      program: {
        statements,
        functions: this.functions,
        variables: this.variables,
        capabilities: this.capabilities,
      },
      diagnostics: [...this.diagnostics],
    };
  }

  // ===========================================================================
  // Bookkeeping
  // ===========================================================================

  private prescan(stmts: AST.Stmt[]): void {
    for (const stmt of stmts) {
      if (stmt.cmd?.type === "FuncDecl") {
        this.functionNames.add(stmt.cmd.name);
      }
      this.prescan(childStatements(stmt.cmd));
    }
  }

  private warn(message: string, pos?: AST.Position): void {
    this.diagnostics.push({ level: "warning", message, location: location(pos) });
  }

  private require(...capabilities: Capability[]): void {
    for (const capability of capabilities) {
      this.capabilities.add(capability);
    }
  }

  private expr(word: AST.Word): Expr {
    return wordToExpr(word, this.words);
  }

  private declareVariable(name: string): void {
    if (this.scope?.locals.has(name)) {
      this.scope.locals.set(name, null);
    } else {
      this.variables.set(name, null);
    }
  }

  private assignment(name: string, value: Expr, options: AssignOptions = {}): Statement {
    const scope = this.scope;
    const local = scope !== null && (options.local === true || scope.locals.has(name));
    const table = local && scope ? scope.locals : this.variables;
    const exported = options.exported ?? false;
    const append = options.append ?? false;

    let known = literalValue(value);
    if (append) {
      const previous = table.get(name);
      known = previous !== undefined && previous !== null && known !== null
        ? previous + known
        : null;
    }
    table.set(name, known);

    if (exported) {
      this.require("environment");
    }
    return { kind: "Assignment", assignment: { name, value, local, exported, append } };
  }

  // ===========================================================================
  // Statements
  // ===========================================================================

  private buildStmts(stmts: AST.Stmt[], inCondition: boolean): Statement[] {
    return stmts.flatMap((stmt) => this.buildStmt(stmt, inCondition));
  }

  private buildStmt(stmt: AST.Stmt, inCondition: boolean): Statement[] {
    if (!stmt.cmd) {
      throw unsupported("redirection without a command", stmt.pos);
    }
    if (stmt.negated && !inCondition) {
      throw unsupported("negated statement outside a condition", stmt.pos);
    }

    let statements = this.buildCommand(stmt.cmd, inCondition, stmt.pos);

    if (stmt.negated) {
      const [only] = statements;
      if (statements.length !== 1 || only?.kind !== "Command") {
        throw unsupported("negated compound command", stmt.pos);
      }
      statements = [{ kind: "Command", command: { ...only.command, negated: true } }];
    }

    if (stmt.redirs.length > 0) {
      const [only] = statements;
      if (statements.length !== 1 || only === undefined) {
        throw unsupported("redirection of a statement group", stmt.pos);
      }
      statements = [this.wrapRedirects(only, stmt.redirs)];
    }

    if (stmt.background) {
      const [only] = statements;
      if (statements.length !== 1 || only === undefined || !isBackgroundTarget(only)) {
        throw unsupported("background compound command", stmt.pos);
      }
      this.require("process", "concurrency");
      statements = [{ kind: "Background", background: { statement: only } }];
    }

    return statements;
  }

  private buildCommand(
    cmd: AST.Command,
    inCondition: boolean,
    pos?: AST.Position,
  ): Statement[] {
    switch (cmd.type) {
      case "CallExpr":
        return this.buildCall(cmd, pos);
      case "BinaryCmd":
        return this.buildBinary(cmd, inCondition);
      case "IfClause":
        return [{ kind: "Conditional", conditional: this.buildIf(cmd) }];
      case "WhileClause": {
        const condition = this.buildStmts(cmd.cond, true);
        return [{
          kind: "Loop",
          loop: {
            type: cmd.until ? "until" : "while",
            condition,
            category: conditionCategory(condition),
            body: this.buildStmts(cmd.body, false),
          },
        }];
      }
      case "ForClause":
        return [this.buildFor(cmd)];
      case "Block":
        return this.buildStmts(cmd.stmts, inCondition);
      case "Subshell":
        return [{ kind: "Subshell", subshell: { body: this.buildStmts(cmd.stmts, false) } }];
      case "FuncDecl":
        return [this.buildFunction(cmd)];
      case "DeclClause":
        return this.buildDecl(cmd);
      case "Unknown":
        throw unsupported(cmd.kind, cmd.pos);
      default: {
        const _exhaustive: never = cmd;
        throw unsupported(JSON.stringify(_exhaustive));
      }
    }
  }

  // ===========================================================================
  // Redirections
  // ===========================================================================

  private wrapRedirects(statement: Statement, redirs: AST.Redirect[]): Statement {
    let wrapped = statement;
    // The first redirection in source order ends up outermost
    for (const redir of [...redirs].reverse()) {
      wrapped = { kind: "Redirection", redirection: this.buildRedirect(redir, wrapped) };
    }
    return wrapped;
  }

  private buildRedirect(redir: AST.Redirect, statement: Statement): Redirection {
    const shown = `${redir.fd ?? ""}${redir.op}`;
    let operator: Redirection["operator"];
    switch (redir.op) {
      case ">":
      case ">|":
        operator = "truncate";
        break;
      case ">>":
        operator = "append";
        break;
      case "<":
        operator = "read";
        break;
      default:
        throw unsupported(`redirection ${shown}`, redir.pos);
    }

    let fd: 0 | 1 | 2;
    if (operator === "read") {
      if (redir.fd !== null && redir.fd !== "0") {
        throw unsupported(`redirection ${shown}`, redir.pos);
      }
      fd = 0;
    } else if (redir.fd === null || redir.fd === "1") {
      fd = 1;
    } else if (redir.fd === "2") {
      fd = 2;
    } else {
      throw unsupported(`redirection ${shown}`, redir.pos);
    }

    if (!redir.word) {
      throw unsupported(`redirection ${shown} without a target`, redir.pos);
    }

    this.require("process", "filesystem");
    return { operator, target: this.expr(redir.word), fd, statement };
  }

  // ===========================================================================
  // Pipelines and Lists
  // ===========================================================================

  private buildBinary(node: AST.BinaryCmd, inCondition: boolean): Statement[] {
    switch (node.op) {
      case "|":
        return [this.buildPipeline(node)];
      case "|&":
        throw unsupported("pipe with stderr (|&)", node.pos);
      case "&&":
      case "||": {
        const onFailure = inCondition && node.op === "&&" ? this.failure : [];
        return this.buildBranch(
          { type: "Stmt", cmd: node, negated: false, background: false, redirs: [], pos: node.pos },
          [],
          onFailure,
          inCondition,
        );
      }
    }
  }

  /**
   * Lower `a && b` / `a || b` into nested conditionals. `onSuccess` runs
   * after the list succeeds, `onFailure` after it fails; a leaf with nothing
   * to run on either side is emitted as a plain statement so its failure
   * propagates.
   */
  private buildBranch(
    stmt: AST.Stmt,
    onSuccess: Statement[],
    onFailure: Statement[],
    inCondition: boolean,
  ): Statement[] {
    const list = listNode(stmt);
    if (list) {
      if (list.op === "&&") {
        const rest = this.buildBranch(list.y, onSuccess, onFailure, inCondition);
        return this.buildBranch(list.x, rest, onFailure, inCondition);
      }
      const rest = this.buildBranch(list.y, onSuccess, onFailure, inCondition);
      return this.buildBranch(list.x, onSuccess, rest, inCondition);
    }

    const plain = onSuccess.length === 0 &&
      (onFailure.length === 0 || onFailure === this.failure);
    if (plain) {
      return this.buildStmt(stmt, inCondition);
    }

    const condition = this.buildStmt(stmt, true);
    return [{
      kind: "Conditional",
      conditional: {
        condition,
        category: conditionCategory(condition),
        then: onSuccess,
        elifs: [],
        else: onFailure,
      },
    }];
  }

  private flattenPipe(stmt: AST.Stmt, stages: AST.Stmt[]): void {
    const cmd = stmt.cmd;
    const plain = !stmt.negated && !stmt.background && stmt.redirs.length === 0;
    if (cmd?.type === "BinaryCmd" && cmd.op !== "|&" && plain) {
      this.flattenPipe(cmd.x, stages);
      this.flattenPipe(cmd.y, stages);
      return;
    }
    stages.push(stmt);
  }

  private buildPipeline(node: AST.BinaryCmd): Statement {
    const stages: AST.Stmt[] = [];
    this.flattenPipe(node.x, stages);
    this.flattenPipe(node.y, stages);

    const hoisted: AST.Redirect[] = [];
    const commands = stages.map((stage, index) => {
      const cmd = stage.cmd;
      if (cmd?.type !== "CallExpr") {
        const kind = !cmd ? "empty statement" : cmd.type === "Unknown" ? cmd.kind : cmd.type;
        throw unsupported(`${kind} in a pipeline`, stage.pos);
      }
      if (stage.negated || stage.background) {
        throw unsupported("negated or background pipeline stage", stage.pos);
      }
      for (const redir of stage.redirs) {
        const first = index === 0 && redir.op === "<" && (redir.fd === null || redir.fd === "0");
        const last = index === stages.length - 1 && (redir.op === ">" || redir.op === ">>") &&
          (redir.fd === null || redir.fd === "1");
        if (!first && !last) {
          throw unsupported(`redirection ${redir.fd ?? ""}${redir.op} inside a pipeline`, redir.pos);
        }
        hoisted.push(redir);
      }
      return this.pipelineStage(cmd, stage.pos);
    });

    this.require("process", "concurrency");
    const pipeline: Statement = { kind: "Pipeline", pipeline: { commands } };
    return hoisted.length > 0 ? this.wrapRedirects(pipeline, hoisted) : pipeline;
  }

  private pipelineStage(call: AST.CallExpr, pos?: AST.Position): Command {
    if (call.assigns.length > 0) {
      throw unsupported("assignment in a pipeline", pos);
    }
    const name = wordLiteral(call.args[0], this.words);
    if (name === null) {
      throw unsupported("dynamic command name", pos);
    }
    if (name === "return" || name === "read" || SHELL_ONLY_COMMANDS.has(name)) {
      throw unsupported(`${name} in a pipeline`, pos);
    }
    return this.command(name, call.args.slice(1), pos);
  }

  // ===========================================================================
  // Control Flow
  // ===========================================================================

  private buildIf(node: AST.IfClause): Conditional {
    const condition = this.buildStmts(node.cond, true);
    const conditional: Conditional = {
      condition,
      category: conditionCategory(condition),
      then: this.buildStmts(node.then, false),
      elifs: [],
      else: [],
    };

    // `elif` nests an IfClause in the else position
    let alternate = node.alternate;
    while (alternate !== null) {
      if (Array.isArray(alternate)) {
        conditional.else = this.buildStmts(alternate, false);
        break;
      }
      const elifCondition = this.buildStmts(alternate.cond, true);
      conditional.elifs.push({
        condition: elifCondition,
        category: conditionCategory(elifCondition),
        body: this.buildStmts(alternate.then, false),
      });
      alternate = alternate.alternate;
    }

    return conditional;
  }

  private buildFor(node: AST.ForClause): Statement {
    if (node.select) {
      throw unsupported("select loop", node.pos);
    }
    const iter = node.loop;
    if (iter.type === "CStyleLoop") {
      throw unsupported("C-style for loop", node.pos);
    }

    const variable = iter.name;
    this.declareVariable(variable);

    const range = this.rangeBounds(iter.items);
    if (range) {
      return {
        kind: "Loop",
        loop: {
          type: "range",
          variable,
          from: range.from,
          to: range.to,
          ...(range.descending ? { descending: true } : {}),
          body: this.buildStmts(node.body, false),
        },
      };
    }

    const items = this.loopItems(iter.items);
    return {
      kind: "Loop",
      loop: { type: "list", variable, items, body: this.buildStmts(node.body, false) },
    };
  }

  /** Bounds of a `{a..b}` word; both must fit a Go int */
  private braceBounds(word: AST.Word): [bigint, bigint] | null {
    const brace = braceRange(word);
    if (brace && !brace.every(fitsInt64)) {
      const [from, to] = brace;
      throw unsupported(`brace range {${from}..${to}} outside the 64-bit integer range`, word.pos);
    }
    return brace;
  }

  /** `{a..b}` in either direction, or `$(seq [a] b)` */
  private rangeBounds(items: AST.Word[]): RangeBounds | null {
    const [only] = items;
    if (items.length !== 1 || only === undefined) {
      return null;
    }

    const brace = this.braceBounds(only);
    if (brace) {
      const [from, to] = brace;
      return { from: literal(from.toString()), to: literal(to.toString()), descending: from > to };
    }

    const [part] = only.parts;
    if (only.parts.length !== 1 || part?.type !== "CmdSubst" || part.stmts.length !== 1) {
      return null;
    }
    const cmd = part.stmts[0]?.cmd;
    if (cmd?.type !== "CallExpr" || cmd.assigns.length > 0) {
      return null;
    }
    const [name, ...bounds] = cmd.args;
    if (name === undefined || wordLiteral(name, this.words) !== "seq") {
      return null;
    }
    if (bounds.length < 1 || bounds.length > 2) {
      throw unsupported(`seq with ${bounds.length} arguments`, part.pos);
    }

    const exprs = bounds.map((bound) => {
      const single = bound.parts.length === 1 ? bound.parts[0] : undefined;
      const expr = this.expr(bound);
      const value = literalValue(expr);
      if ((value !== null && INTEGER.test(value)) || single?.type === "ParamExp") {
        return expr;
      }
      throw unsupported(`seq bound ${bound.text}`, part.pos);
    });

    const [first, second] = exprs;
    if (first === undefined) {
      return null;
    }
    return second === undefined
      ? { from: literal("1"), to: first, descending: false }
      : { from: first, to: second, descending: false };
  }

  private loopItems(words: AST.Word[]): LoopItem[] {
    // `for x; do` iterates the positional parameters
    if (words.length === 0) {
      return [{ value: { kind: "interpolated", template: "$@" }, expand: "split" }];
    }

    return words.flatMap((word): LoopItem[] => {
      const brace = this.braceBounds(word);
      if (brace) {
        const [from, to] = brace;
        const step = from <= to ? 1n : -1n;
        if ((to - from) * step >= BigInt(MAX_BRACE_ITEMS)) {
          throw unsupported(`brace range {${from}..${to}} with more than ${MAX_BRACE_ITEMS} items`, word.pos);
        }
        const values: LoopItem[] = [];
        for (let n = from; n !== to + step; n += step) {
          values.push({ value: literal(n.toString()), expand: "none" });
        }
        return values;
      }
      if (word.parts.some((part) => part.type === "CmdSubst")) {
        throw unsupported("command substitution in loop items", word.pos);
      }
      return [{ value: this.expr(word), expand: itemExpansion(word) }];
    });
  }

  // ===========================================================================
  // Functions and Declarations
  // ===========================================================================

  private buildFunction(node: AST.FuncDecl): Statement {
    if (this.scope) {
      throw unsupported("nested function declaration", node.pos);
    }
    if (this.functions.has(node.name)) {
      throw unsupported(`redefinition of function ${node.name}`, node.pos);
    }

    const scope: FunctionScope = { locals: new Map(), params: new Set() };
    this.scope = scope;
    let body: Statement[];
    try {
      body = this.buildStmt(node.body, false);
    } finally {
      this.scope = null;
    }

    this.functions.set(node.name, {
      name: node.name,
      body,
      params: [...scope.params].sort((a, b) => a - b).map(String),
      locals: scope.locals,
    });
    return { kind: "FunctionDecl", name: node.name };
  }

  private buildDecl(node: AST.DeclClause): Statement[] {
    let local = false;
    let exported = false;
    let readonly = false;

    switch (node.variant) {
      case "local":
        if (!this.scope) {
          throw unsupported("local outside a function", node.pos);
        }
        local = true;
        break;
      case "export":
        exported = true;
        break;
      case "declare":
      case "typeset":
        local = this.scope !== null;
        break;
      case "readonly":
        readonly = true;
        break;
      default:
        throw unsupported(`${node.variant} declaration`, node.pos);
    }

    const statements: Statement[] = [];
    for (const assign of node.assigns) {
      if (assign.name === null) {
        const flag = assign.value ? wordLiteral(assign.value, this.words) : null;
        if (flag === null || !flag.startsWith("-")) {
          throw unsupported(`${node.variant} with a dynamic argument`, assign.pos);
        }
        if (/[aA]/.test(flag)) {
          throw unsupported("array declaration", assign.pos);
        }
        if (node.variant === "declare" || node.variant === "typeset") {
          if (flag.includes("x")) exported = true;
          if (flag.includes("g")) local = false;
        }
        continue;
      }

      if (assign.array || assign.indexed) {
        throw unsupported("array assignment", assign.pos);
      }
      if (!isIdentifier(assign.name)) {
        throw unsupported(`assignment to ${assign.name}`, assign.pos);
      }

      if (assign.naked || assign.value === null) {
        if (exported) {
          // `export NAME` publishes the current value
          statements.push(this.assignment(
            assign.name,
            { kind: "interpolated", template: `\${${assign.name}}` },
            { local: false, exported: true },
          ));
        } else if (!readonly) {
          statements.push(this.assignment(assign.name, literal(""), { local }));
        }
        continue;
      }

      statements.push(this.assignment(assign.name, this.expr(assign.value), {
        local,
        exported,
        append: assign.append,
      }));
    }
    return statements;
  }

  // ===========================================================================
  // Simple Commands
  // ===========================================================================

  private buildCall(node: AST.CallExpr, pos?: AST.Position): Statement[] {
    if (node.args.length === 0) {
      return node.assigns.map((assign) => {
        if (assign.array || assign.indexed || assign.name === null) {
          throw unsupported("array assignment", assign.pos ?? pos);
        }
        const value = assign.value ? this.expr(assign.value) : literal("");
        return this.assignment(assign.name, value, { append: assign.append });
      });
    }

    if (node.assigns.length > 0) {
      throw unsupported("environment prefix assignment", pos);
    }

    const name = wordLiteral(node.args[0], this.words);
    if (name === null) {
      throw unsupported("dynamic command name", pos);
    }
    const args = node.args.slice(1);

    if (name === "return") {
      return [this.buildReturn(args, pos)];
    }
    if (name === "set") {
      const flags = args.map((arg) => wordLiteral(arg, this.words));
      const literals = flags.filter((flag): flag is string => flag !== null);
      if (literals.length === flags.length && isImpliedSetCommand(literals)) {
        this.diagnostics.push({
          level: "info",
          message: `'set ${literals.join(" ")}' dropped: generated programs stop at the first failing statement`,
          location: location(pos),
        });
        return [];
      }
      throw unsupported("set", pos);
    }
    if (SHELL_ONLY_COMMANDS.has(name)) {
      throw unsupported(name, pos);
    }
    if (name === "read" && !this.functionNames.has(name)) {
      return [{ kind: "Command", command: this.buildRead(args, pos) }];
    }

    return [{ kind: "Command", command: this.command(name, args, pos) }];
  }

  private command(name: string, args: AST.Word[], pos?: AST.Position): Command {
    const classification = this.functionNames.has(name)
      ? "function"
      : isBuiltin(name)
      ? "builtin"
      : "external";

    const builtin = SHELL_BUILTINS[name];
    if (classification === "builtin" && builtin) {
      this.require(...builtin.capabilities);
    } else if (classification === "external") {
      this.require("process");
    }

    return {
      name,
      args: args.map((arg) => this.expr(arg)),
      classification,
      useHelper: classification === "external",
      location: location(pos),
    };
  }

  private buildReturn(args: AST.Word[], pos?: AST.Position): Statement {
    if (!this.scope) {
      throw unsupported("return outside a function", pos);
    }
    if (args.length > 1) {
      throw unsupported("return with several arguments", pos);
    }
    const [arg] = args;
    if (arg === undefined) {
      return { kind: "Return", ret: { code: null, value: null } };
    }
    const value = this.expr(arg);
    const text = literalValue(value);
    if (text !== null && /^\d+$/.test(text) && Number.isSafeInteger(Number(text))) {
      return { kind: "Return", ret: { code: Number(text), value: null } };
    }
    return { kind: "Return", ret: { code: null, value } };
  }

  private buildRead(args: AST.Word[], pos?: AST.Position): Command {
    const names: string[] = [];
    for (const arg of args) {
      const text = wordLiteral(arg, this.words);
      if (text === "-r") {
        continue;
      }
      if (text === null || text.startsWith("-")) {
        throw unsupported(`read ${arg.text || "option"}`, pos);
      }
      if (!isIdentifier(text)) {
        throw unsupported(`read into ${text}`, pos);
      }
      names.push(text);
    }
    if (names.length > 1) {
      throw unsupported("read with several variables", pos);
    }

    const variable = names[0] ?? "REPLY";
    this.declareVariable(variable);
    this.require("input");
    return {
      name: "read",
      args: [literal(variable)],
      classification: "builtin",
      useHelper: false,
      location: location(pos),
    };
  }
}

/**
 * Lower a parsed script into a Program
 */
export function buildProgram(file: AST.File): BuildResult {
  return new IRBuilder().build(file);
}
