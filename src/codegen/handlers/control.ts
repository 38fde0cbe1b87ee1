/**
 * Control Flow Handlers
 *
 * Conditionals, loops and the closure-based constructs: subshells,
 * redirections and background jobs.
 */

import { unsupportedConstruct } from "../../core/errors.js";
import { literalValue } from "../../ir/template.js";
import type {
  Background,
  Conditional,
  Expr,
  Loop,
  Redirection,
  Return,
  Statement,
  Subshell,
} from "../../ir/types.js";
import type { ItemGroup } from "../lowering.js";
import { integerLiteral, itemGroups, referenceSegments, returnBlocked } from "../lowering.js";
import type { StatementResult, VisitorContext } from "../types.js";
import { goString } from "../utils/escape.js";
import { checkStatus, commandCondition } from "./commands.js";
import { visitExpr } from "./words.js";

// =============================================================================
// Helpers
// =============================================================================

/** Emit a block body one level deeper */
function visitBody(stmts: Statement[], ctx: VisitorContext): string[] {
  ctx.indent();
  const lines = ctx.visitStatements(stmts);
  ctx.dedent();
  return lines;
}

/**
 * Wrap an expression spanning several lines: `prefix` goes before the first
 * line and `suffix` after the last.
 */
function wrapLines(exprLines: string[], prefix: string, suffix: string): string[] {
  const last = exprLines.length - 1;
  return exprLines.map((line, i) => {
    let text = i === 0 ? prefix + line : line;
    if (i === last) text += suffix;
    return text;
  });
}

/** `func() error {` body `return nil` `}`, as expression lines */
function closure(
  kind: "subshell" | "redirect" | "background",
  stmts: Statement[],
  ctx: VisitorContext,
  prologue: (indent: string) => string[] = () => [],
): string[] {
  const indent = ctx.getIndent();
  return ctx.withFrame(kind, () => {
    ctx.indent();
    const inner = ctx.getIndent();
    const body = [...prologue(inner), ...ctx.visitStatements(stmts), `${inner}return nil`];
    ctx.dedent();
    return ["func() error {", ...body, `${indent}}`];
  });
}

// =============================================================================
// Conditions
// =============================================================================

/**
 * Condition expression lines. A single command is used in place; a list
 * runs in a closure and the condition holds when it returns no error.
 */
export function visitCondition(stmts: Statement[], ctx: VisitorContext): string[] {
  const [only] = stmts;
  if (stmts.length === 1 && only?.kind === "Command") {
    return commandCondition(only.command, ctx);
  }

  const indent = ctx.getIndent();
  return ctx.withFrame("condition", () => {
    ctx.indent();
    const inner = ctx.getIndent();
    const body = [...ctx.visitStatements(stmts), `${inner}return nil`];
    ctx.dedent();
    return ["func() error {", ...body, `${indent}}() == nil`];
  });
}

export function visitConditional(conditional: Conditional, ctx: VisitorContext): StatementResult {
  const indent = ctx.getIndent();
  const lines = wrapLines(ctx.visitCondition(conditional.condition), `${indent}if `, " {");
  lines.push(...visitBody(conditional.then, ctx));

  for (const elif of conditional.elifs) {
    lines.push(...wrapLines(ctx.visitCondition(elif.condition), `${indent}} else if `, " {"));
    lines.push(...visitBody(elif.body, ctx));
  }

  if (conditional.else.length > 0) {
    lines.push(`${indent}} else {`);
    lines.push(...visitBody(conditional.else, ctx));
  }
  lines.push(`${indent}}`);
  return { lines };
}

// =============================================================================
// Loops
// =============================================================================

function rangeBound(expr: Expr, ctx: VisitorContext): string {
  return integerLiteral(expr) ?? `${ctx.useHelper("toInt")}(${visitExpr(expr, ctx)})`;
}

function itemGroup(group: ItemGroup, ctx: VisitorContext): string {
  switch (group.kind) {
    case "words":
      return `[]string{${group.values.map((value) => visitExpr(value, ctx)).join(", ")}}`;
    case "split":
      return `${ctx.usePackage("strings")}.Fields(${visitExpr(group.value, ctx)})`;
    case "glob":
      return `${ctx.useHelper("globItems")}(${visitExpr(group.value, ctx)})`;
  }
}

export function visitLoop(loop: Loop, ctx: VisitorContext): StatementResult {
  const indent = ctx.getIndent();
  const unit = ctx.getOptions().indent;
  const lines: string[] = [];

  switch (loop.type) {
    case "range": {
      const counter = ctx.getTempVar("n");
      const target = ctx.variableTarget(loop.variable);
      const from = rangeBound(loop.from, ctx);
      const to = rangeBound(loop.to, ctx);
      lines.push(loop.descending
        ? `${indent}for ${counter} := ${from}; ${counter} >= ${to}; ${counter}-- {`
        : `${indent}for ${counter} := ${from}; ${counter} <= ${to}; ${counter}++ {`);
      lines.push(`${indent}${unit}${target} = ${ctx.usePackage("strconv")}.Itoa(${counter})`);
      break;
    }
    case "list": {
      const item = ctx.getTempVar("item");
      const target = ctx.variableTarget(loop.variable);
      const groups = itemGroups(loop.items).map((group) => itemGroup(group, ctx));
      const [single] = groups;
      const items = groups.length === 1 && single !== undefined
        ? single
        : groups.length === 0
        ? "[]string{}"
        : `${ctx.useHelper("concatItems")}(${groups.join(", ")})`;
      lines.push(`${indent}for _, ${item} := range ${items} {`);
      lines.push(`${indent}${unit}${target} = ${item}`);
      break;
    }
    case "while":
      lines.push(...wrapLines(ctx.visitCondition(loop.condition), `${indent}for `, " {"));
      break;
    case "until":
      lines.push(...wrapLines(ctx.visitCondition(loop.condition), `${indent}for !(`, ") {"));
      break;
  }

  lines.push(...visitBody(loop.body, ctx));
  lines.push(`${indent}}`);
  return { lines };
}

// =============================================================================
// Subshells
// =============================================================================

interface SubshellEffects {
  /** Shell variables assigned anywhere in the body, in first-seen order */
  assigned: string[];
  /** Environment names the body exports */
  exported: string[];
  /** Shell variables the body reads, in first-seen order */
  referenced: string[];
}

/** Variables and environment entries a subshell body reads or may change */
export function subshellEffects(stmts: Statement[]): SubshellEffects {
  const assigned = new Set<string>();
  const exported = new Set<string>();
  const referenced = new Set<string>();

  const read = (expr: Expr): void => {
    for (const segment of referenceSegments(expr)) {
      if (segment.kind === "variable") referenced.add(segment.name);
    }
  };

  const visit = (stmt: Statement): void => {
    switch (stmt.kind) {
      case "Assignment":
        read(stmt.assignment.value);
        if (stmt.assignment.append) referenced.add(stmt.assignment.name);
        assigned.add(stmt.assignment.name);
        if (stmt.assignment.exported) {
          exported.add(stmt.assignment.name);
        }
        break;
      case "Command": {
        const { command } = stmt;
        command.args.forEach(read);
        if (command.classification !== "builtin") {
          break;
        }
        if (command.name === "read") {
          assigned.add(literalValue(command.args[0]) ?? "REPLY");
        } else if (command.name === "export") {
          for (const arg of command.args) {
            const name = literalValue(arg);
            if (name !== null) exported.add(name);
          }
        }
        break;
      }
      case "Conditional": {
        const { conditional } = stmt;
        conditional.condition.forEach(visit);
        conditional.then.forEach(visit);
        for (const elif of conditional.elifs) {
          elif.condition.forEach(visit);
          elif.body.forEach(visit);
        }
        conditional.else.forEach(visit);
        break;
      }
      case "Loop": {
        const { loop } = stmt;
        if (loop.type === "range") {
          read(loop.from);
          read(loop.to);
          assigned.add(loop.variable);
        } else if (loop.type === "list") {
          loop.items.forEach((item) => read(item.value));
          assigned.add(loop.variable);
        } else {
          loop.condition.forEach(visit);
        }
        loop.body.forEach(visit);
        break;
      }
      case "Subshell":
        stmt.subshell.body.forEach(visit);
        break;
      case "Redirection":
        read(stmt.redirection.target);
        visit(stmt.redirection.statement);
        break;
      case "Background":
        visit(stmt.background.statement);
        break;
      case "Pipeline":
        for (const command of stmt.pipeline.commands) {
          command.args.forEach(read);
        }
        break;
      case "Return":
        if (stmt.ret.value !== null) read(stmt.ret.value);
        break;
      case "FunctionDecl":
        break;
    }
  };

  stmts.forEach(visit);
  return { assigned: [...assigned], exported: [...exported], referenced: [...referenced] };
}

/**
 * A subshell runs as a closure. The working directory is restored by the
 * subshell helper; variables and exported names are restored by deferred
 * calls registered on entry.
 */
export function visitSubshell(subshell: Subshell, ctx: VisitorContext): StatementResult {
  const effects = subshellEffects(subshell.body);
  const expr = closure("subshell", subshell.body, ctx, (inner) => {
    const restores: string[] = [];
    for (const name of effects.assigned) {
      if (!ctx.hasVariable(name)) {
        continue;
      }
      const target = ctx.variableTarget(name);
      const saved = ctx.getTempVar("saved");
      restores.push(`${inner}defer func(${saved} string) { ${target} = ${saved} }(${target})`);
    }
    for (const name of effects.exported) {
      const key = goString(name);
      restores.push(`${inner}defer os.Setenv(${key}, os.Getenv(${key}))`);
    }
    return restores;
  });
  return { lines: checkStatus(wrapLines(expr, `${ctx.useHelper("subshell")}(`, ")"), ctx) };
}

// =============================================================================
// Redirections and Background Jobs
// =============================================================================

const OUTPUT_FLAGS = {
  truncate: "os.O_CREATE|os.O_WRONLY|os.O_TRUNC",
  append: "os.O_CREATE|os.O_WRONLY|os.O_APPEND",
} as const;

export function visitRedirection(redirection: Redirection, ctx: VisitorContext): StatementResult {
  const target = visitExpr(redirection.target, ctx);
  const body = closure("redirect", [redirection.statement], ctx);

  const prefix = redirection.operator === "read"
    ? `${ctx.useHelper("redirectInput")}(${target}, `
    : `${ctx.useHelper("redirectOutput")}(${target}, ${OUTPUT_FLAGS[redirection.operator]}, ${redirection.fd}, `;
  return { lines: checkStatus(wrapLines(body, prefix, ")"), ctx) };
}

/**
 * A background job sees the variables it uses as they were when it was
 * scheduled: each one is passed by value into a closure factory whose
 * parameters shadow the originals.
 */
export function visitBackground(background: Background, ctx: VisitorContext): StatementResult {
  const indent = ctx.getIndent();
  ctx.useHelper("jobGroup");

  const effects = subshellEffects([background.statement]);
  const names = [...new Set([...effects.referenced, ...effects.assigned])]
    .filter((name) => ctx.hasVariable(name));
  if (names.length === 0) {
    const body = closure("background", [background.statement], ctx);
    return { lines: wrapLines(body, `${indent}jobs.Go(`, ")") };
  }

  const targets = names.map((name) => ctx.variableTarget(name));
  ctx.indent();
  const inner = ctx.getIndent();
  const body = closure("background", [background.statement], ctx);
  ctx.dedent();
  const params = targets.map((target) => `${target} string`).join(", ");
  return {
    lines: [
      `${indent}jobs.Go(func(${params}) func() error {`,
      ...wrapLines(body, `${inner}return `, ""),
      `${indent}}(${targets.join(", ")}))`,
    ],
  };
}

// =============================================================================
// Return
// =============================================================================

export function visitReturn(ret: Return, ctx: VisitorContext): StatementResult {
  if (returnBlocked(ctx.getFrames())) {
    throw unsupportedConstruct("return inside a redirection or background job", "generate");
  }

  const indent = ctx.getIndent();
  if (ret.value !== null) {
    return { lines: [`${indent}return ${ctx.useHelper("returnStatus")}(${visitExpr(ret.value, ctx)})`] };
  }
  if (ret.code === null || ret.code === 0) {
    return { lines: [`${indent}return nil`] };
  }
  return { lines: [`${indent}return ${ctx.useHelper("statusError")}(${ret.code})`] };
}
