/**
 * Command, Pipeline and Assignment Handlers
 *
 * Builtins with a native lowering become Go calls; every other command is
 * spawned through the backend's runCommand helper. Error-valued calls are
 * checked and propagated, so a script stops at its first failing statement.
 */

import { unsupportedConstruct } from "../../core/errors.js";
import { literalValue } from "../../ir/template.js";
import type { Assignment, Command, Pipeline } from "../../ir/types.js";
import { echoOptions, exitReturns, integerLiteral, splitOperands } from "../lowering.js";
import type { Lowering, StatementResult, VisitorContext } from "../types.js";
import { goString } from "../utils/escape.js";
import { visitTestCommand } from "./tests.js";
import { visitExpr } from "./words.js";

// =============================================================================
// Helpers
// =============================================================================

/** Flag letters outside the allowed set, as the first offending flag */
function unsupportedFlag(flags: string[], allowed: RegExp): string | null {
  return flags.find((flag) => !allowed.test(flag.slice(1))) ?? null;
}

/**
 * Check an error-valued expression and return from the enclosing body on
 * failure. Continuation lines of a multi-line expression arrive indented.
 */
export function checkStatus(exprLines: string[], ctx: VisitorContext): string[] {
  const indent = ctx.getIndent();
  const unit = ctx.getOptions().indent;
  const first = exprLines[0] ?? "nil";

  if (exprLines.length <= 1) {
    return [
      `${indent}if err := ${first}; err != nil {`,
      `${indent}${unit}return err`,
      `${indent}}`,
    ];
  }

  const last = exprLines[exprLines.length - 1] ?? "";
  return [
    `${indent}if err := ${first}`,
    ...exprLines.slice(1, -1),
    `${last}; err != nil {`,
    `${indent}${unit}return err`,
    `${indent}}`,
  ];
}

/** Statement lines for a lowering at the current indentation */
export function emitLowering(lowering: Lowering, ctx: VisitorContext): string[] {
  switch (lowering.kind) {
    case "status":
      return lowering.exprs.flatMap((expr) => checkStatus([expr], ctx));
    case "bool":
      return emitLowering(lowering.statement(), ctx);
    case "lines": {
      const indent = ctx.getIndent();
      return lowering.lines.map((line) => `${indent}${line}`);
    }
  }
}

/**
 * A command as a condition expression. Booleans and single status calls
 * are used in place; anything else runs in a closure whose error decides.
 * Continuation lines arrive indented.
 */
export function commandCondition(command: Command, ctx: VisitorContext): string[] {
  const lowering = lowerCommand(command, ctx);
  const negated = command.negated === true;

  if (lowering.kind === "bool") {
    return [negated ? `!(${lowering.expr})` : lowering.expr];
  }
  if (lowering.kind === "status" && lowering.exprs.length === 1) {
    const [only] = lowering.exprs;
    if (only !== undefined) {
      return [`${only} ${negated ? "!=" : "=="} nil`];
    }
  }

  const indent = ctx.getIndent();
  ctx.indent();
  const body = ctx.withFrame("condition", () => emitLowering(lowering, ctx));
  const done = `${ctx.getIndent()}return nil`;
  ctx.dedent();
  return ["func() error {", ...body, done, `${indent}}() ${negated ? "!=" : "=="} nil`];
}

// =============================================================================
// Command Lowering
// =============================================================================

export function lowerCommand(command: Command, ctx: VisitorContext): Lowering {
  const args = () => command.args.map((arg) => visitExpr(arg, ctx));

  switch (command.classification) {
    case "function":
      return {
        kind: "status",
        exprs: [`${ctx.functionName(command.name)}(${args().join(", ")})`],
      };
    case "external":
      return {
        kind: "status",
        exprs: [`${ctx.useHelper("runCommand")}(${[goString(command.name), ...args()].join(", ")})`],
      };
    case "builtin":
      return lowerBuiltin(command, ctx);
  }
}

function lowerBuiltin(command: Command, ctx: VisitorContext): Lowering {
  const unsupported = (kind: string) =>
    unsupportedConstruct(kind, "generate", command.location);

  switch (command.name) {
    case "echo": {
      const options = echoOptions(command.args);
      const operands = options.operands.map((arg) =>
        visitExpr(arg, ctx, { escapes: options.escapes })
      );
      if (options.newline) {
        return { kind: "lines", lines: [`fmt.Println(${operands.join(", ")})`] };
      }
      if (operands.length === 0) {
        return { kind: "lines", lines: [] };
      }
      return { kind: "lines", lines: [`fmt.Print(${operands.join(' + " " + ')})`] };
    }

    case "cd": {
      const [dir, ...extra] = command.args;
      if (extra.length > 0) {
        throw unsupported("cd with several arguments");
      }
      if (dir === undefined) {
        return { kind: "status", exprs: ['os.Chdir(os.Getenv("HOME"))'] };
      }
      if (literalValue(dir) === "-") {
        throw unsupported("cd -");
      }
      return { kind: "status", exprs: [`os.Chdir(${visitExpr(dir, ctx)})`] };
    }

    case "pwd":
      return { kind: "status", exprs: [`${ctx.useHelper("printWorkingDir")}()`] };

    case "mkdir": {
      const { flags, operands } = splitOperands(command.args);
      const bad = unsupportedFlag(flags, /^p+$/);
      if (bad !== null) {
        throw unsupported(`mkdir ${bad}`);
      }
      if (operands.length === 0) {
        throw unsupported("mkdir without operands");
      }
      return {
        kind: "status",
        exprs: operands.map((operand) => `os.MkdirAll(${visitExpr(operand, ctx)}, 0o755)`),
      };
    }

    case "rm": {
      const { flags, operands } = splitOperands(command.args);
      const bad = unsupportedFlag(flags, /^[rRf]+$/);
      if (bad !== null) {
        throw unsupported(`rm ${bad}`);
      }
      const letters = flags.join("");
      const recursive = /[rR]/.test(letters);
      const force = letters.includes("f");
      return {
        kind: "status",
        exprs: operands.map((operand) => {
          const path = visitExpr(operand, ctx);
          if (recursive) {
            return `os.RemoveAll(${path})`;
          }
          return force
            ? `${ctx.useHelper("ignoreNotExist")}(os.Remove(${path}))`
            : `os.Remove(${path})`;
        }),
      };
    }

    case "cp": {
      const { flags, operands } = splitOperands(command.args);
      const [flag] = flags;
      if (flag !== undefined) {
        throw unsupported(`cp ${flag}`);
      }
      const [src, dst] = operands;
      if (operands.length !== 2 || src === undefined || dst === undefined) {
        throw unsupported(`cp with ${operands.length} operands`);
      }
      return {
        kind: "status",
        exprs: [`${ctx.useHelper("copyFile")}(${visitExpr(src, ctx)}, ${visitExpr(dst, ctx)})`],
      };
    }

    case "test":
    case "[":
      return visitTestCommand(command, ctx);

    case "exit":
      return lowerExit(command, ctx);

    case "export":
      return {
        kind: "status",
        exprs: command.args.map((arg) => {
          const name = literalValue(arg);
          if (name === null) {
            throw unsupported("export of a dynamic name");
          }
          return `os.Setenv(${goString(name)}, ${ctx.resolveVariable(name)})`;
        }),
      };

    case "read": {
      const name = literalValue(command.args[0]) ?? "REPLY";
      const call = `${ctx.useHelper("readLine")}(&${ctx.variableTarget(name)})`;
      return {
        kind: "bool",
        expr: call,
        statement: () => ({
          kind: "status",
          exprs: [`${ctx.useHelper("testStatus")}(${call})`],
        }),
      };
    }

    case "wait":
      if (command.args.length > 0) {
        throw unsupported("wait with arguments");
      }
      ctx.useHelper("jobGroup");
      return { kind: "status", exprs: ["jobs.Wait()"] };

    default:
      throw unsupported(command.name);
  }
}

/**
 * `exit` ends the process, except inside a subshell or background job
 * where it ends that closure with the status.
 */
function lowerExit(command: Command, ctx: VisitorContext): Lowering {
  const [status, ...extra] = command.args;
  if (extra.length > 0) {
    throw unsupportedConstruct("exit with several arguments", "generate", command.location);
  }
  const code = status === undefined ? "0" : integerLiteral(status);
  const returns = exitReturns(ctx.getFrames());

  if (code === null && status !== undefined) {
    const value = visitExpr(status, ctx);
    return {
      kind: "lines",
      lines: [
        returns
          ? `return ${ctx.useHelper("returnStatus")}(${value})`
          : `os.Exit(${ctx.useHelper("toInt")}(${value}))`,
      ],
    };
  }

  if (!returns) {
    return { kind: "lines", lines: [`os.Exit(${code ?? "0"})`] };
  }
  if (code === "0") {
    return { kind: "lines", lines: ["return nil"] };
  }
  return { kind: "lines", lines: [`return ${ctx.useHelper("statusError")}(${code ?? "0"})`] };
}

// =============================================================================
// Statement Handlers
// =============================================================================

export function visitCommand(command: Command, ctx: VisitorContext): StatementResult {
  if (!command.negated) {
    return { lines: emitLowering(lowerCommand(command, ctx), ctx) };
  }

  // `! cmd` succeeds when cmd fails
  const indent = ctx.getIndent();
  const condition = commandCondition(command, ctx);
  const last = condition.length - 1;
  const lines = condition.map((line, i) => {
    let text = i === 0 ? `${indent}if !(${line}` : line;
    if (i === last) text += ") {";
    return text;
  });
  return {
    lines: [
      ...lines,
      `${indent}${ctx.getOptions().indent}return ${ctx.useHelper("statusError")}(1)`,
      `${indent}}`,
    ],
  };
}

export function visitPipeline(pipeline: Pipeline, ctx: VisitorContext): StatementResult {
  const backend = ctx.getOptions().backend;
  const stages = pipeline.commands.map((command) => {
    if (command.classification === "function") {
      throw unsupportedConstruct(
        `function ${command.name} in a pipeline`,
        "generate",
        command.location,
      );
    }
    ctx.usePackage(backend.stageImport);
    return backend.stage(
      goString(command.name),
      command.args.map((arg) => visitExpr(arg, ctx)),
    );
  });

  return { lines: checkStatus([`${ctx.useHelper("runPipeline")}(${stages.join(", ")})`], ctx) };
}

export function visitAssignment(assignment: Assignment, ctx: VisitorContext): StatementResult {
  const indent = ctx.getIndent();
  const target = ctx.variableTarget(assignment.name);
  const value = visitExpr(assignment.value, ctx);
  const lines = [`${indent}${target} ${assignment.append ? "+=" : "="} ${value}`];

  if (assignment.exported) {
    lines.push(...checkStatus([`os.Setenv(${goString(assignment.name)}, ${target})`], ctx));
  }
  return { lines };
}
