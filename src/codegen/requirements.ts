/**
 * Requirements Pass
 *
 * Pass 1 of generation: walks the Program and derives the imports and
 * runtime helpers the emitted code needs from each statement's kind and
 * each command's classification. Emission (pass 2) records what it
 * actually uses; the generator checks that both agree.
 */

import { analyzeTest } from "../ir/conditions.js";
import type { Command, Expr, Program, Statement } from "../ir/types.js";
import type { ProcessBackend } from "./backend.js";
import type { FrameKind, Requirements } from "./lowering.js";
import {
  exitReturns,
  integerLiteral,
  itemGroups,
  referenceSegments,
  segmentRequirements,
  splitOperands,
} from "./lowering.js";
import type { HelperName } from "./runtime.js";
import { helperImports, resolveHelpers } from "./runtime.js";

/** Imports the program skeleton always uses (main and run) */
export const BASE_IMPORTS: readonly string[] = ["errors", "fmt", "os"];

/** Helpers the program skeleton always uses */
export const BASE_HELPERS: readonly HelperName[] = ["statusError"];

/**
 * Close a usage set over helper dependencies and helper imports, with the
 * skeleton's own needs added. Imports come out sorted.
 */
export function finalizeRequirements(
  imports: Iterable<string>,
  helpers: Iterable<HelperName>,
  backend: ProcessBackend,
): Requirements {
  const closed = resolveHelpers([...BASE_HELPERS, ...helpers]);
  const all = new Set([...BASE_IMPORTS, ...imports, ...helperImports(closed, backend)]);
  return { imports: [...all].sort(), helpers: closed };
}

type CommandUse = "statement" | "condition";

class RequirementsCollector {
  private readonly imports = new Set<string>();
  private readonly helpers = new Set<HelperName>();
  private frames: FrameKind[] = [];

  constructor(private readonly backend: ProcessBackend) {}

  collect(program: Program): Requirements {
    for (const fn of program.functions.values()) {
      this.frames = ["function"];
      this.statements(fn.body);
    }
    this.frames = ["run"];
    this.statements(program.statements);
    return finalizeRequirements(this.imports, this.helpers, this.backend);
  }

  private withFrame(kind: FrameKind, fn: () => void): void {
    this.frames.push(kind);
    try {
      fn();
    } finally {
      this.frames.pop();
    }
  }

  private expr(expr: Expr): void {
    for (const segment of referenceSegments(expr)) {
      const needs = segmentRequirements(segment);
      needs.imports.forEach((path) => this.imports.add(path));
      needs.helpers.forEach((name) => this.helpers.add(name));
    }
  }

  private statements(stmts: Statement[]): void {
    for (const stmt of stmts) {
      this.statement(stmt);
    }
  }

  private condition(stmts: Statement[]): void {
    const [only] = stmts;
    if (stmts.length === 1 && only?.kind === "Command") {
      this.command(only.command, "condition");
      return;
    }
    this.withFrame("condition", () => this.statements(stmts));
  }

  private statement(stmt: Statement): void {
    switch (stmt.kind) {
      case "Command":
        this.command(stmt.command, stmt.command.negated ? "condition" : "statement");
        break;

      case "Assignment":
        this.expr(stmt.assignment.value);
        break;

      case "Conditional": {
        const { conditional } = stmt;
        this.condition(conditional.condition);
        this.statements(conditional.then);
        for (const elif of conditional.elifs) {
          this.condition(elif.condition);
          this.statements(elif.body);
        }
        this.statements(conditional.else);
        break;
      }

      case "Loop": {
        const { loop } = stmt;
        switch (loop.type) {
          case "range":
            for (const bound of [loop.from, loop.to]) {
              if (integerLiteral(bound) === null) {
                this.helpers.add("toInt");
              }
              this.expr(bound);
            }
            this.imports.add("strconv");
            break;
          case "list": {
            const groups = itemGroups(loop.items);
            if (groups.length > 1) {
              this.helpers.add("concatItems");
            }
            for (const group of groups) {
              if (group.kind === "words") {
                group.values.forEach((value) => this.expr(value));
                continue;
              }
              if (group.kind === "split") {
                this.imports.add("strings");
              } else {
                this.helpers.add("globItems");
              }
              this.expr(group.value);
            }
            break;
          }
          case "while":
          case "until":
            this.condition(loop.condition);
            break;
        }
        this.statements(loop.body);
        break;
      }

      case "Pipeline":
        this.imports.add(this.backend.stageImport);
        this.helpers.add("runPipeline");
        for (const command of stmt.pipeline.commands) {
          command.args.forEach((arg) => this.expr(arg));
        }
        break;

      case "Subshell":
        this.helpers.add("subshell");
        this.withFrame("subshell", () => this.statements(stmt.subshell.body));
        break;

      case "Redirection": {
        const { redirection } = stmt;
        this.helpers.add(redirection.operator === "read" ? "redirectInput" : "redirectOutput");
        this.expr(redirection.target);
        this.withFrame("redirect", () => this.statement(redirection.statement));
        break;
      }

      case "Background":
        this.helpers.add("jobGroup");
        this.withFrame("background", () => this.statement(stmt.background.statement));
        break;

      case "Return":
        if (stmt.ret.value !== null) {
          this.helpers.add("returnStatus");
          this.expr(stmt.ret.value);
        }
        break;

      case "FunctionDecl":
        break;
    }
  }

  private command(command: Command, use: CommandUse): void {
    command.args.forEach((arg) => this.expr(arg));

    switch (command.classification) {
      case "function":
        return;
      case "external":
        this.helpers.add("runCommand");
        return;
      case "builtin":
        break;
    }

    switch (command.name) {
      case "pwd":
        this.helpers.add("printWorkingDir");
        return;
      case "rm": {
        const { flags, operands } = splitOperands(command.args);
        const letters = flags.join("");
        if (operands.length > 0 && letters.includes("f") && !/[rR]/.test(letters)) {
          this.helpers.add("ignoreNotExist");
        }
        return;
      }
      case "cp":
        this.helpers.add("copyFile");
        return;
      case "test":
      case "[": {
        const analysis = analyzeTest(command);
        if (analysis.category === "generic-command") {
          this.helpers.add("runCommand");
          return;
        }
        if (analysis.category === "file-test") {
          this.helpers.add("fileTest");
        }
        if (analysis.category === "numeric-test" &&
          analysis.operands.some((operand) => integerLiteral(operand) === null)) {
          this.helpers.add("toInt");
        }
        if (use === "statement") {
          this.helpers.add("testStatus");
        }
        return;
      }
      case "exit": {
        const [status] = command.args;
        if (status !== undefined && integerLiteral(status) === null) {
          this.helpers.add(exitReturns(this.frames) ? "returnStatus" : "toInt");
        }
        return;
      }
      case "read":
        this.helpers.add("readLine");
        if (use === "statement") {
          this.helpers.add("testStatus");
        }
        return;
      case "wait":
        this.helpers.add("jobGroup");
        return;
      default:
        return;
    }
  }
}

/** Pass 1: imports and helpers the generated program needs */
export function collectRequirements(program: Program, backend: ProcessBackend): Requirements {
  return new RequirementsCollector(backend).collect(program);
}
