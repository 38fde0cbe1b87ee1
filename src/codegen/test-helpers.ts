/**
 * IR builders and output readers for generator unit tests
 */

import type {
  Assignment,
  Command,
  Expr,
  Program,
  ShellFunction,
  Statement,
} from "../ir/types.js";
import { literal } from "../ir/types.js";
import type { GenerateOptions } from "./types.js";
import { generate } from "./mod.js";

export const text = literal;
export const tpl = (template: string): Expr => ({ kind: "interpolated", template });

export const cmd = (
  name: string,
  args: (string | Expr)[] = [],
  classification: Command["classification"] = "builtin",
): Command => ({
  name,
  args: args.map((arg) => typeof arg === "string" ? literal(arg) : arg),
  classification,
  useHelper: classification === "external",
});

export const run = (
  name: string,
  args: (string | Expr)[] = [],
  classification: Command["classification"] = "builtin",
): Extract<Statement, { kind: "Command" }> => ({ kind: "Command", command: cmd(name, args, classification) });

export const set = (
  name: string,
  value: Expr,
  opts: Partial<Omit<Assignment, "name" | "value">> = {},
): Statement => ({
  kind: "Assignment",
  assignment: {
    name,
    value,
    local: opts.local ?? false,
    exported: opts.exported ?? false,
    append: opts.append ?? false,
  },
});

export function program(
  statements: Statement[],
  opts: { variables?: string[]; functions?: ShellFunction[] } = {},
): Program {
  return {
    statements,
    functions: new Map((opts.functions ?? []).map((fn) => [fn.name, fn])),
    variables: new Map((opts.variables ?? []).map((name) => [name, null])),
    capabilities: new Set(),
  };
}

export function shellFunction(
  name: string,
  body: Statement[],
  opts: { params?: string[]; locals?: string[] } = {},
): ShellFunction {
  return {
    name,
    body,
    params: opts.params ?? [],
    locals: new Map((opts.locals ?? []).map((local) => [local, null])),
  };
}

/** Lines of a top-level block, from its opening line to its closing brace */
export function block(code: string, opening: string): string[] {
  const lines = code.split("\n");
  const start = lines.indexOf(opening);
  if (start < 0) {
    throw new Error(`expected a line ${JSON.stringify(opening)}`);
  }
  const end = lines.indexOf("}", start);
  return lines.slice(start, end + 1);
}

/** Body lines of `run`, one tab stripped, without the final return */
export function runBody(statements: Statement[], variables: string[] = [], options?: GenerateOptions): string[] {
  const { code } = generate(program(statements, { variables }), options);
  return block(code, "func run(args []string) error {")
    .slice(1, -2)
    .map((line) => line.replace(/^\t/, ""));
}
