/**
 * Condition-type inference for `test` and `[`
 */

import { literalValue } from "./template.js";
import type { Command, ConditionCategory, Expr, Statement } from "./types.js";

const FILE_OPERATORS = new Set(["-f", "-d", "-e"]);
const UNARY_STRING_OPERATORS = new Set(["-z", "-n"]);
const BINARY_STRING_OPERATORS = new Set(["=", "!="]);
const NUMERIC_OPERATORS = new Set(["-eq", "-ne", "-lt", "-le", "-gt", "-ge"]);

export interface TestAnalysis {
  category: ConditionCategory;
  /** Leading `!` */
  negated: boolean;
  /** Operator text; empty for generic tests */
  operator: string;
  operands: Expr[];
}

export function isTestCommand(command: Command): boolean {
  return command.classification === "builtin" &&
    (command.name === "test" || command.name === "[");
}

/**
 * Classify a `test` / `[` invocation by its operator.
 * Two operands put the operator first, three put it in the middle.
 */
export function analyzeTest(command: Command): TestAnalysis {
  let args = command.args;
  if (command.name === "[" && literalValue(args[args.length - 1]) === "]") {
    args = args.slice(0, -1);
  }

  let negated = false;
  if (args.length > 1 && literalValue(args[0]) === "!") {
    negated = true;
    args = args.slice(1);
  }

  const generic: TestAnalysis = {
    category: "generic-command",
    negated: false,
    operator: "",
    operands: command.args,
  };

  if (args.length === 2) {
    const operator = literalValue(args[0]);
    const operand = args[1];
    if (operator === null || operand === undefined) {
      return generic;
    }
    if (FILE_OPERATORS.has(operator)) {
      return { category: "file-test", negated, operator, operands: [operand] };
    }
    if (UNARY_STRING_OPERATORS.has(operator)) {
      return { category: "string-test", negated, operator, operands: [operand] };
    }
    return generic;
  }

  if (args.length === 3) {
    const operator = literalValue(args[1]);
    const [left, , right] = args;
    if (operator === null || left === undefined || right === undefined) {
      return generic;
    }
    if (BINARY_STRING_OPERATORS.has(operator)) {
      return { category: "string-test", negated, operator, operands: [left, right] };
    }
    if (NUMERIC_OPERATORS.has(operator)) {
      return { category: "numeric-test", negated, operator, operands: [left, right] };
    }
  }

  return generic;
}

/** Category of a condition statement list */
export function conditionCategory(condition: Statement[]): ConditionCategory {
  const [only] = condition;
  if (condition.length === 1 && only?.kind === "Command" && isTestCommand(only.command)) {
    return analyzeTest(only.command).category;
  }
  return "generic-command";
}
