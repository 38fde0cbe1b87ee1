/**
 * Test Condition Handlers
 *
 * Lowers `test` and `[` to native Go comparisons where the operator is
 * known, and spawns `test` otherwise.
 */

import type { TestAnalysis } from "../../ir/conditions.js";
import { analyzeTest } from "../../ir/conditions.js";
import type { Command, Expr } from "../../ir/types.js";
import { integerLiteral, testArgs } from "../lowering.js";
import type { Lowering, VisitorContext } from "../types.js";
import { goString } from "../utils/escape.js";
import { visitExpr } from "./words.js";

const NUMERIC_OPERATORS: Record<string, string> = {
  "-eq": "==",
  "-ne": "!=",
  "-lt": "<",
  "-le": "<=",
  "-gt": ">",
  "-ge": ">=",
};

function numericOperand(expr: Expr, ctx: VisitorContext): string {
  return integerLiteral(expr) ?? `${ctx.useHelper("toInt")}(${visitExpr(expr, ctx)})`;
}

/** Native boolean expression for a classified test, or null when generic */
export function visitTestExpression(
  analysis: TestAnalysis,
  ctx: VisitorContext,
): string | null {
  const [left, right] = analysis.operands;
  if (left === undefined) {
    return null;
  }

  switch (analysis.category) {
    case "file-test":
      return `${ctx.useHelper("fileTest")}(${goString(analysis.operator)}, ${visitExpr(left, ctx)})`;
    case "string-test":
      if (analysis.operator === "-z") {
        return `${visitExpr(left, ctx)} == ""`;
      }
      if (analysis.operator === "-n") {
        return `${visitExpr(left, ctx)} != ""`;
      }
      if (right === undefined) {
        return null;
      }
      return `${visitExpr(left, ctx)} ${analysis.operator === "=" ? "==" : "!="} ${visitExpr(right, ctx)}`;
    case "numeric-test": {
      const operator = NUMERIC_OPERATORS[analysis.operator];
      if (right === undefined || operator === undefined) {
        return null;
      }
      return `${numericOperand(left, ctx)} ${operator} ${numericOperand(right, ctx)}`;
    }
    case "generic-command":
      return null;
  }
}

/**
 * Lower a `test` / `[` command. Classified tests become a boolean that a
 * condition uses directly; as a statement the boolean goes through
 * testStatus.
 */
export function visitTestCommand(command: Command, ctx: VisitorContext): Lowering {
  const analysis = analyzeTest(command);
  const native = visitTestExpression(analysis, ctx);

  if (native === null) {
    const args = testArgs(command).map((arg) => visitExpr(arg, ctx));
    return {
      kind: "status",
      exprs: [`${ctx.useHelper("runCommand")}(${["\"test\"", ...args].join(", ")})`],
    };
  }

  const expr = analysis.negated ? `!(${native})` : native;
  return {
    kind: "bool",
    expr,
    statement: () => ({
      kind: "status",
      exprs: [`${ctx.useHelper("testStatus")}(${expr})`],
    }),
  };
}
