/**
 * Handlers Module
 *
 * Re-exports all handler functions.
 */

// Command handlers
export {
  checkStatus,
  commandCondition,
  emitLowering,
  lowerCommand,
  visitAssignment,
  visitCommand,
  visitPipeline,
} from "./commands.js";

// Control flow handlers
export {
  subshellEffects,
  visitBackground,
  visitCondition,
  visitConditional,
  visitLoop,
  visitRedirection,
  visitReturn,
  visitSubshell,
} from "./control.js";

// Test condition handlers
export { visitTestCommand, visitTestExpression } from "./tests.js";

// Value handlers
export { visitExpr } from "./words.js";
export type { ExprOptions } from "./words.js";
