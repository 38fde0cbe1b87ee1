/**
 * Builtin Command Table
 *
 * Commands with a fixed native lowering. Anything not listed here (and not
 * a script function) is spawned as an external process.
 */

import type { Capability } from "./types.js";

export interface BuiltinConfig {
  /** Capabilities the lowering needs */
  capabilities: Capability[];
}

export const SHELL_BUILTINS: Record<string, BuiltinConfig> = {
  echo: { capabilities: [] },
  cd: { capabilities: ["filesystem"] },
  pwd: { capabilities: ["filesystem"] },
  mkdir: { capabilities: ["filesystem"] },
  rm: { capabilities: ["filesystem"] },
  cp: { capabilities: ["filesystem"] },
  test: { capabilities: ["filesystem"] },
  "[": { capabilities: ["filesystem"] },
  exit: { capabilities: [] },
  export: { capabilities: ["environment"] },
  read: { capabilities: ["input"] },
  source: { capabilities: ["filesystem"] },
  wait: { capabilities: ["concurrency"] },
};

export function isBuiltin(name: string): boolean {
  return Object.hasOwn(SHELL_BUILTINS, name);
}

/**
 * Shell-only builtins that have no process to spawn and no lowering.
 * Spawning them would fail at run time, so the builder rejects them.
 */
export const SHELL_ONLY_COMMANDS = new Set([
  "alias",
  "break",
  "continue",
  "eval",
  "exec",
  "getopts",
  "let",
  "set",
  "shift",
  "trap",
  "unset",
  ".",
]);

/**
 * True for `set -e`, `set -u`, `set -o pipefail` and their combinations,
 * which generated programs already honor.
 */
export function isImpliedSetCommand(args: string[]): boolean {
  if (args.length === 0) {
    return false;
  }
  const wantsOption = args.some((arg) => /^-[eu]*o[eu]*$/.test(arg));
  return args.every((arg) => /^-[euo]+$/.test(arg) || arg === "pipefail") &&
    wantsOption === args.includes("pipefail");
}
