/**
 * Lowering Rules
 *
 * Decisions shared by the requirements pass and the emitting handlers, so
 * both passes choose the same lowering form for a construct.
 */

import type { SpecialParameter, TemplateSegment } from "../ir/template.js";
import { literalValue, scanTemplate } from "../ir/template.js";
import type { Command, Expr, LoopItem } from "../ir/types.js";
import { int64Text } from "../ir/words.js";
import type { HelperName } from "./runtime.js";

/** Closures and bodies the generator is currently emitting into */
export type FrameKind =
  | "run"
  | "function"
  | "subshell"
  | "redirect"
  | "background"
  | "condition";

/**
 * Whether `exit` returns from the enclosing closure instead of ending the
 * process: true inside a subshell or background job, looking through
 * redirections only.
 */
export function exitReturns(frames: readonly FrameKind[]): boolean {
  for (let i = frames.length - 1; i >= 0; i--) {
    const frame = frames[i];
    if (frame === "redirect") {
      continue;
    }
    return frame === "subshell" || frame === "background";
  }
  return false;
}

/** `return` cannot leave a redirection or background closure */
export function returnBlocked(frames: readonly FrameKind[]): boolean {
  const innermost = frames[frames.length - 1];
  return innermost === "redirect" || innermost === "background";
}

export interface Operands {
  flags: string[];
  operands: Expr[];
}

/** Split leading literal `-x` flags from operands; `--` ends the flags */
export function splitOperands(args: Expr[]): Operands {
  const flags: string[] = [];
  let index = 0;
  for (; index < args.length; index++) {
    const value = literalValue(args[index]);
    if (value === "--") {
      index++;
      break;
    }
    if (value === null || !value.startsWith("-") || value.length < 2) {
      break;
    }
    flags.push(value);
  }
  return { flags, operands: args.slice(index) };
}

export interface EchoOptions {
  newline: boolean;
  escapes: boolean;
  operands: Expr[];
}

export function echoOptions(args: Expr[]): EchoOptions {
  let newline = true;
  let escapes = false;
  let index = 0;
  for (; index < args.length; index++) {
    const value = literalValue(args[index]);
    if (value === null || !/^-[neE]+$/.test(value)) {
      break;
    }
    for (const flag of value.slice(1)) {
      if (flag === "n") newline = false;
      if (flag === "e") escapes = true;
      if (flag === "E") escapes = false;
    }
  }
  return { newline, escapes, operands: args.slice(index) };
}

/**
 * Decimal text of a literal integer operand, or null. Values outside
 * int64 are null too, so callers convert them at run time with toInt.
 */
export function integerLiteral(expr: Expr | undefined): string | null {
  const value = literalValue(expr)?.trim();
  return value === undefined ? null : int64Text(value);
}

/** Arguments of a spawned `test`, without the closing bracket of `[` */
export function testArgs(command: Command): Expr[] {
  const last = command.args[command.args.length - 1];
  if (command.name === "[" && literalValue(last) === "]") {
    return command.args.slice(0, -1);
  }
  return command.args;
}

export type ItemGroup =
  | { kind: "words"; values: Expr[] }
  | { kind: "split"; value: Expr }
  | { kind: "glob"; value: Expr };

/** Group loop items: runs of plain words, then one group per expansion */
export function itemGroups(items: LoopItem[]): ItemGroup[] {
  const groups: ItemGroup[] = [];
  for (const item of items) {
    if (item.expand === "none") {
      const last = groups[groups.length - 1];
      if (last?.kind === "words") {
        last.values.push(item.value);
      } else {
        groups.push({ kind: "words", values: [item.value] });
      }
    } else {
      groups.push({ kind: item.expand, value: item.value });
    }
  }
  return groups;
}

export interface Requirements {
  imports: string[];
  helpers: HelperName[];
}

const SPECIAL_IMPORTS: Record<SpecialParameter, string[]> = {
  "0": ["os"],
  "@": ["strings"],
  "*": ["strings"],
  "#": ["strconv"],
  "$": ["os", "strconv"],
};

/** What a template reference needs at run time */
export function segmentRequirements(segment: TemplateSegment): Requirements {
  if (segment.kind === "positional") {
    return { imports: [], helpers: ["arg"] };
  }
  if (segment.kind === "special") {
    return { imports: SPECIAL_IMPORTS[segment.name], helpers: [] };
  }
  return { imports: [], helpers: [] };
}

/** Reference segments of an expression; literals have none */
export function referenceSegments(expr: Expr): TemplateSegment[] {
  return expr.kind === "literal"
    ? []
    : scanTemplate(expr.template).filter((segment) => segment.kind !== "text");
}
