/**
 * Value Handlers
 *
 * Lowers IR expressions to Go string expressions.
 */

import type { SpecialParameter, TemplateSegment } from "../../ir/template.js";
import { exprSegments } from "../../ir/template.js";
import type { Expr } from "../../ir/types.js";
import { expandEscapes } from "../../ir/words.js";
import type { VisitorContext } from "../types.js";
import { goString } from "../utils/escape.js";

export interface ExprOptions {
  /** Interpret backslash escapes in literal text (`echo -e`) */
  escapes?: boolean;
}

/**
 * Go expression for an IR value: segments joined with `+`, or `""` for an
 * empty value.
 */
export function visitExpr(
  expr: Expr,
  ctx: VisitorContext,
  options: ExprOptions = {},
): string {
  const parts = exprSegments(expr).map((segment) => visitSegment(segment, ctx, options));
  return parts.length > 0 ? parts.join(" + ") : '""';
}

function visitSegment(
  segment: TemplateSegment,
  ctx: VisitorContext,
  options: ExprOptions,
): string {
  switch (segment.kind) {
    case "text":
      return goString(options.escapes ? expandEscapes(segment.value) : segment.value);
    case "variable":
      return ctx.resolveVariable(segment.name);
    case "positional":
      return `${ctx.useHelper("arg")}(args, ${segment.index})`;
    case "special":
      return visitSpecial(segment.name, ctx);
  }
}

function visitSpecial(name: SpecialParameter, ctx: VisitorContext): string {
  switch (name) {
    case "0":
      return `${ctx.usePackage("os")}.Args[0]`;
    case "@":
    case "*":
      return `${ctx.usePackage("strings")}.Join(args, " ")`;
    case "#":
      return `${ctx.usePackage("strconv")}.Itoa(len(args))`;
    case "$": {
      const os = ctx.usePackage("os");
      return `${ctx.usePackage("strconv")}.Itoa(${os}.Getpid())`;
    }
  }
}
