/**
 * Word Extraction
 *
 * Turns syntax-tree words into IR expressions: literal text verbatim,
 * parameter references as template tokens, double quotes as concatenation,
 * single quotes as literal text, command substitution as a literal marker.
 */

import { unsupportedConstruct } from "../core/errors.js";
import type * as AST from "../syntax/ast.js";
import { escapeTemplateText, referenceToken } from "./template.js";
import type { Expr, ItemExpansion } from "./types.js";

export interface WordContext {
  /** Record a warning about lossy extraction */
  warn(message: string, pos?: AST.Position): void;
  /** Record a positional parameter reference */
  usePositional(index: number): void;
}

const UNSUPPORTED_PART_NAMES: Record<string, string> = {
  ArithmExp: "arithmetic expansion",
  ProcSubst: "process substitution",
  ExtGlob: "extended glob",
  BraceExp: "brace expansion",
};

const BRACE_EXPANSION = /(^|[^\\])\{[^{}\s]*(,|\.\.)[^{}\s]*\}/;

const UNSUPPORTED_PARAMETERS: Record<string, string> = {
  "?": "$? (last exit status)",
  "!": "$! (last background job)",
  "-": "$- (shell options)",
};

function location(pos?: AST.Position) {
  return pos ? { line: pos.line, column: pos.column } : undefined;
}

/** Remove backslash escapes from unquoted literal text */
export function unescapeUnquoted(value: string): string {
  return value.replace(/\\([\s\S])/g, (_, char: string) => char === "\n" ? "" : char);
}

/** Remove the escapes that are active inside double quotes */
export function unescapeDoubleQuoted(value: string): string {
  return value.replace(/\\([$`"\\\n])/g, (_, char: string) => char === "\n" ? "" : char);
}

/** Expand backslash escapes as `echo -e` and `$'...'` do */
export function expandEscapes(s: string): string {
  let result = "";
  for (let i = 0; i < s.length; i++) {
    if (s[i] === "\\" && i + 1 < s.length) {
      i++;
      switch (s[i]) {
        case "n": result += "\n"; break;
        case "t": result += "\t"; break;
        case "\\": result += "\\"; break;
        case "a": result += "\x07"; break;
        case "b": result += "\b"; break;
        case "e": result += "\x1b"; break;
        case "f": result += "\f"; break;
        case "r": result += "\r"; break;
        case "v": result += "\v"; break;
        case "'": result += "'"; break;
        case "\"": result += "\""; break;
        default: result += `\\${s[i]}`; break;
      }
    } else {
      result += s[i];
    }
  }
  return result;
}

class TemplateWriter {
  private template = "";
  private interpolated = false;
  private plain = "";

  text(value: string): void {
    this.template += escapeTemplateText(value);
    this.plain += value;
  }

  reference(name: string): void {
    this.template += referenceToken(name);
    this.interpolated = true;
  }

  toExpr(): Expr {
    return this.interpolated
      ? { kind: "interpolated", template: this.template }
      : { kind: "literal", value: this.plain };
  }
}

function writeParam(part: AST.ParamExp, writer: TemplateWriter, ctx: WordContext): void {
  const special = UNSUPPORTED_PARAMETERS[part.name];
  if (special) {
    throw unsupportedConstruct(special, "build", location(part.pos));
  }
  if (!part.plain || part.name === "") {
    throw unsupportedConstruct(`parameter expansion ${part.text}`, "build", location(part.pos));
  }
  if (/^\d+$/.test(part.name) && part.name !== "0") {
    ctx.usePositional(Number(part.name));
  }
  writer.reference(part.name);
}

function writeParts(
  parts: AST.WordPart[],
  writer: TemplateWriter,
  ctx: WordContext,
  quoted: boolean,
): void {
  parts.forEach((part, index) => {
    switch (part.type) {
      case "Lit": {
        if (quoted) {
          writer.text(unescapeDoubleQuoted(part.value));
          break;
        }
        if (BRACE_EXPANSION.test(part.value)) {
          throw unsupportedConstruct("brace expansion", "build", location(part.pos));
        }
        // `~` and `~/...` at the start of a word expand to $HOME
        if (index === 0 && (part.value === "~" || part.value.startsWith("~/"))) {
          writer.reference("HOME");
          writer.text(unescapeUnquoted(part.value.slice(1)));
          break;
        }
        writer.text(unescapeUnquoted(part.value));
        break;
      }
      case "SglQuoted":
        writer.text(part.dollar ? expandEscapes(part.value) : part.value);
        break;
      case "DblQuoted":
        writeParts(part.parts, writer, ctx, true);
        break;
      case "ParamExp":
        writeParam(part, writer, ctx);
        break;
      case "CmdSubst":
        ctx.warn(
          `command substitution ${part.text} is kept as literal text; its output is not captured`,
          part.pos,
        );
        writer.text(part.text);
        break;
      case "Unknown":
        throw unsupportedConstruct(
          UNSUPPORTED_PART_NAMES[part.kind] ?? part.kind,
          "build",
          location(part.pos),
        );
      default: {
        const _exhaustive: never = part;
        throw unsupportedConstruct(JSON.stringify(_exhaustive), "build");
      }
    }
  });
}

/**
 * Extract the value of a word as an IR expression
 */
export function wordToExpr(word: AST.Word, ctx: WordContext): Expr {
  const writer = new TemplateWriter();
  writeParts(word.parts, writer, ctx, false);
  return writer.toExpr();
}

/** Literal text of a word with no expansions, or null */
export function wordLiteral(word: AST.Word | undefined, ctx: WordContext): string | null {
  if (!word) {
    return null;
  }
  const expr = wordToExpr(word, ctx);
  return expr.kind === "literal" ? expr.value : null;
}

/**
 * How a for-loop item expands: unquoted parameter references split on
 * whitespace, unquoted glob characters match files, anything else is one item.
 */
export function itemExpansion(word: AST.Word): ItemExpansion {
  if (word.parts.some((part) => part.type === "ParamExp")) {
    return "split";
  }
  const globbing = word.parts.some((part) =>
    part.type === "Lit" && /(^|[^\\])[*?[]/.test(part.value)
  );
  return globbing ? "glob" : "none";
}

const BRACE_RANGE = /^\{(-?\d+)\.\.(-?\d+)\}$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function fitsInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

/** Canonical decimal text of an integer that fits a Go int, or null */
export function int64Text(text: string): string | null {
  if (!/^-?\d+$/.test(text)) {
    return null;
  }
  const value = BigInt(text);
  return fitsInt64(value) ? value.toString() : null;
}

/** Bounds of an unquoted `{a..b}` word */
export function braceRange(word: AST.Word): [bigint, bigint] | null {
  const [part] = word.parts;
  if (word.parts.length !== 1 || part?.type !== "Lit") {
    return null;
  }
  const match = BRACE_RANGE.exec(part.value);
  if (!match) {
    return null;
  }
  return [BigInt(match[1]), BigInt(match[2])];
}
