/**
 * Interpolation templates
 *
 * Literal text is stored with `\$` and `\\` escapes; everything else that
 * starts with `$` is a reference token. The builder writes templates with
 * escapeTemplateText and reference tokens, the generator reads them back
 * with scanTemplate.
 */

import type { Expr } from "./types.js";

export type SpecialParameter = "0" | "@" | "*" | "#" | "$";

export type TemplateSegment =
  | { kind: "text"; value: string }
  | { kind: "variable"; name: string }
  | { kind: "positional"; index: number }
  | { kind: "special"; name: SpecialParameter };

const IDENT_START = /[A-Za-z_]/;
const IDENT_CONTINUE = /[A-Za-z0-9_]/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SPECIALS = new Set<string>(["@", "*", "#", "$"]);

function isSpecial(name: string): name is SpecialParameter {
  return name === "0" || SPECIALS.has(name);
}

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** Escape literal text for inclusion in a template */
export function escapeTemplateText(text: string): string {
  return text.replace(/[\\$]/g, (char) => `\\${char}`);
}

/** Reference token for a parameter name (identifier, digits or special) */
export function referenceToken(name: string): string {
  if (SPECIALS.has(name)) {
    return `$${name}`;
  }
  return `\${${name}}`;
}

/**
 * Split a template into text and reference segments.
 * Adjacent text is merged; a `$` that starts no reference stays literal.
 */
export function scanTemplate(template: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let text = "";

  const flush = () => {
    if (text) {
      segments.push({ kind: "text", value: text });
      text = "";
    }
  };

  const pushReference = (name: string) => {
    flush();
    if (/^\d+$/.test(name)) {
      const index = Number(name);
      segments.push(index === 0 ? { kind: "special", name: "0" } : { kind: "positional", index });
    } else if (isSpecial(name)) {
      segments.push({ kind: "special", name });
    } else {
      segments.push({ kind: "variable", name });
    }
  };

  let i = 0;
  while (i < template.length) {
    const char = template[i];
    const next = template[i + 1];

    if (char === "\\" && next !== undefined) {
      text += next;
      i += 2;
      continue;
    }

    if (char === "$" && next !== undefined) {
      if (next === "{") {
        const close = template.indexOf("}", i + 2);
        const inner = close > 0 ? template.slice(i + 2, close) : "";
        if (IDENTIFIER.test(inner) || /^\d+$/.test(inner) || isSpecial(inner)) {
          pushReference(inner);
          i = close + 1;
          continue;
        }
      } else if (IDENT_START.test(next)) {
        let end = i + 2;
        while (end < template.length && IDENT_CONTINUE.test(template[end] ?? "")) {
          end++;
        }
        pushReference(template.slice(i + 1, end));
        i = end;
        continue;
      } else if (/\d/.test(next) || isSpecial(next)) {
        pushReference(next);
        i += 2;
        continue;
      }
    }

    text += char;
    i++;
  }

  flush();
  return segments;
}

/** Segments of any expression; a literal is a single text segment */
export function exprSegments(expr: Expr): TemplateSegment[] {
  if (expr.kind === "literal") {
    return expr.value ? [{ kind: "text", value: expr.value }] : [];
  }
  return scanTemplate(expr.template);
}

/** The literal value of an expression, or null when it interpolates */
export function literalValue(expr: Expr | undefined): string | null {
  return expr?.kind === "literal" ? expr.value : null;
}
