/**
 * Output Emitter
 *
 * Builds the generated Go file with gofmt's layout: tab indentation,
 * grouped imports and a blank line between top-level declarations.
 */

import type { GeneratorContext } from "./context.js";

/** Standard-library import paths have no dot in their first element */
export function isStandardImport(path: string): boolean {
  const [first] = path.split("/");
  return first !== undefined && !first.includes(".");
}

/** Import block: standard library first, then third-party, each sorted */
export function formatImports(paths: readonly string[]): string[] {
  const standard = paths.filter(isStandardImport).sort();
  const external = paths.filter((path) => !isStandardImport(path)).sort();
  const quoted = (path: string) => `\t"${path}"`;

  if (standard.length + external.length === 0) {
    return [];
  }
  const lines = ["import (", ...standard.map(quoted)];
  if (standard.length > 0 && external.length > 0) {
    lines.push("");
  }
  lines.push(...external.map(quoted), ")");
  return lines;
}

// =============================================================================
// Output Emitter
// =============================================================================

export class OutputEmitter {
  private readonly ctx: GeneratorContext;
  private readonly lines: string[] = [];

  constructor(ctx: GeneratorContext) {
    this.ctx = ctx;
  }

  // ===========================================================================
  // Line Emission
  // ===========================================================================

  /** Emit a line with current indentation */
  emit(line: string): void {
    if (line === "") {
      this.lines.push("");
    } else {
      this.lines.push(this.ctx.getIndent() + line);
    }
  }

  /** Emit lines that already carry their indentation */
  emitRaw(lines: string[]): void {
    this.lines.push(...lines);
  }

  /** Emit a blank line */
  emitBlank(): void {
    this.lines.push("");
  }

  // ===========================================================================
  // Block Emission
  // ===========================================================================

  /** Emit `prefix {`, the body one level deeper, then `}` */
  emitBlock(prefix: string, bodyFn: () => void): void {
    this.emit(`${prefix} {`);
    this.ctx.indent();
    bodyFn();
    this.ctx.dedent();
    this.emit("}");
  }

  // ===========================================================================
  // Output Generation
  // ===========================================================================

  /** Final source, newline-terminated */
  toString(): string {
    return this.lines.join("\n") + "\n";
  }
}
