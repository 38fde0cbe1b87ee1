/**
 * Source-to-source conversion: shell script text in, Go source out.
 */

import { generate } from "./codegen/mod.js";
import type { BackendName, Diagnostic } from "./core/types.js";
import { buildProgram } from "./ir/builder.js";
import { parse } from "./syntax/parse.js";

export interface ConvertOptions {
  /** Name used in parse errors */
  filename?: string;
  backend?: BackendName;
}

export interface ConvertResult {
  /** Complete main.go source */
  code: string;
  /** Warnings and notes from lowering */
  diagnostics: Diagnostic[];
}

/**
 * Parse, lower and generate. Throws a TranspileError on the first
 * malformed or unsupported construct; nothing partial is returned.
 */
export function convert(source: string, options: ConvertOptions = {}): ConvertResult {
  const file = parse(source, options.filename);
  const { program, diagnostics } = buildProgram(file);
  const { code } = generate(program, { backend: options.backend });
  return { code, diagnostics };
}
