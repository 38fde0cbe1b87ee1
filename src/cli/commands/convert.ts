/**
 * convert command - Write Go source for a shell script
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import fse from "fs-extra";
import { convert } from "../../convert.js";
import { writeFileAtomic } from "../../core/temp.js";
import type { ResolvedConfig } from "../../core/types.js";
import type { Reporter } from "../lib/output.js";

export interface CommandContext {
  cwd: string;
  config: ResolvedConfig;
  reporter: Reporter;
}

/**
 * Read and convert a script, printing its diagnostics
 */
export async function transpileScript(scriptPath: string, ctx: CommandContext): Promise<string> {
  const path = resolve(ctx.cwd, scriptPath);
  if (!(await fse.pathExists(path))) {
    throw new Error(`Script not found: ${scriptPath}`);
  }
  const source = await readFile(path, "utf8");
  ctx.reporter.debug(`Read ${source.length} bytes from ${path}`);

  const { code, diagnostics } = convert(source, {
    filename: scriptPath,
    backend: ctx.config.backend,
  });
  for (const diagnostic of diagnostics) {
    ctx.reporter.diagnostic(scriptPath, diagnostic);
  }
  ctx.reporter.debug(`Generated ${code.length} bytes of Go (${ctx.config.backend} backend)`);
  return code;
}

export async function convertCommand(
  scriptPath: string,
  outputPath: string,
  ctx: CommandContext,
): Promise<void> {
  const code = await transpileScript(scriptPath, ctx);
  const target = resolve(ctx.cwd, outputPath);
  await writeFileAtomic(target, code);
  ctx.reporter.success(`Wrote ${outputPath}`);
}
