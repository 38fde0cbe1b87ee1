/**
 * build command - Convert a shell script and compile it
 */

import { resolve } from "node:path";
import { stageAndBuild } from "../../compiler/build.js";
import type { ToolRunner } from "../../compiler/runner.js";
import type { CommandContext } from "./convert.js";
import { transpileScript } from "./convert.js";

export interface BuildCommandOptions {
  /** Existing directory to build in */
  workspace?: string;
  /** Go toolchain stand-in */
  runner?: ToolRunner;
}

export async function buildCommand(
  scriptPath: string,
  outputPath: string,
  ctx: CommandContext,
  options: BuildCommandOptions = {},
): Promise<void> {
  const { config, reporter } = ctx;
  const code = await transpileScript(scriptPath, ctx);

  const outcome = await stageAndBuild(code, resolve(ctx.cwd, outputPath), {
    goBinary: config.goBinary,
    moduleName: config.moduleName,
    buildFlags: config.buildFlags,
    timeout: config.timeout,
    workspace: options.workspace === undefined ? undefined : resolve(ctx.cwd, options.workspace),
    workspaceRoot: config.workspaceRoot,
    keepWorkspace: config.keepWorkspace,
    runner: options.runner,
    log: (line) => reporter.debug(line),
  });

  reporter.success(`Built ${outputPath}`);
  if (outcome.workspaceKept) {
    reporter.info(`Workspace: ${outcome.workspace}`);
  }
}
