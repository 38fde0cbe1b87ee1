/**
 * Build driver
 *
 * Stages generated Go source in a workspace, resolves its module
 * dependencies and compiles it into a standalone binary.
 */

import { chmod } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve } from "node:path";
import fse from "fs-extra";
import { DEFAULT_CONFIG } from "../core/config.js";
import { buildToolFailure, describeError } from "../core/errors.js";
import { createWorkspace } from "../core/temp.js";
import type { ToolRunner } from "./runner.js";
import { execaRunner } from "./runner.js";

/** Binary name inside the workspace when the output lives elsewhere */
const STAGED_BINARY = "sh2go-binary";

export interface BuildOptions {
  goBinary?: string;
  moduleName?: string;
  buildFlags?: string[];
  /** Per-tool timeout in milliseconds */
  timeout?: number;
  /** Existing directory to build in; it is never deleted */
  workspace?: string;
  /** Parent of created workspaces (default: OS tmp) */
  workspaceRoot?: string;
  /** Keep a created workspace after the build */
  keepWorkspace?: boolean;
  runner?: ToolRunner;
  /** Receives one line per tool invocation */
  log?: (message: string) => void;
}

export interface BuildOutcome {
  /** Absolute path of the executable */
  binaryPath: string;
  workspace: string;
  /** Whether the workspace still exists */
  workspaceKept: boolean;
}

function isInside(dir: string, path: string): boolean {
  const rel = relative(dir, path);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

/** Run a filesystem step, reporting its failure like a tool's */
async function fsStep<T>(name: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw buildToolFailure(name, describeError(error));
  }
}

/**
 * Write `main.go`, run `go mod init` (unless go.mod exists), `go mod tidy`
 * and `go build`, then place the binary at outputPath with mode 0755.
 *
 * A failing step throws BUILD_TOOL_FAILURE with the tool's output; the
 * workspace and relocate steps carry the filesystem error instead. A
 * created workspace is removed afterwards, on success and on failure,
 * unless keepWorkspace is set.
 */
export async function stageAndBuild(
  source: string,
  outputPath: string,
  options: BuildOptions = {},
): Promise<BuildOutcome> {
  const runner = options.runner ?? execaRunner;
  const goBinary = options.goBinary ?? DEFAULT_CONFIG.goBinary;
  const moduleName = options.moduleName ?? DEFAULT_CONFIG.moduleName;
  const buildFlags = options.buildFlags ?? DEFAULT_CONFIG.buildFlags;
  const timeout = options.timeout ?? DEFAULT_CONFIG.timeout;
  const log = options.log ?? (() => {});

  const binaryPath = resolve(outputPath);
  const created = options.workspace === undefined;
  const workspace = options.workspace === undefined
    ? await fsStep("workspace", () => createWorkspace(options.workspaceRoot))
    : resolve(options.workspace);
  const keep = !created || options.keepWorkspace === true;

  const step = async (name: string, args: string[]): Promise<void> => {
    log(`${goBinary} ${args.join(" ")}`);
    const result = await runner.run(goBinary, args, { cwd: workspace, timeout });
    if (result.timedOut) {
      throw buildToolFailure(name, `${result.output}\n${name} timed out after ${timeout} ms`);
    }
    if (result.failed || result.exitCode !== 0) {
      throw buildToolFailure(name, result.output);
    }
  };

  try {
    await fsStep("workspace", async () => {
      await fse.ensureDir(workspace);
      await fse.outputFile(join(workspace, "main.go"), source, "utf8");
    });

    if (!(await fse.pathExists(join(workspace, "go.mod")))) {
      await step("go mod init", ["mod", "init", moduleName]);
    }
    await step("go mod tidy", ["mod", "tidy"]);

    const inside = isInside(workspace, binaryPath);
    const staged = inside ? binaryPath : join(workspace, STAGED_BINARY);
    await step("go build", ["build", ...buildFlags, "-o", staged, "main.go"]);

    await fsStep("relocate", async () => {
      if (!inside) {
        await fse.ensureDir(dirname(binaryPath));
        await fse.move(staged, binaryPath, { overwrite: true });
      }
      await chmod(binaryPath, 0o755);
    });

    return { binaryPath, workspace, workspaceKept: keep };
  } finally {
    if (!keep) {
      await fse.remove(workspace);
    }
  }
}
