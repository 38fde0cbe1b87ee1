/**
 * Tool runner
 *
 * Runs build tools (the Go toolchain) via execa with a timeout and
 * collects their interleaved output. Failures are reported in the result,
 * never thrown, so the build driver decides how each step fails.
 */

import { execa } from "execa";

export interface ToolRunOptions {
  /** Working directory of the tool */
  cwd: string;
  /** Milliseconds before the tool is killed */
  timeout: number;
}

export interface ToolResult {
  exitCode: number;
  /** stdout and stderr, interleaved */
  output: string;
  /** The tool could not be started or was killed */
  failed: boolean;
  timedOut: boolean;
}

export interface ToolRunner {
  run(command: string, args: string[], options: ToolRunOptions): Promise<ToolResult>;
}

/**
 * Run tools as child processes
 */
export const execaRunner: ToolRunner = {
  async run(command, args, options) {
    const result = await execa(command, args, {
      cwd: options.cwd,
      timeout: options.timeout,
      reject: false,
      all: true,
      stdin: "ignore",
    });

    let output = result.all ?? "";
    // A tool that never started has no output; keep the spawn error instead
    if (result.failed && !output && "message" in result && typeof result.message === "string") {
      output = result.message;
    }

    return {
      exitCode: result.exitCode ?? 1,
      output,
      failed: result.failed,
      timedOut: result.timedOut,
    };
  },
};
