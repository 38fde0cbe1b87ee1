#!/usr/bin/env node
/**
 * sh2go CLI entry point
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import minimist from "minimist";
import { loadConfig } from "../core/config.js";
import type { ToolRunner } from "../compiler/runner.js";
import { buildCommand } from "./commands/build.js";
import { convertCommand } from "./commands/convert.js";
import { createReporter } from "./lib/output.js";

export const VERSION = "0.1.0";

export const HELP = `
sh2go - Transpile shell scripts to Go

USAGE:
  sh2go <command> <script> -o <output> [options]

COMMANDS:
  convert <script>     Write Go source for the script
  build <script>       Convert and compile into a standalone binary

OPTIONS:
  -o, --output <file>  Output file (required)
  -c, --config <file>  Config file (default: ./sh2go.config.json)
  --backend <name>     Process backend in generated code (exec|gexe)
  --workspace <dir>    Build in this directory instead of a temp one
  --keep-workspace     Keep the temp build directory
  -v, --verbose        Verbose output
  -h, --help           Show this help
  --version            Show version

EXAMPLES:
  sh2go convert deploy.sh -o deploy.go
  sh2go build deploy.sh -o bin/deploy
  sh2go build deploy.sh -o deploy --backend gexe --keep-workspace -v
`;

export interface MainOptions {
  cwd?: string;
  /** Go toolchain stand-in for `build` */
  runner?: ToolRunner;
  /** Ignore ~/.config/sh2go/config.json */
  skipGlobalConfig?: boolean;
}

function stringFlag(args: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = args[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Run the CLI and return its exit status
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const args = minimist(argv, {
    string: ["output", "config", "backend", "workspace"],
    boolean: ["verbose", "help", "version", "keep-workspace"],
    alias: {
      o: "output",
      c: "config",
      v: "verbose",
      h: "help",
    },
    default: {
      verbose: false,
    },
  });

  if (args.help) {
    console.log(HELP);
    return 0;
  }

  if (args.version) {
    console.log(`sh2go ${VERSION}`);
    return 0;
  }

  const reporter = createReporter(args.verbose === true);
  const [command, script] = args._.map(String);
  const cwd = options.cwd ?? process.cwd();

  if (command !== "convert" && command !== "build") {
    console.error(command ? `Unknown command: ${command}` : "Missing command");
    console.error(HELP);
    return 1;
  }
  if (!script) {
    console.error(`Usage: sh2go ${command} <script> -o <output>`);
    return 1;
  }
  const output = stringFlag(args, "output");
  if (!output) {
    console.error(`Missing required option -o/--output`);
    console.error(`Usage: sh2go ${command} <script> -o <output>`);
    return 1;
  }

  try {
    const overrides: Record<string, unknown> = {};
    const backend = stringFlag(args, "backend");
    if (backend !== undefined) overrides.backend = backend;
    if (args["keep-workspace"] === true) overrides.keepWorkspace = true;

    const config = await loadConfig(cwd, {
      configPath: stringFlag(args, "config"),
      skipGlobal: options.skipGlobalConfig,
      overrides,
    });
    reporter.debug(`Config: ${JSON.stringify(config)}`);

    const ctx = { cwd, config, reporter };
    if (command === "convert") {
      await convertCommand(script, output, ctx);
    } else {
      await buildCommand(script, output, ctx, {
        workspace: stringFlag(args, "workspace"),
        runner: options.runner,
      });
    }
    return 0;
  } catch (error) {
    reporter.error(error);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(script)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
