/**
 * Configuration loading and merging
 *
 * Precedence: defaults < global (~/.config/sh2go/config.json)
 * < project (./sh2go.config.json) < explicit --config file.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import fse from "fs-extra";
import { z } from "zod";
import { configError } from "./errors.js";
import type { ResolvedConfig, Sh2GoConfig } from "./types.js";

export const DEFAULT_CONFIG: ResolvedConfig = {
  goBinary: "go",
  moduleName: "sh2go_output",
  backend: "exec",
  keepWorkspace: false,
  buildFlags: [],
  timeout: 300_000,
};

export const ConfigSchema = z.object({
  goBinary: z.string().min(1).optional(),
  moduleName: z.string().regex(/^[A-Za-z0-9_.\-/]+$/, "must be a valid Go module path").optional(),
  backend: z.enum(["exec", "gexe"]).optional(),
  keepWorkspace: z.boolean().optional(),
  workspaceRoot: z.string().min(1).optional(),
  buildFlags: z.array(z.string()).optional(),
  timeout: z.number().int().positive().optional(),
});

const KNOWN_KEYS = new Set(Object.keys(ConfigSchema.shape));

/**
 * Get the global config path
 */
export function getGlobalConfigPath(): string {
  return join(homedir(), ".config", "sh2go", "config.json");
}

/**
 * Get the project config path
 */
export function getProjectConfigPath(cwd: string): string {
  return join(cwd, "sh2go.config.json");
}

export function mergeConfigs(base: ResolvedConfig, override: Sh2GoConfig): ResolvedConfig {
  return {
    goBinary: override.goBinary ?? base.goBinary,
    moduleName: override.moduleName ?? base.moduleName,
    backend: override.backend ?? base.backend,
    keepWorkspace: override.keepWorkspace ?? base.keepWorkspace,
    workspaceRoot: override.workspaceRoot ?? base.workspaceRoot,
    buildFlags: override.buildFlags ?? base.buildFlags,
    timeout: override.timeout ?? base.timeout,
  };
}

export interface ConfigValidation {
  config: Sh2GoConfig;
  errors: string[];
  warnings: string[];
}

/**
 * Validate a raw config object. Unknown keys are warnings, bad values are errors.
 */
export function validateConfig(raw: unknown): ConfigValidation {
  const result: ConfigValidation = { config: {}, errors: [], warnings: [] };

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    result.errors.push("config must be a JSON object");
    return result;
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      result.warnings.push(`unknown config key '${key}' is ignored`);
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      result.errors.push(`${issue.path.join(".") || "(root)"}: ${issue.message}`);
    }
    return result;
  }

  result.config = parsed.data;
  if (parsed.data.buildFlags?.some((flag) => flag === "-o" || flag.startsWith("-o="))) {
    result.errors.push("buildFlags: '-o' is set by sh2go and cannot be overridden");
  }
  return result;
}

/**
 * Load a JSON config file if it exists
 */
async function loadJsonConfigFile(path: string): Promise<Sh2GoConfig | null> {
  if (!(await fse.pathExists(path))) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    throw configError(
      `Failed to load config from ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
    );
  }

  const validation = validateConfig(raw);
  if (validation.errors.length > 0) {
    throw configError(`Invalid config in ${path}:\n${validation.errors.join("\n")}`, path);
  }
  for (const warning of validation.warnings) {
    console.error(`Config warning (${path}): ${warning}`);
  }
  return validation.config;
}

/** Options for loading config */
export interface LoadConfigOptions {
  /** Explicit config file; it must exist */
  configPath?: string;
  /** Skip the global config (default: false) */
  skipGlobal?: boolean;
  /** Values applied last, typically from CLI flags; validated like a file */
  overrides?: Record<string, unknown>;
}

/**
 * Load and merge all config layers
 */
export async function loadConfig(
  cwd: string,
  options: LoadConfigOptions = {},
): Promise<ResolvedConfig> {
  let config = { ...DEFAULT_CONFIG };

  if (!options.skipGlobal) {
    const globalConfig = await loadJsonConfigFile(getGlobalConfigPath());
    if (globalConfig) {
      config = mergeConfigs(config, globalConfig);
    }
  }

  const projectConfig = await loadJsonConfigFile(getProjectConfigPath(cwd));
  if (projectConfig) {
    config = mergeConfigs(config, projectConfig);
  }

  if (options.configPath) {
    const explicitPath = resolve(cwd, options.configPath);
    const explicitConfig = await loadJsonConfigFile(explicitPath);
    if (!explicitConfig) {
      throw configError(`Config file not found: ${explicitPath}`, explicitPath);
    }
    config = mergeConfigs(config, explicitConfig);
  }

  if (options.overrides) {
    const validation = validateConfig(options.overrides);
    if (validation.errors.length > 0) {
      throw configError(`Invalid option:\n${validation.errors.join("\n")}`);
    }
    config = mergeConfigs(config, validation.config);
  }

  if (config.workspaceRoot) {
    config.workspaceRoot = resolve(cwd, config.workspaceRoot);
  }

  return config;
}
