import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG, loadConfig, mergeConfigs, validateConfig } from "./config.js";
import { TranspileError } from "./errors.js";

describe("validateConfig", () => {
  it("accepts a well-formed config", () => {
    const result = validateConfig({ backend: "gexe", buildFlags: ["-trimpath"] });
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.config).toEqual({ backend: "gexe", buildFlags: ["-trimpath"] });
  });

  it("warns about unknown keys", () => {
    const result = validateConfig({ colour: true });
    expect(result.warnings).toEqual(["unknown config key 'colour' is ignored"]);
    expect(result.errors).toEqual([]);
  });

  it("reports invalid values by path", () => {
    const result = validateConfig({ timeout: -5 });
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^timeout: /);
  });

  it("rejects an output flag in buildFlags", () => {
    const result = validateConfig({ buildFlags: ["-o", "x"] });
    expect(result.errors).toEqual(["buildFlags: '-o' is set by sh2go and cannot be overridden"]);
  });

  it("rejects non-object configs", () => {
    expect(validateConfig([1, 2]).errors).toEqual(["config must be a JSON object"]);
  });
});

describe("mergeConfigs", () => {
  it("lets later layers override earlier ones", () => {
    const merged = mergeConfigs(DEFAULT_CONFIG, { moduleName: "demo", keepWorkspace: true });
    expect(merged.moduleName).toBe("demo");
    expect(merged.keepWorkspace).toBe(true);
    expect(merged.goBinary).toBe("go");
  });
});

describe("loadConfig", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), "sh2go-config-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(cwd, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", async () => {
    const config = await loadConfig(cwd, { skipGlobal: true });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("merges project config, explicit config and overrides in order", async () => {
    await writeFile(
      join(cwd, "sh2go.config.json"),
      JSON.stringify({ moduleName: "project", timeout: 1000 }),
    );
    await writeFile(join(cwd, "ci.json"), JSON.stringify({ timeout: 2000, workspaceRoot: "ws" }));

    const config = await loadConfig(cwd, {
      skipGlobal: true,
      configPath: "ci.json",
      overrides: { backend: "gexe" },
    });

    expect(config.moduleName).toBe("project");
    expect(config.timeout).toBe(2000);
    expect(config.backend).toBe("gexe");
    expect(config.workspaceRoot).toBe(join(cwd, "ws"));
  });

  it("throws a config error for malformed JSON", async () => {
    await writeFile(join(cwd, "sh2go.config.json"), "{ nope");
    await expect(loadConfig(cwd, { skipGlobal: true })).rejects.toBeInstanceOf(TranspileError);
  });

  it("throws when the explicit config file is missing", async () => {
    await expect(
      loadConfig(cwd, { skipGlobal: true, configPath: "missing.json" }),
    ).rejects.toThrow(`Config file not found: ${join(cwd, "missing.json")}`);
  });

  it("prints warnings for unknown keys", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    await writeFile(join(cwd, "sh2go.config.json"), JSON.stringify({ extra: 1 }));
    await loadConfig(cwd, { skipGlobal: true });
    expect(spy).toHaveBeenCalledWith(
      `Config warning (${join(cwd, "sh2go.config.json")}): unknown config key 'extra' is ignored`,
    );
  });
});
