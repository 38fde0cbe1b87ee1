import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createWorkspace, generateTempId, writeFileAtomic } from "./temp.js";

describe("temp helpers", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "sh2go-temp-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("creates distinct workspaces under the given root", async () => {
    const first = await createWorkspace(root);
    const second = await createWorkspace(root);
    expect(first).not.toBe(second);
    expect(dirname(first)).toBe(root);
    expect(basename(first).startsWith("sh2go-")).toBe(true);
  });

  it("generates distinct temp ids", () => {
    expect(generateTempId()).not.toBe(generateTempId());
  });

  it("replaces the target and leaves no temp file behind", async () => {
    const target = join(root, "out.go");
    await writeFile(target, "old");
    await writeFileAtomic(target, "package main\n");
    expect(await readFile(target, "utf8")).toBe("package main\n");
    expect(await readdir(root)).toEqual(["out.go"]);
  });

  it("creates missing parent directories", async () => {
    const target = join(root, "nested", "dir", "out.go");
    await writeFileAtomic(target, "x");
    expect(await readFile(target, "utf8")).toBe("x");
  });
});
