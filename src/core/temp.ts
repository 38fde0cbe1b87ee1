/**
 * Temporary files and build workspaces
 *
 * Workspaces are unique per invocation so concurrent builds never collide.
 */

import { mkdtemp, rename } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import fse from "fs-extra";

const WORKSPACE_PREFIX = "sh2go-";

/**
 * Create a fresh, uniquely named workspace directory
 */
export async function createWorkspace(root?: string): Promise<string> {
  const parent = root ?? tmpdir();
  await fse.ensureDir(parent);
  return await mkdtemp(join(parent, WORKSPACE_PREFIX));
}

/**
 * Generate a unique ID for temporary files
 */
export function generateTempId(): string {
  return `${Date.now()}-${process.pid}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Write a file so that readers see either the old content or the new one.
 *
 * The content lands in a sibling temp file first, then replaces the target
 * with a rename. The temp file is removed if anything fails.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${generateTempId()}.tmp`);
  try {
    await fse.outputFile(tempPath, content, "utf8");
    await rename(tempPath, path);
  } catch (error) {
    await fse.remove(tempPath);
    throw error;
  }
}
