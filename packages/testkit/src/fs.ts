/**
 * Scratch directories and source files for tests that touch the disk
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export async function createTempDir(prefix = "blocksplit-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write a file under `dir`, creating missing parent directories
 * @returns Absolute path of the written file
 */
export async function writeSource(dir: string, name: string, content: Uint8Array | string): Promise<string> {
  const path = join(dir, name);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
  return path;
}
