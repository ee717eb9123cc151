/**
 * Expanding path arguments into source files to index
 */

import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import { join } from "node:path";
import type { CodecRegistry } from "@blocksplit/sdk";
import { CliError } from "./errors.js";

/**
 * Expand files and directories into the source files a codec handles
 *
 * Directories are walked recursively and only files with a known codec are
 * kept. A file named directly must have a known codec. Symlinks inside
 * directories are skipped. The result is sorted and free of duplicates.
 */
export async function collectSources(paths: string[], registry: CodecRegistry): Promise<string[]> {
  const found = new Set<string>();

  for (const p of paths) {
    let stat: Stats;
    try {
      stat = await fs.stat(p);
    } catch (err) {
      throw new CliError(`Path not found: ${p}`, { exitCode: 1, cause: err });
    }

    if (stat.isDirectory()) {
      for (const file of await walk(p, registry)) {
        found.add(file);
      }
    } else {
      registry.require(p);
      found.add(p);
    }
  }

  return [...found].sort();
}

async function walk(dir: string, registry: CodecRegistry): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full, registry)));
    } else if (entry.isFile() && registry.resolve(full)) {
      files.push(full);
    }
  }

  return files;
}
