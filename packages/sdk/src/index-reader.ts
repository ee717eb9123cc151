/**
 * Loading persisted block indexes
 *
 * The index file is a flat run of big-endian 8-byte offsets with no header or
 * footer, stored beside the source file. A missing file is not an error: it
 * yields the empty index, and the caller treats the source as one slice.
 */

import { BlockOffsetIndex } from "./block-index.js";
import { INDEX_SUFFIX, OFFSET_BYTES } from "./constants.js";
import { IndexFormatError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { ByteReader, IndexStorage } from "./storage/types.js";

export interface IndexPathOptions {
  /** Suffix appended to the source path (default ".index") */
  indexSuffix?: string;
}

export interface LoadIndexOptions extends IndexPathOptions {
  /**
   * Ignore bytes past the last whole offset instead of failing. Only for
   * index files written by tools that left trailing bytes.
   */
  allowTrailingBytes?: boolean;
}

/**
 * Path of the index file for a source file
 */
export function indexPathFor(sourcePath: string, options: IndexPathOptions = {}): string {
  return sourcePath + (options.indexSuffix ?? INDEX_SUFFIX);
}

/**
 * Check whether a source file has been indexed
 */
export async function hasIndex(
  storage: IndexStorage,
  sourcePath: string,
  options: IndexPathOptions = {}
): Promise<boolean> {
  return storage.exists(indexPathFor(sourcePath, options));
}

/**
 * Read the index of a source file
 * @returns The populated index, or an empty one when the source is not indexed
 * @throws IndexFormatError if the index file is misaligned or out of order
 */
export async function loadIndex(
  storage: IndexStorage,
  sourcePath: string,
  options: LoadIndexOptions = {}
): Promise<BlockOffsetIndex> {
  const startTime = performance.now();
  const indexPath = indexPathFor(sourcePath, options);

  if (!(await storage.exists(indexPath))) {
    logger.debug("index.load.missing", { path: indexPath });
    metrics.recordLoad(sourcePath, performance.now() - startTime, 0, false);
    return new BlockOffsetIndex();
  }

  const indexLength = await storage.length(indexPath);
  const trailing = indexLength % OFFSET_BYTES;
  if (trailing !== 0) {
    if (!options.allowTrailingBytes) {
      throw new IndexFormatError(
        indexPath,
        `length ${indexLength} is not a multiple of ${OFFSET_BYTES}`
      );
    }
    logger.warn("index.load.trailing_bytes", {
      path: indexPath,
      details: { ignoredBytes: trailing },
    });
  }

  const blocks = Math.floor(indexLength / OFFSET_BYTES);
  const index = new BlockOffsetIndex(blocks);

  const input = await storage.open(indexPath);
  try {
    await readOffsets(input, index, blocks);
  } finally {
    await input.close();
  }

  const duration = performance.now() - startTime;
  metrics.recordLoad(sourcePath, duration, blocks, true);
  logger.debug("index.load", {
    path: indexPath,
    details: { blocks, durationMs: duration.toFixed(2) },
  });

  return index;
}

async function readOffsets(input: ByteReader, index: BlockOffsetIndex, blocks: number): Promise<void> {
  let previous = -1;

  for (let i = 0; i < blocks; i++) {
    const raw = await input.readInt64BE();
    if (raw < 0n || raw > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new IndexFormatError(input.path, `entry ${i} holds invalid offset ${raw}`);
    }

    const pos = Number(raw);
    if (pos <= previous) {
      throw new IndexFormatError(
        input.path,
        `entry ${i} (${pos}) does not follow entry ${i - 1} (${previous})`
      );
    }

    index.set(i, pos);
    previous = pos;
  }
}
