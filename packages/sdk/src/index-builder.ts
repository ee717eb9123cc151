/**
 * Building block indexes by scanning block headers
 *
 * Invariants:
 * - Only the size fields of each block are read; payloads and checksums are skipped
 * - Offsets are written to a staging file and become visible through a single
 *   rename after the scan succeeds
 * - A failed build leaves no index file, neither a new one nor an earlier one
 *   that no longer matches the source
 * - Both file handles are closed on every path; a close failure after another
 *   failure is logged and the first error is what the caller sees
 *
 * Builds of the same source must not run concurrently; nothing here locks.
 */

import { BLOCK_HEADER_BYTES, CHECKSUM_BYTES, TMP_SUFFIX } from "./constants.js";
import type { BlockCodec } from "./codec/types.js";
import { IndexFormatError } from "./errors.js";
import { indexPathFor, type IndexPathOptions } from "./index-reader.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { ByteReader, ByteWriter, IndexStorage } from "./storage/types.js";

export type BuildIndexOptions = IndexPathOptions;

/**
 * Outcome of a successful build
 */
export interface BuildSummary {
  sourcePath: string;
  indexPath: string;
  blocks: number;
  checksumCount: number;
  durationMs: number;
}

/**
 * Index a block-compressed file so it can be split into slices
 * @throws IndexFormatError if a block size field is malformed
 */
export async function buildIndex(
  storage: IndexStorage,
  codec: BlockCodec,
  sourcePath: string,
  options: BuildIndexOptions = {}
): Promise<BuildSummary> {
  const startTime = performance.now();
  const indexPath = indexPathFor(sourcePath, options);
  const tmpPath = indexPath + TMP_SUFFIX;

  logger.info("index.build.start", { path: sourcePath, details: { codec: codec.name } });

  let input: ByteReader | undefined;
  let output: ByteWriter | undefined;
  let blocks = 0;
  let checksumCount = 0;

  try {
    let scanned = false;
    try {
      input = await storage.open(sourcePath);
      ({ checksumCount } = await codec.createHeaderReader().readHeader(input));
      output = await storage.create(tmpPath);
      blocks = await scanBlocks(input, output, checksumCount);
      scanned = true;
    } finally {
      await closeHandles(sourcePath, [input, output], scanned);
    }

    await storage.rename(tmpPath, indexPath);
  } catch (err) {
    metrics.recordBuildFailure(sourcePath);
    logger.error("index.build.failed", {
      path: sourcePath,
      message: err instanceof Error ? err.message : String(err),
    });
    if (output) {
      await discardQuietly(storage, tmpPath);
    }
    await discardQuietly(storage, indexPath);
    throw err;
  }

  const durationMs = performance.now() - startTime;
  metrics.recordBuild(sourcePath, durationMs, blocks);
  logger.info("index.build.end", {
    path: sourcePath,
    details: { blocks, checksumCount, durationMs: durationMs.toFixed(2) },
  });

  return { sourcePath, indexPath, blocks, checksumCount, durationMs };
}

/**
 * Walk block headers from the current cursor, writing each block's start
 * @returns Number of blocks found
 */
async function scanBlocks(input: ByteReader, output: ByteWriter, checksumCount: number): Promise<number> {
  const trailerBytes = CHECKSUM_BYTES * checksumCount;
  let blocks = 0;

  while (true) {
    const uncompressedBlockSize = await input.readInt32BE();
    if (uncompressedBlockSize === 0) {
      // End-of-stream marker
      return blocks;
    }
    if (uncompressedBlockSize < 0) {
      throw new IndexFormatError(
        input.path,
        `negative uncompressed block size ${uncompressedBlockSize} at byte ${input.position - 4}`
      );
    }

    const compressedBlockSize = await input.readInt32BE();
    if (compressedBlockSize <= 0) {
      throw new IndexFormatError(
        input.path,
        `could not read compressed block size at byte ${input.position - 4}`
      );
    }

    const pos = input.position;
    await output.writeInt64BE(pos - BLOCK_HEADER_BYTES);
    blocks++;

    await input.seek(pos + compressedBlockSize + trailerBytes);
  }
}

/**
 * Close every handle even if one fails. With `rethrow` the first close
 * failure is thrown; otherwise close failures are only logged.
 */
async function closeHandles(
  sourcePath: string,
  handles: Array<ByteReader | ByteWriter | undefined>,
  rethrow: boolean
): Promise<void> {
  const results = await Promise.allSettled(handles.map((handle) => handle?.close()));
  const failures = results.filter((result): result is PromiseRejectedResult => result.status === "rejected");

  if (rethrow && failures.length > 0) {
    throw failures[0]?.reason;
  }
  for (const failure of failures) {
    logger.warn("index.build.close_failed", {
      path: sourcePath,
      message: failure.reason instanceof Error ? failure.reason.message : String(failure.reason),
    });
  }
}

/**
 * Remove a file a failed build must not leave behind; failure to remove is
 * logged so the original error reaches the caller
 */
async function discardQuietly(storage: IndexStorage, path: string): Promise<void> {
  try {
    await storage.remove(path);
  } catch (err) {
    logger.warn("index.build.cleanup_failed", {
      path,
      message: err instanceof Error ? err.message : String(err),
    });
  }
}
