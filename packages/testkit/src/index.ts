/**
 * Test helpers for blocksplit packages
 */

export { MemoryStorage } from "./memory-storage.js";
export type { StorageOperation } from "./memory-storage.js";
export {
  encodeBlockStream,
  encodeInt32Words,
  encodeIndexFile,
  encodeLzopHeader,
  FixedHeaderCodec,
} from "./streams.js";
export type { SyntheticBlock, BlockStreamOptions, BlockStream, LzopHeaderOptions } from "./streams.js";
export { createTempDir, removeDir, writeSource } from "./fs.js";
