/**
 * blocksplit SDK
 *
 * Block-offset indexes that let block-compressed files be split into slices
 * workers can decompress independently
 */

export { BlockOffsetIndex } from "./block-index.js";
export { alignSliceStartToIndex, alignSliceEndToIndex, alignSlice, splitIntoSlices } from "./slice.js";
export type { Slice } from "./slice.js";
export { loadIndex, hasIndex, indexPathFor } from "./index-reader.js";
export type { IndexPathOptions, LoadIndexOptions } from "./index-reader.js";
export { buildIndex } from "./index-builder.js";
export type { BuildIndexOptions, BuildSummary } from "./index-builder.js";

export {
  INDEX_SUFFIX,
  TMP_SUFFIX,
  NOT_FOUND,
  OFFSET_BYTES,
  BLOCK_HEADER_BYTES,
  CHECKSUM_BYTES,
} from "./constants.js";

export {
  BlockSplitError,
  IndexFormatError,
  IndexRangeError,
  UnknownCodecError,
  StorageError,
  StorageReadError,
  StorageWriteError,
  EndOfFileError,
} from "./errors.js";

// Storage
export type { ByteReader, ByteWriter, IndexStorage } from "./storage/types.js";
export { ChunkedByteReader, BufferedByteWriter } from "./storage/buffered.js";
export { LocalFileStorage } from "./storage/local.js";

// Codecs
export type { BlockCodec, HeaderReader, StreamHeader } from "./codec/types.js";
export {
  LzopCodec,
  LzopHeaderReader,
  LzopFlags,
  LZOP_MAGIC,
  LZOP_MIN_VERSION,
  LZOP_VERSION_EXTENDED,
  LZOP_MAX_VERSION_NEEDED,
  countChecksums,
} from "./codec/lzop.js";
export type { LzopHeader } from "./codec/lzop.js";
export { CodecRegistry, createDefaultRegistry } from "./codec/registry.js";

// Observability
export { logger, formatEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { IndexMetrics } from "./observability/metrics.js";
