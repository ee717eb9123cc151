/**
 * Codec capabilities used by the index builder
 *
 * Reading a stream header and decompressing blocks are separate concerns;
 * indexing only ever needs the former.
 */

import type { ByteReader } from "../storage/types.js";

/**
 * What the builder needs to know from a stream header
 */
export interface StreamHeader {
  /** Number of 4-byte checksum words after each block's compressed payload */
  checksumCount: number;
}

/**
 * Consumes a stream's file-level header
 */
export interface HeaderReader {
  /**
   * Read the header from the start of `input`, leaving the cursor on the
   * first block's size fields
   */
  readHeader(input: ByteReader): Promise<StreamHeader>;
}

/**
 * A block-compressed stream format
 */
export interface BlockCodec {
  readonly name: string;
  /** File extensions, including the leading dot */
  readonly extensions: readonly string[];
  createHeaderReader(): HeaderReader;
}
