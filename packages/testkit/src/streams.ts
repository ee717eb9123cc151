/**
 * Synthetic block streams for index tests
 *
 * Payload and checksum bytes are filler; only the size fields matter to the
 * index builder.
 */

import {
  LZOP_MAGIC,
  type BlockCodec,
  type ByteReader,
  type HeaderReader,
  type StreamHeader,
} from "@blocksplit/sdk";

export interface SyntheticBlock {
  compressedSize: number;
  /** Defaults to twice the compressed size */
  uncompressedSize?: number;
}

export interface BlockStreamOptions {
  /** Bytes placed before the first block (default none) */
  header?: Uint8Array;
  checksumCount?: number;
  /** Append the zero end-of-stream marker (default true) */
  terminate?: boolean;
}

export interface BlockStream {
  bytes: Buffer;
  /** Offset of each block's size fields */
  offsets: number[];
}

/**
 * Encode blocks as size-prefixed payloads followed by checksum words
 */
export function encodeBlockStream(blocks: SyntheticBlock[], options: BlockStreamOptions = {}): BlockStream {
  const { header = new Uint8Array(0), checksumCount = 0, terminate = true } = options;
  const parts: Buffer[] = [Buffer.from(header)];
  const offsets: number[] = [];
  let position = header.length;

  for (const block of blocks) {
    offsets.push(position);
    const sizes = Buffer.alloc(8);
    sizes.writeInt32BE(block.uncompressedSize ?? block.compressedSize * 2, 0);
    sizes.writeInt32BE(block.compressedSize, 4);
    const body = Buffer.alloc(block.compressedSize + 4 * checksumCount, 0xab);
    parts.push(sizes, body);
    position += sizes.length + body.length;
  }

  if (terminate) {
    parts.push(Buffer.alloc(4));
  }

  return { bytes: Buffer.concat(parts), offsets };
}

/**
 * Encode raw 32-bit size words, for malformed streams
 */
export function encodeInt32Words(words: number[]): Buffer {
  const buf = Buffer.alloc(words.length * 4);
  words.forEach((word, i) => buf.writeInt32BE(word, i * 4));
  return buf;
}

/**
 * Encode a persisted index file
 */
export function encodeIndexFile(offsets: Array<number | bigint>): Buffer {
  const buf = Buffer.alloc(offsets.length * 8);
  offsets.forEach((offset, i) => buf.writeBigInt64BE(BigInt(offset), i * 8));
  return buf;
}

export interface LzopHeaderOptions {
  /** Default 0x1030 */
  version?: number;
  method?: number;
  flags?: number;
  name?: string;
  /** Written when flags include H_EXTRA_FIELD */
  extra?: Uint8Array;
}

/**
 * Encode an lzop file header; checksum fields are zero
 */
export function encodeLzopHeader(options: LzopHeaderOptions = {}): Buffer {
  const { version = 0x1030, method = 1, flags = 0, name = "", extra } = options;
  const extended = version >= 0x0940;
  const parts: Buffer[] = [Buffer.from(LZOP_MAGIC)];

  const u8 = (value: number) => Buffer.from([value]);
  const u16 = (value: number) => {
    const buf = Buffer.alloc(2);
    buf.writeUInt16BE(value, 0);
    return buf;
  };
  const u32 = (value: number) => {
    const buf = Buffer.alloc(4);
    buf.writeUInt32BE(value >>> 0, 0);
    return buf;
  };

  parts.push(u16(version), u16(0x2080));
  if (extended) parts.push(u16(0x0940));
  parts.push(u8(method));
  if (extended) parts.push(u8(5));
  parts.push(u32(flags));
  if (flags & 0x0800) parts.push(u32(0));
  parts.push(u32(0o100644), u32(1_700_000_000));
  if (extended) parts.push(u32(0));
  parts.push(u8(name.length), Buffer.from(name, "latin1"), u32(0));
  if (flags & 0x0040) {
    const payload = Buffer.from(extra ?? new Uint8Array(0));
    parts.push(u32(payload.length), payload, u32(0));
  }

  return Buffer.concat(parts);
}

/**
 * Codec whose header is a fixed number of bytes
 */
export class FixedHeaderCodec implements BlockCodec {
  readonly name = "fixed";
  readonly extensions = [".blk"] as const;
  /** Number of times a header was read */
  headerReads = 0;

  constructor(
    readonly headerLength: number,
    readonly checksumCount = 0
  ) {}

  createHeaderReader(): HeaderReader {
    return {
      readHeader: async (input: ByteReader): Promise<StreamHeader> => {
        this.headerReads++;
        await input.readBytes(this.headerLength);
        return { checksumCount: this.checksumCount };
      },
    };
  }
}
