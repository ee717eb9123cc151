/**
 * lzop stream header parsing
 *
 * Layout (big-endian):
 *   magic[9] version:u16 libVersion:u16 [versionNeeded:u16] method:u8 [level:u8]
 *   flags:u32 [filter:u32] mode:u32 mtimeLow:u32 [mtimeHigh:u32]
 *   nameLength:u8 name[nameLength] headerChecksum:u32
 *   [extraLength:u32 extra[extraLength] extraChecksum:u32]
 *
 * Bracketed fields depend on the version (>= 0x0940) or on header flags.
 * Checksums are skipped, never verified.
 */

import { IndexFormatError } from "../errors.js";
import type { ByteReader } from "../storage/types.js";
import type { BlockCodec, HeaderReader, StreamHeader } from "./types.js";

export const LZOP_MAGIC = Buffer.from([0x89, 0x4c, 0x5a, 0x4f, 0x00, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Oldest header layout this parser understands */
export const LZOP_MIN_VERSION = 0x0900;
/** Versions from here on carry versionNeeded, level and mtimeHigh */
export const LZOP_VERSION_EXTENDED = 0x0940;
/** Newest format version a stream may require */
export const LZOP_MAX_VERSION_NEEDED = 0x1040;

export const LzopFlags = {
  ADLER32_D: 0x0001,
  ADLER32_C: 0x0002,
  H_EXTRA_FIELD: 0x0040,
  CRC32_D: 0x0100,
  CRC32_C: 0x0200,
  MULTIPART: 0x0400,
  H_FILTER: 0x0800,
  H_CRC32: 0x1000,
} as const;

/** LZO1X-1, LZO1X-1(15), LZO1X-999 */
const KNOWN_METHODS = new Set([1, 2, 3]);

const CHECKSUM_FLAGS = [
  LzopFlags.ADLER32_D,
  LzopFlags.ADLER32_C,
  LzopFlags.CRC32_D,
  LzopFlags.CRC32_C,
];

/**
 * Every field of a parsed lzop header
 */
export interface LzopHeader extends StreamHeader {
  version: number;
  libVersion: number;
  versionNeeded?: number;
  method: number;
  level?: number;
  flags: number;
  mode: number;
  mtime: number;
  name: string;
}

/**
 * Number of per-block checksum words the flags enable
 */
export function countChecksums(flags: number): number {
  return CHECKSUM_FLAGS.filter((flag) => (flags & flag) !== 0).length;
}

export class LzopHeaderReader implements HeaderReader {
  async readHeader(input: ByteReader): Promise<LzopHeader> {
    const magic = await input.readBytes(LZOP_MAGIC.length);
    if (!magic.equals(LZOP_MAGIC)) {
      throw new IndexFormatError(input.path, "not an lzop stream (bad magic)");
    }

    const version = await readU16(input);
    if (version < LZOP_MIN_VERSION) {
      throw new IndexFormatError(input.path, `unsupported lzop version 0x${version.toString(16)}`);
    }
    const libVersion = await readU16(input);
    const extended = version >= LZOP_VERSION_EXTENDED;

    let versionNeeded: number | undefined;
    if (extended) {
      versionNeeded = await readU16(input);
      if (versionNeeded > LZOP_MAX_VERSION_NEEDED) {
        throw new IndexFormatError(
          input.path,
          `stream needs lzop version 0x${versionNeeded.toString(16)}`
        );
      }
    }

    const method = await readU8(input);
    if (!KNOWN_METHODS.has(method)) {
      throw new IndexFormatError(input.path, `unknown compression method ${method}`);
    }
    const level = extended ? await readU8(input) : undefined;

    const flags = await readU32(input);
    if (flags & LzopFlags.MULTIPART) {
      throw new IndexFormatError(input.path, "multipart lzop streams are not supported");
    }
    if (flags & LzopFlags.H_FILTER) {
      await readU32(input);
    }

    const mode = await readU32(input);
    const mtimeLow = await readU32(input);
    const mtimeHigh = extended ? await readU32(input) : 0;

    const nameLength = await readU8(input);
    const name = (await input.readBytes(nameLength)).toString("latin1");

    // Header checksum (adler32, or crc32 under H_CRC32)
    await input.readBytes(4);

    if (flags & LzopFlags.H_EXTRA_FIELD) {
      const extraLength = await readU32(input);
      await input.readBytes(extraLength);
      await input.readBytes(4);
    }

    return {
      checksumCount: countChecksums(flags),
      version,
      libVersion,
      versionNeeded,
      method,
      level,
      flags,
      mode,
      mtime: mtimeHigh * 2 ** 32 + mtimeLow,
      name,
    };
  }
}

export class LzopCodec implements BlockCodec {
  readonly name = "lzop";
  readonly extensions = [".lzo"] as const;

  createHeaderReader(): HeaderReader {
    return new LzopHeaderReader();
  }
}

async function readU8(input: ByteReader): Promise<number> {
  return (await input.readBytes(1)).readUInt8(0);
}

async function readU16(input: ByteReader): Promise<number> {
  return (await input.readBytes(2)).readUInt16BE(0);
}

async function readU32(input: ByteReader): Promise<number> {
  return (await input.readBytes(4)).readUInt32BE(0);
}
