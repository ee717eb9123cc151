/**
 * Buffered reader and writer shared by storage implementations
 *
 * Subclasses supply raw chunk access; integer decoding, cursor tracking and
 * buffering live here.
 */

import { EndOfFileError } from "../errors.js";
import type { ByteReader, ByteWriter } from "./types.js";

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Reader that loads the file in chunks and serves reads from the current one
 */
export abstract class ChunkedByteReader implements ByteReader {
  readonly path: string;
  readonly chunkSize: number;

  #position = 0;
  #chunkBase = 0;
  #chunk: Buffer = Buffer.alloc(0);

  constructor(path: string, chunkSize = DEFAULT_CHUNK_SIZE) {
    this.path = path;
    this.chunkSize = chunkSize;
  }

  /**
   * Read up to `length` bytes starting at `position`; an empty buffer means
   * end of file
   */
  protected abstract fetch(position: number, length: number): Promise<Buffer>;

  get position(): number {
    return this.#position;
  }

  async readBytes(length: number): Promise<Buffer> {
    const out = Buffer.alloc(length);
    let filled = 0;

    while (filled < length) {
      const local = this.#position - this.#chunkBase;
      if (local >= 0 && local < this.#chunk.length) {
        const copied = this.#chunk.copy(out, filled, local, Math.min(this.#chunk.length, local + length - filled));
        filled += copied;
        this.#position += copied;
        continue;
      }

      this.#chunk = await this.fetch(this.#position, Math.max(this.chunkSize, length - filled));
      this.#chunkBase = this.#position;
      if (this.#chunk.length === 0) {
        throw new EndOfFileError(this.path, this.#position);
      }
    }

    return out;
  }

  async readInt32BE(): Promise<number> {
    return (await this.readBytes(4)).readInt32BE(0);
  }

  async readInt64BE(): Promise<bigint> {
    return (await this.readBytes(8)).readBigInt64BE(0);
  }

  async seek(position: number): Promise<void> {
    this.#position = position;
  }

  abstract close(): Promise<void>;
}

/**
 * Writer that collects encoded values and hands them on in chunks
 */
export abstract class BufferedByteWriter implements ByteWriter {
  readonly path: string;
  readonly chunkSize: number;

  #pending: Buffer[] = [];
  #pendingBytes = 0;

  constructor(path: string, chunkSize = DEFAULT_CHUNK_SIZE) {
    this.path = path;
    this.chunkSize = chunkSize;
  }

  /** Persist one chunk after everything written before it */
  protected abstract writeChunk(chunk: Buffer): Promise<void>;

  /** Release the underlying file once all chunks are written */
  protected abstract finish(): Promise<void>;

  async writeInt64BE(value: number): Promise<void> {
    const buf = Buffer.alloc(8);
    buf.writeBigInt64BE(BigInt(value), 0);
    this.#pending.push(buf);
    this.#pendingBytes += buf.length;

    if (this.#pendingBytes >= this.chunkSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.#pendingBytes === 0) return;

    const chunk = Buffer.concat(this.#pending, this.#pendingBytes);
    this.#pending = [];
    this.#pendingBytes = 0;
    await this.writeChunk(chunk);
  }

  async close(): Promise<void> {
    try {
      await this.flush();
    } finally {
      await this.finish();
    }
  }
}
