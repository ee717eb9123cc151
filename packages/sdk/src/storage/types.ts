/**
 * Storage contract consumed by the index reader and builder
 *
 * Implementations surface every failure as a StorageError subclass; the core
 * propagates those unchanged.
 */

/**
 * Seekable, sequential reader over one file
 */
export interface ByteReader {
  /** Path the reader was opened on */
  readonly path: string;

  /** Offset of the next byte to be read */
  readonly position: number;

  /**
   * Read exactly `length` bytes
   * @throws EndOfFileError if the file ends first
   */
  readBytes(length: number): Promise<Buffer>;

  /** Read a signed big-endian 32-bit integer */
  readInt32BE(): Promise<number>;

  /** Read a signed big-endian 64-bit integer */
  readInt64BE(): Promise<bigint>;

  /**
   * Move the read cursor; seeking past the end is allowed and fails on the
   * next read
   */
  seek(position: number): Promise<void>;

  close(): Promise<void>;
}

/**
 * Sequential writer over one newly created file
 */
export interface ByteWriter {
  /** Write a big-endian 64-bit integer */
  writeInt64BE(value: number): Promise<void>;

  /** Flush buffered bytes and release the file */
  close(): Promise<void>;
}

/**
 * File operations needed to build and load indexes
 */
export interface IndexStorage {
  exists(path: string): Promise<boolean>;

  /** Size of a file in bytes */
  length(path: string): Promise<number>;

  open(path: string): Promise<ByteReader>;

  /** Create or truncate a file for writing */
  create(path: string): Promise<ByteWriter>;

  /** Move `src` to `dst`, replacing `dst` */
  rename(src: string, dst: string): Promise<void>;

  /** Delete a file; no error if it does not exist */
  remove(path: string): Promise<void>;
}
