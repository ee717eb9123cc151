/**
 * In-memory IndexStorage for tests
 *
 * Behaves like the local filesystem adapter: create() truncates immediately,
 * writes land as chunks are flushed, rename() replaces the destination.
 * Failures can be injected per operation, and open handles are counted so
 * tests can assert every handle was released.
 */

import {
  BufferedByteWriter,
  ChunkedByteReader,
  StorageReadError,
  StorageWriteError,
  type ByteReader,
  type ByteWriter,
  type IndexStorage,
} from "@blocksplit/sdk";

export type StorageOperation =
  | "exists"
  | "length"
  | "open"
  | "read"
  | "create"
  | "write"
  | "rename"
  | "remove";

interface InjectedFailure {
  operation: StorageOperation;
  path?: string;
  error?: Error;
}

const READ_OPERATIONS: ReadonlySet<StorageOperation> = new Set(["exists", "length", "open", "read"]);

export class MemoryStorage implements IndexStorage {
  #files = new Map<string, Buffer>();
  #failures: InjectedFailure[] = [];
  #openHandles = 0;

  /** Readers and writers not yet closed */
  get openHandles(): number {
    return this.#openHandles;
  }

  /**
   * Store a file's full contents
   */
  put(path: string, content: Uint8Array): void {
    this.#files.set(path, Buffer.from(content));
  }

  /**
   * Contents of a file, or undefined if it does not exist
   */
  get(path: string): Buffer | undefined {
    return this.#files.get(path);
  }

  /**
   * Sorted paths of every stored file
   */
  paths(): string[] {
    return [...this.#files.keys()].sort();
  }

  /**
   * Make the next matching operation throw; without `path` any path matches
   */
  failNext(operation: StorageOperation, options: { path?: string; error?: Error } = {}): void {
    this.#failures.push({ operation, ...options });
  }

  async exists(path: string): Promise<boolean> {
    this.#check("exists", path);
    return this.#files.has(path);
  }

  async length(path: string): Promise<number> {
    this.#check("length", path);
    return this.#require(path).length;
  }

  async open(path: string): Promise<ByteReader> {
    this.#check("open", path);
    const content = this.#require(path);
    this.#openHandles++;
    return new MemoryReader(path, content, this);
  }

  async create(path: string): Promise<ByteWriter> {
    this.#check("create", path);
    this.#files.set(path, Buffer.alloc(0));
    this.#openHandles++;
    return new MemoryWriter(path, this);
  }

  async rename(src: string, dst: string): Promise<void> {
    this.#check("rename", src);
    const content = this.#require(src);
    this.#files.delete(src);
    this.#files.set(dst, content);
  }

  async remove(path: string): Promise<void> {
    this.#check("remove", path);
    this.#files.delete(path);
  }

  /** @internal */
  checkRead(path: string): void {
    this.#check("read", path);
  }

  /** @internal */
  append(path: string, chunk: Buffer): void {
    this.#check("write", path);
    const current = this.#files.get(path) ?? Buffer.alloc(0);
    this.#files.set(path, Buffer.concat([current, chunk]));
  }

  /** @internal */
  release(): void {
    this.#openHandles--;
  }

  #require(path: string): Buffer {
    const content = this.#files.get(path);
    if (!content) {
      throw new StorageReadError(path, { cause: new Error("ENOENT: no such file") });
    }
    return content;
  }

  #check(operation: StorageOperation, path: string): void {
    const idx = this.#failures.findIndex(
      (failure) => failure.operation === operation && (failure.path === undefined || failure.path === path)
    );
    if (idx === -1) return;

    const [failure] = this.#failures.splice(idx, 1);
    if (failure?.error) {
      throw failure.error;
    }
    const cause = new Error(`injected ${operation} failure`);
    throw READ_OPERATIONS.has(operation)
      ? new StorageReadError(path, { cause })
      : new StorageWriteError(path, { cause });
  }
}

class MemoryReader extends ChunkedByteReader {
  #content: Buffer;
  #storage: MemoryStorage;
  #closed = false;

  constructor(path: string, content: Buffer, storage: MemoryStorage) {
    // Small chunks so tests cross chunk boundaries
    super(path, 16);
    this.#content = content;
    this.#storage = storage;
  }

  protected async fetch(position: number, length: number): Promise<Buffer> {
    this.#storage.checkRead(this.path);
    return this.#content.subarray(position, position + length);
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    this.#storage.release();
  }
}

class MemoryWriter extends BufferedByteWriter {
  #storage: MemoryStorage;
  #closed = false;

  constructor(path: string, storage: MemoryStorage) {
    super(path, 16);
    this.#storage = storage;
  }

  protected async writeChunk(chunk: Buffer): Promise<void> {
    this.#storage.append(this.path, chunk);
  }

  protected async finish(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    this.#storage.release();
  }
}
