/**
 * Local filesystem storage
 *
 * Invariants:
 * - Every Node error is wrapped in StorageReadError/StorageWriteError with `cause`
 * - Writers are data-synced before they close, so a rename after close commits
 *   durable content
 * - remove() is idempotent
 */

import * as fs from "node:fs/promises";
import { dirname } from "node:path";
import { StorageReadError, StorageWriteError } from "../errors.js";
import { logger } from "../observability/logs.js";
import { BufferedByteWriter, ChunkedByteReader } from "./buffered.js";
import type { ByteReader, ByteWriter, IndexStorage } from "./types.js";

/**
 * Feature flag to control directory fsync after rename (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

class FileReader extends ChunkedByteReader {
  #handle: fs.FileHandle;

  constructor(path: string, handle: fs.FileHandle) {
    super(path);
    this.#handle = handle;
  }

  protected async fetch(position: number, length: number): Promise<Buffer> {
    const buf = Buffer.alloc(length);
    try {
      const { bytesRead } = await this.#handle.read(buf, 0, length, position);
      return buf.subarray(0, bytesRead);
    } catch (err) {
      throw new StorageReadError(this.path, { cause: err });
    }
  }

  async close(): Promise<void> {
    try {
      await this.#handle.close();
    } catch (err) {
      throw new StorageReadError(this.path, { cause: err });
    }
  }
}

class FileWriter extends BufferedByteWriter {
  #handle: fs.FileHandle;

  constructor(path: string, handle: fs.FileHandle) {
    super(path);
    this.#handle = handle;
  }

  protected async writeChunk(chunk: Buffer): Promise<void> {
    try {
      await this.#handle.write(chunk);
    } catch (err) {
      throw new StorageWriteError(this.path, { cause: err });
    }
  }

  protected async finish(): Promise<void> {
    try {
      // Sync file data to disk (prefer datasync for performance, fall back to sync)
      try {
        await this.#handle.datasync();
      } catch (err) {
        // ENOTSUP/ENOSYS: not supported on this platform
        // EINVAL: some CIFS/FUSE mounts report this instead
        const code = errorCode(err);
        if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
          await this.#handle.sync();
        } else {
          throw err;
        }
      }
    } catch (err) {
      await this.#handle.close();
      throw new StorageWriteError(this.path, { cause: err });
    }

    try {
      await this.#handle.close();
    } catch (err) {
      throw new StorageWriteError(this.path, { cause: err });
    }
  }
}

/**
 * IndexStorage over the local filesystem
 */
export class LocalFileStorage implements IndexStorage {
  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return false;
      }
      throw new StorageReadError(path, { cause: err });
    }
  }

  async length(path: string): Promise<number> {
    try {
      const stat = await fs.stat(path);
      return stat.size;
    } catch (err) {
      throw new StorageReadError(path, { cause: err });
    }
  }

  async open(path: string): Promise<ByteReader> {
    try {
      return new FileReader(path, await fs.open(path, "r"));
    } catch (err) {
      throw new StorageReadError(path, { cause: err });
    }
  }

  async create(path: string): Promise<ByteWriter> {
    try {
      return new FileWriter(path, await fs.open(path, "w", 0o644));
    } catch (err) {
      throw new StorageWriteError(path, { cause: err });
    }
  }

  async rename(src: string, dst: string): Promise<void> {
    try {
      try {
        await fs.rename(src, dst);
      } catch (err) {
        // On Windows, rename may fail transiently when antivirus or indexing grabs the file
        const code = errorCode(err);
        if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
          await new Promise((resolve) => setTimeout(resolve, 10));
          await fs.rename(src, dst);
        } else {
          throw err;
        }
      }
    } catch (err) {
      throw new StorageWriteError(dst, { cause: err });
    }

    if (ENABLE_DIR_FSYNC) {
      await this.#syncDirectory(dirname(dst));
    }
  }

  async remove(path: string): Promise<void> {
    try {
      await fs.unlink(path);
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return;
      }
      throw new StorageWriteError(path, { cause: err });
    }
  }

  /**
   * Best-effort fsync of a directory so a completed rename survives a crash
   */
  async #syncDirectory(dir: string): Promise<void> {
    try {
      const dirHandle = await fs.open(dir, "r");
      try {
        await dirHandle.sync();
      } finally {
        await dirHandle.close();
      }
    } catch (err) {
      // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
      const code = errorCode(err);
      if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
        logger.debug("storage.dir_fsync.failed", {
          path: dir,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
