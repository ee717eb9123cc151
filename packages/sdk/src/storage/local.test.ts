import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import { readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  createTempDir,
  removeDir,
  encodeBlockStream,
  encodeLzopHeader,
} from "@blocksplit/testkit";
import { LocalFileStorage } from "./local.js";
import { EndOfFileError, IndexFormatError, StorageReadError } from "../errors.js";
import { buildIndex } from "../index-builder.js";
import { loadIndex } from "../index-reader.js";
import { LzopCodec, LzopFlags } from "../codec/lzop.js";
import { logger } from "../observability/logs.js";

describe("LocalFileStorage", () => {
  const storage = new LocalFileStorage();
  let testDir: string;

  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  beforeEach(async () => {
    testDir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe("file operations", () => {
    it("should report existence and length", async () => {
      const path = join(testDir, "a.bin");
      expect(await storage.exists(path)).toBe(false);

      await writeFile(path, Buffer.alloc(24));

      expect(await storage.exists(path)).toBe(true);
      expect(await storage.length(path)).toBe(24);
    });

    it("should wrap missing files in StorageReadError", async () => {
      const path = join(testDir, "missing.bin");

      await expect(storage.length(path)).rejects.toThrow(StorageReadError);
      await expect(storage.open(path)).rejects.toThrow(`Failed to read: ${path}`);
    });

    it("should read integers across chunk boundaries and after seeks", async () => {
      const path = join(testDir, "ints.bin");
      const buf = Buffer.alloc(70 * 1024);
      buf.writeInt32BE(-2, 0);
      buf.writeInt32BE(123456, 64 * 1024 - 2);
      buf.writeBigInt64BE(9_000_000_000n, 70 * 1024 - 8);
      await writeFile(path, buf);

      const reader = await storage.open(path);
      try {
        expect(await reader.readInt32BE()).toBe(-2);
        expect(reader.position).toBe(4);

        await reader.seek(64 * 1024 - 2);
        expect(await reader.readInt32BE()).toBe(123456);

        await reader.seek(70 * 1024 - 8);
        expect(await reader.readInt64BE()).toBe(9_000_000_000n);

        await expect(reader.readBytes(1)).rejects.toThrow(EndOfFileError);
      } finally {
        await reader.close();
      }
    });

    it("should write big-endian offsets", async () => {
      const path = join(testDir, "out.index");
      const writer = await storage.create(path);
      await writer.writeInt64BE(38);
      await writer.writeInt64BE(2 ** 40);
      await writer.close();

      const content = await readFile(path);
      expect(content.length).toBe(16);
      expect(content.readBigInt64BE(0)).toBe(38n);
      expect(content.readBigInt64BE(8)).toBe(2n ** 40n);
    });

    it("should rename over an existing file", async () => {
      const src = join(testDir, "src");
      const dst = join(testDir, "dst");
      await writeFile(src, "new");
      await writeFile(dst, "old");

      await storage.rename(src, dst);

      expect(await readFile(dst, "utf-8")).toBe("new");
      expect(await storage.exists(src)).toBe(false);
    });

    it("should remove files idempotently", async () => {
      const path = join(testDir, "gone");
      await writeFile(path, "x");

      await storage.remove(path);
      await storage.remove(path);

      expect(await storage.exists(path)).toBe(false);
    });
  });

  describe("indexing on disk", () => {
    it("should build and load an index for an lzop file", async () => {
      const source = join(testDir, "events.lzo");
      const stream = encodeBlockStream([{ compressedSize: 100 }, { compressedSize: 200 }, { compressedSize: 150 }], {
        header: encodeLzopHeader({ flags: LzopFlags.CRC32_D }),
        checksumCount: 1,
      });
      await writeFile(source, stream.bytes);

      const summary = await buildIndex(storage, new LzopCodec(), source);
      const index = await loadIndex(storage, source);

      expect(summary.blocks).toBe(3);
      expect(index.toArray()).toEqual([38, 150, 362]);
      expect((await readdir(testDir)).sort()).toEqual(["events.lzo", "events.lzo.index"]);
    });

    it("should leave no files behind when the build fails", async () => {
      const source = join(testDir, "broken.lzo");
      const header = encodeLzopHeader();
      const sizes = Buffer.alloc(8);
      sizes.writeInt32BE(-1, 0);
      await writeFile(source, Buffer.concat([header, sizes]));

      await expect(buildIndex(storage, new LzopCodec(), source)).rejects.toThrow(IndexFormatError);

      expect(await readdir(testDir)).toEqual(["broken.lzo"]);
      expect((await loadIndex(storage, source)).isEmpty()).toBe(true);
    });
  });
});
