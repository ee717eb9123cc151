import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { MemoryStorage, encodeIndexFile } from "@blocksplit/testkit";
import { hasIndex, indexPathFor, loadIndex } from "./index-reader.js";
import { IndexFormatError, StorageReadError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

const SOURCE = "/data/events.lzo";
const INDEX = "/data/events.lzo.index";

describe("loadIndex", () => {
  let storage: MemoryStorage;

  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  beforeEach(() => {
    storage = new MemoryStorage();
    metrics.reset();
  });

  it("should derive the index path from the source path", () => {
    expect(indexPathFor(SOURCE)).toBe(INDEX);
    expect(indexPathFor(SOURCE, { indexSuffix: ".idx" })).toBe("/data/events.lzo.idx");
  });

  it("should return an empty index when no index file exists", async () => {
    const index = await loadIndex(storage, SOURCE);

    expect(index.isEmpty()).toBe(true);
    expect(await hasIndex(storage, SOURCE)).toBe(false);
    expect(metrics.getMetrics(SOURCE)?.misses).toBe(1);
  });

  it("should load offsets in order", async () => {
    storage.put(INDEX, encodeIndexFile([38, 146, 354]));

    const index = await loadIndex(storage, SOURCE);

    expect(index.toArray()).toEqual([38, 146, 354]);
    expect(await hasIndex(storage, SOURCE)).toBe(true);
    expect(storage.openHandles).toBe(0);
    expect(metrics.getMetrics(SOURCE)?.blocks).toBe(3);
  });

  it("should load offsets beyond the first read chunk", async () => {
    const offsets = Array.from({ length: 50 }, (_, i) => 38 + i * 1000);
    storage.put(INDEX, encodeIndexFile(offsets));

    const index = await loadIndex(storage, SOURCE);

    expect(index.toArray()).toEqual(offsets);
  });

  it("should honour a custom suffix", async () => {
    storage.put("/data/events.lzo.idx", encodeIndexFile([0, 64]));

    expect((await loadIndex(storage, SOURCE)).isEmpty()).toBe(true);
    expect((await loadIndex(storage, SOURCE, { indexSuffix: ".idx" })).toArray()).toEqual([0, 64]);
  });

  it("should return an empty index for a zero-length index file", async () => {
    storage.put(INDEX, new Uint8Array(0));

    const index = await loadIndex(storage, SOURCE);

    expect(index.isEmpty()).toBe(true);
    expect(metrics.getMetrics(SOURCE)?.misses).toBe(0);
  });

  describe("misaligned length", () => {
    beforeEach(() => {
      storage.put(INDEX, Buffer.concat([encodeIndexFile([38, 146]), Buffer.from([1, 2, 3, 4])]));
    });

    it("should fail by default", async () => {
      await expect(loadIndex(storage, SOURCE)).rejects.toThrow(IndexFormatError);
      await expect(loadIndex(storage, SOURCE)).rejects.toThrow(
        "Malformed data in /data/events.lzo.index: length 20 is not a multiple of 8"
      );
    });

    it("should ignore trailing bytes when allowed", async () => {
      const index = await loadIndex(storage, SOURCE, { allowTrailingBytes: true });

      expect(index.toArray()).toEqual([38, 146]);
    });
  });

  it("should reject offsets that are not strictly ascending", async () => {
    storage.put(INDEX, encodeIndexFile([38, 146, 146]));

    await expect(loadIndex(storage, SOURCE)).rejects.toThrow("entry 2 (146) does not follow entry 1 (146)");
    expect(storage.openHandles).toBe(0);
  });

  it("should reject negative offsets", async () => {
    storage.put(INDEX, encodeIndexFile([-8n]));

    await expect(loadIndex(storage, SOURCE)).rejects.toThrow("entry 0 holds invalid offset -8");
  });

  it("should reject offsets beyond the safe integer range", async () => {
    storage.put(INDEX, encodeIndexFile([2n ** 60n]));

    await expect(loadIndex(storage, SOURCE)).rejects.toThrow(IndexFormatError);
  });

  it("should propagate open failures", async () => {
    storage.put(INDEX, encodeIndexFile([38]));
    storage.failNext("open", { path: INDEX });

    await expect(loadIndex(storage, SOURCE)).rejects.toThrow(StorageReadError);
    expect(storage.openHandles).toBe(0);
  });

  it("should propagate read failures and release the handle", async () => {
    storage.put(INDEX, encodeIndexFile([38, 146]));
    const failure = new Error("disk unplugged");
    storage.failNext("read", { path: INDEX, error: failure });

    await expect(loadIndex(storage, SOURCE)).rejects.toBe(failure);
    expect(storage.openHandles).toBe(0);
  });

  it("should propagate existence check failures instead of reporting no index", async () => {
    storage.failNext("exists");

    await expect(loadIndex(storage, SOURCE)).rejects.toThrow(StorageReadError);
  });
});
