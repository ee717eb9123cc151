import { describe, it, expect } from "vitest";
import { FixedHeaderCodec } from "@blocksplit/testkit";
import { CodecRegistry, createDefaultRegistry } from "./registry.js";
import { UnknownCodecError } from "../errors.js";
import type { BlockCodec } from "./types.js";

describe("CodecRegistry", () => {
  it("should resolve lzop files by default", () => {
    const registry = createDefaultRegistry();

    expect(registry.resolve("/logs/2024-01-01.lzo")?.name).toBe("lzop");
    expect(registry.resolve("/logs/2024-01-01.gz")).toBeUndefined();
  });

  it("should not treat index files as sources", () => {
    expect(createDefaultRegistry().resolve("/logs/a.lzo.index")).toBeUndefined();
  });

  it("should prefer the longest matching extension", () => {
    const tar: BlockCodec = {
      name: "tar-lzo",
      extensions: [".tar.lzo"],
      createHeaderReader: () => new FixedHeaderCodec(0).createHeaderReader(),
    };
    const registry = createDefaultRegistry().register(tar);

    expect(registry.resolve("/a.tar.lzo")?.name).toBe("tar-lzo");
    expect(registry.resolve("/a.lzo")?.name).toBe("lzop");
  });

  it("should throw for unknown extensions in require", () => {
    const registry = new CodecRegistry();

    expect(() => registry.require("/a.lzo")).toThrow(UnknownCodecError);
    expect(() => registry.require("/a.lzo")).toThrow("No codec registered for /a.lzo");
  });
});
