/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { loadConfig, resolvePath } from "../src/lib/env.js";
import { CliError } from "../src/lib/errors.js";

describe("env", () => {
  describe("loadConfig", () => {
    it("should use defaults for an empty environment", () => {
      expect(loadConfig({})).toEqual({ indexSuffix: ".index", allowTrailingBytes: false });
    });

    it("should read the index suffix", () => {
      expect(loadConfig({ BLOCKSPLIT_INDEX_SUFFIX: ".idx" }).indexSuffix).toBe(".idx");
    });

    it("should read the trailing-bytes flag", () => {
      expect(loadConfig({ BLOCKSPLIT_ALLOW_TRAILING_BYTES: "1" }).allowTrailingBytes).toBe(true);
      expect(loadConfig({ BLOCKSPLIT_ALLOW_TRAILING_BYTES: "true" }).allowTrailingBytes).toBe(true);
      expect(loadConfig({ BLOCKSPLIT_ALLOW_TRAILING_BYTES: "0" }).allowTrailingBytes).toBe(false);
    });

    it("should reject a suffix without a leading dot", () => {
      expect(() => loadConfig({ BLOCKSPLIT_INDEX_SUFFIX: "index" })).toThrow(CliError);
      expect(() => loadConfig({ BLOCKSPLIT_INDEX_SUFFIX: "index" })).toThrow(
        /^Invalid environment: BLOCKSPLIT_INDEX_SUFFIX must start with a dot/
      );
    });

    it("should reject an unknown flag value", () => {
      expect(() => loadConfig({ BLOCKSPLIT_ALLOW_TRAILING_BYTES: "yes" })).toThrow(
        "Invalid environment: BLOCKSPLIT_ALLOW_TRAILING_BYTES must be 0, 1, true or false"
      );
    });

    it("should ignore unrelated variables", () => {
      expect(loadConfig({ PATH: "/usr/bin", HOME: "/home/test" }).indexSuffix).toBe(".index");
    });
  });

  describe("resolvePath", () => {
    it("should expand a leading tilde", () => {
      expect(resolvePath("~")).toBe(homedir());
      expect(resolvePath("~/logs/a.lzo")).toBe(join(homedir(), "logs/a.lzo"));
    });

    it("should resolve relative paths against the working directory", () => {
      expect(resolvePath("logs/a.lzo")).toBe(resolve("logs/a.lzo"));
    });
  });
});
