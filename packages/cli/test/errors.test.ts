/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import { IndexFormatError, StorageReadError } from "@blocksplit/sdk";
import { CliError, EXIT_NOT_INDEXED, formatCliError, mapErrorToExitCode } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("no index", { exitCode: EXIT_NOT_INDEXED });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should use the exit code of a CliError", () => {
      expect(mapErrorToExitCode(new CliError("no index", { exitCode: 2 }))).toBe(2);
    });

    it("should use the exit code of a commander error", () => {
      expect(mapErrorToExitCode(new CommanderError(0, "commander.version", "0.1.0"))).toBe(0);
      expect(mapErrorToExitCode(new InvalidArgumentError("bad"))).toBe(1);
    });

    it("should map SDK errors to exit code 1", () => {
      expect(mapErrorToExitCode(new IndexFormatError("/a.lzo", "bad magic"))).toBe(1);
      expect(mapErrorToExitCode(new StorageReadError("/a.lzo"))).toBe(1);
    });

    it("should map unknown values to exit code 1", () => {
      expect(mapErrorToExitCode("boom")).toBe(1);
      expect(mapErrorToExitCode(new Error("boom"))).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should return the message", () => {
      expect(formatCliError(new IndexFormatError("/a.lzo", "bad magic"))).toBe(
        "Malformed data in /a.lzo: bad magic"
      );
    });

    it("should add the code and cause chain when verbose", () => {
      const err = new StorageReadError("/a.lzo", {
        cause: new Error("read failed", { cause: "EIO" }),
      });
      expect(formatCliError(err, true)).toBe(
        "[READ_ERROR] Failed to read: /a.lzo\n  caused by: read failed\n  caused by: EIO"
      );
    });

    it("should leave out the cause when not verbose", () => {
      const err = new StorageReadError("/a.lzo", { cause: new Error("EIO") });
      expect(formatCliError(err)).toBe("Failed to read: /a.lzo");
    });

    it("should stringify non-errors", () => {
      expect(formatCliError(42)).toBe("42");
    });
  });
});
