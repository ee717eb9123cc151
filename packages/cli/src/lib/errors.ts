/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { BlockSplitError } from "@blocksplit/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/** Exit code when a file has no index */
export const EXIT_NOT_INDEXED = 2;

/**
 * Map errors to CLI exit codes
 * - 0: success (--help, --version)
 * - 1: usage/format/IO/unknown error
 * - 2: file not indexed
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  // Commander has already printed its own usage errors
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  return 1;
}

/**
 * Format an error for CLI output. Verbose output adds the SDK error code
 * and one line per cause.
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (!verbose) {
    return error.message;
  }

  const lines = [error instanceof BlockSplitError ? `[${error.code}] ${error.message}` : error.message];
  let cause: unknown = error.cause;
  while (cause !== undefined) {
    lines.push(`  caused by: ${cause instanceof Error ? cause.message : String(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }

  return lines.join("\n");
}
