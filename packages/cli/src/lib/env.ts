/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { INDEX_SUFFIX } from "@blocksplit/sdk";
import { CliError } from "./errors.js";

const flagPattern = /^(0|1|true|false)$/;

const EnvSchema = z.object({
  BLOCKSPLIT_INDEX_SUFFIX: z
    .string()
    .regex(/^\.[A-Za-z0-9._-]+$/, "must start with a dot and contain only letters, digits, dots, underscores and dashes")
    .optional(),
  BLOCKSPLIT_ALLOW_TRAILING_BYTES: z.string().regex(flagPattern, "must be 0, 1, true or false").optional(),
});

/**
 * Settings the CLI takes from the environment
 */
export interface CliConfig {
  indexSuffix: string;
  allowTrailingBytes: boolean;
}

/**
 * Read CLI settings from environment variables
 * @throws CliError if a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new CliError(`Invalid environment: ${issues.join("; ")}`, { exitCode: 1 });
  }

  const allow = result.data.BLOCKSPLIT_ALLOW_TRAILING_BYTES;
  return {
    indexSuffix: result.data.BLOCKSPLIT_INDEX_SUFFIX ?? INDEX_SUFFIX,
    allowTrailingBytes: allow === "1" || allow === "true",
  };
}

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve a path argument to an absolute path
 */
export function resolvePath(input: string): string {
  return path.resolve(expandTilde(input));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.BLOCKSPLIT_CLI_DEBUG === "1";
}
