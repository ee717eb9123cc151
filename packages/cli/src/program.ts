/**
 * Command tree and top-level error handling
 */

import { Command, CommanderError } from "commander";
import { logger } from "@blocksplit/sdk";
import { createAlignCommand } from "./commands/align.js";
import { createIndexCommand } from "./commands/index-files.js";
import { createInspectCommand } from "./commands/inspect.js";
import type { GlobalOptions } from "./lib/context.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { colorize } from "./lib/render.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("blocksplit")
    .description("Index block-compressed files so they can be split into independently decompressible slices")
    .version(VERSION)
    .option("--verbose", "Verbose diagnostics, including SDK logs")
    .option("--quiet", "Suppress non-error output")
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride()
    .hook("preAction", () => {
      // SDK logs go to the console; only show them when asked
      logger.setEnabled(Boolean(program.opts<GlobalOptions>().verbose));
    });

  // addCommand() does not inherit exitOverride/configureOutput on its own
  for (const command of [createIndexCommand(program), createInspectCommand(), createAlignCommand()]) {
    program.addCommand(command.copyInheritedSettings(program));
  }

  return program;
}

/**
 * Parse and run a command line
 * @returns Process exit code
 */
export async function run(argv: string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    const code = mapErrorToExitCode(err);
    // Commander prints its own usage errors and help output
    if (!(err instanceof CommanderError)) {
      const opts = program.opts<GlobalOptions>();
      console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    }
    return code;
  }
}
