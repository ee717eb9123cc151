/**
 * `inspect` command: show the offsets stored in an index
 */

import { Command } from "commander";
import { hasIndex, loadIndex } from "@blocksplit/sdk";
import { createContext } from "../lib/context.js";
import { resolvePath } from "../lib/env.js";
import { CliError, EXIT_NOT_INDEXED } from "../lib/errors.js";
import { printOffsets } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface InspectCommandOptions {
  json?: boolean;
}

export function createInspectCommand(): Command {
  return new Command("inspect")
    .description("Print the block offsets recorded for a file")
    .argument("<file>", "Source file whose index to read")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (file: string, options: InspectCommandOptions) => {
      await withTiming("cli.inspect", async () => {
        const { storage, config } = createContext();
        const source = resolvePath(file);

        if (!(await hasIndex(storage, source, config))) {
          throw new CliError(`No index for ${source}`, { exitCode: EXIT_NOT_INDEXED });
        }

        const offsets = (await loadIndex(storage, source, config)).toArray();

        printOffsets(source, offsets, options);
      });
    });
}
