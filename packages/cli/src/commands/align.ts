/**
 * `align` command: snap a candidate slice to block boundaries
 */

import { Command } from "commander";
import { alignSlice, loadIndex } from "@blocksplit/sdk";
import { parseOffset } from "../lib/arg.js";
import { createContext } from "../lib/context.js";
import { resolvePath } from "../lib/env.js";
import { CliError } from "../lib/errors.js";
import { printSlice } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface AlignCommandOptions {
  start: number;
  end: number;
}

export function createAlignCommand(): Command {
  return new Command("align")
    .description("Align a slice [start, end) of a file to block boundaries")
    .argument("<file>", "Source file")
    .requiredOption("--start <n>", "Slice start offset", (val) => parseOffset(val, "--start"))
    .requiredOption("--end <n>", "Slice end offset (exclusive)", (val) => parseOffset(val, "--end"))
    .addHelpText(
      "after",
      `
Prints {"start": null, "end": null} when the slice holds no block start.
Files without an index align only as the whole file.`
    )
    .action(async (file: string, options: AlignCommandOptions) => {
      await withTiming("cli.align", async () => {
        const { storage, config } = createContext();
        const source = resolvePath(file);

        if (options.start >= options.end) {
          throw new CliError("--start must be less than --end");
        }

        const fileSize = await storage.length(source);
        if (options.end > fileSize) {
          throw new CliError(`--end ${options.end} is past the end of the file (${fileSize} bytes)`);
        }

        const index = await loadIndex(storage, source, config);
        printSlice(alignSlice(index, { start: options.start, end: options.end }, fileSize));
      });
    });
}
