/**
 * `index` command: build indexes for source files
 */

import { Command } from "commander";
import { buildIndex, hasIndex } from "@blocksplit/sdk";
import { collectSources } from "../lib/collect.js";
import { createContext, type GlobalOptions } from "../lib/context.js";
import { resolvePath } from "../lib/env.js";
import { colorize } from "../lib/render.js";
import { emitIndexMetrics, withTiming } from "../lib/telemetry.js";

interface IndexCommandOptions {
  force?: boolean;
}

export function createIndexCommand(program: Command): Command {
  return new Command("index")
    .description("Build block indexes for files, walking directories recursively")
    .argument("<paths...>", "Files or directories to index")
    .option("--force", "Rebuild indexes that already exist")
    .addHelpText(
      "after",
      `
Examples:
  $ blocksplit index ./logs/2024-01-01.lzo
  $ blocksplit index ./logs --force`
    )
    .action(async (paths: string[], options: IndexCommandOptions) => {
      await withTiming("cli.index", async () => {
        const opts = program.opts<GlobalOptions>();
        const { storage, registry, config } = createContext();
        const sources = await collectSources(paths.map(resolvePath), registry);

        let indexed = 0;
        let skipped = 0;

        for (const source of sources) {
          if (!options.force && (await hasIndex(storage, source, config))) {
            skipped++;
            if (!opts.quiet) {
              console.log(`Skipped ${source} (already indexed)`);
            }
            continue;
          }

          const summary = await buildIndex(storage, registry.require(source), source, config);
          indexed++;
          emitIndexMetrics(source);
          if (!opts.quiet) {
            console.log(`Indexed ${source} (${summary.blocks} blocks)`);
          }
        }

        if (!opts.quiet) {
          console.log(colorize(`✓ Indexed ${indexed} file(s), skipped ${skipped}`, "green"));
        }
      });
    });
}
