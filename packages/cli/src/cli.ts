#!/usr/bin/env node

/**
 * blocksplit CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
