/**
 * Verbose-mode metrics on stderr
 */

import { metrics } from "@blocksplit/sdk";
import { isVerbose } from "./env.js";

const NEWLINES = /[\r\n]+/g;

function clean(part: unknown): string {
  return String(part).replace(NEWLINES, " ").trim();
}

/**
 * Emit one `metric <key> k=v ...` line when BLOCKSPLIT_CLI_DEBUG=1
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${clean(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${clean(k)}=${clean(v)}`);
  }

  process.stderr.write(parts.join(" ") + "\n");
}

/**
 * Emit the SDK's recorded metrics for one source file
 */
export function emitIndexMetrics(sourcePath: string): void {
  const recorded = metrics.getMetrics(sourcePath);
  if (!recorded) {
    return;
  }

  emitMetric("index", {
    path: sourcePath,
    blocks: recorded.blocks,
    builds: recorded.builds,
    build_failures: recorded.buildFailures,
    loads: recorded.loads,
    build_p95_ms: metrics.getP95(recorded.buildTimeMs).toFixed(2),
    load_p95_ms: metrics.getP95(recorded.loadTimeMs).toFixed(2),
  });
}

/**
 * Wrap a command with a duration metric
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, { duration_ms: Date.now() - start, success });
  }
}
