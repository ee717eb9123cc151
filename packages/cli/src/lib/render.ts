/**
 * Output for offsets and slices
 */

import type { Slice } from "@blocksplit/sdk";

type Color = "red" | "green";

const ANSI: Record<Color, string> = { red: "\x1b[31m", green: "\x1b[32m" };
const RESET = "\x1b[0m";

/**
 * Print the offsets of an index, either as a count followed by one offset
 * per line or as a pretty-printed JSON document
 */
export function printOffsets(file: string, offsets: number[], options: { json?: boolean } = {}): void {
  if (options.json) {
    console.log(JSON.stringify({ file, blocks: offsets.length, offsets }, null, 2));
    return;
  }

  console.log(`Blocks: ${offsets.length}`);
  for (const offset of offsets) {
    console.log(String(offset));
  }
}

/**
 * Print an aligned slice as a single JSON line; null bounds mean the slice
 * holds no block start
 */
export function printSlice(slice: Slice | null): void {
  console.log(JSON.stringify(slice ?? { start: null, end: null }));
}

/**
 * Color text for a terminal; plain when the stream is piped
 */
export function colorize(text: string, color: Color, stream: NodeJS.WriteStream = process.stdout): string {
  return stream.isTTY ? `${ANSI[color]}${text}${RESET}` : text;
}
