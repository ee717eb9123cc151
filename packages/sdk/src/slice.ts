/**
 * Slice alignment against a block-offset index
 *
 * Every boundary these functions return is a block start, except a slice end
 * that falls past the last block, which becomes the file's physical end. A
 * worker can therefore start decompressing at its slice start without any
 * state from the preceding slice.
 */

import type { BlockOffsetIndex } from "./block-index.js";
import { NOT_FOUND } from "./constants.js";
import { IndexRangeError } from "./errors.js";

/**
 * A byte range [start, end) of a source file
 */
export interface Slice {
  start: number;
  end: number;
}

/**
 * Nudge a slice start forward to the nearest block start
 * @returns The smallest block offset in [start, end), `0` when `start` is 0,
 *   or NOT_FOUND when the slice holds no block start and must be dropped
 *   or merged into a neighbour
 */
export function alignSliceStartToIndex(index: BlockOffsetIndex, start: number, end: number): number {
  // Byte 0 is always a block boundary
  if (start === 0) {
    return 0;
  }

  const newStart = index.findNextPosition(start);
  if (newStart === NOT_FOUND || newStart >= end) {
    return NOT_FOUND;
  }
  return newStart;
}

/**
 * Extend a slice end to the next block start, or to the end of the file
 * when no block starts at or after `end`
 */
export function alignSliceEndToIndex(index: BlockOffsetIndex, end: number, fileSize: number): number {
  const newEnd = index.findNextPosition(end);
  return newEnd === NOT_FOUND ? fileSize : newEnd;
}

/**
 * Align both ends of a slice
 * @returns The aligned slice, or null when it contains no block start
 */
export function alignSlice(index: BlockOffsetIndex, slice: Slice, fileSize: number): Slice | null {
  const start = alignSliceStartToIndex(index, slice.start, slice.end);
  if (start === NOT_FOUND) {
    return null;
  }
  return { start, end: alignSliceEndToIndex(index, slice.end, fileSize) };
}

/**
 * Cut a file into candidate slices of `sliceBytes` and align each one.
 * Candidates holding no block start are dropped, since the aligned slice
 * before them already extends over their bytes.
 * @throws IndexRangeError if `sliceBytes` is not a positive safe integer
 */
export function splitIntoSlices(index: BlockOffsetIndex, fileSize: number, sliceBytes: number): Slice[] {
  if (!Number.isSafeInteger(sliceBytes) || sliceBytes <= 0) {
    throw new IndexRangeError(`Slice size ${sliceBytes} is not a positive integer`);
  }

  const slices: Slice[] = [];
  for (let start = 0; start < fileSize; start += sliceBytes) {
    const aligned = alignSlice(index, { start, end: Math.min(start + sliceBytes, fileSize) }, fileSize);
    if (aligned) {
      slices.push(aligned);
    }
  }
  return slices;
}
