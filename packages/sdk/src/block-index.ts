/**
 * In-memory block-offset index
 *
 * Invariants:
 * - Offsets are unique and strictly ascending once fully populated
 * - Zero slots means "no index" (the file is treated as unsplittable)
 * - A loaded index is never mutated by readers
 */

import { NOT_FOUND } from "./constants.js";
import { IndexRangeError } from "./errors.js";

/**
 * Sorted block-start offsets of one source file
 */
export class BlockOffsetIndex implements Iterable<number> {
  #positions: Float64Array;

  /**
   * @param blocks - Number of slots to allocate (default 0, the empty index)
   */
  constructor(blocks = 0) {
    if (!Number.isSafeInteger(blocks) || blocks < 0) {
      throw new IndexRangeError(`Block count must be a non-negative integer, got ${blocks}`);
    }
    this.#positions = new Float64Array(blocks);
  }

  /**
   * Build a fully populated index from offsets already in ascending order
   */
  static from(offsets: Iterable<number>): BlockOffsetIndex {
    const values = Array.from(offsets);
    const index = new BlockOffsetIndex(values.length);
    values.forEach((pos, i) => index.set(i, pos));
    return index;
  }

  get length(): number {
    return this.#positions.length;
  }

  /**
   * Store the offset of block `blockNumber`
   */
  set(blockNumber: number, pos: number): void {
    if (!Number.isInteger(blockNumber) || blockNumber < 0 || blockNumber >= this.#positions.length) {
      throw new IndexRangeError(
        `Block ${blockNumber} is outside [0, ${this.#positions.length})`
      );
    }
    if (!Number.isSafeInteger(pos) || pos < 0) {
      throw new IndexRangeError(`Block offset must be a non-negative integer, got ${pos}`);
    }
    this.#positions[blockNumber] = pos;
  }

  /**
   * Offset stored for block `blockNumber`
   */
  get(blockNumber: number): number {
    const pos = this.#positions[blockNumber];
    if (pos === undefined || !Number.isInteger(blockNumber)) {
      throw new IndexRangeError(
        `Block ${blockNumber} is outside [0, ${this.#positions.length})`
      );
    }
    return pos;
  }

  /**
   * Find the first block start at or after `pos`
   * @returns The block start, or NOT_FOUND when every block starts before `pos`
   *   or `pos` is NaN
   */
  findNextPosition(pos: number): number {
    if (Number.isNaN(pos)) {
      return NOT_FOUND;
    }

    // Lower bound: first slot whose offset is >= pos
    let lo = 0;
    let hi = this.#positions.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.get(mid) < pos) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo < this.#positions.length ? this.get(lo) : NOT_FOUND;
  }

  isEmpty(): boolean {
    return this.#positions.length === 0;
  }

  toArray(): number[] {
    return Array.from(this.#positions);
  }

  [Symbol.iterator](): Iterator<number> {
    return this.#positions[Symbol.iterator]();
  }
}
