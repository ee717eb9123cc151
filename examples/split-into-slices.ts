/**
 * Slicing Example
 *
 * Indexes an lzop file if needed, cuts it into equal candidate slices and
 * aligns each one to block boundaries, the way a job planner would.
 * Usage: split-into-slices <file.lzo> [sliceBytes]
 */

import {
  LocalFileStorage,
  LzopCodec,
  buildIndex,
  hasIndex,
  loadIndex,
  splitIntoSlices,
} from "@blocksplit/sdk";

async function main() {
  const [file, sliceArg] = process.argv.slice(2);
  if (!file) {
    console.error("usage: split-into-slices <file.lzo> [sliceBytes]");
    process.exitCode = 1;
    return;
  }
  const sliceBytes = sliceArg === undefined ? 64 * 1024 * 1024 : Number(sliceArg);

  const storage = new LocalFileStorage();
  if (!(await hasIndex(storage, file))) {
    console.log(`Indexing ${file}...`);
    await buildIndex(storage, new LzopCodec(), file);
  }

  const fileSize = await storage.length(file);
  const index = await loadIndex(storage, file);
  console.log(`${index.length} blocks in ${fileSize} bytes\n`);

  // Throws IndexRangeError for a slice size that is not a positive integer
  const slices = splitIntoSlices(index, fileSize, sliceBytes);

  for (const [i, slice] of slices.entries()) {
    console.log(`slice ${i}: [${slice.start}, ${slice.end}) ${slice.end - slice.start} bytes`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
