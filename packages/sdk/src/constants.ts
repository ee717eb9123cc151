/**
 * Fixed values shared by the index reader and builder
 */

/** Suffix appended to a source file path to locate its index */
export const INDEX_SUFFIX = ".index";

/** Suffix of the staging file a build writes before committing */
export const TMP_SUFFIX = ".tmp";

/** Returned by lookups and alignment when no block start qualifies */
export const NOT_FOUND = -1;

/** Width of one persisted offset */
export const OFFSET_BYTES = 8;

/** Uncompressed size + compressed size, both int32 */
export const BLOCK_HEADER_BYTES = 8;

/** Width of one per-block checksum word */
export const CHECKSUM_BYTES = 4;
