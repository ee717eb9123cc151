/**
 * Error types for block index operations
 *
 * Invariants:
 * - Storage errors include the path they failed on
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all blocksplit errors
 */
export abstract class BlockSplitError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a source stream or an index file is malformed
 */
export class IndexFormatError extends BlockSplitError {
  readonly code = "FORMAT_ERROR";

  constructor(
    public readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Malformed data in ${path}: ${reason}`, options);
  }
}

/**
 * Thrown on misuse of an index slot; a caller defect, not a runtime condition
 */
export class IndexRangeError extends BlockSplitError {
  readonly code = "RANGE_ERROR";
}

/**
 * Thrown when no registered codec handles a path
 */
export class UnknownCodecError extends BlockSplitError {
  readonly code = "CODEC_ERROR";

  constructor(public readonly path: string, options?: ErrorOptions) {
    super(`No codec registered for ${path}`, options);
  }
}

/**
 * Base class for failures raised by a storage implementation
 */
export abstract class StorageError extends BlockSplitError {
  constructor(
    public readonly path: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when opening, stating or reading a file fails
 */
export class StorageReadError extends StorageError {
  readonly code = "READ_ERROR";

  constructor(path: string, options?: ErrorOptions) {
    super(path, `Failed to read: ${path}`, options);
  }
}

/**
 * Thrown when creating, writing, renaming or removing a file fails
 */
export class StorageWriteError extends StorageError {
  readonly code = "WRITE_ERROR";

  constructor(path: string, options?: ErrorOptions) {
    super(path, `Failed to write: ${path}`, options);
  }
}

/**
 * Thrown when a read runs past the end of a file
 */
export class EndOfFileError extends StorageError {
  readonly code = "EOF";

  constructor(
    path: string,
    public readonly position: number,
    options?: ErrorOptions
  ) {
    super(path, `Unexpected end of file at byte ${position}: ${path}`, options);
  }
}
