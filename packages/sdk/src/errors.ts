/**
 * Error types for trail operations
 *
 * Invariants:
 * - File errors include the absolute target path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all trail errors
 */
export abstract class TrailError extends Error {
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
 * Thrown when a file cannot be found
 */
export class FileNotFoundError extends TrailError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`File not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a file read operation fails
 */
export class FileReadError extends TrailError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file write operation fails
 */
export class FileWriteError extends TrailError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file removal operation fails
 */
export class FileRemoveError extends TrailError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends TrailError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends TrailError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when a crumb cannot be written. The mutation it journals stays applied in memory.
 */
export class CrumbWriteError extends TrailError {
  readonly code = "E_CRUMB_WRITE";

  constructor(
    public readonly crumbPath: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write crumb: ${crumbPath}`, options);
  }
}

/**
 * Thrown when the snapshot file exists but does not hold a valid trail
 */
export class SnapshotCorruptError extends TrailError {
  readonly code = "E_SNAPSHOT_CORRUPT";

  constructor(
    public readonly snapshotPath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Corrupt snapshot ${snapshotPath}: ${reason}`, options);
  }
}

/**
 * Thrown when a well-named crumb holds a body that is not a record
 */
export class CrumbCorruptError extends TrailError {
  readonly code = "E_CRUMB_CORRUPT";

  constructor(
    public readonly crumbPath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Corrupt crumb ${crumbPath}: ${reason}`, options);
  }
}

/**
 * Thrown when rotating an empty trail
 */
export class EmptyTrailError extends TrailError {
  readonly code = "E_EMPTY";

  constructor(operation: string) {
    super(`Cannot ${operation}: trail is empty`);
  }
}

/**
 * Thrown when a record fails validation
 */
export class InvalidRecordError extends TrailError {
  readonly code = "E_INVALID_RECORD";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid record: ${issues.join("; ")}`, options);
  }
}
