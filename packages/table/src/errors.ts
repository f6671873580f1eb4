/**
 * Error types for table operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Validation errors name the offending column
 */

/**
 * Base class for all table errors
 */
export abstract class TableError extends Error {
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
 * Thrown when a column is declared with a type tag outside the supported set
 */
export class UnsupportedTypeError extends TableError {
  readonly code = "E_UNSUPPORTED_TYPE";

  constructor(
    public readonly tag: string,
    supported: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Unsupported data type "${tag}". Use one of: ${supported.join(", ")}`, options);
  }
}

/**
 * Thrown when a value does not match its column's declared type
 */
export class InvalidTypeError extends TableError {
  readonly code = "E_INVALID_TYPE";

  constructor(
    public readonly column: string,
    public readonly expected: string,
    received: string,
    options?: ErrorOptions
  ) {
    super(`Column "${column}" only accepts ${expected} values, got ${received}`, options);
  }
}

/**
 * Thrown when null is supplied to a non-nullable column
 */
export class NullValueError extends TableError {
  readonly code = "E_NULL_VALUE";

  constructor(
    public readonly column: string,
    options?: ErrorOptions
  ) {
    super(`Column "${column}" does not allow null values`, options);
  }
}

/**
 * Thrown when a value collides with an existing value in a unique column
 */
export class DuplicateValueError extends TableError {
  readonly code = "E_DUPLICATE_VALUE";

  constructor(
    public readonly column: string,
    display: string,
    options?: ErrorOptions
  ) {
    super(`Value ${display} already exists in unique column "${column}"`, options);
  }
}

/**
 * Thrown when required data is absent: an omitted column, an unknown primary
 * key, or a membership entry that should exist but does not
 */
export class MissingDataError extends TableError {
  readonly code = "E_MISSING_DATA";
}

/**
 * Thrown when reading the default of a column that has none
 */
export class DefaultValueError extends TableError {
  readonly code = "E_NO_DEFAULT";

  constructor(
    public readonly column: string,
    options?: ErrorOptions
  ) {
    super(`Column "${column}" has no default value`, options);
  }
}

/**
 * Thrown for an invalid column set or a reference to a column the table
 * cannot serve
 */
export class SchemaError extends TableError {
  readonly code = "E_SCHEMA";
}

/**
 * Thrown when a snapshot file cannot be found
 */
export class SnapshotNotFoundError extends TableError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Snapshot not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a snapshot read operation fails
 */
export class SnapshotReadError extends TableError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read snapshot: ${filePath}`, options);
  }
}

/**
 * Thrown when a snapshot write operation fails
 */
export class SnapshotWriteError extends TableError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write snapshot: ${filePath}`, options);
  }
}

/**
 * Thrown when snapshot text or structure is malformed
 */
export class SnapshotFormatError extends TableError {
  readonly code = "E_SNAPSHOT_FORMAT";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid snapshot: ${reason}`, options);
  }
}

/**
 * Thrown when environment configuration holds an invalid value
 */
export class ConfigError extends TableError {
  readonly code = "E_CONFIG";
}
