/**
 * Failures raised below the request layer.
 *
 * The global HttpExceptionFilter maps each class to a status code; callers
 * never catch them to retry.
 */

/** The database could not be reached (connect or reconnect failed). */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/** A statement failed after the connection was established. */
export class StorageError extends Error {
  constructor(
    readonly operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** A unique constraint rejected the statement. */
export class DuplicateRecordError extends StorageError {
  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(operation, message, options);
    this.name = "DuplicateRecordError";
  }
}

/** The capability exists on the record service but is not implemented. */
export class UnsupportedOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedOperationError";
  }
}

/** Input that passed the request schema but breaks a record invariant. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
