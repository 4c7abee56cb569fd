/**
 * Custom error classes for the application
 * Allows for consistent error handling and specific error types
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  code: string;

  constructor(message: string, code: string = 'APP_ERROR', options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    // Capture stack trace properly
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration-related errors
 */
export class ConfigError extends AppError {
  constructor(message: string, code: string = 'CONFIG_ERROR') {
    super(message, code);
  }
}

/**
 * Storage-related errors
 * Every storage error carries the file or directory it was about.
 */
export class StorageError extends AppError {
  readonly path: string;

  constructor(message: string, path: string, code: string = 'STORAGE_ERROR', cause?: unknown) {
    super(message, code, { cause });
    this.path = path;
  }
}

/**
 * The per-user data directory cannot be resolved or accessed
 */
export class StorageUnavailableError extends StorageError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, path, 'STORAGE_UNAVAILABLE', cause);
  }
}

/**
 * A file exists but could not be read
 */
export class ReadFailureError extends StorageError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, path, 'READ_FAILURE', cause);
  }
}

/**
 * File content is not valid JSON or does not match the record schema
 */
export class DecodeFailureError extends StorageError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, path, 'DECODE_FAILURE', cause);
  }
}

/**
 * The persisted file could not be written
 */
export class WriteFailureError extends StorageError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, path, 'WRITE_FAILURE', cause);
  }
}
