/**
 * Custom error classes for the application
 * Allows for consistent error handling and specific error types
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  code: string;
  
  constructor(message: string, code: string = 'APP_ERROR') {
    super(message);
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
 * Persistence (task file) errors
 */
export class PersistenceError extends AppError {
  constructor(message: string, code: string = 'PERSISTENCE_ERROR') {
    super(message, code);
  }
}

/**
 * The task file does not exist yet
 */
export class PersistenceNotFoundError extends PersistenceError {
  constructor(message: string, code: string = 'PERSISTENCE_NOT_FOUND') {
    super(message, code);
  }
}

/**
 * The task file exists but could not be read
 */
export class PersistenceReadError extends PersistenceError {
  constructor(message: string, code: string = 'PERSISTENCE_READ_FAILURE') {
    super(message, code);
  }
}

/**
 * The task file could not be written
 */
export class PersistenceWriteError extends PersistenceError {
  constructor(message: string, code: string = 'PERSISTENCE_WRITE_FAILURE') {
    super(message, code);
  }
}

/**
 * Record decoding errors
 */
export class RecordError extends AppError {
  constructor(message: string, code: string = 'RECORD_ERROR') {
    super(message, code);
  }
}

/**
 * A record line split into fewer than four fields
 */
export class MalformedRecordError extends RecordError {
  constructor(message: string, code: string = 'MALFORMED_RECORD') {
    super(message, code);
  }
}

/**
 * The id field of a record is not an integer
 */
export class InvalidIdError extends RecordError {
  constructor(message: string, code: string = 'INVALID_ID') {
    super(message, code);
  }
}

/**
 * The completed field of a record is neither 0 nor 1
 */
export class InvalidCompletedFlagError extends RecordError {
  constructor(message: string, code: string = 'INVALID_COMPLETED_FLAG') {
    super(message, code);
  }
}
