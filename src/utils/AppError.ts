/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }

  static serviceUnavailable(message = 'Service unavailable'): AppError {
    return new AppError(message, 503);
  }
}

/**
 * The registry snapshot does not have a recognised shape. Nothing from
 * the failed load is published.
 */
export class RegistryFormatError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}

/**
 * Matching options are out of range or unreadable.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}

/**
 * An importer source cannot be read as a whole (wrong columns, missing file).
 * Individual bad rows are reported as row errors instead.
 */
export class ImportError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export default AppError;
