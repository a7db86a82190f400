/**
 * Custom error classes for consistent error handling.
 * Each error type maps to a specific HTTP status code.
 */

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 404 Not Found - Resource does not exist
 */
export class NotFoundError extends AppError {
  readonly statusCode = 404;

  constructor(code: string, message: string) {
    super(code, message);
  }
}

/**
 * 500 - The catalog store failed to connect or to execute a query.
 * Not retried here; the original driver error is kept as `cause`.
 */
export class StoreError extends AppError {
  readonly statusCode = 500;

  constructor(message: string, cause: unknown) {
    super('STORE_ERROR', message, { cause });
  }
}
