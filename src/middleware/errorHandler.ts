import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { AppError, StoreError } from '../utils/errors';
import { Logger } from '../utils/logger';

/**
 * Global error handler middleware.
 * - Maps custom error types to HTTP status codes
 * - Returns consistent error format: { error: { code, message } }
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof StoreError) {
      logger.error(`${req.method} ${req.originalUrl} failed: ${err.message}`, { cause: String(err.cause) });
    } else if (err instanceof AppError) {
      logger.debug(`${req.method} ${req.originalUrl} -> ${err.statusCode} ${err.code}`);
    } else {
      logger.error(`${req.method} ${req.originalUrl} failed`, { error: err.stack ?? String(err) });
    }

    // Handle custom AppError types
    if (err instanceof AppError) {
      res.status(err.statusCode).json({
        error: {
          code: err.code,
          message: err.message,
        },
      });
      return;
    }

    // Default to 500 Internal Server Error
    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    });
  };
}
