import { Request, Response, NextFunction, RequestHandler } from 'express';
import { Logger } from '../utils/logger';

/**
 * Logs one line per finished request with status and duration.
 */
export function createRequestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      logger.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, { durationMs: Math.round(durationMs) });
    });
    next();
  };
}
