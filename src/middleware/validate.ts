/**
 * Validation Middleware - Uses Zod for request validation
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';

/**
 * Middleware factory that validates request data against a Zod schema
 *
 * @param schema - Zod schema to validate against
 * @param toError - Builds the error passed on when validation fails
 * @returns Express middleware function
 */
export const validate = (
  schema: z.ZodSchema,
  toError: (messages: string[]) => AppError
) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      await schema.parseAsync({
        body: req.body,
        params: req.params,
        query: req.query,
        headers: req.headers,
      });
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        const messages = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
        next(toError(messages));
      } else {
        next(error);
      }
    }
  };
};
