/**
 * Validation Schemas - Zod schemas for request parsing and validation
 */

import { z } from 'zod';

export const MAX_INT32 = 2147483647;

/**
 * A single query-string value. Repeated parameters keep the last occurrence;
 * anything that is not a string (nested qs objects) is treated as absent.
 */
const queryValue = z
  .preprocess((value) => (Array.isArray(value) ? value[value.length - 1] : value), z.string().optional())
  .catch(undefined);

// Book routes schemas
export const bookListQuerySchema = z.object({
  gutenberg_id: queryValue,
  language: queryValue,
  topic: queryValue,
  mime_type: queryValue,
  author: queryValue,
  title: queryValue,
  page: queryValue,
  page_size: queryValue,
});

export type BookListQueryInput = z.infer<typeof bookListQuerySchema>;

export const bookIdSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().min(1).max(MAX_INT32));

export const bookDetailSchema = z.object({
  params: z.object({
    id: bookIdSchema,
  }),
});
