/**
 * Filter Parser - turns raw GET /api/books query parameters into typed filters.
 *
 * Never throws: malformed tokens are dropped, a filter whose tokens are all
 * malformed is treated as absent, and bad pagination values use defaults.
 */

import { BookListQueryInput, MAX_INT32, bookListQuerySchema } from '../schemas';
import { BookFilters, BookListQuery } from '../types';
import { parsePaginationParams } from '../utils/pagination';

const DIGITS = /^\d+$/;

export type FilterParam = Exclude<keyof BookListQueryInput, 'page' | 'page_size'>;

/**
 * Query parameters that carry filters, in the order they are echoed back
 * into pagination links.
 */
export const FILTER_PARAMS: readonly FilterParam[] = [
  'gutenberg_id',
  'language',
  'topic',
  'mime_type',
  'author',
  'title',
];

/**
 * Split a comma-separated value into trimmed, non-empty tokens.
 */
export function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

export function parseGutenbergIds(value: string | undefined): number[] {
  return splitList(value)
    .filter((token) => DIGITS.test(token))
    .map((token) => parseInt(token, 10))
    .filter((id) => id <= MAX_INT32);
}

export function parseLanguageCodes(value: string | undefined): string[] {
  return splitList(value).map((code) => code.toLowerCase());
}

export function parseBookListQuery(query: unknown): BookListQuery {
  const input = bookListQuerySchema.parse(query);
  const rawParams: Record<string, string> = {};

  // Registers the raw value of a filter only when it yields at least one token
  const active = <T>(param: FilterParam, values: T[]): T[] | undefined => {
    const raw = input[param];
    if (raw === undefined || values.length === 0) {
      return undefined;
    }
    rawParams[param] = raw.trim();
    return values;
  };

  const filters: BookFilters = {
    gutenbergIds: active('gutenberg_id', parseGutenbergIds(input.gutenberg_id)),
    languages: active('language', parseLanguageCodes(input.language)),
    topics: active('topic', splitList(input.topic)),
    mimeTypes: active('mime_type', splitList(input.mime_type)),
    authors: active('author', splitList(input.author)),
    titles: active('title', splitList(input.title)),
  };

  const { page, pageSize } = parsePaginationParams({ page: input.page, page_size: input.page_size });
  if (input.page_size !== undefined) {
    rawParams.page_size = String(pageSize);
  }

  return { filters, page, pageSize, rawParams };
}
