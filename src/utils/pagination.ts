import { PaginationParams } from '../types';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 25;
export const MAX_PAGE_SIZE = 100;

const POSITIVE_INT = /^\d+$/;

function parsePositiveInt(value: string | undefined): number | null {
  const trimmed = value?.trim() ?? '';
  if (!POSITIVE_INT.test(trimmed)) {
    return null;
  }
  const parsed = parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) && parsed >= 1 ? parsed : null;
}

/**
 * Parse pagination parameters from query string.
 * Invalid values fall back to defaults; oversized page sizes are clamped.
 */
export function parsePaginationParams(query: {
  page?: string;
  page_size?: string;
}): PaginationParams {
  const page = parsePositiveInt(query.page) ?? DEFAULT_PAGE;
  const pageSize = Math.min(parsePositiveInt(query.page_size) ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);

  return { page, pageSize };
}

/**
 * Calculate skip value for database queries.
 */
export function calculateSkip(page: number, pageSize: number): number {
  return (page - 1) * pageSize;
}

export function hasNextPage(total: number, page: number, pageSize: number): boolean {
  return page * pageSize < total;
}

export function hasPreviousPage(page: number): boolean {
  return page > 1;
}
