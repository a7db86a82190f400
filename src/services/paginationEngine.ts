/**
 * Pagination Engine - executes a composed book query one page at a time.
 *
 * The total is counted before slicing, over the same deduplicated set the
 * page is taken from, and both run on one store connection.
 */

import { QueryClient } from '../db/client';
import { PaginationParams } from '../types';
import { calculateSkip, hasNextPage, hasPreviousPage } from '../utils/pagination';
import { BookQueryDescriptor, compileCountQuery, compilePageQuery } from './queryComposer';

export interface PageSlice extends PaginationParams {
  total: number;
  /** Book ids of the requested page, in query order. */
  ids: number[];
  hasNext: boolean;
  hasPrevious: boolean;
}

export async function countBooks(client: QueryClient, descriptor: BookQueryDescriptor): Promise<number> {
  const { text, values } = compileCountQuery(descriptor);
  const [row] = await client.query<{ total: number }>(text, values);
  return row ? Number(row.total) : 0;
}

export async function selectPageIds(
  client: QueryClient,
  descriptor: BookQueryDescriptor,
  { page, pageSize }: PaginationParams
): Promise<number[]> {
  const { text, values } = compilePageQuery(descriptor, pageSize, calculateSkip(page, pageSize));
  const rows = await client.query<{ id: number }>(text, values);
  return rows.map((row) => Number(row.id));
}

/**
 * Count, then slice. Pages past the end come back empty, not as errors.
 * Callers pass the connection they go on to hydrate the page with.
 */
export async function paginateWith(
  client: QueryClient,
  descriptor: BookQueryDescriptor,
  params: PaginationParams
): Promise<PageSlice> {
  const { page, pageSize } = params;
  const total = await countBooks(client, descriptor);
  const beyondEnd = calculateSkip(page, pageSize) >= total;
  const ids = beyondEnd ? [] : await selectPageIds(client, descriptor, params);

  return {
    page,
    pageSize,
    total,
    ids,
    hasNext: hasNextPage(total, page, pageSize),
    hasPrevious: hasPreviousPage(page),
  };
}
