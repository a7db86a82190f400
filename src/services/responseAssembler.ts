/**
 * Response Assembler - wraps a page of books in the list envelope.
 */

import { BookDto, BookPageResponse } from '../types';
import { FILTER_PARAMS } from './filterParser';
import { PageSlice } from './paginationEngine';

export interface LinkContext {
  /** URL of the list endpoint, without a query string. */
  baseUrl: string;
  /** Raw values of the active filters (and explicit page_size) to carry over. */
  rawParams: Record<string, string>;
}

/**
 * URL of the list endpoint for a request. Without a Host header there is no
 * origin to build on, so the link stays relative to the server root.
 */
export function listEndpointUrl(protocol: string, host: string | undefined, pathname: string): string {
  return host ? `${protocol}://${host}${pathname}` : pathname;
}

/**
 * Build the URL of another page of the same listing. Page 1 is addressed
 * without a `page` parameter.
 */
export function buildPageUrl({ baseUrl, rawParams }: LinkContext, page: number): string {
  const search = new URLSearchParams();
  for (const param of FILTER_PARAMS) {
    const value = rawParams[param];
    if (value !== undefined) {
      search.append(param, value);
    }
  }
  if (page > 1) {
    search.append('page', String(page));
  }
  if (rawParams.page_size !== undefined) {
    search.append('page_size', rawParams.page_size);
  }

  const query = search.toString();
  return query ? `${baseUrl}?${query}` : baseUrl;
}

export function assembleBookPage(slice: PageSlice, results: BookDto[], context: LinkContext): BookPageResponse {
  return {
    count: results.length,
    count_total: slice.total,
    next: slice.hasNext ? buildPageUrl(context, slice.page + 1) : null,
    previous: slice.hasPrevious ? buildPageUrl(context, slice.page - 1) : null,
    results,
  };
}
