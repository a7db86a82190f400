/**
 * Book Service - Handles book listing and retrieval operations
 *
 * Key features:
 * - listBooks() - Filtered, deduplicated, paginated listing
 * - getBookById() - Single book lookup
 */

import { Database } from '../db/client';
import { findBookById, findBooksByIds } from '../repositories/bookRepository';
import { BookDto, BookFilters, BookListQuery, BookPageResponse } from '../types';
import { NotFoundError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { toBookDto } from './bookSerializer';
import { paginateWith } from './paginationEngine';
import { composeBookQuery } from './queryComposer';
import { assembleBookPage } from './responseAssembler';

function describeFilters(filters: BookFilters): Record<string, unknown> {
  return Object.fromEntries(Object.entries(filters).filter(([, values]) => values !== undefined));
}

export class BookService {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger
  ) {}

  /**
   * List books matching every active filter, most downloaded first.
   *
   * @param query - Parsed filters and pagination
   * @param baseUrl - Absolute URL of the list endpoint, used for next/previous links
   */
  async listBooks(query: BookListQuery, baseUrl: string): Promise<BookPageResponse> {
    const { filters, page, pageSize, rawParams } = query;
    const descriptor = composeBookQuery(filters);
    const applied = describeFilters(filters);

    if (Object.keys(applied).length > 0) {
      this.logger.info('Applied filters', applied);
    } else {
      this.logger.info('No filters applied');
    }

    const { slice, books } = await this.db.withClient(async (client) => {
      const pageSlice = await paginateWith(client, descriptor, { page, pageSize });
      const records = await findBooksByIds(client, pageSlice.ids);
      return { slice: pageSlice, books: records };
    });

    this.logger.info(`Returned page ${page} with ${books.length} results out of ${slice.total} total matches`);

    return assembleBookPage(slice, books.map(toBookDto), { baseUrl, rawParams });
  }

  /**
   * Get a single book by its catalog id
   *
   * @throws NotFoundError when no book has this id
   */
  async getBookById(id: number): Promise<BookDto> {
    const book = await this.db.withClient((client) => findBookById(client, id));

    if (!book) {
      this.logger.warn(`Book ${id} not found`);
      throw new NotFoundError('BOOK_NOT_FOUND', `Book ${id} not found`);
    }

    this.logger.info(`Retrieved book: '${book.title ?? `Book ${book.id}`}'`, {
      id: book.id,
      gutenbergId: book.gutenbergId,
    });
    return toBookDto(book);
  }
}
