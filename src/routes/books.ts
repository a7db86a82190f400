/**
 * Books Routes - Read-only catalog endpoints
 *
 * GET /api/books     - List books with filters and pagination
 * GET /api/books/:id - Get one book
 */

import { Router, Request, Response, NextFunction } from 'express';
import { validate } from '../middleware';
import { bookDetailSchema } from '../schemas';
import { BookService } from '../services/bookService';
import { parseBookListQuery } from '../services/filterParser';
import { listEndpointUrl } from '../services/responseAssembler';
import { NotFoundError } from '../utils/errors';

export function createBooksRouter(bookService: BookService): Router {
  const router = Router();

  /**
   * GET /api/books
   *
   * List books, most downloaded first.
   *
   * Query Parameters (each optional, comma-separated):
   * - gutenberg_id: Gutenberg catalog ids
   * - language: Language codes (exact, case-insensitive)
   * - topic: Subject or bookshelf (partial match, case-insensitive)
   * - mime_type: Format MIME types (exact)
   * - author: Author name (partial match, case-insensitive)
   * - title: Title (partial match, case-insensitive)
   * - page: Page number (default: 1)
   * - page_size: Items per page (default: 25, max: 100)
   *
   * Response:
   * - 200: { count, count_total, next, previous, results }
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = parseBookListQuery(req.query);
      const result = await bookService.listBooks(
        query,
        listEndpointUrl(req.protocol, req.get('host'), `${req.baseUrl}${req.path}`)
      );

      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/books/:id
   *
   * Response:
   * - 200: Book
   * - 404: No book with this id
   */
  router.get(
    '/:id',
    validate(bookDetailSchema, () => new NotFoundError('BOOK_NOT_FOUND', 'Book not found')),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const book = await bookService.getBookById(Number(req.params.id));

        res.status(200).json(book);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
