/**
 * Books Endpoints Integration Tests
 *
 * Tests for:
 * - List envelope, filters and pagination links
 * - Following next links across the whole catalog
 * - Book detail and not-found handling
 * - Store failures surfacing as server errors
 */

import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../app';
import { Database } from '../db/client';
import { silentLogger } from '../utils/logger';
import { CATALOG, CATALOG_ORDER } from '../test/fixtures';
import { createTestDatabase, createUnreachableDatabase } from '../test/pgliteDatabase';

function pathOf(link: string): string {
  const url = new URL(link);
  return `${url.pathname}${url.search}`;
}

describe('Books Endpoints', () => {
  let db: Database;
  let app: Application;

  beforeAll(async () => {
    db = await createTestDatabase(CATALOG);
    app = createApp({ db, logger: silentLogger });
  });

  afterAll(async () => {
    await db.close();
  });

  describe('GET /api/books', () => {
    it('should return the paginated envelope', async () => {
      const response = await request(app).get('/api/books');

      expect(response.status).toBe(200);
      expect(Object.keys(response.body)).toEqual(['count', 'count_total', 'next', 'previous', 'results']);
      expect(response.body.count).toBe(8);
      expect(response.body.count_total).toBe(8);
      expect(response.body.next).toBeNull();
      expect(response.body.previous).toBeNull();
    });

    it('should filter by comma-separated gutenberg ids', async () => {
      const response = await request(app).get('/api/books').query({ gutenberg_id: '1342,84,11' });

      expect(response.status).toBe(200);
      expect(response.body.results.map((b: { gutenberg_id: number }) => b.gutenberg_id)).toEqual([1342, 84, 11]);
    });

    it('should combine mime type and author filters', async () => {
      const response = await request(app)
        .get('/api/books')
        .query({ mime_type: 'text/html,application/epub+zip', author: 'twain' });

      expect(response.status).toBe(200);
      expect(response.body.count_total).toBe(2);
      expect(response.body.results.map((b: { gutenberg_id: number }) => b.gutenberg_id)).toEqual([76, 74]);
    });

    it('should never fail on malformed filter or pagination values', async () => {
      const response = await request(app)
        .get('/api/books')
        .query({ gutenberg_id: 'abc', page: 'first', page_size: '-3' });

      expect(response.status).toBe(200);
      expect(response.body.count_total).toBe(8);
      expect(response.body.count).toBe(8);
    });

    it('should build absolute links that keep the filters', async () => {
      const response = await request(app).get('/api/books').query({ language: 'en', page: '2', page_size: '2' });

      expect(pathOf(response.body.next)).toBe('/api/books/?language=en&page=3&page_size=2');
      expect(pathOf(response.body.previous)).toBe('/api/books/?language=en&page_size=2');
      expect(response.body.next).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/api\/books\//);
    });

    it('should visit every book exactly once when following next links', async () => {
      const visited: number[] = [];
      let link: string | null = '/api/books?page_size=3';
      let pages = 0;

      while (link) {
        const response = await request(app).get(link);
        expect(response.status).toBe(200);
        visited.push(...response.body.results.map((b: { gutenberg_id: number }) => b.gutenberg_id));
        link = response.body.next ? pathOf(response.body.next) : null;
        pages++;
      }

      expect(pages).toBe(3);
      expect(visited).toEqual(CATALOG_ORDER);
    });

    it('should return an empty page with a previous link past the last page', async () => {
      const response = await request(app).get('/api/books').query({ page: '9', page_size: '5' });

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(0);
      expect(response.body.count_total).toBe(8);
      expect(response.body.results).toEqual([]);
      expect(response.body.next).toBeNull();
      expect(pathOf(response.body.previous)).toBe('/api/books/?page=8&page_size=5');
    });

    it('should ignore a malformed JSON body on a list request', async () => {
      const response = await request(app)
        .get('/api/books')
        .query({ page_size: '3' })
        .set('Content-Type', 'application/json')
        .send('{bad');

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(3);
      expect(response.body.count_total).toBe(8);
    });

    it('should use the forwarded protocol when trusting a proxy', async () => {
      const proxied = createApp({ db, logger: silentLogger, trustProxy: true });

      const response = await request(proxied)
        .get('/api/books')
        .set('X-Forwarded-Proto', 'https')
        .query({ page_size: '3' });

      expect(response.body.next).toMatch(/^https:\/\//);
    });
  });

  describe('GET /api/books/:id', () => {
    it('should return one book', async () => {
      const response = await request(app).get('/api/books/4');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        id: 4,
        title: 'River Adventures of Huck',
        gutenberg_id: 76,
        download_count: 3000,
        authors: [{ name: 'Twain, Mark', birth_year: 1835, death_year: 1910 }],
        languages: [{ code: 'en' }],
        subjects: [{ name: 'Adventure stories' }, { name: 'Boys -- Fiction' }],
        bookshelves: [{ name: 'Banned Books' }],
        formats: [
          { mime_type: 'text/html', url: 'https://catalog.test/ebooks/76.html.images' },
          { mime_type: 'text/plain', url: 'https://catalog.test/ebooks/76.txt.utf-8' },
        ],
      });
    });

    it('should accept a trailing slash', async () => {
      const response = await request(app).get('/api/books/4/');

      expect(response.status).toBe(200);
      expect(response.body.gutenberg_id).toBe(76);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request(app).get('/api/books/999');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: { code: 'BOOK_NOT_FOUND', message: 'Book 999 not found' },
      });
    });

    it.each(['abc', '0', '99999999999', '1.5'])('should return 404 for the id %p', async (id) => {
      const response = await request(app).get(`/api/books/${id}`);

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: { code: 'BOOK_NOT_FOUND', message: 'Book not found' },
      });
    });
  });

  describe('GET /api/openapi.json', () => {
    it('should describe the catalog endpoints', async () => {
      const response = await request(app).get('/api/openapi.json');

      expect(response.status).toBe(200);
      expect(response.body.openapi).toBe('3.0.3');
      expect(Object.keys(response.body.paths)).toEqual(['/api/books', '/api/books/{id}', '/health']);
      expect(Object.keys(response.body.components.schemas.BookPage.properties)).toEqual([
        'count',
        'count_total',
        'next',
        'previous',
        'results',
      ]);
    });
  });

  describe('unknown routes', () => {
    it('should return the generic 404 body', async () => {
      const response = await request(app).get('/api/authors');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Resource not found' } });
    });
  });

  describe('GET /health', () => {
    it('should report the store as up', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok', database: 'up' });
    });
  });

  describe('when the store is unreachable', () => {
    const broken = createApp({ db: createUnreachableDatabase(), logger: silentLogger });

    it('should fail the list endpoint with a store error', async () => {
      const response = await request(broken).get('/api/books');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        error: { code: 'STORE_ERROR', message: 'Could not connect to the catalog store' },
      });
    });

    it('should fail the detail endpoint with a store error rather than 404', async () => {
      const response = await request(broken).get('/api/books/1');

      expect(response.status).toBe(500);
      expect(response.body.error.code).toBe('STORE_ERROR');
    });

    it('should report the health check as degraded', async () => {
      const response = await request(broken).get('/health');

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ status: 'degraded', database: 'down' });
    });
  });
});
