/**
 * Book Repository - loads full book records with their related rows.
 *
 * One query for the books and one per relation, keyed by book id, instead of
 * a row per (book, author, subject, ...) combination.
 */

import { QueryClient } from '../db/client';
import { AuthorRecord, BookRecord, FormatRecord } from '../types';

interface BookRow {
  id: number;
  gutenberg_id: number;
  title: string | null;
  download_count: number | null;
  media_type: string;
}

interface AuthorRow {
  book_id: number;
  name: string;
  birth_year: number | null;
  death_year: number | null;
}

interface NameRow {
  book_id: number;
  name: string;
}

interface FormatRow {
  book_id: number;
  mime_type: string;
  url: string;
}

function placeholders(count: number): string {
  return Array.from({ length: count }, (_, index) => `$${index + 1}`).join(', ');
}

function groupByBook<R extends { book_id: number }, T>(rows: R[], project: (row: R) => T): Map<number, T[]> {
  const grouped = new Map<number, T[]>();
  for (const row of rows) {
    const bookId = Number(row.book_id);
    const bucket = grouped.get(bookId);
    if (bucket) {
      bucket.push(project(row));
    } else {
      grouped.set(bookId, [project(row)]);
    }
  }
  return grouped;
}

/**
 * Load books by id, returned in the order of `ids`. Unknown ids are skipped.
 */
export async function findBooksByIds(client: QueryClient, ids: readonly number[]): Promise<BookRecord[]> {
  if (ids.length === 0) {
    return [];
  }

  const inIds = placeholders(ids.length);
  const bookRows = await client.query<BookRow>(
    `SELECT id, gutenberg_id, title, download_count, media_type FROM books_book WHERE id IN (${inIds})`,
    ids
  );
  if (bookRows.length === 0) {
    return [];
  }

  const authorRows = await client.query<AuthorRow>(
    `SELECT ba.book_id, a.name, a.birth_year, a.death_year
       FROM books_book_authors ba
       INNER JOIN books_author a ON a.id = ba.author_id
      WHERE ba.book_id IN (${inIds})
      ORDER BY ba.id`,
    ids
  );
  const languageRows = await client.query<NameRow>(
    `SELECT bl.book_id, l.code AS name
       FROM books_book_languages bl
       INNER JOIN books_language l ON l.id = bl.language_id
      WHERE bl.book_id IN (${inIds})
      ORDER BY bl.id`,
    ids
  );
  const subjectRows = await client.query<NameRow>(
    `SELECT bs.book_id, s.name
       FROM books_book_subjects bs
       INNER JOIN books_subject s ON s.id = bs.subject_id
      WHERE bs.book_id IN (${inIds})
      ORDER BY bs.id`,
    ids
  );
  const bookshelfRows = await client.query<NameRow>(
    `SELECT bb.book_id, sh.name
       FROM books_book_bookshelves bb
       INNER JOIN books_bookshelf sh ON sh.id = bb.bookshelf_id
      WHERE bb.book_id IN (${inIds})
      ORDER BY bb.id`,
    ids
  );
  const formatRows = await client.query<FormatRow>(
    `SELECT book_id, mime_type, url FROM books_format WHERE book_id IN (${inIds}) ORDER BY id`,
    ids
  );

  const authors = groupByBook<AuthorRow, AuthorRecord>(authorRows, (row) => ({
    name: row.name,
    birthYear: row.birth_year,
    deathYear: row.death_year,
  }));
  const languages = groupByBook(languageRows, (row) => row.name);
  const subjects = groupByBook(subjectRows, (row) => row.name);
  const bookshelves = groupByBook(bookshelfRows, (row) => row.name);
  const formats = groupByBook<FormatRow, FormatRecord>(formatRows, (row) => ({
    mimeType: row.mime_type,
    url: row.url,
  }));

  const byId = new Map<number, BookRecord>();
  for (const row of bookRows) {
    const id = Number(row.id);
    byId.set(id, {
      id,
      gutenbergId: row.gutenberg_id,
      title: row.title,
      downloadCount: row.download_count,
      mediaType: row.media_type,
      authors: authors.get(id) ?? [],
      languages: languages.get(id) ?? [],
      subjects: subjects.get(id) ?? [],
      bookshelves: bookshelves.get(id) ?? [],
      formats: formats.get(id) ?? [],
    });
  }

  return ids.flatMap((id) => {
    const book = byId.get(id);
    return book ? [book] : [];
  });
}

export async function findBookById(client: QueryClient, id: number): Promise<BookRecord | null> {
  const [book] = await findBooksByIds(client, [id]);
  return book ?? null;
}
