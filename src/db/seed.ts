import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import config from '../config';
import { createLogger } from '../utils/logger';
import { QueryClient, createPool, createPoolDatabase, readSchemaSql } from './client';

const authorSeedSchema = z.object({
  name: z.string().min(1),
  birth_year: z.number().int().nullable().default(null),
  death_year: z.number().int().nullable().default(null),
});

const bookSeedSchema = z.object({
  gutenberg_id: z.number().int().nonnegative(),
  title: z.string().nullable().default(null),
  download_count: z.number().int().nullable().default(null),
  media_type: z.string().default('Text'),
  authors: z.array(authorSeedSchema).default([]),
  languages: z.array(z.string().min(1)).default([]),
  subjects: z.array(z.string().min(1)).default([]),
  bookshelves: z.array(z.string().min(1)).default([]),
  formats: z.array(z.object({ mime_type: z.string().min(1), url: z.string().min(1) })).default([]),
});

export const catalogSeedSchema = z.array(bookSeedSchema);

export type BookSeedData = z.input<typeof bookSeedSchema>;

export interface SeedResult {
  books: number;
  skipped: number;
  authors: number;
  formats: number;
}

export async function applySchema(client: QueryClient): Promise<void> {
  const statements = readSchemaSql()
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

  for (const statement of statements) {
    await client.query(statement);
  }
}

/**
 * Finds a row by a lookup query or inserts it, caching ids for the run.
 */
class LookupTable {
  private readonly ids = new Map<string, number>();
  created = 0;

  constructor(
    private readonly client: QueryClient,
    private readonly selectSql: string,
    private readonly insertSql: string
  ) {}

  async resolve(key: string, values: (string | number | null)[]): Promise<number> {
    const cached = this.ids.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const [existing] = await this.client.query<{ id: number }>(this.selectSql, values);
    let id = existing?.id;
    if (id === undefined) {
      const [inserted] = await this.client.query<{ id: number }>(this.insertSql, values);
      if (!inserted) {
        throw new Error(`Insert returned no id for ${key}`);
      }
      id = inserted.id;
      this.created++;
    }

    this.ids.set(key, id);
    return id;
  }
}

/**
 * Load catalog entries. gutenberg_id is not unique (one work can ship as
 * several media types or editions), so an entry is only skipped when a book
 * with the same gutenberg_id, title and media_type is already stored.
 * Re-running the seed with the same file is a no-op.
 */
export async function seedCatalog(client: QueryClient, entries: BookSeedData[]): Promise<SeedResult> {
  const books = catalogSeedSchema.parse(entries);

  const authors = new LookupTable(
    client,
    'SELECT id FROM books_author WHERE name = $1 AND birth_year IS NOT DISTINCT FROM $2::smallint AND death_year IS NOT DISTINCT FROM $3::smallint',
    'INSERT INTO books_author (name, birth_year, death_year) VALUES ($1, $2, $3) RETURNING id'
  );
  const languages = new LookupTable(
    client,
    'SELECT id FROM books_language WHERE code = $1',
    'INSERT INTO books_language (code) VALUES ($1) RETURNING id'
  );
  const subjects = new LookupTable(
    client,
    'SELECT id FROM books_subject WHERE name = $1',
    'INSERT INTO books_subject (name) VALUES ($1) RETURNING id'
  );
  const bookshelves = new LookupTable(
    client,
    'SELECT id FROM books_bookshelf WHERE name = $1',
    'INSERT INTO books_bookshelf (name) VALUES ($1) RETURNING id'
  );

  const result: SeedResult = { books: 0, skipped: 0, authors: 0, formats: 0 };

  for (const book of books) {
    const [existing] = await client.query<{ id: number }>(
      'SELECT id FROM books_book WHERE gutenberg_id = $1 AND title IS NOT DISTINCT FROM $2::text AND media_type = $3',
      [book.gutenberg_id, book.title, book.media_type]
    );
    if (existing) {
      result.skipped++;
      continue;
    }

    const [inserted] = await client.query<{ id: number }>(
      'INSERT INTO books_book (download_count, gutenberg_id, media_type, title) VALUES ($1, $2, $3, $4) RETURNING id',
      [book.download_count, book.gutenberg_id, book.media_type, book.title]
    );
    if (!inserted) {
      throw new Error(`Insert returned no id for gutenberg_id ${book.gutenberg_id}`);
    }
    const bookId = inserted.id;

    for (const author of book.authors) {
      const key = `${author.name}|${author.birth_year}|${author.death_year}`;
      const authorId = await authors.resolve(key, [author.name, author.birth_year, author.death_year]);
      await client.query('INSERT INTO books_book_authors (book_id, author_id) VALUES ($1, $2)', [bookId, authorId]);
    }

    for (const code of book.languages) {
      const normalized = code.toLowerCase();
      const languageId = await languages.resolve(normalized, [normalized]);
      await client.query('INSERT INTO books_book_languages (book_id, language_id) VALUES ($1, $2)', [
        bookId,
        languageId,
      ]);
    }

    for (const name of book.subjects) {
      const subjectId = await subjects.resolve(name, [name]);
      await client.query('INSERT INTO books_book_subjects (book_id, subject_id) VALUES ($1, $2)', [bookId, subjectId]);
    }

    for (const name of book.bookshelves) {
      const bookshelfId = await bookshelves.resolve(name, [name]);
      await client.query('INSERT INTO books_book_bookshelves (book_id, bookshelf_id) VALUES ($1, $2)', [
        bookId,
        bookshelfId,
      ]);
    }

    for (const format of book.formats) {
      await client.query('INSERT INTO books_format (mime_type, url, book_id) VALUES ($1, $2, $3)', [
        format.mime_type,
        format.url,
        bookId,
      ]);
      result.formats++;
    }

    result.books++;
  }

  result.authors = authors.created;
  return result;
}

export function readCatalogFile(filePath: string): BookSeedData[] {
  return catalogSeedSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}

async function main(): Promise<void> {
  const logger = createLogger(config.logLevel, 'seed');
  const catalogPath = path.resolve(process.argv[2] ?? path.join(process.cwd(), 'catalog.json'));
  const db = createPoolDatabase(createPool());

  try {
    const entries = readCatalogFile(catalogPath);
    logger.info(`Seeding ${entries.length} catalog entries from ${catalogPath}`);

    const result = await db.transaction(async (client) => {
      await applySchema(client);
      return seedCatalog(client, entries);
    });

    logger.info(
      `Seeded ${result.books} books (${result.skipped} already present), ${result.authors} new authors, ${result.formats} formats`
    );
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Seeding failed:', error);
    process.exit(1);
  });
}
