/**
 * Query Composer - builds the book list query from parsed filters.
 *
 * Every active filter becomes one independent criterion (the relation joins
 * it needs plus a predicate); criteria are ANDed, values inside a criterion
 * are ORed. Composition is pure: nothing here touches the store.
 *
 * Any criterion that joins a to-many relation can repeat a book once per
 * matching related row, so such queries are marked `distinct` and both the
 * count and the page select deduplicate on `b.id`.
 */

import { SqlValue } from '../db/client';
import { BookFilters } from '../types';

export type RelationJoin = 'authors' | 'languages' | 'subjects' | 'bookshelves' | 'formats';

/** Joins are always emitted in this order, whichever filters asked for them. */
const JOIN_ORDER: readonly RelationJoin[] = ['authors', 'languages', 'subjects', 'bookshelves', 'formats'];

const JOIN_SQL: Record<RelationJoin, string> = {
  authors:
    'INNER JOIN books_book_authors ba ON ba.book_id = b.id INNER JOIN books_author a ON a.id = ba.author_id',
  languages:
    'INNER JOIN books_book_languages bl ON bl.book_id = b.id INNER JOIN books_language l ON l.id = bl.language_id',
  // Topic matches subjects OR bookshelves, so a book lacking one side must survive the join
  subjects:
    'LEFT JOIN books_book_subjects bsu ON bsu.book_id = b.id LEFT JOIN books_subject s ON s.id = bsu.subject_id',
  bookshelves:
    'LEFT JOIN books_book_bookshelves bbs ON bbs.book_id = b.id LEFT JOIN books_bookshelf sh ON sh.id = bbs.bookshelf_id',
  formats: 'INNER JOIN books_format f ON f.book_id = b.id',
};

export const ORDER_BY_SQL = 'ORDER BY b.download_count DESC NULLS LAST, b.id ASC';

/** Adds a value to the parameter list and returns its placeholder. */
export type Bind = (value: SqlValue) => string;

export interface Criterion {
  filter: keyof BookFilters;
  joins: RelationJoin[];
  predicate: (bind: Bind) => string;
}

export interface BookQueryDescriptor {
  joins: RelationJoin[];
  criteria: Criterion[];
  distinct: boolean;
}

export interface CompiledQuery {
  text: string;
  values: SqlValue[];
}

/**
 * Escape LIKE metacharacters so the token matches literally, then wrap it
 * for a substring match.
 */
export function containsPattern(token: string): string {
  return `%${token.replace(/[\\%_]/g, '\\$&')}%`;
}

function inList(column: string, values: SqlValue[]): (bind: Bind) => string {
  return (bind) => `${column} IN (${values.map((value) => bind(value)).join(', ')})`;
}

function anyContains(columns: string[], tokens: string[]): (bind: Bind) => string {
  return (bind) =>
    tokens
      .flatMap((token) => {
        const placeholder = bind(containsPattern(token));
        return columns.map((column) => `${column} ILIKE ${placeholder}`);
      })
      .join(' OR ');
}

/**
 * One criterion per active filter, in a fixed order.
 */
export function buildCriteria(filters: BookFilters): Criterion[] {
  const criteria: Criterion[] = [];

  if (filters.gutenbergIds?.length) {
    criteria.push({
      filter: 'gutenbergIds',
      joins: [],
      predicate: inList('b.gutenberg_id', filters.gutenbergIds),
    });
  }

  if (filters.languages?.length) {
    criteria.push({
      filter: 'languages',
      joins: ['languages'],
      predicate: inList('l.code', filters.languages),
    });
  }

  if (filters.topics?.length) {
    criteria.push({
      filter: 'topics',
      joins: ['subjects', 'bookshelves'],
      predicate: anyContains(['s.name', 'sh.name'], filters.topics),
    });
  }

  if (filters.mimeTypes?.length) {
    criteria.push({
      filter: 'mimeTypes',
      joins: ['formats'],
      predicate: inList('f.mime_type', filters.mimeTypes),
    });
  }

  if (filters.authors?.length) {
    criteria.push({
      filter: 'authors',
      joins: ['authors'],
      predicate: anyContains(['a.name'], filters.authors),
    });
  }

  if (filters.titles?.length) {
    criteria.push({
      filter: 'titles',
      joins: [],
      predicate: anyContains(['b.title'], filters.titles),
    });
  }

  return criteria;
}

export function composeBookQuery(filters: BookFilters): BookQueryDescriptor {
  const criteria = buildCriteria(filters);
  const requested = new Set(criteria.flatMap((criterion) => criterion.joins));
  const joins = JOIN_ORDER.filter((join) => requested.has(join));

  return {
    joins,
    criteria,
    distinct: joins.length > 0,
  };
}

/**
 * FROM/JOIN/WHERE shared by the count and the page query, so both see the
 * same filtered set.
 */
function compileFromWhere(descriptor: BookQueryDescriptor, values: SqlValue[]): string {
  const bind: Bind = (value) => {
    values.push(value);
    return `$${values.length}`;
  };

  const clauses = ['FROM books_book b', ...descriptor.joins.map((join) => JOIN_SQL[join])];
  if (descriptor.criteria.length > 0) {
    const where = descriptor.criteria.map((criterion) => `(${criterion.predicate(bind)})`).join(' AND ');
    clauses.push(`WHERE ${where}`);
  }
  return clauses.join(' ');
}

export function compileCountQuery(descriptor: BookQueryDescriptor): CompiledQuery {
  const values: SqlValue[] = [];
  const fromWhere = compileFromWhere(descriptor, values);
  const counted = descriptor.distinct ? 'DISTINCT b.id' : '*';

  return {
    text: `SELECT COUNT(${counted})::int AS total ${fromWhere}`,
    values,
  };
}

export function compilePageQuery(descriptor: BookQueryDescriptor, limit: number, offset: number): CompiledQuery {
  const values: SqlValue[] = [];
  const fromWhere = compileFromWhere(descriptor, values);
  const select = descriptor.distinct ? 'SELECT DISTINCT' : 'SELECT';
  values.push(limit, offset);

  return {
    text: `${select} b.id, b.download_count ${fromWhere} ${ORDER_BY_SQL} LIMIT $${values.length - 1} OFFSET $${values.length}`,
    values,
  };
}
