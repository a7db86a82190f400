import { BookDto, BookRecord } from '../types';

/**
 * Format a book record for API response
 */
export function toBookDto(book: BookRecord): BookDto {
  return {
    id: book.id,
    title: book.title,
    gutenberg_id: book.gutenbergId,
    download_count: book.downloadCount,
    authors: book.authors.map((author) => ({
      name: author.name,
      birth_year: author.birthYear,
      death_year: author.deathYear,
    })),
    languages: book.languages.map((code) => ({ code })),
    subjects: book.subjects.map((name) => ({ name })),
    bookshelves: book.bookshelves.map((name) => ({ name })),
    formats: book.formats.map((format) => ({
      mime_type: format.mimeType,
      url: format.url,
    })),
  };
}
