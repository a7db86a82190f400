// Pagination types
export interface PaginationParams {
  page: number;
  pageSize: number;
}

// Filters recognized by GET /api/books, already parsed and normalized
export interface BookFilters {
  gutenbergIds?: number[];
  languages?: string[];
  topics?: string[];
  mimeTypes?: string[];
  authors?: string[];
  titles?: string[];
}

export interface BookListQuery extends PaginationParams {
  filters: BookFilters;
  /**
   * Raw (trimmed) query-string values of the active filters, keyed by
   * query parameter name. Used to rebuild next/previous links.
   */
  rawParams: Record<string, string>;
}

// Storage-side records, as hydrated by the book repository
export interface AuthorRecord {
  name: string;
  birthYear: number | null;
  deathYear: number | null;
}

export interface FormatRecord {
  mimeType: string;
  url: string;
}

export interface BookRecord {
  id: number;
  gutenbergId: number;
  title: string | null;
  downloadCount: number | null;
  mediaType: string;
  authors: AuthorRecord[];
  languages: string[];
  subjects: string[];
  bookshelves: string[];
  formats: FormatRecord[];
}

// Wire shapes
export interface AuthorDto {
  name: string;
  birth_year: number | null;
  death_year: number | null;
}

export interface LanguageDto {
  code: string;
}

export interface SubjectDto {
  name: string;
}

export interface BookshelfDto {
  name: string;
}

export interface FormatDto {
  mime_type: string;
  url: string;
}

export interface BookDto {
  id: number;
  title: string | null;
  gutenberg_id: number;
  download_count: number | null;
  authors: AuthorDto[];
  languages: LanguageDto[];
  subjects: SubjectDto[];
  bookshelves: BookshelfDto[];
  formats: FormatDto[];
}

export interface BookPageResponse {
  count: number;
  count_total: number;
  next: string | null;
  previous: string | null;
  results: BookDto[];
}
