import { BookSeedData } from '../db/seed';

/**
 * Small catalog shared by the store-backed tests. Seeded in this order, so
 * ids run 1..8; by download count the order is
 * 1342, 84, 11, 76, 74, 2000, 3176, 17989 (17989 has no count).
 */
export const CATALOG: BookSeedData[] = [
  {
    gutenberg_id: 1342,
    title: 'A Tale of Orchard Lane',
    download_count: 5000,
    authors: [{ name: 'Holloway, Jane', birth_year: 1775, death_year: 1817 }],
    languages: ['en'],
    subjects: ['Courtship -- Fiction', 'Sisters -- Fiction'],
    bookshelves: ['Best Books Ever Listings'],
    formats: [
      { mime_type: 'text/html', url: 'https://catalog.test/ebooks/1342.html.images' },
      { mime_type: 'application/epub+zip', url: 'https://catalog.test/ebooks/1342.epub3.images' },
    ],
  },
  {
    gutenberg_id: 84,
    title: 'The Clockwork Physician',
    download_count: 4000,
    authors: [{ name: 'Wollen, Mary', birth_year: 1797, death_year: 1851 }],
    languages: ['en'],
    subjects: ['Science fiction', 'Monsters -- Fiction'],
    bookshelves: ['Gothic Fiction'],
    formats: [{ mime_type: 'text/plain', url: 'https://catalog.test/ebooks/84.txt.utf-8' }],
  },
  {
    gutenberg_id: 11,
    title: 'Wanderings of a Curious Child',
    download_count: 3500,
    authors: [{ name: 'Carrow, Lewis', birth_year: 1832, death_year: 1898 }],
    languages: ['en'],
    subjects: ['Fantasy fiction', "Children's stories"],
    bookshelves: ["Children's Literature"],
    formats: [
      { mime_type: 'text/html', url: 'https://catalog.test/ebooks/11.html.images' },
      { mime_type: 'application/epub+zip', url: 'https://catalog.test/ebooks/11.epub3.images' },
    ],
  },
  {
    gutenberg_id: 76,
    title: 'River Adventures of Huck',
    download_count: 3000,
    authors: [{ name: 'Twain, Mark', birth_year: 1835, death_year: 1910 }],
    languages: ['en'],
    subjects: ['Adventure stories', 'Boys -- Fiction'],
    bookshelves: ['Banned Books'],
    formats: [
      { mime_type: 'text/html', url: 'https://catalog.test/ebooks/76.html.images' },
      { mime_type: 'text/plain', url: 'https://catalog.test/ebooks/76.txt.utf-8' },
    ],
  },
  {
    gutenberg_id: 74,
    title: 'The Sawyer Chronicle',
    download_count: 2500,
    authors: [{ name: 'Twain, Mark', birth_year: 1835, death_year: 1910 }],
    languages: ['en'],
    subjects: ['Adventure stories', 'Child characters'],
    bookshelves: ["Children's Book Series", 'Adventure'],
    formats: [{ mime_type: 'application/epub+zip', url: 'https://catalog.test/ebooks/74.epub3.images' }],
  },
  {
    gutenberg_id: 3176,
    title: 'Innocents on the Road',
    download_count: 800,
    authors: [
      { name: 'Twain, Mark', birth_year: 1835, death_year: 1910 },
      { name: 'Warner, Charles Dudley', birth_year: 1829, death_year: 1900 },
    ],
    languages: ['en', 'fr'],
    subjects: ['Travel'],
    bookshelves: [],
    formats: [{ mime_type: 'text/plain', url: 'https://catalog.test/ebooks/3176.txt.utf-8' }],
  },
  {
    gutenberg_id: 17989,
    title: 'Le Comte de la Mer',
    download_count: null,
    authors: [{ name: 'Dumaine, Alexandre', birth_year: null, death_year: null }],
    languages: ['fr'],
    subjects: ['Adventure stories'],
    bookshelves: [],
    formats: [{ mime_type: 'text/html', url: 'https://catalog.test/ebooks/17989.html.images' }],
  },
  {
    gutenberg_id: 2000,
    title: null,
    download_count: 1200,
    media_type: 'Sound',
    languages: ['es'],
  },
];

/** Gutenberg ids of CATALOG in list order (download count desc, nulls last). */
export const CATALOG_ORDER = [1342, 84, 11, 76, 74, 2000, 3176, 17989];

/**
 * `count` generated books sharing one subject, with strictly decreasing
 * download counts so their list order is their insertion order.
 */
export function makeBooks(count: number, subject: string, firstGutenbergId = 50000): BookSeedData[] {
  return Array.from({ length: count }, (_, index) => ({
    gutenberg_id: firstGutenbergId + index,
    title: `Generated Volume ${index + 1}`,
    download_count: 10000 - index,
    authors: [{ name: `Author ${index % 3}` }],
    languages: ['en'],
    subjects: [subject],
    formats: [{ mime_type: 'text/plain', url: `https://catalog.test/ebooks/${firstGutenbergId + index}.txt` }],
  }));
}
