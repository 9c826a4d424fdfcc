/**
 * Library Database Module
 * Read-only access to a calibre library's metadata.db
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { METADATA_FILE } from './library-locator.js';
import type { BookFormat, BookRecord } from './types.js';

export class LibraryLoadError extends Error {
  readonly libraryPath: string;

  constructor(libraryPath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LibraryLoadError';
    this.libraryPath = libraryPath;
  }
}

const bookRowSchema = z.object({
  id: z.number().int(),
  title: z.string().nullable(),
  path: z.string().nullable(),
  uuid: z.string().nullable(),
  timestamp: z.string().nullable(),
  has_cover: z.union([z.number(), z.boolean(), z.null()])
});

const linkRowSchema = z.object({
  book: z.number().int(),
  name: z.string()
});

const formatRowSchema = z.object({
  book: z.number().int(),
  format: z.string(),
  name: z.string()
});

const countRowSchema = z.object({ count: z.number().int() });

const BOOKS_SQL = `
  SELECT id, title, path, uuid, timestamp, has_cover
  FROM books
  ORDER BY sort COLLATE NOCASE, id
`;

const AUTHORS_SQL = `
  SELECT l.book AS book, a.name AS name
  FROM books_authors_link l
  JOIN authors a ON a.id = l.author
  ORDER BY l.book, l.id
`;

const TAGS_SQL = `
  SELECT l.book AS book, t.name AS name
  FROM books_tags_link l
  JOIN tags t ON t.id = l.tag
  ORDER BY l.book, t.name COLLATE NOCASE
`;

const FORMATS_SQL = `
  SELECT book, format, name
  FROM data
  ORDER BY book, format
`;

function groupByBook<T extends { book: number }>(rows: T[]): Map<number, T[]> {
  const groups = new Map<number, T[]>();
  for (const row of rows) {
    const group = groups.get(row.book);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.book, [row]);
    }
  }
  return groups;
}

export class LibraryDatabase {
  readonly libraryPath: string;
  private db: Database.Database;

  private constructor(libraryPath: string, db: Database.Database) {
    this.libraryPath = libraryPath;
    this.db = db;
  }

  static open(libraryPath: string): LibraryDatabase {
    const dbPath = path.join(libraryPath, METADATA_FILE);
    if (!fs.existsSync(dbPath)) {
      throw new LibraryLoadError(libraryPath, `No calibre database found at: ${dbPath}`);
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath, { readonly: true, fileMustExist: true });
    } catch (err) {
      throw new LibraryLoadError(libraryPath, `Cannot open ${dbPath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }

    const hasBooks = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'books'`)
      .get();
    if (hasBooks === undefined) {
      db.close();
      throw new LibraryLoadError(libraryPath, `${dbPath} is not a calibre library database`);
    }

    return new LibraryDatabase(libraryPath, db);
  }

  private select<S extends z.ZodTypeAny>(sql: string, schema: S): z.infer<S>[] {
    return this.db.prepare(sql).all().map(row => schema.parse(row));
  }

  countBooks(): number {
    try {
      const row = countRowSchema.parse(this.db.prepare('SELECT COUNT(*) AS count FROM books').get());
      return row.count;
    } catch (err) {
      throw new LibraryLoadError(
        this.libraryPath,
        `Failed to count books in ${this.libraryPath}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  /**
   * All books ordered by calibre's sort title; any failure surfaces once
   * as a LibraryLoadError.
   */
  async loadBooks(): Promise<BookRecord[]> {
    try {
      const books = this.select(BOOKS_SQL, bookRowSchema);
      const authors = groupByBook(this.select(AUTHORS_SQL, linkRowSchema));
      const tags = groupByBook(this.select(TAGS_SQL, linkRowSchema));
      const formats = groupByBook(this.select(FORMATS_SQL, formatRowSchema));

      return books.map(row => {
        const authorNames = (authors.get(row.id) ?? []).map(a => a.name);
        const bookFormats: BookFormat[] = (formats.get(row.id) ?? []).map(f => ({
          format: f.format.toUpperCase(),
          fileName: f.name
        }));

        return {
          id: row.id,
          title: row.title ?? 'Unknown',
          authors: authorNames.length > 0 ? authorNames : ['Unknown'],
          tags: [...new Set((tags.get(row.id) ?? []).map(t => t.name))],
          path: row.path ?? '',
          uuid: row.uuid ?? '',
          formats: bookFormats,
          addedAt: row.timestamp,
          hasCover: Boolean(row.has_cover)
        };
      });
    } catch (err) {
      throw new LibraryLoadError(
        this.libraryPath,
        `Failed to load books from ${this.libraryPath}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

/**
 * Open, load and close in one step
 */
export async function loadLibrary(libraryPath: string): Promise<BookRecord[]> {
  const database = LibraryDatabase.open(libraryPath);
  try {
    return await database.loadBooks();
  } finally {
    database.close();
  }
}

/**
 * Book count shown beside a library that was never opened; null when the
 * database cannot be read
 */
export function countLibraryBooks(libraryPath: string): number | null {
  let database: LibraryDatabase;
  try {
    database = LibraryDatabase.open(libraryPath);
  } catch (err) {
    if (err instanceof LibraryLoadError) return null;
    throw err;
  }

  try {
    return database.countBooks();
  } catch (err) {
    if (err instanceof LibraryLoadError) return null;
    throw err;
  } finally {
    database.close();
  }
}
