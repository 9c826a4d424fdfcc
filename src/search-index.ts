/**
 * Search Index Module
 * Precomputes searchable forms for a record set and filters it per keystroke
 */

import { normalize, transliterate } from './transliterate.js';
import type { BookRecord, FieldExtractor, LibraryRecord, SearchableField } from './types.js';

interface IndexedRecord<T, K> {
  id: K;
  record: T;
  fields: SearchableField[];
}

export const bookFields: FieldExtractor<BookRecord, number> = {
  id: book => book.id,
  fields: book => [
    { field: 'title', text: book.title, primary: true },
    ...book.authors.map(author => ({ field: 'author', text: author })),
    ...book.tags.map(tag => ({ field: 'tag', text: tag })),
    { field: 'path', text: book.path }
  ]
};

export const libraryFields: FieldExtractor<LibraryRecord, string> = {
  id: library => library.path,
  fields: library => [
    { field: 'name', text: library.displayName, primary: true },
    { field: 'path', text: library.path }
  ]
};

export function splitTerms(rawQuery: string): string[] {
  return normalize(rawQuery)
    .split(/\s+/)
    .filter(term => term.length > 0);
}

// Terms stay literal: "中" must not match "钟" just because both read "zhong"
function fieldHas(field: SearchableField, term: string): boolean {
  return field.normalized.includes(term) || field.phonetic.includes(term);
}

/**
 * One implementation for books and libraries; the extractor decides which
 * attributes are searchable.
 */
export class SearchIndex<T, K extends string | number = string | number> {
  private entries: IndexedRecord<T, K>[] = [];
  private byId = new Map<K, IndexedRecord<T, K>>();

  static build<T, K extends string | number>(
    records: Iterable<T>,
    extractor: FieldExtractor<T, K>
  ): SearchIndex<T, K> {
    const index = new SearchIndex<T, K>();
    for (const record of records) {
      const id = extractor.id(record);
      if (index.byId.has(id)) continue;

      const fields = extractor.fields(record).map(({ field, text, primary }) => ({
        field,
        ...transliterate(text),
        primary: primary === true
      }));
      const entry = { id, record, fields };
      index.entries.push(entry);
      index.byId.set(id, entry);
    }
    return index;
  }

  get size(): number {
    return this.entries.length;
  }

  has(id: K): boolean {
    return this.byId.has(id);
  }

  get(id: K): T | undefined {
    return this.byId.get(id)?.record;
  }

  records(): T[] {
    return this.entries.map(entry => entry.record);
  }

  /** Searchable forms computed at build time for one record */
  fieldsOf(id: K): readonly SearchableField[] {
    return this.byId.get(id)?.fields ?? [];
  }

  /**
   * Every term must hit at least one field. Records with a hit in the
   * primary field come first; load order otherwise.
   */
  query(rawQuery: string): K[] {
    const terms = splitTerms(rawQuery);
    if (terms.length === 0) {
      return this.entries.map(entry => entry.id);
    }

    const primaryHits: K[] = [];
    const otherHits: K[] = [];

    for (const entry of this.entries) {
      let matched = true;
      let primary = false;

      for (const term of terms) {
        let termMatched = false;
        for (const field of entry.fields) {
          if (!fieldHas(field, term)) continue;
          termMatched = true;
          if (field.primary) {
            primary = true;
            break;
          }
        }
        if (!termMatched) {
          matched = false;
          break;
        }
      }

      if (!matched) continue;
      if (primary) {
        primaryHits.push(entry.id);
      } else {
        otherHits.push(entry.id);
      }
    }

    return [...primaryHits, ...otherHits];
  }
}
