import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SearchIndex, bookFields, libraryFields, splitTerms } from '../src/search-index.js';
import type { LibraryRecord } from '../src/types.js';
import { SAMPLE_BOOKS, book } from './fixtures/books.js';

describe('SearchIndex', () => {
  const index = SearchIndex.build(SAMPLE_BOOKS, bookFields);

  describe('build', () => {
    it('should index every record once', () => {
      assert.strictEqual(index.size, 5);
      const withDuplicate = SearchIndex.build([...SAMPLE_BOOKS, book(1, 'Copy')], bookFields);
      assert.strictEqual(withDuplicate.size, 5);
      assert.strictEqual(withDuplicate.get(1)?.title, 'The Hobbit');
    });

    it('should precompute the phonetic form of Chinese fields', () => {
      const title = index.fieldsOf(2).find(f => f.field === 'title');
      assert.deepStrictEqual(title, {
        field: 'title',
        normalized: '中国历史',
        phonetic: 'zhongguolishi',
        primary: true
      });
    });

    it('should index title, authors, tags and path', () => {
      assert.deepStrictEqual(index.fieldsOf(1).map(f => f.field), ['title', 'author', 'tag', 'tag', 'path']);
    });
  });

  describe('query', () => {
    it('should return all records in load order for an empty query', () => {
      assert.deepStrictEqual(index.query(''), [1, 2, 3, 4, 5]);
      assert.deepStrictEqual(index.query('   '), [1, 2, 3, 4, 5]);
    });

    it('should be case insensitive', () => {
      assert.deepStrictEqual(index.query('DUNE'), [3]);
    });

    it('should require every term to match some field', () => {
      assert.deepStrictEqual(index.query('classic dune'), [3]);
      assert.deepStrictEqual(index.query('tolkien hobbit'), [1]);
    });

    it('should match terms found in different fields', () => {
      // "fantasy" only appears as a tag, "hobbit" in the title
      assert.deepStrictEqual(index.query('fantasy hobbit'), [1]);
    });

    it('should rank title hits above path-only hits', () => {
      const reversed = SearchIndex.build([...SAMPLE_BOOKS].reverse(), bookFields);
      assert.deepStrictEqual(reversed.query('hobbit'), [1, 5]);
    });

    it('should keep load order among non-title hits', () => {
      assert.deepStrictEqual(index.query('science'), [3, 4]);
    });

    it('should match Chinese titles by pinyin', () => {
      assert.deepStrictEqual(index.query('zhongguo'), [2]);
      assert.deepStrictEqual(index.query('lishi'), [2]);
    });

    it('should match Chinese titles by literal substring', () => {
      assert.deepStrictEqual(index.query('中国'), [2]);
      assert.deepStrictEqual(index.query('历史'), [2]);
    });

    it('should not match different characters that share a reading', () => {
      const homophones = SearchIndex.build([book(1, '钟表'), book(2, '中国'), book(3, '立春')], bookFields);
      assert.deepStrictEqual(homophones.query('中'), [2]);
      assert.deepStrictEqual(homophones.query('历'), []);
      assert.deepStrictEqual(homophones.query('zhong'), [1, 2]);
    });

    it('should match Chinese authors by pinyin', () => {
      assert.deepStrictEqual(index.query('qianmu'), [2]);
    });

    it('should return nothing when a term matches no field', () => {
      assert.deepStrictEqual(index.query('dune xyz'), []);
    });

    it('should return identical results for repeated queries', () => {
      assert.deepStrictEqual(index.query('classic'), index.query('classic'));
      assert.deepStrictEqual(index.query('classic'), [1, 3]);
    });
  });

  describe('libraries', () => {
    const libraries: LibraryRecord[] = [
      { path: '/home/reader/Calibre Library', displayName: 'Calibre Library', lastOpened: null, openCount: 0 },
      { path: '/mnt/usb/ebooks', displayName: 'ebooks', lastOpened: null, openCount: 0 }
    ];
    const libraryIndex = SearchIndex.build(libraries, libraryFields);

    it('should key libraries by path', () => {
      assert.deepStrictEqual(libraryIndex.query(''), ['/home/reader/Calibre Library', '/mnt/usb/ebooks']);
    });

    it('should search display name and path', () => {
      assert.deepStrictEqual(libraryIndex.query('calibre'), ['/home/reader/Calibre Library']);
      assert.deepStrictEqual(libraryIndex.query('usb'), ['/mnt/usb/ebooks']);
    });
  });

  describe('splitTerms', () => {
    it('should split on whitespace and normalize each term', () => {
      assert.deepStrictEqual(splitTerms('  Dune  中国 '), ['dune', '中国']);
    });
  });
});
