import { describe, it } from 'node:test';
import assert from 'node:assert';
import { containsHan, normalize, transliterate } from '../src/transliterate.js';

describe('transliterate', () => {
  describe('Latin text', () => {
    it('should lowercase and leave the phonetic form equal to the original', () => {
      const result = transliterate('The Hobbit');
      assert.strictEqual(result.normalized, 'the hobbit');
      assert.strictEqual(result.phonetic, 'the hobbit');
    });

    it('should fold full-width letters to ASCII', () => {
      assert.strictEqual(normalize('ＡＢＣ Books'), 'abc books');
    });

    it('should handle empty text', () => {
      assert.deepStrictEqual(transliterate(''), { normalized: '', phonetic: '' });
    });
  });

  describe('Chinese text', () => {
    it('should join per-character readings without separators', () => {
      const result = transliterate('中国历史');
      assert.strictEqual(result.normalized, '中国历史');
      assert.strictEqual(result.phonetic, 'zhongguolishi');
    });

    it('should keep Latin parts of mixed titles', () => {
      assert.strictEqual(transliterate('三体 Trilogy').phonetic, 'santi trilogy');
    });

    it('should pass characters without a reading through unchanged', () => {
      assert.strictEqual(transliterate('ノルウェイの森').phonetic, 'ノルウェイのsen');
    });

    it('should be deterministic', () => {
      assert.deepStrictEqual(transliterate('红楼梦'), transliterate('红楼梦'));
    });
  });

  describe('containsHan', () => {
    it('should detect Han characters', () => {
      assert.strictEqual(containsHan('红楼梦'), true);
      assert.strictEqual(containsHan('Dream of the Red Chamber'), false);
    });
  });
});
