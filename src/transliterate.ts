/**
 * Transliteration Module
 * Renders Chinese-script text as a Latin pinyin key so it can be searched
 * from an ASCII keyboard
 */

import { pinyin } from 'pinyin-pro';

const HAN_CHAR = /\p{Script=Han}/u;

// Per-character reading cache, shared across index builds
const readings = new Map<string, string>();

export interface Transliteration {
  normalized: string;
  phonetic: string;
}

export function normalize(text: string): string {
  return text.normalize('NFKC').toLowerCase();
}

export function containsHan(text: string): boolean {
  return HAN_CHAR.test(text);
}

function readingOf(char: string): string {
  const cached = readings.get(char);
  if (cached !== undefined) return cached;

  let reading = char;
  try {
    const result = pinyin(char, { toneType: 'none', v: true });
    // Unknown characters come back as themselves
    if (result && /^[a-z]+$/i.test(result)) {
      reading = result.toLowerCase();
    }
  } catch {
    reading = char;
  }

  readings.set(char, reading);
  return reading;
}

/**
 * Each Han character maps to its most common toneless reading; everything
 * else passes through, so "中国历史" becomes "zhongguolishi".
 */
export function transliterate(text: string): Transliteration {
  const normalized = normalize(text);
  if (!containsHan(normalized)) {
    return { normalized, phonetic: normalized };
  }

  let phonetic = '';
  for (const char of normalized) {
    phonetic += HAN_CHAR.test(char) ? readingOf(char) : char;
  }

  return { normalized, phonetic };
}
