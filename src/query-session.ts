/**
 * Query Session Module
 * Owns the filter string, the ranked matches and the selection cursor
 */

import type { SearchIndex } from './search-index.js';
import type { QueryState } from './types.js';

// ============================================================================
// State transitions
// ============================================================================

function withMatches<K>(rawQuery: string, matches: K[]): QueryState<K> {
  return {
    rawQuery,
    matches,
    cursor: matches.length > 0 ? 0 : undefined
  };
}

export function applyQuery<T, K extends string | number>(
  index: SearchIndex<T, K>,
  rawQuery: string
): QueryState<K> {
  return withMatches(rawQuery, index.query(rawQuery));
}

export function clearQuery<T, K extends string | number>(index: SearchIndex<T, K>): QueryState<K> {
  return applyQuery(index, '');
}

export function applyCursor<K>(state: QueryState<K>, delta: number): QueryState<K> {
  if (state.matches.length === 0 || state.cursor === undefined) {
    return { ...state, cursor: undefined };
  }
  const last = state.matches.length - 1;
  const cursor = Math.min(last, Math.max(0, state.cursor + delta));
  return { ...state, cursor };
}

// ============================================================================
// Session
// ============================================================================

export class QuerySession<T, K extends string | number = string | number> {
  private readonly index: SearchIndex<T, K>;
  private _state: QueryState<K>;

  constructor(index: SearchIndex<T, K>) {
    this.index = index;
    this._state = clearQuery(index);
  }

  get state(): Readonly<QueryState<K>> {
    return this._state;
  }

  get query(): string {
    return this._state.rawQuery;
  }

  get total(): number {
    return this.index.size;
  }

  setQuery(rawQuery: string): void {
    this._state = applyQuery(this.index, rawQuery);
  }

  moveCursor(delta: number): void {
    this._state = applyCursor(this._state, delta);
  }

  clear(): void {
    this._state = clearQuery(this.index);
  }

  appendChar(char: string): void {
    this.setQuery(this._state.rawQuery + char);
  }

  backspace(): void {
    const chars = Array.from(this._state.rawQuery);
    if (chars.length === 0) return;
    this.setQuery(chars.slice(0, -1).join(''));
  }

  selectedId(): K | undefined {
    const { cursor, matches } = this._state;
    return cursor === undefined ? undefined : matches[cursor];
  }

  selected(): T | undefined {
    const id = this.selectedId();
    return id === undefined ? undefined : this.index.get(id);
  }

  resolve(ids: readonly K[]): T[] {
    const records: T[] = [];
    for (const id of ids) {
      const record = this.index.get(id);
      if (record !== undefined) records.push(record);
    }
    return records;
  }

  matchedRecords(): T[] {
    return this.resolve(this._state.matches);
  }
}
