/**
 * History Store Module
 * Persists previously opened libraries with usage statistics and ranks them
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { canonicalPath } from './library-locator.js';
import type { LibraryRecord, LogCallback, RecordOpenDetails } from './types.js';

export function defaultHistoryFile(): string {
  const fromEnv = process.env.CALIBROWSE_HISTORY;
  if (fromEnv && fromEnv.trim()) return path.resolve(fromEnv.trim());
  return path.join(os.homedir(), '.config', 'calibrowse', 'libraries.json');
}

// Unknown keys are stripped by zod's default object behaviour
const historyEntrySchema = z.object({
  path: z.string().min(1),
  display_name: z.string().optional(),
  last_opened: z.union([z.string(), z.number(), z.null()]).optional(),
  open_count: z.number().int().nonnegative().optional(),
  book_count: z.number().int().nonnegative().optional()
});

type HistoryEntry = z.infer<typeof historyEntrySchema>;

const EPOCH_SECONDS_LIMIT = 1e11;

function parseTimestamp(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    // Below 1e11 ms is early 1973; such values are epoch seconds
    return Math.abs(value) < EPOCH_SECONDS_LIMIT ? value * 1000 : value;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function displayNameFor(libraryPath: string): string {
  return path.basename(libraryPath) || libraryPath;
}

function fromEntry(entry: HistoryEntry): LibraryRecord {
  const libraryPath = canonicalPath(entry.path);
  const record: LibraryRecord = {
    path: libraryPath,
    displayName: entry.display_name?.trim() || displayNameFor(libraryPath),
    lastOpened: parseTimestamp(entry.last_opened),
    openCount: entry.open_count ?? 0
  };
  if (entry.book_count !== undefined) record.bookCountHint = entry.book_count;
  return record;
}

function toEntry(record: LibraryRecord): HistoryEntry {
  const entry: HistoryEntry = {
    path: record.path,
    display_name: record.displayName,
    last_opened: record.lastOpened === null ? null : new Date(record.lastOpened).toISOString(),
    open_count: record.openCount
  };
  if (record.bookCountHint !== undefined) entry.book_count = record.bookCountHint;
  return entry;
}

/**
 * Two records for the same path collapse into one: highest open count,
 * latest open time. Name and count hint follow the more recent side.
 */
export function mergeRecords(a: LibraryRecord, b: LibraryRecord): LibraryRecord {
  const aTime = a.lastOpened ?? -Infinity;
  const bTime = b.lastOpened ?? -Infinity;
  const recent = bTime > aTime ? b : a;
  const other = recent === a ? b : a;

  const merged: LibraryRecord = {
    path: a.path,
    displayName: recent.displayName || other.displayName,
    lastOpened: Math.max(aTime, bTime) === -Infinity ? null : Math.max(aTime, bTime),
    openCount: Math.max(a.openCount, b.openCount)
  };
  const hint = recent.bookCountHint ?? other.bookCountHint;
  if (hint !== undefined) merged.bookCountHint = hint;
  return merged;
}

/**
 * Most recently opened first (never-opened last), then open count, then name
 */
export function compareLibraries(a: LibraryRecord, b: LibraryRecord): number {
  if (a.lastOpened !== b.lastOpened) {
    if (a.lastOpened === null) return 1;
    if (b.lastOpened === null) return -1;
    return b.lastOpened - a.lastOpened;
  }
  if (a.openCount !== b.openCount) return b.openCount - a.openCount;
  const byName = a.displayName.localeCompare(b.displayName);
  if (byName !== 0) return byName;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

export interface HistoryStoreOptions {
  filePath?: string;
  now?: () => number;
}

export class HistoryStore {
  readonly filePath: string;
  private now: () => number;
  private records = new Map<string, LibraryRecord>();
  private dirty = false;
  private _memoryOnly = false;
  private _logCallback: LogCallback | null = null;

  constructor(options: HistoryStoreOptions = {}) {
    this.filePath = options.filePath ?? defaultHistoryFile();
    this.now = options.now ?? Date.now;
  }

  /**
   * Set a callback for logging events (load and save problems)
   */
  setLogCallback(callback: LogCallback): void {
    this._logCallback = callback;
  }

  private _log(type: string, message: string): void {
    if (this._logCallback) {
      this._logCallback(type, message);
    }
  }

  get size(): number {
    return this.records.size;
  }

  /** True once a read or write has failed; the session then runs without persistence */
  get memoryOnly(): boolean {
    return this._memoryOnly;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  get(libraryPath: string): LibraryRecord | undefined {
    const record = this.records.get(canonicalPath(libraryPath));
    return record ? { ...record } : undefined;
  }

  /**
   * Read the history file. A missing file is an empty history; a broken one
   * is logged and the store continues in memory only.
   */
  load(): this {
    this.records.clear();
    this.dirty = false;

    if (!fs.existsSync(this.filePath)) return this;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      this._memoryOnly = true;
      this._log('history', `Could not read ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
      return this;
    }

    if (!Array.isArray(raw)) {
      this._memoryOnly = true;
      this._log('history', `Ignoring ${this.filePath}: expected a list of libraries`);
      return this;
    }

    let skipped = 0;
    for (const item of raw) {
      const parsed = historyEntrySchema.safeParse(item);
      if (!parsed.success) {
        skipped++;
        continue;
      }
      this.put(fromEntry(parsed.data));
    }

    if (skipped > 0) {
      this._log('history', `Skipped ${skipped} invalid history entr${skipped === 1 ? 'y' : 'ies'}`);
    }
    return this;
  }

  private put(record: LibraryRecord): void {
    const existing = this.records.get(record.path);
    this.records.set(record.path, existing ? mergeRecords(existing, record) : record);
  }

  /**
   * Union of persisted records and freshly discovered paths. Nothing is
   * dropped because a scan missed it.
   */
  merge(candidatePaths: Iterable<string>): LibraryRecord[] {
    for (const candidate of candidatePaths) {
      const libraryPath = canonicalPath(candidate);
      if (this.records.has(libraryPath)) continue;
      this.records.set(libraryPath, {
        path: libraryPath,
        displayName: displayNameFor(libraryPath),
        lastOpened: null,
        openCount: 0
      });
    }
    return this.ranked();
  }

  /**
   * Fill in the book count of never-opened libraries that have none yet.
   * Display only: usage is untouched and the store is not marked dirty.
   */
  fillBookCounts(count: (libraryPath: string) => number | null): void {
    for (const record of this.records.values()) {
      if (record.openCount > 0 || record.bookCountHint !== undefined) continue;
      const books = count(record.path);
      if (books !== null) record.bookCountHint = books;
    }
  }

  ranked(): LibraryRecord[] {
    return [...this.records.values()]
      .map(record => ({ ...record }))
      .sort(compareLibraries);
  }

  recordOpen(libraryPath: string, details: RecordOpenDetails = {}): LibraryRecord {
    const key = canonicalPath(libraryPath);
    const existing = this.records.get(key);
    const record: LibraryRecord = existing ?? {
      path: key,
      displayName: displayNameFor(key),
      lastOpened: null,
      openCount: 0
    };

    record.openCount += 1;
    record.lastOpened = this.now();
    if (details.displayName) record.displayName = details.displayName;
    if (details.bookCount !== undefined) record.bookCountHint = details.bookCount;

    this.records.set(key, record);
    this.dirty = true;
    return { ...record };
  }

  /**
   * Write the history if anything changed. Failures are logged, never thrown.
   * A memory-only store never writes, so a file it could not read survives.
   */
  save(): boolean {
    if (this._memoryOnly) return false;
    if (!this.dirty) return true;

    const entries = [...this.records.values()].sort(compareLibraries).map(toEntry);
    const tempPath = this.filePath + '.tmp';

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(entries, null, 2));
      fs.renameSync(tempPath, this.filePath);
      this.dirty = false;
      return true;
    } catch (err) {
      this._memoryOnly = true;
      this._log('history', `Failed to save history: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }
}
