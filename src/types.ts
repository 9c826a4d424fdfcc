/**
 * Shared type definitions for calibrowse
 */

// ============================================================================
// Library Types
// ============================================================================

/**
 * A known calibre library, keyed by its canonical path
 */
export interface LibraryRecord {
  /** Canonical absolute path of the library directory */
  path: string;
  displayName: string;
  /** Epoch milliseconds of the last open, null if never opened */
  lastOpened: number | null;
  openCount: number;
  /** Number of books seen at the last open (display only) */
  bookCountHint?: number;
}

export interface LocatorOptions {
  cwd?: string;
  homeDir?: string;
  platform?: NodeJS.Platform;
  /** Caller-supplied locations, probed last */
  extraPaths?: string[];
  /** Cap on child directories probed per location */
  maxChildren?: number;
}

export interface RecordOpenDetails {
  displayName?: string;
  bookCount?: number;
}

export type LogCallback = (type: string, message: string) => void;

// ============================================================================
// Book Types
// ============================================================================

export interface BookFormat {
  /** Upper-case calibre format name, e.g. EPUB */
  format: string;
  /** File name without extension */
  fileName: string;
}

/**
 * A book loaded from a library's metadata.db
 */
export interface BookRecord {
  id: number;
  title: string;
  authors: string[];
  tags: string[];
  /** Book directory, relative to the library root */
  path: string;
  uuid: string;
  formats: BookFormat[];
  addedAt: string | null;
  hasCover: boolean;
}

// ============================================================================
// Search Types
// ============================================================================

/**
 * Normalized and phonetic forms of one textual attribute
 */
export interface SearchableField {
  field: string;
  normalized: string;
  /** Equal to normalized for Latin-only text */
  phonetic: string;
  /** Title-like field; hits here rank first */
  primary: boolean;
}

export interface FieldText {
  field: string;
  text: string;
  primary?: boolean;
}

/**
 * Capability that turns a record into its searchable attributes
 */
export interface FieldExtractor<T, K extends string | number = string | number> {
  id(record: T): K;
  fields(record: T): FieldText[];
}

export interface QueryState<K> {
  rawQuery: string;
  /** Record ids, best match first */
  matches: readonly K[];
  /** Index into matches, undefined when matches is empty */
  cursor: number | undefined;
}

// ============================================================================
// Keyboard Types
// ============================================================================

/**
 * Callbacks for keyboard events
 */
export interface KeyboardCallbacks {
  up: (() => void) | null;
  down: (() => void) | null;
  pageUp: (() => void) | null;
  pageDown: (() => void) | null;
  enter: (() => void) | null;
  back: (() => void) | null;
  quit: (() => void) | null;
  search: (() => void) | null;
  switchLibrary: (() => void) | null;
  help: (() => void) | null;
  character: ((char: string) => void) | null;
  backspace: (() => void) | null;
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CliOptionsData {
  libraryPath: string | null;
  scanPaths: string[];
  historyFile: string | null;
  list: boolean;
  help: boolean;
  errors: string[];
}

// ============================================================================
// Browser Types
// ============================================================================

export type BrowserMode =
  | 'library-select'
  | 'loading'
  | 'books'
  | 'book-search'
  | 'details'
  | 'help';

export interface BrowserOptions {
  libraryPath?: string | null;
  scanPaths?: string[];
  historyFile?: string;
}
