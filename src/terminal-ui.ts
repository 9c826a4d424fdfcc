/**
 * Terminal UI Module
 * Renders the library picker, book list and detail screens with ANSI codes
 */

import type { BookRecord, LibraryRecord, QueryState } from './types.js';

// ANSI escape codes
const ANSI = {
  clearScreen: '\x1b[2J\x1b[H',
  clearLine: '\x1b[2K',
  moveTo: (row: number, col: number) => `\x1b[${row};${col}H`,
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',

  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  italic: '\x1b[3m',
  inverse: '\x1b[7m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

/** Anything with a write method and optional terminal size, e.g. process.stdout */
export interface UIOutput {
  write(text: string): unknown;
  rows?: number;
  columns?: number;
}

export interface TerminalUIOptions {
  output?: UIOutput;
}

// ============================================================================
// Layout helpers
// ============================================================================

function isWide(codePoint: number): boolean {
  return (
    (codePoint >= 0x1100 && codePoint <= 0x115f) ||
    (codePoint >= 0x2e80 && codePoint <= 0xa4cf) ||
    (codePoint >= 0xac00 && codePoint <= 0xd7a3) ||
    (codePoint >= 0xf900 && codePoint <= 0xfaff) ||
    (codePoint >= 0xfe30 && codePoint <= 0xfe4f) ||
    (codePoint >= 0xff00 && codePoint <= 0xff60) ||
    (codePoint >= 0xffe0 && codePoint <= 0xffe6) ||
    (codePoint >= 0x20000 && codePoint <= 0x3fffd)
  );
}

export function displayWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;
    width += isWide(codePoint) ? 2 : 1;
  }
  return width;
}

/**
 * Cut text to a terminal column budget; CJK characters take two columns
 */
export function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  if (displayWidth(text) <= width) return text;

  let result = '';
  let used = 0;
  for (const char of text) {
    const charWidth = displayWidth(char);
    if (used + charWidth > width - 1) break;
    result += char;
    used += charWidth;
  }
  return result + '…';
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatLastOpened(ms: number | null): string {
  if (ms === null) return 'never';
  const d = new Date(ms);
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
}

/**
 * Slice of a list to draw so the cursor stays roughly centred
 */
export function visibleWindow(total: number, cursor: number | undefined, height: number): { start: number; end: number } {
  if (height <= 0) return { start: 0, end: 0 };
  if (total <= height) return { start: 0, end: total };
  const centre = cursor ?? 0;
  const start = Math.min(total - height, Math.max(0, centre - Math.floor(height / 2)));
  return { start, end: start + height };
}

// ============================================================================
// TerminalUI
// ============================================================================

export class TerminalUI {
  private output: UIOutput;
  private statusMessage: string | null = null;
  private statusIsError = false;

  constructor(options: TerminalUIOptions = {}) {
    this.output = options.output ?? process.stdout;
  }

  private write(text: string): void {
    this.output.write(text);
  }

  getSize(): { rows: number; cols: number } {
    return {
      rows: this.output.rows || 24,
      cols: this.output.columns || 80
    };
  }

  private frame(lines: string[]): void {
    const { rows } = this.getSize();
    const body = lines.slice(0, Math.max(0, rows - 2));
    this.write(ANSI.clearScreen + ANSI.hideCursor + body.join('\n'));

    if (this.statusMessage) {
      this.moveToStatus();
      const colour = this.statusIsError ? ANSI.red : ANSI.green;
      this.write(`${colour}${this.statusMessage}${ANSI.reset}`);
    }
  }

  private moveToStatus(): void {
    const { rows } = this.getSize();
    this.write(ANSI.moveTo(rows - 1, 1) + ANSI.clearLine);
  }

  private controls(text: string): string {
    return `${ANSI.dim}${text}${ANSI.reset}`;
  }

  private filterLine(query: string, active: boolean, matched: number, total: number): string {
    const count = `${ANSI.gray}${matched}/${total}${ANSI.reset}`;
    if (!active && !query) {
      return `${ANSI.dim}Press / to filter${ANSI.reset}  ${count}`;
    }
    const caret = active ? `${ANSI.inverse} ${ANSI.reset}` : '';
    return `${ANSI.cyan}Filter:${ANSI.reset} ${query}${caret}  ${count}`;
  }

  // ============================================================================
  // Screens
  // ============================================================================

  renderLibraries(
    libraries: LibraryRecord[],
    state: Readonly<QueryState<string>>,
    total: number,
    filterActive: boolean
  ): void {
    const { rows, cols } = this.getSize();
    const lines: string[] = [];

    lines.push(`${ANSI.inverse} Select a calibre library ${ANSI.reset}`);
    lines.push(this.filterLine(state.rawQuery, filterActive, state.matches.length, total));
    lines.push('');

    if (libraries.length === 0) {
      lines.push(total === 0
        ? `${ANSI.yellow}No calibre libraries found.${ANSI.reset} Run with a path: calibrowse /path/to/library`
        : `${ANSI.yellow}No libraries match the filter.${ANSI.reset}`);
    }

    // Two lines per library
    const height = Math.max(1, Math.floor((rows - 6) / 2));
    const { start, end } = visibleWindow(libraries.length, state.cursor, height);
    for (let i = start; i < end; i++) {
      const lib = libraries[i];
      const selected = i === state.cursor;
      const marker = selected ? `${ANSI.inverse}>${ANSI.reset}` : ' ';
      const name = truncate(lib.displayName, cols - 4);
      lines.push(`${marker} ${selected ? ANSI.bold : ''}${name}${ANSI.reset}`);

      const meta = [`last ${formatLastOpened(lib.lastOpened)}`, `opened ${lib.openCount}x`];
      if (lib.bookCountHint !== undefined) meta.push(`${lib.bookCountHint} books`);
      lines.push(`    ${ANSI.gray}${truncate(`${lib.path} · ${meta.join(' · ')}`, cols - 5)}${ANSI.reset}`);
    }

    this.frame(lines);
    this.write(ANSI.moveTo(rows, 1) + this.controls(filterActive
      ? '[type] filter [Enter] open [Esc] done'
      : '[↑↓ jk] move [Enter] open [/] filter [h] help [q] quit'));
  }

  renderBooks(
    libraryName: string,
    books: BookRecord[],
    state: Readonly<QueryState<number>>,
    total: number,
    searchActive: boolean
  ): void {
    const { rows, cols } = this.getSize();
    const lines: string[] = [];

    lines.push(`${ANSI.inverse} ${truncate(libraryName, cols - 2)} ${ANSI.reset}`);
    lines.push(this.filterLine(state.rawQuery, searchActive, state.matches.length, total));
    lines.push('');

    if (books.length === 0) {
      lines.push(`${ANSI.yellow}No books match.${ANSI.reset}`);
    }

    const height = Math.max(1, rows - 6);
    const { start, end } = visibleWindow(books.length, state.cursor, height);
    for (let i = start; i < end; i++) {
      const book = books[i];
      const selected = i === state.cursor;
      const authors = book.authors.join(', ');
      const text = truncate(`${book.title} — ${authors}`, cols - 3);
      lines.push(selected ? `${ANSI.inverse}>${ANSI.reset} ${ANSI.bold}${text}${ANSI.reset}` : `  ${text}`);
    }

    this.frame(lines);
    this.write(ANSI.moveTo(rows, 1) + this.controls(searchActive
      ? '[type] search [↑↓] move [Enter] details [Esc] done'
      : '[↑↓ jk] move [Enter] details [/] search [l] libraries [h] help [q] quit'));
  }

  renderDetails(book: BookRecord, filePath: string | null): void {
    const { rows, cols } = this.getSize();
    const label = (name: string) => `${ANSI.cyan}${name.padEnd(9)}${ANSI.reset}`;
    const lines: string[] = [];

    lines.push(`${ANSI.inverse} Book details ${ANSI.reset}`);
    lines.push('');
    lines.push(`${label('Title')}${ANSI.bold}${truncate(book.title, cols - 10)}${ANSI.reset}`);
    lines.push(`${label('Authors')}${truncate(book.authors.join(', '), cols - 10)}`);
    lines.push(`${label('Tags')}${truncate(book.tags.join(', ') || '-', cols - 10)}`);
    lines.push(`${label('Formats')}${book.formats.map(f => f.format).join(', ') || '-'}`);
    lines.push(`${label('Added')}${book.addedAt ?? '-'}`);
    lines.push(`${label('Path')}${truncate(book.path, cols - 10)}`);
    lines.push(`${label('UUID')}${book.uuid || '-'}`);
    lines.push(`${label('File')}${filePath ? truncate(filePath, cols - 10) : `${ANSI.yellow}no file on disk${ANSI.reset}`}`);

    this.frame(lines);
    this.write(ANSI.moveTo(rows, 1) + this.controls('[Enter] open file [Esc] back [q] quit'));
  }

  showHelp(): void {
    const lines = [
      `${ANSI.inverse} calibrowse help ${ANSI.reset}`,
      '',
      `${ANSI.bold}Lists${ANSI.reset}`,
      '  ↑ ↓ k j     Move selection',
      '  PgUp PgDn   Move a page',
      '  Enter →     Open library / show details / open file',
      '  Esc ←       Back',
      '',
      `${ANSI.bold}Filtering${ANSI.reset}`,
      '  /           Start typing a filter',
      '              Words are matched against title, authors, tags and path',
      '              Chinese titles also match their pinyin, e.g. "zhongguo"',
      '',
      `${ANSI.bold}Other${ANSI.reset}`,
      '  l           Switch library',
      '  h ?         This help',
      '  q Ctrl+C    Quit',
      '',
      `${ANSI.dim}Press Esc to return...${ANSI.reset}`,
    ];
    this.frame(lines);
  }

  showLoading(libraryPath: string): void {
    this.frame([`${ANSI.cyan}Loading library ${libraryPath}...${ANSI.reset}`]);
  }

  // ============================================================================
  // Status Messages
  // ============================================================================

  /** Shown now and kept until the next clearStatus() */
  showMessage(message: string): void {
    this.statusMessage = message;
    this.statusIsError = false;
    this.moveToStatus();
    this.write(`${ANSI.green}${message}${ANSI.reset}`);
  }

  showError(message: string): void {
    this.statusMessage = `Error: ${message}`;
    this.statusIsError = true;
    this.moveToStatus();
    this.write(`${ANSI.red}Error: ${message}${ANSI.reset}`);
  }

  clearStatus(): void {
    this.statusMessage = null;
    this.statusIsError = false;
  }

  showGoodbye(): void {
    this.write(ANSI.showCursor + ANSI.clearScreen);
  }
}
