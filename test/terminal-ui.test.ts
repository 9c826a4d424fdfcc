import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import {
  TerminalUI,
  displayWidth,
  formatLastOpened,
  truncate,
  visibleWindow
} from '../src/terminal-ui.js';
import type { UIOutput } from '../src/terminal-ui.js';
import type { LibraryRecord, QueryState } from '../src/types.js';
import { SAMPLE_BOOKS } from './fixtures/books.js';

const ANSI_PATTERN = /\x1b\[[0-9;?]*[A-Za-z]/g;

class FakeOutput implements UIOutput {
  rows = 24;
  columns = 80;
  chunks: string[] = [];

  write(text: string): boolean {
    this.chunks.push(text);
    return true;
  }

  plain(): string {
    return this.chunks.join('').replace(ANSI_PATTERN, '');
  }

  reset(): void {
    this.chunks = [];
  }
}

describe('layout helpers', () => {
  it('should count CJK characters as two columns', () => {
    assert.strictEqual(displayWidth('abc'), 3);
    assert.strictEqual(displayWidth('a中'), 3);
    assert.strictEqual(displayWidth('中国历史'), 8);
  });

  it('should truncate with an ellipsis', () => {
    assert.strictEqual(truncate('hello', 5), 'hello');
    assert.strictEqual(truncate('hello world', 5), 'hell…');
    assert.strictEqual(truncate('中国历史', 5), '中国…');
    assert.strictEqual(truncate('anything', 0), '');
  });

  it('should format open times', () => {
    assert.strictEqual(formatLastOpened(null), 'never');
    assert.strictEqual(formatLastOpened(new Date(2024, 0, 5, 9, 7).getTime()), '2024-01-05 09:07');
  });

  it('should keep the cursor inside the visible window', () => {
    assert.deepStrictEqual(visibleWindow(5, 2, 10), { start: 0, end: 5 });
    assert.deepStrictEqual(visibleWindow(100, 0, 10), { start: 0, end: 10 });
    assert.deepStrictEqual(visibleWindow(100, 50, 10), { start: 45, end: 55 });
    assert.deepStrictEqual(visibleWindow(100, 99, 10), { start: 90, end: 100 });
    assert.deepStrictEqual(visibleWindow(100, undefined, 10), { start: 0, end: 10 });
    assert.deepStrictEqual(visibleWindow(3, 0, 0), { start: 0, end: 0 });
  });
});

describe('TerminalUI', () => {
  let output: FakeOutput;
  let ui: TerminalUI;

  beforeEach(() => {
    output = new FakeOutput();
    ui = new TerminalUI({ output });
  });

  it('should report the output size', () => {
    output.rows = 30;
    output.columns = 100;
    assert.deepStrictEqual(ui.getSize(), { rows: 30, cols: 100 });
  });

  it('should render libraries with open counts and book counts', () => {
    const libraries: LibraryRecord[] = [
      { path: '/shelf/fiction', displayName: 'fiction', lastOpened: null, openCount: 3, bookCountHint: 120 },
      { path: '/shelf/papers', displayName: 'papers', lastOpened: null, openCount: 0 }
    ];
    const state: QueryState<string> = { rawQuery: '', matches: ['/shelf/fiction', '/shelf/papers'], cursor: 0 };

    ui.renderLibraries(libraries, state, 2, false);
    const text = output.plain();

    assert.ok(text.includes('Select a calibre library'));
    assert.ok(text.includes('Press / to filter  2/2'));
    assert.ok(text.includes('> fiction'));
    assert.ok(text.includes('/shelf/fiction · last never · opened 3x · 120 books'));
    assert.ok(text.includes('/shelf/papers · last never · opened 0x'));
    assert.ok(!text.includes('opened 0x ·'));
  });

  it('should show the filter text and match count', () => {
    const state: QueryState<string> = { rawQuery: 'pap', matches: [], cursor: undefined };
    ui.renderLibraries([], state, 2, true);
    const text = output.plain();

    assert.ok(text.includes('Filter: pap   0/2'));
    assert.ok(text.includes('No libraries match the filter.'));
  });

  it('should render book rows as title and authors', () => {
    const state: QueryState<number> = { rawQuery: '', matches: [1, 3], cursor: 1 };
    ui.renderBooks('Calibre Library', [SAMPLE_BOOKS[0], SAMPLE_BOOKS[2]], state, 5, false);
    const text = output.plain();

    assert.ok(text.includes('  The Hobbit — J.R.R. Tolkien'));
    assert.ok(text.includes('> Dune — Frank Herbert'));
    assert.ok(text.includes('Press / to filter  2/5'));
  });

  it('should render book details', () => {
    ui.renderDetails(SAMPLE_BOOKS[1], null);
    const text = output.plain();

    assert.ok(text.includes('Title    中国历史'));
    assert.ok(text.includes('Authors  钱穆'));
    assert.ok(text.includes('Tags     History'));
    assert.ok(text.includes('Formats  -'));
    assert.ok(text.includes('File     no file on disk'));
  });

  it('should redraw the status line on the next frame until cleared', () => {
    ui.showError('disk on fire');
    assert.strictEqual(output.plain(), 'Error: disk on fire');

    output.reset();
    ui.showLoading('/shelf/fiction');
    assert.ok(output.plain().endsWith('Error: disk on fire'));

    output.reset();
    ui.clearStatus();
    ui.showLoading('/shelf/fiction');
    assert.strictEqual(output.plain(), 'Loading library /shelf/fiction...');
  });
});
