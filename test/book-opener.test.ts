import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { bookFilePath, openerCommand, resolveBookFile } from '../src/book-opener.js';
import { book } from './fixtures/books.js';

describe('bookFilePath', () => {
  it('should join library, book folder and lower-cased extension', () => {
    const dune = book(3, 'Dune', { path: 'Frank Herbert/Dune (3)' });
    assert.strictEqual(
      bookFilePath('/lib', dune, 'EPUB', 'Dune - Frank Herbert'),
      path.join('/lib', 'Frank Herbert/Dune (3)', 'Dune - Frank Herbert.epub')
    );
  });
});

describe('resolveBookFile', () => {
  let library: string;
  const hobbit = book(1, 'The Hobbit', {
    path: 'Tolkien/The Hobbit (1)',
    formats: [
      { format: 'PDF', fileName: 'The Hobbit' },
      { format: 'TXT', fileName: 'The Hobbit' },
      { format: 'EPUB', fileName: 'The Hobbit' }
    ]
  });

  before(() => {
    library = fs.mkdtempSync(path.join(os.tmpdir(), 'calibrowse-open-'));
    const folder = path.join(library, hobbit.path);
    fs.mkdirSync(folder, { recursive: true });
    fs.writeFileSync(path.join(folder, 'The Hobbit.pdf'), 'pdf');
    fs.writeFileSync(path.join(folder, 'The Hobbit.txt'), 'txt');
  });

  after(() => {
    fs.rmSync(library, { recursive: true, force: true });
  });

  it('should pick the most preferred format present on disk', () => {
    assert.strictEqual(resolveBookFile(library, hobbit), path.join(library, hobbit.path, 'The Hobbit.pdf'));
  });

  it('should follow a custom preference order', () => {
    assert.strictEqual(
      resolveBookFile(library, hobbit, ['TXT', 'PDF']),
      path.join(library, hobbit.path, 'The Hobbit.txt')
    );
  });

  it('should return null when no file exists', () => {
    const missing = book(9, 'Missing', { formats: [{ format: 'EPUB', fileName: 'Missing' }] });
    assert.strictEqual(resolveBookFile(library, missing), null);
  });

  it('should return null for a book without formats', () => {
    assert.strictEqual(resolveBookFile(library, book(10, 'Empty')), null);
  });
});

describe('openerCommand', () => {
  it('should use open on macOS', () => {
    assert.deepStrictEqual(openerCommand('/b/x.epub', 'darwin'), { command: 'open', args: ['/b/x.epub'] });
  });

  it('should use start through cmd on Windows', () => {
    assert.deepStrictEqual(openerCommand('C:\\b\\x.epub', 'win32'), {
      command: 'cmd',
      args: ['/c', 'start', '""', '"C:\\b\\x.epub"']
    });
  });

  it('should use xdg-open elsewhere', () => {
    assert.deepStrictEqual(openerCommand('/b/x.epub', 'linux'), { command: 'xdg-open', args: ['/b/x.epub'] });
    assert.deepStrictEqual(openerCommand('/b/x.epub', 'freebsd'), { command: 'xdg-open', args: ['/b/x.epub'] });
  });
});
