import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CliOptions } from '../src/cli-options.js';

describe('CliOptions', () => {
  it('should default to discovery mode', () => {
    const options = new CliOptions([]);
    assert.strictEqual(options.libraryPath, null);
    assert.deepStrictEqual(options.scanPaths, []);
    assert.strictEqual(options.historyFile, null);
    assert.strictEqual(options.list, false);
    assert.strictEqual(options.help, false);
    assert.strictEqual(options.isValid(), true);
    assert.strictEqual(options.getErrorMessage(), null);
  });

  it('should take a positional library path', () => {
    const options = new CliOptions(['/shelf/fiction']);
    assert.strictEqual(options.libraryPath, '/shelf/fiction');
  });

  it('should take --library and -l', () => {
    assert.strictEqual(new CliOptions(['--library', '/a']).libraryPath, '/a');
    assert.strictEqual(new CliOptions(['-l', '/b']).libraryPath, '/b');
  });

  it('should prefer the positional path over --library', () => {
    const options = new CliOptions(['--library', '/a', '/b']);
    assert.strictEqual(options.libraryPath, '/b');
  });

  it('should collect repeated --scan flags', () => {
    const options = new CliOptions(['--scan', '/srv/books', '--scan', '/mnt/nas', '--history', '/tmp/h.json', '--list']);
    assert.deepStrictEqual(options.scanPaths, ['/srv/books', '/mnt/nas']);
    assert.strictEqual(options.historyFile, '/tmp/h.json');
    assert.strictEqual(options.list, true);
  });

  it('should recognise help flags', () => {
    assert.strictEqual(new CliOptions(['--help']).help, true);
    assert.strictEqual(new CliOptions(['-h']).help, true);
  });

  it('should report a flag missing its value', () => {
    const options = new CliOptions(['--scan', '--list']);
    assert.strictEqual(options.isValid(), false);
    assert.deepStrictEqual(options.errors, ['--scan requires a directory argument']);
    assert.strictEqual(options.list, true);
  });

  it('should report unknown flags and extra paths', () => {
    const options = new CliOptions(['--verbose', '/a', '/b']);
    assert.deepStrictEqual(options.errors, ['Unknown flag: --verbose', 'Expected at most one library path']);
    assert.strictEqual(options.getErrorMessage(), '\n❌ Unknown flag: --verbose\n❌ Expected at most one library path\n');
  });

  it('should describe usage', () => {
    const options = new CliOptions([]);
    assert.ok(options.getUsageMessage().includes('Usage: calibrowse [options] [libraryPath]'));
    assert.ok(options.getHelpMessage().includes('--scan <dir>'));
  });
});
