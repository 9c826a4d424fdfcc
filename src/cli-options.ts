/**
 * CLI Options Parser
 * Handles command-line argument parsing for the library path and scan flags
 */

import type { CliOptionsData } from './types.js';

const VALUE_FLAGS = new Set(['--library', '-l', '--scan', '--history']);

export class CliOptions implements CliOptionsData {
  libraryPath: string | null = null;
  scanPaths: string[] = [];
  historyFile: string | null = null;
  list: boolean = false;
  help: boolean = false;
  errors: string[] = [];

  constructor(argv: string[] = process.argv.slice(2)) {
    this._parse(argv);
  }

  private _parse(argv: string[]): void {
    const positional: string[] = [];
    let libraryFlag: string | null = null;

    for (let i = 0; i < argv.length; i++) {
      const arg = argv[i];

      if (VALUE_FLAGS.has(arg)) {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
          this.errors.push(`${arg} requires a directory argument`);
          continue;
        }
        i++;
        if (arg === '--scan') {
          this.scanPaths.push(value);
        } else if (arg === '--history') {
          this.historyFile = value;
        } else {
          libraryFlag = value;
        }
      } else if (arg === '--list') {
        this.list = true;
      } else if (arg === '--help' || arg === '-h') {
        this.help = true;
      } else if (arg.startsWith('-')) {
        this.errors.push(`Unknown flag: ${arg}`);
      } else {
        positional.push(arg);
      }
    }

    if (positional.length > 1) {
      this.errors.push('Expected at most one library path');
      return;
    }

    // A positional path takes precedence over --library
    this.libraryPath = positional[0] ?? libraryFlag;
  }

  isValid(): boolean {
    return this.errors.length === 0;
  }

  getErrorMessage(): string | null {
    if (this.errors.length === 0) {
      return null;
    }

    return '\n❌ ' + this.errors.join('\n❌ ') + '\n';
  }

  getUsageMessage(): string {
    return `
Usage: calibrowse [options] [libraryPath]

Run 'calibrowse --help' for full usage information.

Quick examples:
  calibrowse                         Pick from discovered libraries
  calibrowse ~/Calibre\\ Library       Open a library directly
  calibrowse --scan /srv/books       Also look for libraries under /srv/books
`;
  }

  getHelpMessage(): string {
    return `
calibrowse - Browse calibre libraries from the terminal

Usage:
  calibrowse [options] [libraryPath]

Arguments:
  libraryPath        Directory containing metadata.db (optional)

Options:
  --library, -l <dir>  Same as libraryPath
  --scan <dir>         Extra location to search for libraries (repeatable)
  --history <file>     History file (default: ~/.config/calibrowse/libraries.json,
                       or $CALIBROWSE_HISTORY)
  --list               Print known and discovered libraries, then exit
  --help, -h           Show this help

Search locations:
  current directory, home directory, ~/Documents, ~/Calibre Library,
  ~/Calibre Libraries, ~/Books, ~/Library, and system folders
  (Linux: /home /media /mnt, macOS: /Users /Volumes, Windows: C:\\ to F:\\),
  each with one level of subdirectories

Keyboard Controls:
  ↑ ↓ k j    Move selection
  Enter →    Open / details / open file
  Esc ←      Back
  /          Filter (title, authors, tags, path; pinyin for Chinese)
  l          Switch library
  h ?        Help
  q          Quit
`;
  }
}
