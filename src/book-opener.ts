/**
 * Book Opener Module
 * Resolves a book's file on disk and hands it to the system opener
 */

import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import type { BookRecord, LogCallback } from './types.js';

export const PREFERRED_FORMATS = ['EPUB', 'AZW3', 'MOBI', 'PDF', 'KEPUB', 'FB2', 'CBZ', 'TXT'];

export interface OpenerCommand {
  command: string;
  args: string[];
}

/**
 * Calibre keeps files at <library>/<book.path>/<name>.<format>
 */
export function bookFilePath(libraryPath: string, book: BookRecord, format: string, fileName: string): string {
  return path.join(libraryPath, book.path, `${fileName}.${format.toLowerCase()}`);
}

export function resolveBookFile(
  libraryPath: string,
  book: BookRecord,
  preferred: string[] = PREFERRED_FORMATS
): string | null {
  const rank = (format: string): number => {
    const idx = preferred.indexOf(format.toUpperCase());
    return idx === -1 ? preferred.length : idx;
  };
  const ordered = [...book.formats].sort((a, b) => rank(a.format) - rank(b.format));

  for (const { format, fileName } of ordered) {
    const filePath = bookFilePath(libraryPath, book, format, fileName);
    if (fs.existsSync(filePath)) return filePath;
  }
  return null;
}

export function openerCommand(filePath: string, platform: NodeJS.Platform = process.platform): OpenerCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [filePath] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', `"${filePath}"`] };
    default:
      return { command: 'xdg-open', args: [filePath] };
  }
}

export interface OpenBookOptions {
  platform?: NodeJS.Platform;
  log?: LogCallback;
}

export function openBookFile(filePath: string, options: OpenBookOptions = {}): Promise<boolean> {
  const platform = options.platform ?? process.platform;
  const { command, args } = openerCommand(filePath, platform);

  return new Promise((resolve) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
      windowsVerbatimArguments: platform === 'win32'
    });

    child.once('error', (err) => {
      options.log?.('open', `Failed to open ${filePath}: ${err.message}`);
      resolve(false);
    });

    child.once('spawn', () => {
      child.unref();
      resolve(true);
    });
  });
}
