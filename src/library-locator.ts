/**
 * Library Locator Module
 * Probes a fixed set of filesystem locations for calibre libraries
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { LocatorOptions } from './types.js';

export const METADATA_FILE = 'metadata.db';

const HOME_SUBFOLDERS = ['Documents', 'Calibre Library', 'Calibre Libraries', 'Books', 'Library'];
const WINDOWS_DRIVES = ['C', 'D', 'E', 'F'];
const DEFAULT_MAX_CHILDREN = 500;

export function canonicalPath(dir: string): string {
  try {
    return fs.realpathSync(dir);
  } catch {
    return path.resolve(dir);
  }
}

/**
 * A directory is a library iff metadata.db sits directly inside it and can be read
 */
export function isLibraryDirectory(dir: string): boolean {
  const dbPath = path.join(dir, METADATA_FILE);
  try {
    if (!fs.statSync(dbPath).isFile()) return false;
    fs.accessSync(dbPath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function sharedLocations(platform: NodeJS.Platform): string[] {
  switch (platform) {
    case 'darwin':
      return ['/Users', '/Volumes'];
    case 'win32':
      return WINDOWS_DRIVES
        .map(drive => `${drive}:\\`)
        .filter(root => fs.existsSync(root));
    default:
      return ['/home', '/media', '/mnt'];
  }
}

/**
 * Ordered probe list. The order is a scanning strategy only; presentation
 * order belongs to the history ranking.
 */
export function candidateLocations(options: LocatorOptions = {}): string[] {
  const cwd = options.cwd ?? process.cwd();
  const home = options.homeDir ?? os.homedir();
  const platform = options.platform ?? process.platform;

  return [
    cwd,
    home,
    ...HOME_SUBFOLDERS.map(name => path.join(home, name)),
    ...sharedLocations(platform),
    ...(options.extraPaths ?? [])
  ];
}

function childDirectories(dir: string, limit: number): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }

  const children: string[] = [];
  for (const entry of entries) {
    if (children.length >= limit) break;
    if (entry.name.startsWith('.')) continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory() || (entry.isSymbolicLink() && isDirectory(full))) {
      children.push(full);
    }
  }
  return children;
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Lazily yields canonical library paths. Each location is checked itself and
 * one level of its children, never deeper.
 */
export function* locateLibraries(options: LocatorOptions = {}): Generator<string, void, undefined> {
  const limit = options.maxChildren ?? DEFAULT_MAX_CHILDREN;
  const seen = new Set<string>();

  for (const location of candidateLocations(options)) {
    if (!isDirectory(location)) continue;

    for (const dir of [location, ...childDirectories(location, limit)]) {
      if (!isLibraryDirectory(dir)) continue;
      const canonical = canonicalPath(dir);
      if (seen.has(canonical)) continue;
      seen.add(canonical);
      yield canonical;
    }
  }
}
