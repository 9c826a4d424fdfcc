#!/usr/bin/env node

import { fileURLToPath } from 'url';
import { Browser } from './browser.js';
import { CliOptions } from './cli-options.js';
import { HistoryStore } from './history-store.js';
import { countLibraryBooks } from './library-database.js';
import { locateLibraries } from './library-locator.js';
import { formatLastOpened } from './terminal-ui.js';

function handleList(options: CliOptions): void {
  const history = new HistoryStore({ filePath: options.historyFile ?? undefined });
  history.setLogCallback((type, message) => console.error(`Warning (${type}): ${message}`));
  history.load();

  history.merge(locateLibraries({ extraPaths: options.scanPaths }));
  history.fillBookCounts(countLibraryBooks);
  const libraries = history.ranked();

  if (libraries.length === 0) {
    console.log('No calibre libraries found.\n');
    return;
  }

  console.log(`Found ${libraries.length} librar${libraries.length === 1 ? 'y' : 'ies'}:\n`);

  for (const lib of libraries) {
    const books = lib.bookCountHint !== undefined ? `, ${lib.bookCountHint} books` : '';
    console.log(`    --> ${lib.displayName}  ${lib.path}`);
    console.log(`        last opened ${formatLastOpened(lib.lastOpened)}, ${lib.openCount}x${books}`);
  }

  console.log();
}

async function main(): Promise<void> {
  const options = new CliOptions();

  if (options.help) {
    console.log(options.getHelpMessage());
    return;
  }

  if (!options.isValid()) {
    console.error(options.getErrorMessage());
    console.error(options.getUsageMessage());
    process.exit(1);
  }

  if (options.list) {
    handleList(options);
    return;
  }

  const browser = new Browser({
    libraryPath: options.libraryPath,
    scanPaths: options.scanPaths,
    historyFile: options.historyFile ?? undefined
  });

  await browser.start();
}

// Main execution check
const modulePath = fileURLToPath(import.meta.url);
const scriptPath = process.argv[1];

if (scriptPath && (modulePath.endsWith(scriptPath) || scriptPath.endsWith('calibrowse') || scriptPath.endsWith('calibrowse.js'))) {
  main().catch(err => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n❌ Fatal error: ${message}\n`);
    if (process.env.DEBUG === '1' && err instanceof Error) {
      console.error(err.stack);
    }
    process.exit(1);
  });
}

export { main, handleList };
