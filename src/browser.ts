/**
 * Browser Class
 * Keyboard-driven library picker and book browser
 */

import path from 'path';
import { openBookFile, resolveBookFile } from './book-opener.js';
import type { OpenBookOptions } from './book-opener.js';
import { HistoryStore } from './history-store.js';
import { KeyboardHandler } from './keyboard.js';
import { countLibraryBooks, loadLibrary } from './library-database.js';
import { canonicalPath, isLibraryDirectory, locateLibraries } from './library-locator.js';
import { QuerySession } from './query-session.js';
import { SearchIndex, bookFields, libraryFields } from './search-index.js';
import { TerminalUI } from './terminal-ui.js';
import type {
  BookRecord,
  BrowserMode,
  BrowserOptions,
  LibraryRecord,
  LocatorOptions,
  QueryState
} from './types.js';

const PAGE_SIZE = 10;

export interface BrowserDeps {
  ui?: TerminalUI;
  keyboard?: KeyboardHandler;
  history?: HistoryStore;
  locate?: (options: LocatorOptions) => Iterable<string>;
  loadBooks?: (libraryPath: string) => Promise<BookRecord[]>;
  countBooks?: (libraryPath: string) => number | null;
  openFile?: (filePath: string, options: OpenBookOptions) => Promise<boolean>;
  exit?: (code: number) => void;
}

/**
 * Books of the open library. Replaced as a whole when another library opens.
 */
interface ActiveLibrary {
  path: string;
  name: string;
  index: SearchIndex<BookRecord, number>;
  session: QuerySession<BookRecord, number>;
}

export class Browser {
  private options: BrowserOptions;
  private ui: TerminalUI;
  private keyboard: KeyboardHandler;
  private history: HistoryStore;
  private locate: (options: LocatorOptions) => Iterable<string>;
  private loadBooks: (libraryPath: string) => Promise<BookRecord[]>;
  private countBooks: (libraryPath: string) => number | null;
  private openFile: (filePath: string, options: OpenBookOptions) => Promise<boolean>;
  private exit: (code: number) => void;

  private _mode: BrowserMode = 'library-select';
  private returnMode: BrowserMode = 'library-select';
  private libraryFilterActive = false;
  private librarySession: QuerySession<LibraryRecord, string>;
  private active: ActiveLibrary | null = null;

  // Bumped on every open and on abandon; a load finishing under an old value is dropped
  private loadGeneration = 0;
  private loadingPath: string | null = null;

  constructor(options: BrowserOptions = {}, deps: BrowserDeps = {}) {
    this.options = options;
    this.ui = deps.ui ?? new TerminalUI();
    this.keyboard = deps.keyboard ?? new KeyboardHandler();
    this.history = deps.history ?? new HistoryStore({ filePath: options.historyFile });
    this.locate = deps.locate ?? locateLibraries;
    this.loadBooks = deps.loadBooks ?? loadLibrary;
    this.countBooks = deps.countBooks ?? countLibraryBooks;
    this.openFile = deps.openFile ?? openBookFile;
    this.exit = deps.exit ?? ((code) => process.exit(code));

    this.history.setLogCallback((type, message) => this.ui.showMessage(`[${type}] ${message}`));
    this.librarySession = new QuerySession(SearchIndex.build([], libraryFields));
  }

  get mode(): BrowserMode {
    return this._mode;
  }

  get activeLibraryPath(): string | null {
    return this.active?.path ?? null;
  }

  get bookState(): Readonly<QueryState<number>> | null {
    return this.active?.session.state ?? null;
  }

  get libraryState(): Readonly<QueryState<string>> {
    return this.librarySession.state;
  }

  get libraries(): LibraryRecord[] {
    return this.librarySession.matchedRecords();
  }

  selectedBook(): BookRecord | undefined {
    return this.active?.session.selected();
  }

  // ============================================================================
  // Startup
  // ============================================================================

  /**
   * Load history, scan for libraries and show the picker, or open the
   * library given on the command line straight away.
   */
  async start(): Promise<void> {
    this.history.load();
    this.discoverLibraries();

    this.setupKeyboardHandlers();
    this.keyboard.start();

    const requested = this.options.libraryPath;
    if (requested) {
      if (isLibraryDirectory(requested)) {
        await this.openLibrary(requested);
        return;
      }
      this.render();
      this.ui.showError(`No calibre database found in ${requested}`);
      return;
    }

    this.render();
  }

  discoverLibraries(): LibraryRecord[] {
    const found = this.locate({ extraPaths: this.options.scanPaths ?? [] });
    this.history.merge(found);
    this.history.fillBookCounts(this.countBooks);
    const ranked = this.history.ranked();
    this.rebuildLibraryList(ranked);
    return ranked;
  }

  private rebuildLibraryList(records: LibraryRecord[] = this.history.ranked()): void {
    this.librarySession = new QuerySession(SearchIndex.build(records, libraryFields));
    this.libraryFilterActive = false;
  }

  private setupKeyboardHandlers(): void {
    this.keyboard.onUp(() => this.handleMove(-1));
    this.keyboard.onDown(() => this.handleMove(1));
    this.keyboard.onPageUp(() => this.handleMove(-PAGE_SIZE));
    this.keyboard.onPageDown(() => this.handleMove(PAGE_SIZE));
    this.keyboard.onEnter(() => this.runTask(this.handleEnter()));
    this.keyboard.onBack(() => this.handleBack());
    this.keyboard.onQuit(() => this.handleQuit());
    this.keyboard.onSearch(() => this.handleSearch());
    this.keyboard.onSwitchLibrary(() => this.handleSwitchLibrary());
    this.keyboard.onHelp(() => this.handleHelp());
    this.keyboard.onCharacter((char) => this.handleCharacter(char));
    this.keyboard.onBackspace(() => this.handleBackspace());
  }

  private runTask(task: Promise<unknown>): void {
    task.catch((err: unknown) => {
      this.ui.showError(err instanceof Error ? err.message : String(err));
    });
  }

  private setMode(mode: BrowserMode): void {
    this._mode = mode;
    const typing = (mode === 'library-select' && this.libraryFilterActive) || mode === 'book-search';
    this.keyboard.setTextEntry(typing);
  }

  // ============================================================================
  // Library loading
  // ============================================================================

  /**
   * Load a library's books and swap them in. Returns false on failure or
   * when the load was abandoned before it finished.
   */
  async openLibrary(libraryPath: string): Promise<boolean> {
    const target = canonicalPath(libraryPath);
    const generation = ++this.loadGeneration;
    this.loadingPath = target;
    this.ui.clearStatus();
    this.setMode('loading');
    this.ui.showLoading(target);

    let books: BookRecord[];
    try {
      books = await this.loadBooks(target);
    } catch (err) {
      if (generation !== this.loadGeneration) return false;
      this.loadingPath = null;
      this.setMode('library-select');
      this.render();
      this.ui.showError(err instanceof Error ? err.message : String(err));
      return false;
    }

    if (generation !== this.loadGeneration) return false;
    this.loadingPath = null;

    const index = SearchIndex.build(books, bookFields);
    const record = this.history.recordOpen(target, { bookCount: index.size });
    this.history.save();

    this.active = {
      path: target,
      name: record.displayName || path.basename(target),
      index,
      session: new QuerySession(index)
    };

    this.rebuildLibraryList();
    this.setMode('books');
    this.render();
    return true;
  }

  private abandonLoad(): void {
    this.loadGeneration++;
    this.loadingPath = null;
    this.setMode('library-select');
    this.render();
  }

  // ============================================================================
  // Handlers
  // ============================================================================

  private closeHelp(): void {
    this.setMode(this.returnMode);
    this.render();
  }

  private handleMove(delta: number): void {
    if (this._mode === 'help') return this.closeHelp();

    if (this._mode === 'library-select') {
      this.librarySession.moveCursor(delta);
    } else if ((this._mode === 'books' || this._mode === 'book-search') && this.active) {
      this.active.session.moveCursor(delta);
    } else {
      return;
    }
    this.render();
  }

  private async handleEnter(): Promise<void> {
    if (this._mode === 'help') return this.closeHelp();

    switch (this._mode) {
      case 'library-select': {
        const library = this.librarySession.selected();
        if (library) {
          await this.openLibrary(library.path);
        }
        return;
      }
      case 'books':
      case 'book-search': {
        if (!this.selectedBook()) return;
        this.returnMode = this._mode;
        this.setMode('details');
        this.render();
        return;
      }
      case 'details':
        await this.openSelectedBook();
        return;
      default:
        return;
    }
  }

  async openSelectedBook(): Promise<boolean> {
    const book = this.selectedBook();
    if (!this.active || !book) return false;

    const filePath = resolveBookFile(this.active.path, book);
    if (!filePath) {
      this.ui.showError(`No file found for "${book.title}"`);
      return false;
    }

    const opened = await this.openFile(filePath, {
      log: (_type, message) => this.ui.showError(message)
    });
    if (opened) {
      this.ui.showMessage(`Opened ${path.basename(filePath)}`);
    }
    return opened;
  }

  private handleBack(): void {
    switch (this._mode) {
      case 'help':
        this.closeHelp();
        return;
      case 'loading':
        this.abandonLoad();
        return;
      case 'library-select':
        if (this.libraryFilterActive) {
          this.libraryFilterActive = false;
          this.setMode('library-select');
        } else if (this.librarySession.query) {
          this.librarySession.clear();
        } else if (this.active) {
          this.setMode('books');
        } else {
          this.handleQuit();
          return;
        }
        break;
      case 'book-search':
        this.setMode('books');
        break;
      case 'books':
        if (this.active?.session.query) {
          this.active.session.clear();
        } else {
          this.setMode('library-select');
        }
        break;
      case 'details':
        this.setMode(this.returnMode === 'book-search' ? 'book-search' : 'books');
        break;
    }
    this.render();
  }

  private handleSearch(): void {
    if (this._mode === 'help') return this.closeHelp();

    if (this._mode === 'library-select') {
      this.libraryFilterActive = true;
      this.setMode('library-select');
    } else if (this._mode === 'books') {
      this.setMode('book-search');
    } else {
      return;
    }
    this.render();
  }

  private handleSwitchLibrary(): void {
    if (this._mode === 'help') return this.closeHelp();
    if (this._mode === 'loading') return;

    this.rebuildLibraryList();
    this.setMode('library-select');
    this.render();
  }

  private handleHelp(): void {
    if (this._mode === 'help') return this.closeHelp();
    if (this._mode === 'loading') return;

    this.returnMode = this._mode;
    this.setMode('help');
    this.ui.showHelp();
  }

  private handleCharacter(char: string): void {
    if (this._mode === 'library-select' && this.libraryFilterActive) {
      this.librarySession.appendChar(char);
    } else if (this._mode === 'book-search' && this.active) {
      this.active.session.appendChar(char);
    } else {
      return;
    }
    this.render();
  }

  private handleBackspace(): void {
    if (this._mode === 'library-select' && this.libraryFilterActive) {
      this.librarySession.backspace();
    } else if (this._mode === 'book-search' && this.active) {
      this.active.session.backspace();
    } else {
      return;
    }
    this.render();
  }

  handleQuit(): void {
    this.history.save();
    this.keyboard.stop();
    this.ui.showGoodbye();
    this.exit(0);
  }

  // ============================================================================
  // Rendering
  // ============================================================================

  render(): void {
    switch (this._mode) {
      case 'library-select':
        this.ui.renderLibraries(
          this.librarySession.matchedRecords(),
          this.librarySession.state,
          this.librarySession.total,
          this.libraryFilterActive
        );
        return;
      case 'loading':
        this.ui.showLoading(this.loadingPath ?? '');
        return;
      case 'books':
      case 'book-search':
        if (!this.active) return;
        this.ui.renderBooks(
          this.active.name,
          this.active.session.matchedRecords(),
          this.active.session.state,
          this.active.index.size,
          this._mode === 'book-search'
        );
        return;
      case 'details': {
        const book = this.selectedBook();
        if (!this.active || !book) return;
        this.ui.renderDetails(book, resolveBookFile(this.active.path, book));
        return;
      }
      case 'help':
        this.ui.showHelp();
        return;
    }
  }
}
