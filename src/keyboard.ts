/**
 * Keyboard Handler Module
 * Handles raw keyboard input for list navigation and live filtering
 */

import readline from 'readline';
import type { KeyboardCallbacks } from './types.js';

interface KeyData {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  shift?: boolean;
  meta?: boolean;
}

export class KeyboardHandler {
  private callbacks: KeyboardCallbacks = {
    up: null,
    down: null,
    pageUp: null,
    pageDown: null,
    enter: null,
    back: null,
    quit: null,
    search: null,
    switchLibrary: null,
    help: null,
    character: null,
    backspace: null
  };

  private textEntry = false;
  private keypressListener: ((str: string | undefined, key: KeyData | undefined) => void) | null = null;

  onUp(callback: () => void): void { this.callbacks.up = callback; }
  onDown(callback: () => void): void { this.callbacks.down = callback; }
  onPageUp(callback: () => void): void { this.callbacks.pageUp = callback; }
  onPageDown(callback: () => void): void { this.callbacks.pageDown = callback; }
  onEnter(callback: () => void): void { this.callbacks.enter = callback; }
  onBack(callback: () => void): void { this.callbacks.back = callback; }
  onQuit(callback: () => void): void { this.callbacks.quit = callback; }
  onSearch(callback: () => void): void { this.callbacks.search = callback; }
  onSwitchLibrary(callback: () => void): void { this.callbacks.switchLibrary = callback; }
  onHelp(callback: () => void): void { this.callbacks.help = callback; }
  onCharacter(callback: (char: string) => void): void { this.callbacks.character = callback; }
  onBackspace(callback: () => void): void { this.callbacks.backspace = callback; }

  /**
   * In text entry, printable keys go to the character callback instead of
   * being read as commands
   */
  setTextEntry(enabled: boolean): void {
    this.textEntry = enabled;
  }

  isTextEntry(): boolean {
    return this.textEntry;
  }

  start(): void {
    readline.emitKeypressEvents(process.stdin);

    if (process.stdin.isTTY) {
      process.stdin.setRawMode(true);
    }

    this.keypressListener = (str, key) => {
      this.handleKeypress(str ?? '', key ?? {});
    };

    process.stdin.on('keypress', this.keypressListener);
    process.stdin.resume();
  }

  handleKeypress(str: string, key: KeyData): void {
    const name = key.name || '';

    // Ctrl+C always quits, even while typing a filter
    if (key.ctrl && name === 'c') {
      this.callbacks.quit?.();
      return;
    }

    // Navigation keys work in both modes
    if (name === 'up') { this.callbacks.up?.(); return; }
    if (name === 'down') { this.callbacks.down?.(); return; }
    if (name === 'pageup') { this.callbacks.pageUp?.(); return; }
    if (name === 'pagedown') { this.callbacks.pageDown?.(); return; }
    if (name === 'return' || name === 'enter') { this.callbacks.enter?.(); return; }
    if (name === 'escape') { this.callbacks.back?.(); return; }

    if (this.textEntry) {
      this.handleTextEntry(str, key);
      return;
    }

    if (name === 'right') { this.callbacks.enter?.(); return; }
    if (name === 'left') { this.callbacks.back?.(); return; }

    if (name === 'q') { this.callbacks.quit?.(); return; }
    if (name === 'k') { this.callbacks.up?.(); return; }
    if (name === 'j') { this.callbacks.down?.(); return; }

    if (str === '/' || (key.ctrl && name === 'f')) {
      this.callbacks.search?.();
      return;
    }

    if (name === 'l') { this.callbacks.switchLibrary?.(); return; }

    if (name === 'h' || str === '?') {
      this.callbacks.help?.();
      return;
    }
  }

  private handleTextEntry(str: string, key: KeyData): void {
    if (key.name === 'backspace') {
      this.callbacks.backspace?.();
      return;
    }
    if (key.ctrl || key.meta) return;

    // Printable input, including pasted or IME-composed multi-character text
    if (str && !/[\u0000-\u001f\u007f]/.test(str)) {
      this.callbacks.character?.(str);
    }
  }

  stop(): void {
    if (this.keypressListener) {
      process.stdin.removeListener('keypress', this.keypressListener);
      this.keypressListener = null;
    }
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
  }
}
