import { stripMarkup } from '../../src/dialog/markup.js';
import type { TermSession } from '../../src/tui/term.js';

export interface ScreenStub extends TermSession {
  readonly writes: string[];
  readonly cursor: { x: number; y: number };
  readonly cursorVisible: boolean;
  readonly enterCount: number;
  readonly leaveCount: number;
  readonly keyListenerCount: number;
  /** Visible text of a 1-based row, trailing spaces trimmed. */
  rowText(y: number): string;
  screenText(): string;
  press(...names: string[]): void;
}

/**
 * In-memory terminal: keeps a character grid of what was drawn, ignoring styles.
 */
export function createScreenStub(width = 40, height = 12): ScreenStub {
  let grid: string[][] = [];
  const writes: string[] = [];
  const keyListeners = new Set<(name: string) => void>();
  const resizeListeners = new Set<() => void>();
  const state = { x: 1, y: 1, cursorVisible: true, enterCount: 0, leaveCount: 0 };

  const clear = (): void => {
    grid = Array.from({ length: height }, () => Array.from({ length: width }, () => ' '));
  };
  clear();

  return {
    width,
    height,
    writes,
    get cursor() {
      return { x: state.x, y: state.y };
    },
    get cursorVisible() {
      return state.cursorVisible;
    },
    get enterCount() {
      return state.enterCount;
    },
    get leaveCount() {
      return state.leaveCount;
    },
    get keyListenerCount() {
      return keyListeners.size;
    },
    write(markup: string): void {
      writes.push(markup);
      const row = grid[state.y - 1];
      for (const ch of Array.from(stripMarkup(markup))) {
        if (row && state.x >= 1 && state.x <= width) row[state.x - 1] = ch;
        state.x++;
      }
    },
    moveTo(x: number, y: number): void {
      state.x = x;
      state.y = y;
    },
    clear,
    styleReset(): void {},
    setCursorVisible(visible: boolean): void {
      state.cursorVisible = visible;
    },
    onKey(listener) {
      keyListeners.add(listener);
      return () => {
        keyListeners.delete(listener);
      };
    },
    onResize(listener) {
      resizeListeners.add(listener);
      return () => {
        resizeListeners.delete(listener);
      };
    },
    enter(): void {
      state.enterCount++;
    },
    leave(): void {
      state.leaveCount++;
    },
    rowText(y: number): string {
      return (grid[y - 1] ?? []).join('').trimEnd();
    },
    screenText(): string {
      return grid.map((row) => row.join('').trimEnd()).join('\n');
    },
    press(...names: string[]): void {
      for (const name of names) {
        for (const listener of [...keyListeners]) listener(name);
      }
    },
  };
}
