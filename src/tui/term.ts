import terminalKit from 'terminal-kit';

/**
 * The drawing surface the renderer needs. `write` takes terminal-kit caret markup.
 */
export interface TermWriter {
  readonly width: number;
  readonly height: number;
  write(markup: string): void;
  moveTo(x: number, y: number): void;
  clear(): void;
  styleReset(): void;
  setCursorVisible(visible: boolean): void;
}

export interface TermSession extends TermWriter {
  /** Subscribes to key names (`TAB`, `ENTER`, `a`, ...). Returns an unsubscribe function. */
  onKey(listener: (name: string) => void): () => void;
  onResize(listener: () => void): () => void;
  /** Switches to the alternate screen and grabs keyboard input. */
  enter(): void;
  leave(): void;
}

type KitTerminal = typeof terminalKit.terminal;

export function fromTerminalKit(term: KitTerminal = terminalKit.terminal): TermSession {
  return {
    get width(): number {
      return term.width || process.stdout.columns || 80;
    },
    get height(): number {
      return term.height || process.stdout.rows || 24;
    },
    write(markup: string): void {
      // Caret markup only: text such as "100%" must not go through format().
      term.markupOnly(markup);
    },
    moveTo(x: number, y: number): void {
      term.moveTo(x, y);
    },
    clear(): void {
      term.clear();
    },
    styleReset(): void {
      term.styleReset();
    },
    setCursorVisible(visible: boolean): void {
      term.hideCursor(!visible);
    },
    onKey(listener: (name: string) => void): () => void {
      const handler = (name: string): void => listener(name);
      term.on('key', handler);
      return () => {
        term.removeListener('key', handler);
      };
    },
    onResize(listener: () => void): () => void {
      const handler = (): void => listener();
      term.on('resize', handler);
      return () => {
        term.removeListener('resize', handler);
      };
    },
    enter(): void {
      term.fullscreen(true);
      term.grabInput(true);
    },
    leave(): void {
      term.grabInput(false);
      term.fullscreen(false);
      term.hideCursor(false);
      term.styleReset();
    },
  };
}
