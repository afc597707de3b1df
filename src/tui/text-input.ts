import { isPrintableKeyName, isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /** Cursor position in code points. */
  cursor: number;
}

export interface TextInputResult {
  state: TextInputState;
  didChangeValue: boolean;
}

type Edit = (chars: string[], cursor: number) => { chars: string[]; cursor: number };

function splice(chars: string[], from: number, to: number, insert: string[] = []): string[] {
  const out = [...chars];
  out.splice(from, Math.max(0, to - from), ...insert);
  return out;
}

function wordStartBefore(chars: string[], cursor: number): number {
  let i = cursor;
  while (i > 0 && /\s/.test(chars[i - 1] ?? '')) i--;
  while (i > 0 && !/\s/.test(chars[i - 1] ?? '')) i--;
  return i;
}

function wordEndAfter(chars: string[], cursor: number): number {
  let i = cursor;
  while (i < chars.length && /\s/.test(chars[i] ?? '')) i++;
  while (i < chars.length && !/\s/.test(chars[i] ?? '')) i++;
  return i;
}

const move =
  (to: (chars: string[], cursor: number) => number): Edit =>
  (chars, cursor) => ({ chars, cursor: to(chars, cursor) });

const EDITS: Record<string, Edit> = {
  LEFT: move((_, c) => c - 1),
  RIGHT: move((_, c) => c + 1),
  HOME: move(() => 0),
  CTRL_A: move(() => 0),
  END: move((chars) => chars.length),
  CTRL_E: move((chars) => chars.length),
  CTRL_LEFT: move(wordStartBefore),
  ALT_B: move(wordStartBefore),
  CTRL_RIGHT: move(wordEndAfter),
  ALT_F: move(wordEndAfter),
  BACKSPACE: (chars, c) => (c > 0 ? { chars: splice(chars, c - 1, c), cursor: c - 1 } : { chars, cursor: c }),
  DELETE: (chars, c) => ({ chars: splice(chars, c, c + 1), cursor: c }),
  CTRL_W: (chars, c) => {
    const start = wordStartBefore(chars, c);
    return { chars: splice(chars, start, c), cursor: start };
  },
  CTRL_U: (chars, c) => ({ chars: splice(chars, 0, c), cursor: 0 }),
  CTRL_K: (chars, c) => ({ chars: splice(chars, c, chars.length), cursor: c }),
};

export function createTextInput(initial: string): TextInputState {
  const value = initial ?? '';
  return { value, cursor: Array.from(value).length };
}

/**
 * Applies an editing key (terminal-kit key name) to a single-line input.
 * Returns null for keys that aren't editing keys, so callers can handle them.
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputResult | null {
  const chars = Array.from(state.value ?? '');
  const cursor = Math.max(0, Math.min(state.cursor, chars.length));

  let edit = EDITS[name];
  if (!edit && (isSpaceKeyName(name) || isPrintableKeyName(name))) {
    const text = isSpaceKeyName(name) ? [' '] : Array.from(name);
    edit = (cs, c) => ({ chars: splice(cs, c, c, text), cursor: c + text.length });
  }
  if (!edit) return null;

  const next = edit(chars, cursor);
  const value = next.chars.join('');
  return {
    state: { value, cursor: Math.max(0, Math.min(next.cursor, next.chars.length)) },
    didChangeValue: value !== state.value,
  };
}

/**
 * What an input field shows: the value, or one mask character per code point.
 */
export function displayValue(value: string, masked: boolean, maskChar = '*'): string {
  return masked ? maskChar.repeat(Array.from(value).length) : value;
}
