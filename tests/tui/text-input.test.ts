import { describe, expect, it } from 'vitest';
import { applyTextInputKey, createTextInput, displayValue } from '../../src/tui/text-input.js';

describe('createTextInput', () => {
  it('puts the cursor at the end', () => {
    expect(createTextInput('héllo')).toEqual({ value: 'héllo', cursor: 5 });
  });
});

describe('applyTextInputKey', () => {
  it('inserts printable characters at the cursor', () => {
    const result = applyTextInputKey({ value: 'ac', cursor: 1 }, 'b');
    expect(result).toEqual({ state: { value: 'abc', cursor: 2 }, didChangeValue: true });
  });

  it('inserts a space for SPACE', () => {
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'SPACE')?.state).toEqual({ value: 'ab ', cursor: 3 });
  });

  it('moves without changing the value', () => {
    expect(applyTextInputKey({ value: 'abc', cursor: 1 }, 'LEFT')).toEqual({
      state: { value: 'abc', cursor: 0 },
      didChangeValue: false,
    });
    expect(applyTextInputKey({ value: 'abc', cursor: 0 }, 'LEFT')?.state.cursor).toBe(0);
    expect(applyTextInputKey({ value: 'abc', cursor: 3 }, 'RIGHT')?.state.cursor).toBe(3);
    expect(applyTextInputKey({ value: 'abc', cursor: 2 }, 'HOME')?.state.cursor).toBe(0);
    expect(applyTextInputKey({ value: 'abc', cursor: 0 }, 'CTRL_E')?.state.cursor).toBe(3);
  });

  it('jumps by words', () => {
    expect(applyTextInputKey({ value: 'one two  three', cursor: 14 }, 'CTRL_LEFT')?.state.cursor).toBe(9);
    expect(applyTextInputKey({ value: 'one two  three', cursor: 3 }, 'ALT_F')?.state.cursor).toBe(7);
  });

  it('deletes around the cursor', () => {
    expect(applyTextInputKey({ value: 'abc', cursor: 2 }, 'BACKSPACE')?.state).toEqual({ value: 'ac', cursor: 1 });
    expect(applyTextInputKey({ value: 'abc', cursor: 0 }, 'BACKSPACE')?.didChangeValue).toBe(false);
    expect(applyTextInputKey({ value: 'abc', cursor: 1 }, 'DELETE')?.state).toEqual({ value: 'ac', cursor: 1 });
  });

  it('kills words and line halves', () => {
    expect(applyTextInputKey({ value: 'foo bar', cursor: 7 }, 'CTRL_W')?.state).toEqual({ value: 'foo ', cursor: 4 });
    expect(applyTextInputKey({ value: 'foo bar', cursor: 4 }, 'CTRL_U')?.state).toEqual({ value: 'bar', cursor: 0 });
    expect(applyTextInputKey({ value: 'foo bar', cursor: 3 }, 'CTRL_K')?.state).toEqual({ value: 'foo', cursor: 3 });
  });

  it('clamps a cursor past the end', () => {
    expect(applyTextInputKey({ value: 'ab', cursor: 10 }, 'c')?.state).toEqual({ value: 'abc', cursor: 3 });
  });

  it('returns null for keys it does not handle', () => {
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'ENTER')).toBeNull();
    expect(applyTextInputKey({ value: 'ab', cursor: 2 }, 'TAB')).toBeNull();
  });
});

describe('displayValue', () => {
  it('masks one character per code point', () => {
    expect(displayValue('pässwörd', true)).toBe('********');
    expect(displayValue('abc', true, '•')).toBe('•••');
    expect(displayValue('abc', false)).toBe('abc');
  });
});
