import terminalKit from 'terminal-kit';
import { escapeMarkup } from '../dialog/markup.js';

/**
 * Keeps the end of `text` that fits in `maxWidth` columns, so the insertion point stays visible.
 */
export function truncateStartByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (terminalKit.stringWidth(text) <= maxWidth) return text;

  const chars = Array.from(text);
  const out: string[] = [];
  let width = 0;
  for (let i = chars.length - 1; i >= 0; i--) {
    const ch = chars[i]!;
    const w = terminalKit.stringWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }
  return out.reverse().join('');
}

/**
 * Renders a single-line input field as caret markup exactly `width` columns wide.
 * `cursorCol` is the 0-based column of the insertion point inside the field.
 */
export function renderInputField(options: {
  value: string;
  cursor: number;
  width: number;
  focused: boolean;
  colorsDisabled: boolean;
}): { markup: string; cursorCol: number } {
  const { width, focused, colorsDisabled } = options;
  if (width <= 0) return { markup: '', cursorCol: 0 };

  // Text left of the cursor decides how far the field scrolls.
  const chars = Array.from(options.value ?? '');
  const cursor = Math.max(0, Math.min(options.cursor, chars.length));
  const budget = Math.max(0, width - 1);
  const before = truncateStartByWidth(chars.slice(0, cursor).join(''), budget);
  const beforeWidth = terminalKit.stringWidth(before);
  const after = terminalKit.truncateString(chars.slice(cursor).join(''), Math.max(0, budget - beforeWidth));
  const shown = before + after;
  const padWidth = Math.max(0, width - terminalKit.stringWidth(shown));

  if (colorsDisabled) {
    // No background to show the field's extent, so underline it.
    return { markup: escapeMarkup(shown) + '_'.repeat(padWidth), cursorCol: beforeWidth };
  }

  const style = focused ? '^W^k' : '^K^w';
  return { markup: `${style}${escapeMarkup(shown)}${' '.repeat(padWidth)}^:`, cursorCol: beforeWidth };
}
