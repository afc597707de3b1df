import type { FieldSpec } from './types.js';

export const BORDER = 1;
export const PADDING = 1;
const MIN_BUTTON_WIDTH = 10;
// Two columns of breathing room on each side of a button label.
const BUTTON_LABEL_PADDING = 2;
const BUTTON_GAP = 1;

/**
 * Data-only description of the message box template. The text row takes whatever height the
 * fixed rows leave over; every other row is one line tall.
 */
export type LayoutRow =
  | { kind: 'text' }
  | { kind: 'spacer' }
  | { kind: 'label'; field: number; text: string }
  | { kind: 'field'; field: number }
  | { kind: 'buttons'; widths: number[] };

export interface ButtonCell {
  index: number;
  /** Column offset inside the row, 0-based. */
  x: number;
  width: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function buttonCellWidth(label: string): number {
  return Math.max(MIN_BUTTON_WIDTH, Array.from(label).length + 2 * BUTTON_LABEL_PADDING);
}

export function buildLayout(fields: readonly FieldSpec[], buttons: readonly string[]): LayoutRow[] {
  const rows: LayoutRow[] = [{ kind: 'text' }];

  fields.forEach((field, i) => {
    if (i > 0) rows.push({ kind: 'spacer' });
    if (field.label) rows.push({ kind: 'label', field: i, text: field.label });
    rows.push({ kind: 'field', field: i });
  });

  rows.push({ kind: 'buttons', widths: buttons.map(buttonCellWidth) });
  return rows;
}

export function fixedRowCount(rows: readonly LayoutRow[]): number {
  return rows.filter((row) => row.kind !== 'text').length;
}

/**
 * Centers the button cells in a row `rowWidth` columns wide, one column apart.
 */
export function layoutButtonRow(widths: readonly number[], rowWidth: number): ButtonCell[] {
  const total = widths.reduce((sum, w) => sum + w, 0) + Math.max(0, widths.length - 1) * BUTTON_GAP;
  let x = Math.max(0, Math.floor((rowWidth - total) / 2));

  return widths.map((width, index) => {
    const cell = { index, x, width };
    x += width + BUTTON_GAP;
    return cell;
  });
}

/**
 * Centers a `width` x `height` box on the screen. Coordinates are 1-based, like terminal-kit's.
 */
export function placeModal(screenWidth: number, screenHeight: number, width: number, height: number): Rect {
  const w = Math.min(width, screenWidth);
  const h = Math.min(height, screenHeight);
  return {
    x: Math.max(0, Math.floor((screenWidth - w) / 2)) + 1,
    y: Math.max(0, Math.floor((screenHeight - h) / 2)) + 1,
    width: w,
    height: h,
  };
}

/**
 * The area inside border and padding.
 */
export function contentRect(frame: Rect): Rect {
  const inset = BORDER + PADDING;
  return {
    x: frame.x + inset,
    y: frame.y + inset,
    width: Math.max(0, frame.width - 2 * inset),
    height: Math.max(0, frame.height - 2 * inset),
  };
}
