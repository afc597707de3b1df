import terminalKit from 'terminal-kit';
import { sameTarget } from '../dialog/focus-ring.js';
import { contentRect, fixedRowCount, layoutButtonRow, type Rect } from '../dialog/layout.js';
import { escapeMarkup, stripMarkup, wrapMarkupLine } from '../dialog/markup.js';
import type { Align, BackgroundColor, DialogView, FocusTarget } from '../dialog/types.js';
import { renderInputField } from './input-render.js';
import type { TermWriter } from './term.js';
import { displayValue } from './text-input.js';

const BG_MARKUP: Record<BackgroundColor, string> = {
  black: '^K',
  red: '^R',
  green: '^G',
  yellow: '^Y',
  blue: '^B',
  magenta: '^M',
  cyan: '^C',
  white: '^W',
};

const BUTTON_STYLE = '^B^w';
const FOCUSED_STYLE = '^W^k';

export interface DialogRenderOptions {
  colorsDisabled: boolean;
  focused: FocusTarget | null;
  /** Cursor position (in code points) of a field's input. */
  fieldCursor: (index: number) => number;
}

function visibleWidth(markup: string): number {
  return terminalKit.stringWidth(stripMarkup(markup));
}

function centerText(text: string, width: number): string {
  const shown = terminalKit.truncateString(text, Math.max(0, width));
  const free = Math.max(0, width - terminalKit.stringWidth(shown));
  const left = Math.floor(free / 2);
  return ' '.repeat(left) + escapeMarkup(shown) + ' '.repeat(free - left);
}

function alignRow(markup: string, width: number, align: Align, reset: string): string {
  const free = Math.max(0, width - visibleWidth(markup));
  const left = align === 'center' ? Math.floor(free / 2) : align === 'right' ? free : 0;
  return ' '.repeat(left) + markup + reset + ' '.repeat(free - left);
}

function titleBar(title: string, inner: number, bold: string, reset: string): string {
  if (!title || inner < 3) return '─'.repeat(Math.max(0, inner));

  const shown = ` ${terminalKit.truncateString(title, inner - 2)} `;
  const len = terminalKit.stringWidth(shown);
  const left = Math.floor((inner - len) / 2);
  return '─'.repeat(left) + bold + escapeMarkup(shown) + reset + '─'.repeat(inner - left - len);
}

function textRows(text: string, width: number, plain: boolean): string[] {
  return text.split('\n').flatMap((line) =>
    wrapMarkupLine(plain ? escapeMarkup(line) : line, width, terminalKit.stringWidth)
  );
}

function buttonRow(
  view: DialogView,
  widths: readonly number[],
  rowWidth: number,
  focused: FocusTarget | null,
  plain: boolean,
  reset: string
): string {
  let out = '';
  let col = 0;

  for (const cell of layoutButtonRow(widths, rowWidth)) {
    if (cell.x + cell.width > rowWidth) break;

    const label = view.getButtonLabel(cell.index);
    const isFocused = focused !== null && sameTarget(focused, { kind: 'button', index: cell.index });
    out += ' '.repeat(cell.x - col);
    if (plain) {
      out += isFocused ? `[${centerText(label, cell.width - 2)}]` : ` ${centerText(label, cell.width - 2)} `;
    } else {
      out += (isFocused ? FOCUSED_STYLE : BUTTON_STYLE) + centerText(label, cell.width) + reset;
    }
    col = cell.x + cell.width;
  }

  return out;
}

/**
 * Draws a message box into `frame` (1-based screen coordinates). Returns where the terminal
 * cursor belongs when an input field has focus, else null.
 */
export function renderDialog(
  term: TermWriter,
  view: DialogView,
  frame: Rect,
  options: DialogRenderOptions
): { x: number; y: number } | null {
  if (frame.width < 2 || frame.height < 2) return null;

  const plain = options.colorsDisabled;
  const bg = !plain && view.background ? BG_MARKUP[view.background] : '';
  const reset = plain ? '' : `^:${bg}`;
  const end = plain ? '' : '^:';
  const inner = frame.width - 2;

  const line = (y: number, body: string): void => {
    term.moveTo(frame.x, y);
    term.write(bg + body + end);
  };

  line(frame.y, `┌${titleBar(view.title, inner, plain ? '' : '^+', reset)}┐`);
  for (let y = frame.y + 1; y < frame.y + frame.height - 1; y++) {
    line(y, `│${' '.repeat(inner)}│`);
  }
  line(frame.y + frame.height - 1, `└${'─'.repeat(inner)}┘`);

  const content = contentRect(frame);
  const put = (row: number, markup: string): void => {
    if (row >= content.height) return;
    term.moveTo(content.x, content.y + row);
    term.write(bg + markup + end);
  };

  const textHeight = Math.max(0, content.height - fixedRowCount(view.layout));
  let cursor: { x: number; y: number } | null = null;
  let row = 0;

  for (const item of view.layout) {
    switch (item.kind) {
      case 'text': {
        const rows = textRows(view.getText(plain), content.width, plain).slice(0, textHeight);
        rows.forEach((r, i) => put(row + i, alignRow(r, content.width, view.align, reset)));
        row += textHeight;
        break;
      }
      case 'spacer':
        row++;
        break;
      case 'label':
        put(row, escapeMarkup(terminalKit.truncateString(item.text, content.width)));
        row++;
        break;
      case 'field': {
        const target: FocusTarget = { kind: 'field', index: item.field };
        const focused = options.focused !== null && sameTarget(options.focused, target);
        const masked = Boolean(view.fields[item.field]?.isPassword);
        const rendered = renderInputField({
          value: displayValue(view.getFieldValue(item.field), masked),
          cursor: options.fieldCursor(item.field),
          width: content.width,
          focused,
          colorsDisabled: plain,
        });
        put(row, rendered.markup);
        if (focused && row < content.height) {
          cursor = { x: content.x + rendered.cursorCol, y: content.y + row };
        }
        row++;
        break;
      }
      case 'buttons':
        put(row, buttonRow(view, item.widths, content.width, options.focused, plain, reset));
        row++;
        break;
    }
  }

  return cursor;
}
