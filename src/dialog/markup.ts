// terminal-kit caret markup: `^r` red, `^+` bold, `^:` reset, `^[fg:red]` long form, `^^` a caret.

export type MarkupToken = { kind: 'style'; code: string } | { kind: 'char'; ch: string };

const RESET = '^:';

export function tokenizeMarkup(text: string): MarkupToken[] {
  const chars = Array.from(text ?? '');
  const tokens: MarkupToken[] = [];

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i]!;
    const next = chars[i + 1];
    if (ch !== '^' || next === undefined) {
      tokens.push({ kind: 'char', ch });
      continue;
    }
    if (next === '^') {
      tokens.push({ kind: 'char', ch: '^' });
      i++;
      continue;
    }
    if (next === '[') {
      const close = chars.indexOf(']', i + 2);
      if (close !== -1) {
        tokens.push({ kind: 'style', code: chars.slice(i, close + 1).join('') });
        i = close;
        continue;
      }
    }
    tokens.push({ kind: 'style', code: `^${next}` });
    i++;
  }

  return tokens;
}

export function stripMarkup(text: string): string {
  return tokenizeMarkup(text)
    .map((t) => (t.kind === 'char' ? t.ch : ''))
    .join('');
}

export function escapeMarkup(text: string): string {
  return (text ?? '').replace(/\^/g, '^^');
}

function toMarkup(token: MarkupToken): string {
  return token.kind === 'style' ? token.code : escapeMarkup(token.ch);
}

/**
 * Hard-wraps one line of markup into rows at most `width` columns wide. Styles that are active at
 * a break are repeated at the start of the next row, so each row can be drawn on its own.
 * `charWidth` gives the columns a character takes; every character is one column by default.
 */
export function wrapMarkupLine(
  line: string,
  width: number,
  charWidth: (ch: string) => number = () => 1
): string[] {
  if (width <= 0) return [];

  const rows: string[] = [];
  let active: string[] = [];
  let row = '';
  let visible = 0;

  for (const token of tokenizeMarkup(line)) {
    if (token.kind === 'style') {
      active = token.code === RESET ? [] : [...active, token.code];
      row += token.code;
      continue;
    }
    const w = charWidth(token.ch);
    if (visible > 0 && visible + w > width) {
      rows.push(row);
      row = active.join('');
      visible = 0;
    }
    row += toMarkup(token);
    visible += w;
  }

  rows.push(row);
  return rows;
}
