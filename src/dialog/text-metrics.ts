function charCount(line: string): number {
  return Array.from(line).length;
}

/**
 * Length (in code points) of the longest `\n`-separated line. The text is not trimmed.
 */
export function maxLineLength(text: string): number {
  let max = 0;
  for (const line of (text ?? '').split('\n')) {
    const len = charCount(line);
    if (len > max) max = len;
  }
  return max;
}

/**
 * Estimates how many rows the text needs when wrapped at `wrapWidth` columns.
 *
 * Counts characters rather than simulating word-wrap, so it can be off by a row or two
 * compared to what a renderer that breaks on word boundaries draws.
 */
export function estimatedLineCount(text: string, wrapWidth: number): number {
  if (wrapWidth <= 0) return 0;

  const lines = (text ?? '').trim().split('\n');
  let rows = 0;
  for (const line of lines) {
    // An empty line still takes a row.
    rows += Math.max(1, Math.ceil(charCount(line) / wrapWidth));
  }
  return rows;
}
