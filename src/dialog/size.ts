import { estimatedLineCount, maxLineLength } from './text-metrics.js';
import type { FieldSpec } from './types.js';

// Border (1) + padding (1) on both sides.
export const EXTRA_WIDTH = 4;
// Border and padding top/bottom, plus the button row.
export const BASE_EXTRA_HEIGHT = 6;

export interface DialogSize {
  width: number;
  height: number;
}

/**
 * Optimal width and height for a message box showing `text` on a screen `screenWidth` columns
 * wide. `extraWidth` and `extraHeight` cover everything that isn't the text itself.
 */
export function optimalSize(screenWidth: number, extraWidth: number, extraHeight: number, text: string): DialogSize {
  const width = Math.min(screenWidth, maxLineLength(text) + extraWidth);
  const height = extraHeight + estimatedLineCount(text, screenWidth - extraWidth);
  return { width, height };
}

export function fieldBlockHeight(fields: readonly FieldSpec[]): number {
  let height = 0;
  fields.forEach((field, i) => {
    if (i > 0) height++;
    height++;
    if (field.label) height++;
  });
  return height;
}

export function dialogOptimalSize(screenWidth: number, fields: readonly FieldSpec[], text: string): DialogSize {
  return optimalSize(screenWidth, EXTRA_WIDTH, BASE_EXTRA_HEIGHT + fieldBlockHeight(fields), text);
}

/**
 * Grows `current` to fit `optimal`, never shrinking it.
 */
export function growToFit(current: DialogSize, optimal: DialogSize): { size: DialogSize; grew: boolean } {
  const width = Math.max(current.width, optimal.width);
  const height = Math.max(current.height, optimal.height);
  return {
    size: { width, height },
    grew: width !== current.width || height !== current.height,
  };
}
