import { DialogContractError } from './errors.js';
import type { FocusTarget } from './types.js';

export function buildFocusRing(fieldCount: number, buttonCount: number): FocusTarget[] {
  const ring: FocusTarget[] = [];
  for (let i = 0; i < fieldCount; i++) ring.push({ kind: 'field', index: i });
  for (let i = 0; i < buttonCount; i++) ring.push({ kind: 'button', index: i });
  return ring;
}

export function sameTarget(a: FocusTarget, b: FocusTarget): boolean {
  return a.kind === b.kind && a.index === b.index;
}

function neighborIndices(ring: readonly FocusTarget[], current: FocusTarget): { prev: number; next: number } {
  if (ring.length === 0) {
    throw new DialogContractError('Cannot move focus: the dialog has no fields or buttons');
  }

  // An unknown target wraps to the start of the ring.
  const i = ring.findIndex((t) => sameTarget(t, current));
  if (i === -1) return { prev: 0, next: 0 };

  return {
    prev: (i - 1 + ring.length) % ring.length,
    next: (i + 1) % ring.length,
  };
}

export function nextOf(ring: readonly FocusTarget[], current: FocusTarget): FocusTarget {
  return ring[neighborIndices(ring, current).next]!;
}

export function prevOf(ring: readonly FocusTarget[], current: FocusTarget): FocusTarget {
  return ring[neighborIndices(ring, current).prev]!;
}

/**
 * Where focus lands when a dialog is shown: the first field, else the first button.
 */
export function initialFocus(ring: readonly FocusTarget[]): FocusTarget | null {
  return ring[0] ?? null;
}

export function formatTarget(target: FocusTarget): string {
  return `${target.kind}#${target.index}`;
}
