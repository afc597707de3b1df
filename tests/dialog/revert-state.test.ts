import { describe, expect, it } from 'vitest';
import { IDLE, armRevert, resolveBlur } from '../../src/dialog/revert-state.js';

describe('button label revert state', () => {
  it('restores the original label on the next blur', () => {
    const armed = armRevert(IDLE, 0, 'Copy', true);
    expect(armed).toEqual({ kind: 'pending', buttonIndex: 0, previousLabel: 'Copy' });

    const { state, restore } = resolveBlur(armed);
    expect(restore).toEqual({ buttonIndex: 0, label: 'Copy' });
    expect(state).toEqual(IDLE);
  });

  it('does nothing on blur when idle', () => {
    expect(resolveBlur(IDLE)).toEqual({ state: IDLE, restore: null });
  });

  it('leaves the state alone when not asked to revert', () => {
    const armed = armRevert(IDLE, 0, 'Copy', true);
    expect(armRevert(armed, 1, 'Close', false)).toBe(armed);
  });

  it('keeps only the latest pending revert', () => {
    const first = armRevert(IDLE, 0, 'Copy', true);
    const second = armRevert(first, 1, 'Close', true);

    const { restore } = resolveBlur(second);
    expect(restore).toEqual({ buttonIndex: 1, label: 'Close' });
  });
});
