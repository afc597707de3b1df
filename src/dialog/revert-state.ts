/**
 * At most one button label waiting to be restored when focus leaves a button.
 * Used for transient labels such as "Copy" -> "Copied".
 */
export type RevertState = { kind: 'idle' } | { kind: 'pending'; buttonIndex: number; previousLabel: string };

export const IDLE: RevertState = { kind: 'idle' };

export interface LabelRestore {
  buttonIndex: number;
  label: string;
}

/**
 * Arms a revert for `buttonIndex` when `revertOnBlur` is set. A pending revert for any button is
 * replaced, not applied: only the latest one survives.
 */
export function armRevert(
  state: RevertState,
  buttonIndex: number,
  currentLabel: string,
  revertOnBlur: boolean
): RevertState {
  if (!revertOnBlur) return state;
  return { kind: 'pending', buttonIndex, previousLabel: currentLabel };
}

/**
 * Resolves a button blur. The restore targets the stored button, whichever button lost focus.
 */
export function resolveBlur(state: RevertState): { state: RevertState; restore: LabelRestore | null } {
  if (state.kind === 'idle') return { state, restore: null };
  return {
    state: IDLE,
    restore: { buttonIndex: state.buttonIndex, label: state.previousLabel },
  };
}
