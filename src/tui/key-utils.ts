export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

export function isCancelKeyName(name: string): boolean {
  return name === 'ESCAPE' || name === 'CTRL_C';
}

/**
 * Keys that press a focused button.
 */
export function isActivateKeyName(name: string): boolean {
  return name === 'ENTER' || name === 'KP_ENTER' || isSpaceKeyName(name);
}

/**
 * A key that produces a single printable character, as terminal-kit names them.
 */
export function isPrintableKeyName(name: string): boolean {
  return Array.from(name).length === 1 && name >= ' ';
}
