/**
 * Raised when a caller breaks the dialog's usage contract (missing callbacks, showing twice, ...).
 */
export class DialogContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DialogContractError';
  }
}

export class ButtonIndexOutOfRangeError extends RangeError {
  constructor(
    public readonly index: number,
    public readonly buttonCount: number
  ) {
    super(`Button index ${index} out of range (dialog has ${buttonCount} button${buttonCount === 1 ? '' : 's'})`);
    this.name = 'ButtonIndexOutOfRangeError';
  }
}
