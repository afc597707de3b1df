export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * A flag was given a value it doesn't accept.
 */
export class InvalidFlagValueError extends CliUsageError {
  constructor(
    public readonly flag: string,
    public readonly value: string,
    expected: string
  ) {
    super(`Flag '${flag}' ${expected}, got '${value}'.`);
    this.name = 'InvalidFlagValueError';
  }
}

export class FileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
  }
}
