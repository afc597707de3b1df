import { CliUsageError, InvalidFlagValueError } from './errors.js';

/**
 * Removes the last `name value` pair from `args` (later flags win) and returns the value.
 */
export function takeFlag(args: string[], name: string): string | undefined {
  let value: string | undefined;
  let index = args.indexOf(name);
  while (index !== -1) {
    const next = args[index + 1];
    if (next === undefined) {
      throw new CliUsageError(`Flag '${name}' requires a value.`);
    }
    value = next;
    args.splice(index, 2);
    index = args.indexOf(name, index);
  }
  return value;
}

export function takeRepeatedFlag(args: string[], name: string): string[] {
  const values: string[] = [];
  for (let value = takeFirst(args, name); value !== undefined; value = takeFirst(args, name)) {
    values.push(value);
  }
  return values;
}

function takeFirst(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined) {
    throw new CliUsageError(`Flag '${name}' requires a value.`);
  }
  args.splice(index, 2);
  return value;
}

export function takeSwitch(args: string[], ...names: string[]): boolean {
  let found = false;
  for (let i = args.length - 1; i >= 0; i--) {
    if (names.includes(args[i] ?? '')) {
      args.splice(i, 1);
      found = true;
    }
  }
  return found;
}

export function parseNonNegativeInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new InvalidFlagValueError(name, value, 'expects a non-negative integer');
  }
  return Number.parseInt(value, 10);
}

export function assertNoArgsLeft(args: readonly string[], command: string): void {
  const extra = args[0];
  if (extra !== undefined) {
    throw new CliUsageError(`Unexpected argument '${extra}' for '${command}'.`);
  }
}
