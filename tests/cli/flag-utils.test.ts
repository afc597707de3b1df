import { describe, expect, it } from 'vitest';
import { CliUsageError, InvalidFlagValueError } from '../../src/cli/errors.js';
import {
  assertNoArgsLeft,
  parseNonNegativeInt,
  takeFlag,
  takeRepeatedFlag,
  takeSwitch,
} from '../../src/cli/flag-utils.js';

describe('takeFlag', () => {
  it('removes every occurrence and keeps the last value', () => {
    const args = ['--title', 'a', '--text', 'x', '--title', 'b'];
    expect(takeFlag(args, '--title')).toBe('b');
    expect(args).toEqual(['--text', 'x']);
  });

  it('returns undefined when the flag is absent', () => {
    expect(takeFlag(['--text', 'x'], '--title')).toBeUndefined();
  });

  it('requires a value', () => {
    expect(() => takeFlag(['--title'], '--title')).toThrow("Flag '--title' requires a value.");
  });
});

describe('takeRepeatedFlag', () => {
  it('collects values in order', () => {
    const args = ['--button', 'Yes', '--id', 'q', '--button', 'No'];
    expect(takeRepeatedFlag(args, '--button')).toEqual(['Yes', 'No']);
    expect(args).toEqual(['--id', 'q']);
  });

  it('requires a value', () => {
    expect(() => takeRepeatedFlag(['--button', 'Yes', '--button'], '--button')).toThrow(CliUsageError);
  });
});

describe('takeSwitch', () => {
  it('removes any of the names', () => {
    const args = ['-h', 'show', '--help'];
    expect(takeSwitch(args, '-h', '--help')).toBe(true);
    expect(args).toEqual(['show']);
    expect(takeSwitch(args, '--no-color')).toBe(false);
  });
});

describe('parseNonNegativeInt', () => {
  it('parses digits', () => {
    expect(parseNonNegativeInt('--width', '42')).toBe(42);
    expect(parseNonNegativeInt('--width', '0')).toBe(0);
    expect(parseNonNegativeInt('--width', undefined)).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => parseNonNegativeInt('--width', '-1')).toThrow(
      "Flag '--width' expects a non-negative integer, got '-1'."
    );
    expect(() => parseNonNegativeInt('--width', '2.5')).toThrow(InvalidFlagValueError);
    expect(() => parseNonNegativeInt('--width', 'x')).toThrow(CliUsageError);
  });
});

describe('assertNoArgsLeft', () => {
  it('names the first leftover argument', () => {
    expect(() => assertNoArgsLeft(['extra', 'more'], 'show')).toThrow("Unexpected argument 'extra' for 'show'.");
    expect(() => assertNoArgsLeft([], 'show')).not.toThrow();
  });
});
