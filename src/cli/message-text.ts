import fs from 'node:fs';
import type { FieldSpec } from '../dialog/types.js';
import { CliUsageError, FileNotFoundError } from './errors.js';
import { takeFlag } from './flag-utils.js';

/**
 * Reads the message from `--text` or `--text-file` (one of them is required).
 */
export function takeMessageText(args: string[], command: string): string {
  const text = takeFlag(args, '--text');
  const file = takeFlag(args, '--text-file');

  if (text !== undefined && file !== undefined) {
    throw new CliUsageError(`'${command}' takes either --text or --text-file, not both.`);
  }
  if (file !== undefined) {
    if (!fs.existsSync(file)) throw new FileNotFoundError(file);
    return fs.readFileSync(file, 'utf-8');
  }
  if (text === undefined) {
    throw new CliUsageError(`'${command}' requires --text or --text-file.`);
  }
  // Shells don't make typing newlines easy.
  return text.replace(/\\n/g, '\n');
}

/**
 * Collects `--field <label>` and `--password <label>` in the order they were given.
 */
export function takeFieldFlags(args: string[]): FieldSpec[] {
  const fields: FieldSpec[] = [];
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token !== '--field' && token !== '--password') {
      index += 1;
      continue;
    }
    const label = args[index + 1];
    if (label === undefined) {
      throw new CliUsageError(`Flag '${token}' requires a value.`);
    }
    fields.push({ label, isPassword: token === '--password' });
    args.splice(index, 2);
  }
  return fields;
}
