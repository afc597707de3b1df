import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileNotFoundError } from '../../src/cli/errors.js';
import { takeFieldFlags, takeMessageText } from '../../src/cli/message-text.js';

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'msgbox-text-'));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('takeMessageText', () => {
  it('turns \\n into new lines', () => {
    const args = ['--text', 'one\\ntwo'];
    expect(takeMessageText(args, 'show')).toBe('one\ntwo');
    expect(args).toEqual([]);
  });

  it('reads the message from a file as is', () => {
    const file = path.join(tempDir, 'message.txt');
    fs.writeFileSync(file, 'from a file\\n\n', 'utf-8');
    expect(takeMessageText(['--text-file', file], 'show')).toBe('from a file\\n\n');
  });

  it('reports a missing file', () => {
    const file = path.join(tempDir, 'missing.txt');
    expect(() => takeMessageText(['--text-file', file], 'show')).toThrow(FileNotFoundError);
    expect(() => takeMessageText(['--text-file', file], 'show')).toThrow(`File not found: ${file}`);
  });

  it('requires exactly one source', () => {
    expect(() => takeMessageText([], 'measure')).toThrow("'measure' requires --text or --text-file.");
    expect(() => takeMessageText(['--text', 'a', '--text-file', 'b'], 'show')).toThrow(
      "'show' takes either --text or --text-file, not both."
    );
  });
});

describe('takeFieldFlags', () => {
  it('keeps the order of --field and --password', () => {
    const args = ['--password', 'Pin', '--button', 'OK', '--field', 'User'];
    expect(takeFieldFlags(args)).toEqual([
      { label: 'Pin', isPassword: true },
      { label: 'User', isPassword: false },
    ]);
    expect(args).toEqual(['--button', 'OK']);
  });

  it('requires a label', () => {
    expect(() => takeFieldFlags(['--field'])).toThrow("Flag '--field' requires a value.");
  });
});
