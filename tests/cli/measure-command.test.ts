import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { handleMeasureCommand } from '../../src/cli/measure-command.js';

describe('msgbox measure', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('prints the optimal size', () => {
    handleMeasureCommand(['--text', 'hello', '--screen-width', '80']);
    expect(logSpy).toHaveBeenCalledWith('9x7');
  });

  it('accounts for input fields', () => {
    handleMeasureCommand(['--text', 'hello', '--screen-width', '80', '--field', 'Name']);
    expect(logSpy).toHaveBeenCalledWith('9x9');
  });

  it('wraps long lines on narrow screens', () => {
    handleMeasureCommand(['--text', 'x'.repeat(30), '--screen-width', '20']);
    expect(logSpy).toHaveBeenCalledWith('20x8');
  });

  it('rejects unknown arguments', () => {
    expect(() => handleMeasureCommand(['--text', 'hello', '--button', 'OK'])).toThrow(
      "Unexpected argument '--button' for 'measure'."
    );
  });
});
