import { AlignSchema, BackgroundSchema, loadConfig, type Config } from '../config/loader.js';
import type { Align, BackgroundColor } from '../dialog/types.js';
import { runDialog, type RunDialogOptions } from '../tui/run-dialog.js';
import { fromTerminalKit, type TermSession } from '../tui/term.js';
import { CliUsageError, InvalidFlagValueError } from './errors.js';
import { assertNoArgsLeft, parseNonNegativeInt, takeFlag, takeRepeatedFlag, takeSwitch } from './flag-utils.js';
import { formatSection } from './help.js';
import { takeFieldFlags, takeMessageText } from './message-text.js';

export function printShowHelp(): void {
  console.log(
    [
      'Usage: msgbox show --text <text> [options]',
      '',
      'Shows a message box. Prints {"kind":"button",...} and exits 0 when a button is pressed,',
      'prints {"kind":"cancel",...} and exits 1 on Esc / Ctrl+C.',
      '',
      formatSection('Options', [
        ['--text <text>', 'Message text (\\n for new lines, ^r etc. for colors)'],
        ['--text-file <path>', 'Read the message from a file'],
        ['--title <title>', 'Title shown in the top border'],
        ['--button <label>', 'Add a button (repeatable, default: OK)'],
        ['--field <label>', 'Add an input field (repeatable)'],
        ['--password <label>', 'Add a masked input field (repeatable)'],
        ['--required <label>', 'Field that must be filled in (repeatable)'],
        ['--confirm <label>', 'Button that asks "Sure?" before completing (repeatable)'],
        ['--width <n>', 'Fixed width (0 = fit the text)'],
        ['--height <n>', 'Fixed height (0 = fit the text)'],
        ['--align <left|center|right>', 'Text alignment'],
        ['--background <color>', 'Background color (black, red, green, yellow, blue, magenta, cyan, white)'],
        ['--id <id>', 'Modal page id'],
        ['--no-color', 'Draw without colors'],
        ['--config <path>', 'Config file to use'],
      ]),
    ].join('\n')
  );
}

function parseAlign(value: string | undefined): Align | undefined {
  if (value === undefined) return undefined;
  const result = AlignSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidFlagValueError('--align', value, `must be one of: ${AlignSchema.options.join(', ')}`);
  }
  return result.data;
}

function parseBackground(value: string | undefined): BackgroundColor | undefined {
  if (value === undefined) return undefined;
  const result = BackgroundSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidFlagValueError('--background', value, `must be one of: ${BackgroundSchema.options.join(', ')}`);
  }
  return result.data;
}

export function parseShowArgs(args: string[], config: Config): RunDialogOptions {
  const colorsDisabled = takeSwitch(args, '--no-color') || Boolean(config.colors?.disable);
  const id = takeFlag(args, '--id');
  const title = takeFlag(args, '--title');
  const text = takeMessageText(args, 'show');
  const fields = takeFieldFlags(args);
  const buttons = takeRepeatedFlag(args, '--button');
  const confirm = takeRepeatedFlag(args, '--confirm');
  const required = takeRepeatedFlag(args, '--required');
  const width = parseNonNegativeInt('--width', takeFlag(args, '--width')) ?? config.dialog?.width;
  const height = parseNonNegativeInt('--height', takeFlag(args, '--height')) ?? config.dialog?.height;
  const align = parseAlign(takeFlag(args, '--align')) ?? config.dialog?.align;
  const background = parseBackground(takeFlag(args, '--background')) ?? config.dialog?.background;
  assertNoArgsLeft(args, 'show');

  const buttonLabels = buttons.length > 0 ? buttons : ['OK'];
  const unknownConfirm = confirm.find((label) => !buttonLabels.includes(label));
  if (unknownConfirm !== undefined) {
    throw new CliUsageError(`--confirm '${unknownConfirm}' does not match any --button.`);
  }
  const unknownRequired = required.find((label) => !fields.some((f) => f.label === label));
  if (unknownRequired !== undefined) {
    throw new CliUsageError(`--required '${unknownRequired}' does not match any --field or --password.`);
  }

  return {
    id,
    title,
    text,
    fields,
    buttons: buttonLabels,
    confirm,
    required,
    align,
    width,
    height,
    background,
    keys: config.keys,
    colorsDisabled,
  };
}

/**
 * Runs `msgbox show`. Resolves with the process exit code.
 */
export async function handleShowCommand(
  args: string[],
  openTerm: () => TermSession = () => fromTerminalKit()
): Promise<number> {
  const config = loadConfig(takeFlag(args, '--config'));
  const options = parseShowArgs(args, config);

  const outcome = await runDialog(openTerm(), options);
  console.log(JSON.stringify(outcome));
  return outcome.kind === 'button' ? 0 : 1;
}
