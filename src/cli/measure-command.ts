import { dialogOptimalSize } from '../dialog/size.js';
import { assertNoArgsLeft, parseNonNegativeInt, takeFlag } from './flag-utils.js';
import { formatSection } from './help.js';
import { takeFieldFlags, takeMessageText } from './message-text.js';

const FALLBACK_SCREEN_WIDTH = 80;

export function printMeasureHelp(): void {
  console.log(
    [
      'Usage: msgbox measure --text <text> [options]',
      '',
      'Prints the size `msgbox show` would pick, as WIDTHxHEIGHT.',
      '',
      formatSection('Options', [
        ['--text <text>', 'Message text'],
        ['--text-file <path>', 'Read the message from a file'],
        ['--screen-width <n>', 'Screen width to fit (default: terminal width, else 80)'],
        ['--field <label>', 'Account for an input field (repeatable)'],
        ['--password <label>', 'Same as --field'],
      ]),
    ].join('\n')
  );
}

export function handleMeasureCommand(args: string[]): void {
  const screenWidth =
    parseNonNegativeInt('--screen-width', takeFlag(args, '--screen-width')) ??
    (process.stdout.columns || FALLBACK_SCREEN_WIDTH);
  const text = takeMessageText(args, 'measure');
  const fields = takeFieldFlags(args);
  assertNoArgsLeft(args, 'measure');

  const { width, height } = dialogOptimalSize(screenWidth, fields, text);
  console.log(`${width}x${height}`);
}
