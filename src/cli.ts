#!/usr/bin/env node
import { CliUsageError } from './cli/errors.js';
import { takeSwitch } from './cli/flag-utils.js';
import { printHelp, printVersion } from './cli/help.js';
import { handleMeasureCommand, printMeasureHelp } from './cli/measure-command.js';
import { handleShowCommand, printShowHelp } from './cli/show-command.js';

const VERSION = '0.1.0';

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  const firstArg = args[0];
  if (firstArg === undefined) {
    printHelp();
    return 1;
  }
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return 0;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return 0;
  }

  const command = args.shift();
  const showHelp = takeSwitch(args, '--help', '-h');

  try {
    switch (command) {
      case 'help':
        printHelp();
        return 0;

      case 'show':
        if (showHelp) {
          printShowHelp();
          return 0;
        }
        return await handleShowCommand(args);

      case 'measure':
        if (showHelp) {
          printMeasureHelp();
        } else {
          handleMeasureCommand(args);
        }
        return 0;

      default:
        printHelp(`Unknown command '${command}'.`);
        return 1;
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      return 1;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  });
