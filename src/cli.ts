#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleConvertCommand, printConvertHelp } from './cli/convert-command.js';
import { handlePreviewCommand, printPreviewHelp } from './cli/preview-command.js';
import { handleInspectCommand, printInspectHelp } from './cli/inspect-command.js';
import { handleConfigCommand, printConfigHelp } from './cli/config-command.js';
import { takeSwitches } from './cli/flag-utils.js';
import { CliUsageError } from './errors.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    process.exit(1);
    return;
  }

  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  const command = args.shift();

  if (!command) {
    printHelp();
    process.exit(1);
    return;
  }

  const showHelp = takeSwitches(args, { help: ['--help', '-h'] }).has('help');

  try {
    switch (command) {
      case 'help':
        printHelp();
        break;

      case 'convert':
        if (showHelp) {
          printConvertHelp();
        } else {
          const summary = await handleConvertCommand(args);
          if (summary.failed > 0) {
            process.exitCode = 1;
          }
        }
        break;

      case 'preview':
        if (showHelp) {
          printPreviewHelp();
        } else {
          await handlePreviewCommand(args);
        }
        break;

      case 'inspect':
        if (showHelp) {
          printInspectHelp();
        } else {
          await handleInspectCommand(args);
        }
        break;

      case 'config':
        if (showHelp) {
          printConfigHelp();
        } else {
          handleConfigCommand(args);
        }
        break;

      default:
        printHelp(`Unknown command '${command}'.`);
        process.exit(1);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
