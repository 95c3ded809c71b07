#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for chaptify.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { chapterizeCommand, type ChapterizeOptions } from './commands/chapterize.js';
import { inspectCommand, type InspectOptions } from './commands/inspect.js';

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('chaptify')
  .description('Embed catalog chapter markers into audiobook files without re-encoding')
  .version('0.1.0');

program
  .command('chapterize [files...]', { isDefault: true })
  .description('Resolve chapters from the catalog and embed them')
  .option('-o, --output <file>', 'Write the chaptered file here (single input only)')
  .option('-d, --out-dir <dir>', 'Write <name>_chapterized files into this directory')
  .option('-l, --list <file>', 'Read input paths from a file, one per line')
  .option('--dir <dir>', 'Process every .m4b file in a directory')
  .option('-n, --dry-run', 'Resolve and print chapters without writing anything')
  .option('--drop-last-track', "Ignore the catalog's final track")
  .option('-c, --concurrency <count>', 'Files processed at once', parseConcurrency, 1)
  .action((files: string[] | undefined, options: ChapterizeOptions) => chapterizeCommand(files ?? [], options));

program
  .command('inspect <file>')
  .description('Show the identity and duration read from a file')
  .option('--json', 'Output in JSON format')
  .action((file: string, options: InspectOptions) => inspectCommand(file, options));

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Unexpected error:'), error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
