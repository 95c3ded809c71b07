/**
 * Output Formatter
 *
 * Consistent CLI output formatting. Results go to stdout, failures to stderr.
 */

import chalk from 'chalk';
import type { ChapterMarker, ChaptifyError } from '@chaptify/core';
import { formatTimecode } from '@chaptify/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * One line per failure: the kind first, so scripts can grep for it
 */
export function formatFailure(filePath: string, error: ChaptifyError): string {
  return `${error.code}: ${filePath}: ${error.message}`;
}

export function printFailure(filePath: string, error: ChaptifyError): void {
  printError(formatFailure(filePath, error));
}

export function formatChapterLine(marker: ChapterMarker): string {
  const number = String(marker.index + 1).padStart(3, ' ');
  return `${number}  ${formatTimecode(marker.startMs)} - ${formatTimecode(marker.endMs)}  ${marker.title}`;
}

export function printChapters(markers: readonly ChapterMarker[]): void {
  for (const marker of markers) {
    console.log(`  ${chalk.cyan(formatChapterLine(marker))}`);
  }
}
