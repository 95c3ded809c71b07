/**
 * Inspect Command
 *
 * Shows what chapterize would search the catalog for, without calling it.
 */

import ora from 'ora';
import { ChaptifyError, type AudioProber } from '@chaptify/core';
import { extractIdentity } from '@chaptify/media';
import { formatTimecode } from '@chaptify/utils';
import { loadEnvironment } from '../config/index.js';
import { printError, printHeader, printJson, printKeyValue, printWarning } from '../lib/output.js';
import { createProber } from '../lib/wiring.js';

export interface InspectReport {
  filePath: string;
  author?: string;
  title?: string;
  source?: string;
  durationMs: number;
  existingChapters: number;
  identityError?: string;
}

export async function inspectFile(prober: AudioProber, filePath: string): Promise<InspectReport> {
  const probe = await prober.probe(filePath);
  const report: InspectReport = {
    filePath,
    durationMs: probe.actualDurationMs,
    existingChapters: probe.existingChapterCount,
  };

  try {
    const identity = extractIdentity({ filePath, tags: probe.tags });
    return { ...report, author: identity.author, title: identity.title, source: identity.source };
  } catch (error) {
    if (error instanceof ChaptifyError) {
      return { ...report, identityError: error.message };
    }
    throw error;
  }
}

export function printReport(report: InspectReport): void {
  printHeader(report.filePath);
  printKeyValue('Author', report.author ?? '-');
  printKeyValue('Title', report.title ?? '-');
  printKeyValue('Identity from', report.source ?? '-');
  printKeyValue('Duration', formatTimecode(report.durationMs));
  printKeyValue('Existing chapters', report.existingChapters);
  if (report.identityError) {
    printWarning(report.identityError);
  }
}

export interface InspectOptions {
  json?: boolean;
}

export async function inspectCommand(file: string, options: InspectOptions = {}): Promise<void> {
  const spinner = ora({ text: 'Probing...', stream: process.stderr }).start();
  try {
    const config = loadEnvironment();
    const report = await inspectFile(createProber(config), file);
    spinner.stop();
    if (options.json) {
      printJson(report);
    } else {
      printReport(report);
    }
  } catch (error) {
    if (error instanceof ChaptifyError) {
      spinner.fail('Inspect failed');
      printError(`${error.code}: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    spinner.stop();
    throw error;
  }
}
