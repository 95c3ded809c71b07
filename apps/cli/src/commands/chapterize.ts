/**
 * Chapterize Command
 *
 * Resolves catalog chapters for each input and embeds them. Exits with 1
 * if any file fails; the failure kind is printed to stderr.
 */

import ora from 'ora';
import chalk from 'chalk';
import { ChaptifyError, ConfigError } from '@chaptify/core';
import {
  chapterizedPath,
  isChapterized,
  runBatch,
  type FileProcessor,
  type PipelineResult,
  type RunOptions,
} from '@chaptify/pipeline';
import { loadEnvironment } from '../config/index.js';
import { collectInputs } from '../lib/inputs.js';
import {
  printChapters,
  printError,
  printFailure,
  printInfo,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import { createPipeline } from '../lib/wiring.js';

export interface ChapterizeOptions {
  output?: string;
  outDir?: string;
  list?: string;
  dir?: string;
  dryRun?: boolean;
  dropLastTrack?: boolean;
  concurrency?: number;
}

export interface ChapterizeSummary {
  processed: number;
  failed: number;
}

/**
 * Inputs to run, minus the outputs of an earlier run
 */
export async function planInputs(
  files: readonly string[],
  options: ChapterizeOptions
): Promise<{ inputs: string[]; skipped: string[] }> {
  const all = await collectInputs({ files, list: options.list, dir: options.dir });
  const skipped = all.filter(isChapterized);
  const inputs = all.filter(file => !isChapterized(file));

  if (options.output && options.outDir) {
    throw new ConfigError('--output and --out-dir cannot be used together');
  }
  if (options.output && inputs.length !== 1) {
    throw new ConfigError(`--output takes exactly one input, got ${inputs.length}`);
  }
  return { inputs, skipped };
}

export function runOptionsFor(options: ChapterizeOptions): (filePath: string) => RunOptions {
  return filePath => {
    if (options.dryRun) {
      return { dryRun: true };
    }
    if (options.output) {
      return { outputPath: options.output };
    }
    if (options.outDir) {
      return { outputPath: chapterizedPath(filePath, options.outDir) };
    }
    return {};
  };
}

export function reportResult(result: PipelineResult, dryRun = false): void {
  if (!result.ok) {
    printFailure(result.filePath, result.error);
    return;
  }
  const { work, markers } = result;
  if (dryRun) {
    printInfo(`${result.filePath}: ${work.title} by ${work.author} (${markers.length} chapters)`);
    printChapters(markers);
    return;
  }
  printSuccess(
    `${result.filePath}: ${markers.length} chapters from ${chalk.bold(work.title)}` +
      (result.outputPath && result.outputPath !== result.filePath ? ` -> ${result.outputPath}` : '')
  );
}

export async function runChapterize(
  processor: FileProcessor,
  inputs: readonly string[],
  options: ChapterizeOptions
): Promise<ChapterizeSummary> {
  let done = 0;
  const spinner = ora({ text: `Chapterizing ${inputs.length} file(s)...`, stream: process.stderr }).start();

  const results = await runBatch(processor, inputs, {
    concurrency: options.concurrency,
    runOptionsFor: runOptionsFor(options),
    onResult: result => {
      done++;
      spinner.clear();
      reportResult(result, options.dryRun);
      spinner.text = `Chapterizing ${done}/${inputs.length}...`;
    },
  });

  const failed = results.filter(result => !result.ok).length;
  if (failed > 0) {
    spinner.fail(`${failed} of ${inputs.length} file(s) failed`);
  } else {
    spinner.succeed(`${inputs.length} file(s) chapterized`);
  }

  return { processed: inputs.length - failed, failed };
}

export async function chapterizeCommand(
  files: string[],
  options: ChapterizeOptions
): Promise<void> {
  try {
    const config = loadEnvironment();
    const { inputs, skipped } = await planInputs(files, options);
    for (const file of skipped) {
      printWarning(`Skipping ${file}: already chapterized`);
    }
    if (inputs.length === 0) {
      printWarning('No input files');
      return;
    }

    const pipeline = createPipeline(config, { dropLastTrack: options.dropLastTrack });
    const summary = await runChapterize(pipeline, inputs, options);
    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof ChaptifyError) {
      printError(`${error.code}: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}
