/**
 * Batch Runner
 *
 * Runs the pipeline over several files with bounded concurrency.
 * Results come back in input order; one file failing never stops the others.
 */

import type { PipelineResult, RunOptions } from './types.js';

export interface FileProcessor {
  process(filePath: string, options?: RunOptions): Promise<PipelineResult>;
}

export interface BatchOptions {
  concurrency?: number;
  /** Per-file run options, e.g. an output path chosen for that file */
  runOptionsFor?: (filePath: string) => RunOptions;
  onResult?: (result: PipelineResult, index: number) => void;
}

export async function runBatch(
  pipeline: FileProcessor,
  files: readonly string[],
  options: BatchOptions = {}
): Promise<PipelineResult[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const results: PipelineResult[] = new Array(files.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next++;
      const filePath = files[index];
      if (filePath === undefined) {
        return;
      }
      const result = await pipeline.process(filePath, options.runOptionsFor?.(filePath));
      results[index] = result;
      options.onResult?.(result, index);
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, files.length) }, () => worker())
  );
  return results;
}
