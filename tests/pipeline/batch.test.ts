/**
 * Component: Batch Runner Tests
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigError } from '@chaptify/core';
import {
  ChapterPipeline,
  runBatch,
  type FileProcessor,
  type PipelineResult,
  type RunOptions,
} from '@chaptify/pipeline';
import { RemuxInvoker } from '@chaptify/processing';
import { sleep, type CommandRunner } from '@chaptify/utils';
import { FakeCatalog, FakeProber, commandResult, makeProbe, makeTracks, makeWork } from '../helpers/fixtures.js';

function failure(filePath: string): PipelineResult {
  return { ok: false, filePath, error: new ConfigError(`bad ${filePath}`) };
}

class SlowProcessor implements FileProcessor {
  active = 0;
  peak = 0;
  readonly options: Array<RunOptions | undefined> = [];

  constructor(private readonly delays: Record<string, number>) {}

  async process(filePath: string, options?: RunOptions): Promise<PipelineResult> {
    this.options.push(options);
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    await sleep(this.delays[filePath] ?? 0);
    this.active--;
    return failure(filePath);
  }
}

describe('runBatch', () => {
  it('returns results in input order regardless of completion order', async () => {
    const processor = new SlowProcessor({ a: 30, b: 5, c: 15 });
    const completed: number[] = [];

    const results = await runBatch(processor, ['a', 'b', 'c'], {
      concurrency: 3,
      onResult: (_result, index) => completed.push(index),
    });

    expect(results.map(r => r.filePath)).toEqual(['a', 'b', 'c']);
    expect(completed).toEqual([1, 2, 0]);
  });

  it('never runs more files at once than the concurrency', async () => {
    const processor = new SlowProcessor({ a: 10, b: 10, c: 10, d: 10, e: 10 });

    await runBatch(processor, ['a', 'b', 'c', 'd', 'e'], { concurrency: 2 });

    expect(processor.peak).toBe(2);
  });

  it('runs one at a time by default', async () => {
    const processor = new SlowProcessor({ a: 5, b: 5 });

    await runBatch(processor, ['a', 'b']);

    expect(processor.peak).toBe(1);
  });

  it('passes per-file run options', async () => {
    const processor = new SlowProcessor({});

    await runBatch(processor, ['x', 'y'], { runOptionsFor: file => ({ outputPath: `/out/${file}` }) });

    expect(processor.options).toEqual([{ outputPath: '/out/x' }, { outputPath: '/out/y' }]);
  });

  it('handles an empty list', async () => {
    await expect(runBatch(new SlowProcessor({}), [])).resolves.toEqual([]);
  });

  it('keeps going when one file cannot be written', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'chaptify-batch-'));
    try {
      const blocked = join(dir, 'Diana Wynne Jones - Howl\'s Moving Castle.m4b');
      const good = join(dir, 'Diana Wynne Jones - Castle in the Air.m4b');
      const blocker = join(dir, 'blocker');
      await writeFile(blocked, 'original audio');
      await writeFile(good, 'original audio');
      await writeFile(blocker, 'plain file');

      const runner: CommandRunner = async (_command, args) => {
        const output = args[args.length - 1];
        if (output !== undefined) {
          await writeFile(output, 'chaptered audio');
        }
        return commandResult();
      };
      const prober = new FakeProber({}, makeProbe({ actualDurationMs: 6000 }));
      const catalog = new FakeCatalog(
        [[
          makeWork('howl', "Howl's Moving Castle", ['Diana Wynne Jones']),
          makeWork('air', 'Castle in the Air', ['Diana Wynne Jones']),
        ]],
        { howl: [makeTracks([2000, 4000])], air: [makeTracks([3000, 3000])] }
      );
      const pipeline = new ChapterPipeline({
        catalog,
        prober,
        embedder: new RemuxInvoker({ prober, runner }),
      });

      const results = await runBatch(pipeline, [blocked, good], {
        runOptionsFor: file => (file === blocked ? { outputPath: join(blocker, 'out.m4b') } : {}),
      });

      expect(results.map(r => r.ok)).toEqual([false, true]);
      const [first] = results;
      expect(first?.ok === false && first.error).toMatchObject({ code: 'REMUX_ERROR', reason: 'io' });
      await expect(readFile(blocked, 'utf8')).resolves.toBe('original audio');
      await expect(readFile(good, 'utf8')).resolves.toBe('chaptered audio');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
