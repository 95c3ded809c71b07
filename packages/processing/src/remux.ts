/**
 * Remux Invoker
 *
 * Attaches a chapter table to a container without re-encoding.
 *
 * CRITICAL: the original file is never edited in place. ffmpeg writes to a
 * hidden sibling; only a verified output is renamed over the target.
 * Anything else leaves the original as it was and deletes the sibling.
 */

import { dirname } from 'node:path';
import {
  ProbeError,
  RemuxError,
  type AudioProber,
  type ChapterMarker,
} from '@chaptify/core';
import { parseChapterFile, writeChapterFile } from '@chaptify/chapters';
import {
  createLogger,
  ensureDir,
  getFileSizeBytes,
  moveFile,
  removeIfExists,
  safeReadFile,
  tempSiblingPath,
  type CommandResult,
  type CommandRunner,
  type Logger,
} from '@chaptify/utils';
import { FFmpeg } from './ffmpeg.js';

export interface RemuxInvokerOptions {
  prober: AudioProber;
  ffmpegPath?: string;
  runner?: CommandRunner;
  /** Child process timeout */
  timeout?: number;
  /** Allowed difference between output duration and the expected duration */
  durationToleranceMs?: number;
  logger?: Logger;
}

export interface EmbedRequest {
  inputPath: string;
  chapters: readonly ChapterMarker[];
  expectedDurationMs: number;
  /** Defaults to replacing `inputPath` */
  outputPath?: string;
}

export interface EmbedResult {
  outputPath: string;
  outputDurationMs: number;
  elapsedMs: number;
}

export const DEFAULT_REMUX_TIMEOUT_MS = 600000;
export const DEFAULT_OUTPUT_TOLERANCE_MS = 1000;

export class RemuxInvoker {
  private readonly ffmpeg: FFmpeg;
  private readonly prober: AudioProber;
  private readonly timeout: number;
  private readonly durationToleranceMs: number;
  private readonly log: Logger;

  constructor(options: RemuxInvokerOptions) {
    this.ffmpeg = new FFmpeg({ ffmpegPath: options.ffmpegPath, runner: options.runner });
    this.prober = options.prober;
    this.timeout = options.timeout ?? DEFAULT_REMUX_TIMEOUT_MS;
    this.durationToleranceMs = options.durationToleranceMs ?? DEFAULT_OUTPUT_TOLERANCE_MS;
    this.log = options.logger ?? createLogger({ component: 'remux' });
  }

  async embed(request: EmbedRequest): Promise<EmbedResult> {
    const startTime = Date.now();
    const target = request.outputPath ?? request.inputPath;
    const tempOutput = tempSiblingPath(target, 'chaptify');
    const chapterFile = tempSiblingPath(target, 'chapters', '.txt');

    let committed = false;
    try {
      await this.io('prepare output directory', () => ensureDir(dirname(target)));
      await this.io('write chapter file', () => writeChapterFile(request.chapters, chapterFile));
      await this.verifyChapterFile(chapterFile, request.chapters.length);

      const args = this.ffmpeg.buildChapterRemuxArgs(request.inputPath, chapterFile, tempOutput);
      this.log.debug({ command: `${this.ffmpeg.path} ${args.join(' ')}` }, 'Running remux');

      const result = await this.run(args);
      this.checkExit(result);

      const size = await this.io('stat output', () => getFileSizeBytes(tempOutput));
      if (size === 0) {
        throw new RemuxError('emptyOutput', 'ffmpeg reported success but wrote no output', {
          output: tempOutput,
        });
      }

      const outputDurationMs = await this.probeOutput(tempOutput);
      const difference = Math.abs(outputDurationMs - request.expectedDurationMs);
      if (difference > this.durationToleranceMs) {
        throw new RemuxError(
          'durationMismatch',
          `Remuxed file is ${outputDurationMs}ms long, expected ${request.expectedDurationMs}ms`,
          { outputDurationMs, expectedDurationMs: request.expectedDurationMs, toleranceMs: this.durationToleranceMs }
        );
      }

      await this.io('replace target', () => moveFile(tempOutput, target));
      committed = true;

      this.log.info({ output: target, chapters: request.chapters.length }, 'Chapters embedded');
      return {
        outputPath: target,
        outputDurationMs,
        elapsedMs: Date.now() - startTime,
      };
    } finally {
      await this.discard(chapterFile);
      if (!committed && await this.discard(tempOutput)) {
        this.log.debug({ output: tempOutput }, 'Discarded temporary output');
      }
    }
  }

  /**
   * Run a filesystem step, reporting failures as RemuxError('io')
   */
  private async io<T>(step: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RemuxError) {
        throw error;
      }
      throw new RemuxError(
        'io',
        `Could not ${step}: ${error instanceof Error ? error.message : String(error)}`,
        { step },
        { cause: error }
      );
    }
  }

  /**
   * Cleanup must not replace the error that ended the run, so a failed
   * removal is logged and reported as not removed.
   */
  private async discard(path: string): Promise<boolean> {
    try {
      return await removeIfExists(path);
    } catch (error) {
      this.log.warn({ path, err: error }, 'Could not remove temporary file');
      return false;
    }
  }

  /**
   * Read the chapter file back and check it holds every chapter
   */
  private async verifyChapterFile(chapterFile: string, expected: number): Promise<void> {
    const content = await this.io('read chapter file', () => safeReadFile(chapterFile));
    const written = content === null ? 0 : parseChapterFile(content).length;
    if (written !== expected) {
      throw new RemuxError('io', `Chapter file holds ${written} chapters, expected ${expected}`, {
        chapterFile,
        written,
        expected,
      });
    }
  }

  private async run(args: string[]): Promise<CommandResult> {
    try {
      return await this.ffmpeg.execute(args, { timeout: this.timeout });
    } catch (error) {
      throw new RemuxError(
        'spawn',
        `Could not start ${this.ffmpeg.path}: ${error instanceof Error ? error.message : String(error)}`,
        {},
        { cause: error }
      );
    }
  }

  private checkExit(result: CommandResult): void {
    if (result.timedOut) {
      throw new RemuxError('timeout', `ffmpeg did not finish within ${this.timeout}ms`, {
        timeout: this.timeout,
      });
    }
    if (result.exitCode !== 0) {
      throw new RemuxError('exit', `ffmpeg exited with code ${result.exitCode}`, {
        exitCode: result.exitCode,
        stderr: result.stderr.substring(0, 1000),
      });
    }
  }

  private async probeOutput(outputPath: string): Promise<number> {
    try {
      const probe = await this.prober.probe(outputPath);
      return probe.actualDurationMs;
    } catch (error) {
      if (error instanceof ProbeError) {
        throw new RemuxError('probe', `Remuxed file could not be verified: ${error.message}`, {}, { cause: error });
      }
      throw error;
    }
  }
}
