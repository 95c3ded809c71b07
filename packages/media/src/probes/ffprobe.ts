/**
 * FFProbe Wrapper
 *
 * Reads container duration, format tags and chapters from ffprobe's JSON output.
 * This is the probe boundary of the pipeline: `probe(path) -> AudioProbe`.
 */

import { z } from 'zod';
import { ProbeError, type AudioProbe, type AudioProber, type EmbeddedTags } from '@chaptify/core';
import {
  executeCommand,
  secondsToMs,
  type CommandResult,
  type CommandRunner,
} from '@chaptify/utils';

const ffprobeSchema = z.object({
  format: z.object({
    filename: z.string().optional(),
    format_name: z.string().optional(),
    duration: z.string().optional(),
    size: z.string().optional(),
    tags: z.record(z.string()).optional(),
  }),
  streams: z.array(z.object({
    index: z.number(),
    codec_type: z.string().optional(),
    duration: z.string().optional(),
  })).optional(),
  chapters: z.array(z.object({
    id: z.number(),
    start_time: z.string(),
    end_time: z.string(),
    tags: z.record(z.string()).optional(),
  })).optional(),
});

export type FFProbeResult = z.infer<typeof ffprobeSchema>;

export interface FFProbeOptions {
  ffprobePath?: string;
  timeout?: number;
  runner?: CommandRunner;
}

const AUTHOR_TAGS = ['artist', 'album_artist', 'author', 'composer'] as const;
const TITLE_TAGS = ['title', 'album'] as const;

/**
 * Pick author/title from container tags. Keys are compared case-insensitively
 * because mp4 and matroska muxers disagree on casing.
 */
export function tagsToEmbedded(tags: Record<string, string> | undefined): EmbeddedTags {
  if (!tags) {
    return {};
  }

  const lowered = new Map<string, string>();
  for (const [key, value] of Object.entries(tags)) {
    if (!lowered.has(key.toLowerCase())) {
      lowered.set(key.toLowerCase(), value);
    }
  }

  const pick = (keys: readonly string[]): string | undefined => {
    for (const key of keys) {
      const value = lowered.get(key)?.trim();
      if (value) {
        return value;
      }
    }
    return undefined;
  };

  return {
    author: pick(AUTHOR_TAGS),
    title: pick(TITLE_TAGS),
  };
}

export class FFProbe implements AudioProber {
  private readonly ffprobePath: string;
  private readonly timeout: number;
  private readonly runner: CommandRunner;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.timeout = options.timeout ?? 60000;
    this.runner = options.runner ?? executeCommand;
  }

  /**
   * Run ffprobe and return its parsed JSON
   */
  async inspect(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-show_chapters',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await this.runner(this.ffprobePath, args, { timeout: this.timeout });
    } catch (error) {
      throw new ProbeError(
        filePath,
        `could not start ${this.ffprobePath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (result.timedOut) {
      throw new ProbeError(filePath, `ffprobe timed out after ${this.timeout}ms`);
    }
    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, `ffprobe exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch (error) {
      throw new ProbeError(
        filePath,
        `unparseable ffprobe output: ${result.stdout.substring(0, 200)}`,
        { cause: error }
      );
    }

    const validated = ffprobeSchema.safeParse(parsed);
    if (!validated.success) {
      throw new ProbeError(filePath, `unexpected ffprobe output: ${validated.error.issues[0]?.message ?? 'invalid'}`);
    }

    return validated.data;
  }

  /**
   * Probe boundary used by the pipeline and the remux verification step
   */
  async probe(filePath: string): Promise<AudioProbe> {
    const data = await this.inspect(filePath);

    const durationMs = secondsToMs(data.format.duration) ?? longestStreamMs(data);
    if (durationMs === null || durationMs <= 0) {
      throw new ProbeError(filePath, 'container reports no positive duration');
    }

    return {
      actualDurationMs: durationMs,
      tags: tagsToEmbedded(data.format.tags),
      existingChapterCount: data.chapters?.length ?? 0,
    };
  }
}

function longestStreamMs(data: FFProbeResult): number | null {
  let longest: number | null = null;
  for (const stream of data.streams ?? []) {
    const ms = secondsToMs(stream.duration);
    if (ms !== null && (longest === null || ms > longest)) {
      longest = ms;
    }
  }
  return longest;
}
