/**
 * FFmpeg Wrapper
 *
 * Builds and runs the stream-copy command that attaches a chapter table.
 */

import { executeCommand, type CommandResult, type CommandRunner } from '@chaptify/utils';

export interface FFmpegOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
}

export class FFmpeg {
  private readonly ffmpegPath: string;
  private readonly runner: CommandRunner;

  constructor(options: FFmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runner = options.runner ?? executeCommand;
  }

  get path(): string {
    return this.ffmpegPath;
  }

  /**
   * Execute an FFmpeg command. Rejects only if the binary cannot be started.
   */
  async execute(args: string[], options: { timeout?: number } = {}): Promise<CommandResult> {
    return this.runner(this.ffmpegPath, ['-hide_banner', '-nostdin', '-y', ...args], {
      timeout: options.timeout ?? 600000,
    });
  }

  /**
   * Copy the audio and any cover art of `inputFile` unchanged, keep its
   * global metadata, and take the chapter table from the FFMETADATA file.
   * Existing chapter text and data tracks are left out; mp4 cannot take
   * them back by stream copy.
   */
  buildChapterRemuxArgs(inputFile: string, chapterFile: string, outputFile: string): string[] {
    return [
      '-loglevel', 'error',
      '-i', inputFile,
      '-f', 'ffmetadata',
      '-i', chapterFile,
      '-map', '0:a',
      '-map', '0:v?',
      '-map_metadata', '0',
      '-map_chapters', '1',
      '-c', 'copy',
      outputFile,
    ];
  }
}
