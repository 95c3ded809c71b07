/**
 * Output Paths
 */

import { basename, dirname, extname, join } from 'node:path';

const CHAPTERIZED_SUFFIX = '_chapterized';

/**
 * Whether a file is the output of an earlier run written beside its input
 */
export function isChapterized(filePath: string): boolean {
  return basename(filePath, extname(filePath)).endsWith(CHAPTERIZED_SUFFIX);
}

/**
 * `<dir>/<stem>_chapterized<ext>`, with `dir` defaulting to the input's directory
 */
export function chapterizedPath(filePath: string, outputDir?: string): string {
  const ext = extname(filePath);
  const stem = basename(filePath, ext);
  return join(outputDir ?? dirname(filePath), `${stem}${CHAPTERIZED_SUFFIX}${ext}`);
}
