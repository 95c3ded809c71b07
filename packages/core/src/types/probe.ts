/**
 * Probe Types
 */

import type { EmbeddedTags } from './identity.js';

/**
 * What the pipeline needs to know about the input file itself
 */
export interface AudioProbe {
  /** Ground truth duration measured from the file */
  actualDurationMs: number;
  tags: EmbeddedTags;
  existingChapterCount: number;
}

/**
 * Probe boundary. Implemented with ffprobe in @chaptify/media.
 */
export interface AudioProber {
  probe(filePath: string): Promise<AudioProbe>;
}
