/**
 * @chaptify/chapters
 *
 * Chapter resolution:
 * - Work matching (author filter, title scoring, duration tie-break)
 * - Timecode resolution (proportional rescaling onto the file duration)
 * - FFMETADATA serialization
 */

export {
  WorkMatcher,
  authorMatches,
  titleScore,
  DEFAULT_MIN_TITLE_SIMILARITY,
  type WorkMatcherOptions,
  type MatchOptions,
  type RankedCandidate,
} from './matcher.js';

export {
  resolveTimecodes,
  nominalTotalMs,
  chapterTitle,
  DEFAULT_DURATION_TOLERANCE,
  type ResolveOptions,
} from './timecodes.js';

export {
  serializeChapters,
  writeChapterFile,
  parseChapterFile,
  escapeValue,
  FFMETADATA_HEADER,
} from './ffmetadata.js';
