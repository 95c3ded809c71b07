/**
 * @chaptify/pipeline
 *
 * Orchestrates identity extraction, catalog lookup, matching, timecode
 * resolution and remuxing for one file at a time.
 */

export {
  ChapterPipeline,
  type ChapterEmbedder,
  type PipelineDependencies,
  type PipelineOptions,
} from './chapterize.js';
export { runBatch, type BatchOptions, type FileProcessor } from './batch.js';
export { isChapterized, chapterizedPath } from './paths.js';
export type {
  Resolution,
  PipelineResult,
  PipelineSuccess,
  PipelineFailure,
  RunOptions,
} from './types.js';
