/**
 * Pipeline Types
 */

import type {
  AudioProbe,
  CatalogWork,
  ChapterMarker,
  ChaptifyError,
  IdentityKey,
} from '@chaptify/core';

/**
 * Everything learned about one file before anything is written
 */
export interface Resolution {
  filePath: string;
  identity: IdentityKey;
  probe: AudioProbe;
  /** The matched work with its full track listing */
  work: CatalogWork;
  markers: ChapterMarker[];
}

export interface PipelineSuccess extends Resolution {
  ok: true;
  /** Where the chaptered file was written; absent on a dry run */
  outputPath?: string;
}

export interface PipelineFailure {
  ok: false;
  filePath: string;
  error: ChaptifyError;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

export interface RunOptions {
  /** Write here instead of replacing the input */
  outputPath?: string;
  /** Resolve chapters but do not touch any file */
  dryRun?: boolean;
}
