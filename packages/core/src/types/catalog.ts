/**
 * Catalog Types
 *
 * Typed records for what the catalog returns. Created per run, never persisted.
 */

export interface CatalogTrack {
  index: number;
  name: string;
  nominalDurationMs: number;
}

export interface CatalogWork {
  id: string;
  title: string;
  authors: readonly string[];
  /** Display form of `authors` */
  author: string;
  /** Empty until the track listing has been fetched */
  tracks: readonly CatalogTrack[];
  totalTracks?: number;
  url?: string;
}
