/**
 * Chapter Types
 */

/**
 * One navigable segment of the container timeline, in milliseconds.
 * A resolved list partitions [0, actualDurationMs] without gaps.
 */
export interface ChapterMarker {
  index: number;
  title: string;
  startMs: number;
  endMs: number;
}
