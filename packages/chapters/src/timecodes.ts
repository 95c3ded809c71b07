/**
 * Timecode Resolver
 *
 * Turns catalog track lengths into absolute chapter boundaries for the
 * actual file. Catalog lengths come from a different master than the file
 * on disk, so each track is rescaled by actual/nominal; the rounding
 * residual goes to the last chapter so the final END is exactly the file
 * duration.
 */

import {
  DurationMismatchError,
  UnresolvableTimecodesError,
  type CatalogTrack,
  type ChapterMarker,
} from '@chaptify/core';

export interface ResolveOptions {
  /** Maximum relative drift between catalog total and file duration */
  tolerance?: number;
  /** Title used when the catalog gives an empty name; `{n}` is the 1-based number */
  fallbackTitle?: string;
}

export const DEFAULT_DURATION_TOLERANCE = 0.15;

export function nominalTotalMs(tracks: readonly CatalogTrack[]): number {
  return tracks.reduce((sum, track) => sum + track.nominalDurationMs, 0);
}

export function chapterTitle(track: CatalogTrack, template = 'Chapter {n}'): string {
  const name = track.name.trim();
  return name || template.replace('{n}', String(track.index + 1));
}

export function resolveTimecodes(
  tracks: readonly CatalogTrack[],
  actualDurationMs: number,
  options: ResolveOptions = {}
): ChapterMarker[] {
  const tolerance = options.tolerance ?? DEFAULT_DURATION_TOLERANCE;

  if (tracks.length === 0) {
    throw new UnresolvableTimecodesError('catalog returned no tracks');
  }
  if (!Number.isFinite(actualDurationMs) || actualDurationMs <= 0) {
    throw new UnresolvableTimecodesError('file duration is not positive', { actualDurationMs });
  }
  const actual = Math.round(actualDurationMs);

  const nominalTotal = nominalTotalMs(tracks);
  if (nominalTotal <= 0) {
    throw new UnresolvableTimecodesError('catalog tracks have zero total length', {
      tracks: tracks.length,
    });
  }

  if (Math.abs(actual - nominalTotal) / nominalTotal > tolerance) {
    throw new DurationMismatchError(nominalTotal, actual, tolerance);
  }

  const durations = tracks.map(track =>
    Math.round((track.nominalDurationMs * actual) / nominalTotal)
  );
  const residual = actual - durations.reduce((sum, ms) => sum + ms, 0);
  durations[durations.length - 1] = (durations[durations.length - 1] ?? 0) + residual;

  const markers: ChapterMarker[] = [];
  let startMs = 0;
  tracks.forEach((track, i) => {
    const durationMs = durations[i] ?? 0;
    if (durationMs <= 0) {
      throw new UnresolvableTimecodesError(`chapter ${i + 1} resolves to no duration`, {
        index: i,
        nominalDurationMs: track.nominalDurationMs,
        resolvedDurationMs: durationMs,
      });
    }

    markers.push({
      index: i,
      title: chapterTitle(track, options.fallbackTitle),
      startMs,
      endMs: startMs + durationMs,
    });
    startMs += durationMs;
  });

  return markers;
}
