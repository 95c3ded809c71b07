/**
 * Work Matcher
 *
 * Picks the one catalog work that corresponds to an identity key.
 *
 * Matching logic:
 * 1. **Author filter** - the normalized author must match one of the work's
 *    authors (or the joined author list), ignoring word order so that
 *    "Last, First" matches "First Last". Anything else is excluded.
 * 2. **Title score** - exact normalized title scores 1, otherwise Dice
 *    similarity; below `minTitleSimilarity` the candidate is excluded.
 * 3. **Tie-breaks** within the best title score:
 *    - with a duration hint, the work whose summed track lengths are
 *      closest to it; equal distances are reported as ambiguous
 *    - without one, provider order
 */

import { compareTwoStrings } from 'string-similarity';
import {
  AmbiguousMatchError,
  NoMatchError,
  authorKey,
  normalizeTitle,
  type CatalogWork,
  type IdentityKey,
} from '@chaptify/core';
import { nominalTotalMs } from './timecodes.js';

export interface WorkMatcherOptions {
  minTitleSimilarity?: number;
}

export interface MatchOptions {
  /** Actual duration of the file, used to separate editions */
  durationHintMs?: number;
}

export interface RankedCandidate {
  work: CatalogWork;
  titleScore: number;
  /** Position in the provider's result list */
  position: number;
}

export const DEFAULT_MIN_TITLE_SIMILARITY = 0.7;

export function authorMatches(queryAuthor: string, work: CatalogWork): boolean {
  const wanted = authorKey(queryAuthor);
  if (!wanted) {
    return false;
  }
  return [...work.authors, work.author].some(name => authorKey(name) === wanted);
}

export function titleScore(queryTitle: string, candidateTitle: string): number {
  const a = normalizeTitle(queryTitle);
  const b = normalizeTitle(candidateTitle);
  if (!a || !b) {
    return 0;
  }
  if (a === b) {
    return 1;
  }
  return compareTwoStrings(a, b);
}

export class WorkMatcher {
  private readonly minTitleSimilarity: number;

  constructor(options: WorkMatcherOptions = {}) {
    this.minTitleSimilarity = options.minTitleSimilarity ?? DEFAULT_MIN_TITLE_SIMILARITY;
  }

  /**
   * Every candidate that survives the filters and shares the best title
   * score, in provider order. Empty when nothing matches.
   */
  shortlist(query: IdentityKey, candidates: readonly CatalogWork[]): RankedCandidate[] {
    const seen = new Set<string>();
    const ranked: RankedCandidate[] = [];

    candidates.forEach((work, position) => {
      if (seen.has(work.id)) {
        return;
      }
      seen.add(work.id);

      if (!authorMatches(query.author, work)) {
        return;
      }
      const score = titleScore(query.title, work.title);
      if (score < this.minTitleSimilarity) {
        return;
      }
      ranked.push({ work, titleScore: score, position });
    });

    if (ranked.length === 0) {
      return [];
    }

    const best = Math.max(...ranked.map(c => c.titleScore));
    return ranked.filter(c => c.titleScore === best);
  }

  select(
    query: IdentityKey,
    candidates: readonly CatalogWork[],
    options: MatchOptions = {}
  ): CatalogWork {
    const top = this.shortlist(query, candidates);
    const [first] = top;
    if (!first) {
      throw new NoMatchError(query.author, query.title, candidates);
    }
    if (top.length === 1) {
      return first.work;
    }

    const hint = options.durationHintMs;
    const measured = hint === undefined
      ? []
      : top
          .filter(c => c.work.tracks.length > 0)
          .map(c => ({ candidate: c, distance: Math.abs(nominalTotalMs(c.work.tracks) - hint) }));

    if (measured.length === 0) {
      return first.work;
    }

    const closest = Math.min(...measured.map(m => m.distance));
    const winners = measured.filter(m => m.distance === closest);
    const [winner] = winners;
    if (!winner || winners.length > 1) {
      throw new AmbiguousMatchError(
        query.author,
        query.title,
        winners.map(m => m.candidate.work)
      );
    }
    return winner.candidate.work;
  }
}
