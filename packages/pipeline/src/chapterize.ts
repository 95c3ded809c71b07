/**
 * Chapterize Pipeline
 *
 * One file, start to finish:
 *
 *   probe -> identity -> catalog search -> match -> track listing
 *         -> timecodes -> FFMETADATA -> remux
 *
 * Each stage either hands a typed value to the next or throws a
 * ChaptifyError; the first failure ends the run and is returned unchanged.
 * Instances hold no per-file state, so several files may run concurrently.
 */

import type { CatalogClient } from '@chaptify/catalog';
import { resolveTimecodes, WorkMatcher, type ResolveOptions } from '@chaptify/chapters';
import {
  ChaptifyError,
  isTransientCatalogError,
  type AudioProber,
  type CatalogTrack,
  type CatalogWork,
} from '@chaptify/core';
import { extractIdentity } from '@chaptify/media';
import type { EmbedRequest, EmbedResult } from '@chaptify/processing';
import {
  createLogger,
  formatTimecode,
  retry,
  type Logger,
  type RetryOptions,
} from '@chaptify/utils';
import type { PipelineResult, Resolution, RunOptions } from './types.js';

/**
 * The part of RemuxInvoker the pipeline depends on
 */
export interface ChapterEmbedder {
  embed(request: EmbedRequest): Promise<EmbedResult>;
}

export interface PipelineDependencies {
  catalog: CatalogClient;
  prober: AudioProber;
  embedder: ChapterEmbedder;
  matcher?: WorkMatcher;
  logger?: Logger;
}

export interface PipelineOptions extends ResolveOptions {
  /** Retry policy for transient catalog failures */
  retry?: Partial<Omit<RetryOptions, 'retryIf' | 'onRetry'>>;
  /** Ignore the catalog's final track (Spotify often ends with a credits entry) */
  dropLastTrack?: boolean;
}

export class ChapterPipeline {
  private readonly catalog: CatalogClient;
  private readonly prober: AudioProber;
  private readonly embedder: ChapterEmbedder;
  private readonly matcher: WorkMatcher;
  private readonly log: Logger;

  constructor(
    deps: PipelineDependencies,
    private readonly options: PipelineOptions = {}
  ) {
    this.catalog = deps.catalog;
    this.prober = deps.prober;
    this.embedder = deps.embedder;
    this.matcher = deps.matcher ?? new WorkMatcher();
    this.log = deps.logger ?? createLogger({ component: 'pipeline' });
  }

  /**
   * Work out the chapter markers for a file without writing anything.
   * Throws the first ChaptifyError encountered.
   */
  async resolve(filePath: string): Promise<Resolution> {
    const log = this.log.child({ file: filePath });

    const probe = await this.prober.probe(filePath);
    const identity = extractIdentity({ filePath, tags: probe.tags });
    log.info(
      { author: identity.author, title: identity.title, source: identity.source, duration: formatTimecode(probe.actualDurationMs) },
      'Identified recording'
    );

    const candidates = await this.withRetry('search', log, () => this.catalog.search(identity));
    log.debug({ candidates: candidates.length }, 'Catalog candidates');

    const listings = new Map<string, CatalogTrack[]>();
    const shortlist = this.matcher.shortlist(identity, candidates);
    if (shortlist.length > 1) {
      // Separate editions by length before choosing
      for (const { work } of shortlist) {
        listings.set(work.id, await this.fetchTracks(work.id, log));
      }
    }

    const hydrated = candidates.map(work => withTracks(work, listings.get(work.id)));
    const match = this.matcher.select(identity, hydrated, {
      durationHintMs: probe.actualDurationMs,
    });
    log.info({ workId: match.id, title: match.title, author: match.author }, 'Matched catalog work');

    const listing = listings.get(match.id) ?? await this.fetchTracks(match.id, log);
    const work = withTracks(match, listing);

    const tracks = this.options.dropLastTrack && listing.length > 1
      ? listing.slice(0, -1)
      : listing;

    const markers = resolveTimecodes(tracks, probe.actualDurationMs, {
      tolerance: this.options.tolerance,
      fallbackTitle: this.options.fallbackTitle,
    });
    log.info({ chapters: markers.length }, 'Resolved chapter timecodes');

    return { filePath, identity, probe, work, markers };
  }

  /**
   * Resolve and embed. Pipeline failures come back as `{ ok: false }`;
   * anything that is not a ChaptifyError is a bug and is rethrown.
   */
  async process(filePath: string, options: RunOptions = {}): Promise<PipelineResult> {
    try {
      const resolution = await this.resolve(filePath);
      if (options.dryRun) {
        return { ok: true, ...resolution };
      }

      const embedded = await this.embedder.embed({
        inputPath: filePath,
        chapters: resolution.markers,
        expectedDurationMs: resolution.probe.actualDurationMs,
        outputPath: options.outputPath,
      });
      return { ok: true, ...resolution, outputPath: embedded.outputPath };
    } catch (error) {
      if (error instanceof ChaptifyError) {
        this.log.warn({ file: filePath, code: error.code, err: error }, 'Pipeline failed');
        return { ok: false, filePath, error };
      }
      throw error;
    }
  }

  private async fetchTracks(workId: string, log: Logger): Promise<CatalogTrack[]> {
    return this.withRetry('fetchTracks', log, () => this.catalog.fetchTracks(workId));
  }

  private withRetry<T>(operation: string, log: Logger, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      ...this.options.retry,
      retryIf: isTransientCatalogError,
      onRetry: (error, attempt, delayMs) => {
        log.warn(
          { operation, attempt, delayMs, err: error },
          'Transient catalog failure, retrying'
        );
      },
    });
  }
}

function withTracks(work: CatalogWork, tracks: readonly CatalogTrack[] | undefined): CatalogWork {
  if (!tracks) {
    return work;
  }
  return Object.freeze({ ...work, tracks: Object.freeze([...tracks]) });
}
