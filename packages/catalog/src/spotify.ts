/**
 * Spotify Catalog Client
 *
 * Looks audiobooks up through the Spotify Web API and returns their chapter
 * listing as catalog tracks.
 * API Docs: https://developer.spotify.com/documentation/web-api
 *
 * - GET /search?type=audiobook           candidate works
 * - GET /audiobooks/{id}/chapters        paginated chapter listing (follows `next`)
 */

import type { Dispatcher } from 'undici';
import type { z } from 'zod';
import {
  CatalogError,
  type CatalogTrack,
  type CatalogWork,
  type IdentityKey,
} from '@chaptify/core';
import { createLogger, type Logger } from '@chaptify/utils';
import { requestJson } from './http.js';
import type { RateLimiter } from './rateLimiter.js';
import {
  chapterPageSchema,
  searchResponseSchema,
  type SpotifyAudiobook,
} from './schemas.js';
import type { AccessTokenProvider, CatalogClient } from './types.js';

export interface SpotifyCatalogConfig {
  tokens: AccessTokenProvider;
  baseUrl?: string;
  market?: string;
  searchLimit?: number;
  pageSize?: number;
  maxPages?: number;
  timeout?: number;
  dispatcher?: Dispatcher;
  rateLimiter?: RateLimiter;
  logger?: Logger;
}

const DEFAULT_BASE_URL = 'https://api.spotify.com/v1';

export class SpotifyCatalogClient implements CatalogClient {
  private readonly baseUrl: string;
  private readonly searchLimit: number;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly log: Logger;

  constructor(private readonly config: SpotifyCatalogConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.searchLimit = Math.min(Math.max(config.searchLimit ?? 10, 1), 50);
    this.pageSize = Math.min(Math.max(config.pageSize ?? 50, 1), 50);
    this.maxPages = config.maxPages ?? 200;
    this.log = config.logger ?? createLogger({ component: 'spotify-catalog' });
  }

  async search(key: IdentityKey): Promise<CatalogWork[]> {
    const params = new URLSearchParams({
      q: `${key.title} ${key.author}`,
      type: 'audiobook',
      limit: String(this.searchLimit),
    });
    if (this.config.market) {
      params.set('market', this.config.market);
    }

    const data = await this.get(`${this.baseUrl}/search?${params.toString()}`, searchResponseSchema);
    const works = data.audiobooks.items
      .filter((item): item is SpotifyAudiobook => item !== null)
      .map(toCatalogWork);

    this.log.debug({ query: key, results: works.length }, 'Catalog search complete');
    return works;
  }

  async fetchTracks(workId: string): Promise<CatalogTrack[]> {
    const params = new URLSearchParams({ limit: String(this.pageSize) });
    if (this.config.market) {
      params.set('market', this.config.market);
    }

    const tracks: CatalogTrack[] = [];
    const visited = new Set<string>();
    let url: string | null | undefined =
      `${this.baseUrl}/audiobooks/${encodeURIComponent(workId)}/chapters?${params.toString()}`;

    while (url) {
      if (visited.has(url) || visited.size >= this.maxPages) {
        throw new CatalogError(
          'invalidResponse',
          `Chapter listing for ${workId} does not terminate`,
          { url }
        );
      }
      visited.add(url);

      const page: z.infer<typeof chapterPageSchema> = await this.get(url, chapterPageSchema);
      for (const chapter of page.items) {
        if (chapter === null) {
          continue;
        }
        tracks.push({
          index: tracks.length,
          name: chapter.name?.trim() ?? '',
          nominalDurationMs: chapter.duration_ms,
        });
      }

      if (page.next) {
        this.log.debug({ workId, next: page.next }, 'Fetching next chapter page');
      }
      url = page.next;
    }

    this.log.debug({ workId, tracks: tracks.length }, 'Chapter listing complete');
    return tracks;
  }

  private async get<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.infer<S>> {
    await this.config.rateLimiter?.acquire();
    const token = await this.config.tokens.getToken();

    try {
      return await requestJson(url, schema, {
        headers: { Authorization: `Bearer ${token}` },
        dispatcher: this.config.dispatcher,
        timeout: this.config.timeout,
      });
    } catch (error) {
      if (error instanceof CatalogError && error.kind === 'unauthorized') {
        // The next caller gets a fresh token; this call still fails
        this.config.tokens.invalidate();
      }
      throw error;
    }
  }
}

function toCatalogWork(item: SpotifyAudiobook): CatalogWork {
  const authors = item.authors.map(author => author.name.trim()).filter(Boolean);
  return Object.freeze({
    id: item.id,
    title: item.name,
    authors,
    author: authors.join(', '),
    tracks: [],
    totalTracks: item.total_chapters,
    url: item.external_urls?.spotify,
  });
}
