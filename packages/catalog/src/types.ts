/**
 * Catalog Client Contracts
 */

import type { CatalogTrack, CatalogWork, IdentityKey } from '@chaptify/core';

/**
 * Capability injected into the pipeline. Implementations do not retry;
 * failures surface as CatalogError with a kind that tells the caller
 * whether another attempt makes sense.
 */
export interface CatalogClient {
  /** Candidate works in provider relevance order, tracks not yet loaded */
  search(key: IdentityKey): Promise<CatalogWork[]>;
  /** Complete, ordered track listing of one work */
  fetchTracks(workId: string): Promise<CatalogTrack[]>;
}

/**
 * Supplies bearer tokens for catalog requests
 */
export interface AccessTokenProvider {
  getToken(): Promise<string>;
  /** Drop any cached token so the next call obtains a fresh one */
  invalidate(): void;
}
