/**
 * Identity Types
 */

export type IdentitySource = 'tags' | 'filename';

/**
 * Normalized (author, title) pair used to query the catalog.
 * Both fields are non-empty once constructed.
 */
export interface IdentityKey {
  author: string;
  title: string;
  source?: IdentitySource;
}

/**
 * Author/title read from the container's own metadata, before normalization
 */
export interface EmbeddedTags {
  author?: string;
  title?: string;
}
