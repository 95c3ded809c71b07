/**
 * @chaptify/core
 *
 * Shared domain package containing:
 * - Identity, catalog, probe and chapter types
 * - Name normalization
 * - Error taxonomy
 */

// Types
export type { IdentityKey, IdentitySource, EmbeddedTags } from './types/identity.js';
export type { CatalogTrack, CatalogWork } from './types/catalog.js';
export type { ChapterMarker } from './types/chapter.js';
export type { AudioProbe, AudioProber } from './types/probe.js';

// Normalization
export { normalizeText, normalizeTitle, authorKey } from './normalize.js';

// Errors
export {
  ChaptifyError,
  IdentityError,
  CatalogError,
  NoMatchError,
  AmbiguousMatchError,
  UnresolvableTimecodesError,
  DurationMismatchError,
  ProbeError,
  RemuxError,
  ConfigError,
  isTransientCatalogError,
  type ChaptifyErrorCode,
  type CatalogErrorKind,
  type RemuxFailureReason,
} from './errors/index.js';
