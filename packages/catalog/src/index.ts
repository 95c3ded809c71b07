/**
 * @chaptify/catalog
 *
 * Catalog client adapter: typed search and chapter-listing calls,
 * validated at the boundary, plus token providers and a shared rate limiter.
 */

export type { CatalogClient, AccessTokenProvider } from './types.js';
export { SpotifyCatalogClient, type SpotifyCatalogConfig } from './spotify.js';
export {
  StaticTokenProvider,
  ClientCredentialsTokenProvider,
  type ClientCredentialsOptions,
} from './auth.js';
export { RateLimiter } from './rateLimiter.js';
export { classifyStatus, requestJson, type HttpRequest } from './http.js';
