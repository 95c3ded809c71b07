/**
 * Pipeline Wiring
 *
 * Builds the production pipeline from validated configuration.
 */

import {
  ClientCredentialsTokenProvider,
  RateLimiter,
  SpotifyCatalogClient,
  StaticTokenProvider,
  type AccessTokenProvider,
} from '@chaptify/catalog';
import { FFProbe } from '@chaptify/media';
import { ChapterPipeline } from '@chaptify/pipeline';
import { RemuxInvoker } from '@chaptify/processing';
import { logger } from '@chaptify/utils';
import { requireCatalogCredentials, type AppConfig } from '../config/index.js';

export interface WiringOptions {
  dropLastTrack?: boolean;
}

export function createTokenProvider(config: AppConfig): AccessTokenProvider {
  const credentials = requireCatalogCredentials(config);
  if (credentials.kind === 'token') {
    return new StaticTokenProvider(credentials.accessToken);
  }
  return new ClientCredentialsTokenProvider({
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
  });
}

export function createProber(config: AppConfig): FFProbe {
  return new FFProbe({ ffprobePath: config.mediaTools.ffprobe });
}

export function createPipeline(config: AppConfig, options: WiringOptions = {}): ChapterPipeline {
  logger.level = config.logLevel;

  const prober = createProber(config);
  const catalog = new SpotifyCatalogClient({
    tokens: createTokenProvider(config),
    market: config.catalog.market,
    rateLimiter: new RateLimiter(config.catalog.minIntervalMs),
  });
  const embedder = new RemuxInvoker({
    prober,
    ffmpegPath: config.mediaTools.ffmpeg,
    timeout: config.pipeline.remuxTimeoutMs,
  });

  return new ChapterPipeline(
    { catalog, prober, embedder },
    {
      tolerance: config.pipeline.durationTolerance,
      retry: { maxAttempts: config.catalog.maxAttempts },
      dropLastTrack: options.dropLastTrack,
    }
  );
}
