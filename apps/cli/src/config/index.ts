/**
 * CLI Configuration
 *
 * Environment (optionally from a .env file) validated with zod.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '@chaptify/core';

const numberFromEnv = <T extends z.ZodNumber>(schema: T, fallback: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? fallback : Number(value)),
    schema
  );

const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Catalog credentials; CLIENT_ID / CLIENT_SECRET are accepted as older names
  SPOTIFY_CLIENT_ID: optionalString,
  SPOTIFY_CLIENT_SECRET: optionalString,
  CLIENT_ID: optionalString,
  CLIENT_SECRET: optionalString,
  SPOTIFY_ACCESS_TOKEN: optionalString,
  SPOTIFY_MARKET: z.preprocess(
    value => (value === '' ? undefined : value),
    z.string().regex(/^[A-Za-z]{2}$/, 'must be a two-letter country code').toUpperCase().optional()
  ),

  // Media tools
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),

  // Pipeline
  CHAPTIFY_DURATION_TOLERANCE: numberFromEnv(z.number().min(0).max(1), 0.15),
  CHAPTIFY_REMUX_TIMEOUT_MS: numberFromEnv(z.number().int().positive(), 600000),
  CHAPTIFY_CATALOG_ATTEMPTS: numberFromEnv(z.number().int().min(1).max(10), 3),
  CHAPTIFY_CATALOG_INTERVAL_MS: numberFromEnv(z.number().int().min(0), 100),
});

export type CatalogCredentials =
  | { kind: 'token'; accessToken: string }
  | { kind: 'clientCredentials'; clientId: string; clientSecret: string };

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  catalog: {
    clientId?: string;
    clientSecret?: string;
    accessToken?: string;
    market?: string;
    maxAttempts: number;
    minIntervalMs: number;
  };
  mediaTools: {
    ffmpeg: string;
    ffprobe: string;
  };
  pipeline: {
    durationTolerance: number;
    remuxTimeoutMs: number;
  };
}

/**
 * Load `.env` from the working directory into process.env (existing
 * variables win), then validate.
 */
export function loadEnvironment(path?: string): AppConfig {
  dotenvConfig({ path });
  return loadConfig(process.env);
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${problems.join('; ')}`, { problems });
  }
  const values = parsed.data;

  return {
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
    catalog: {
      clientId: values.SPOTIFY_CLIENT_ID ?? values.CLIENT_ID,
      clientSecret: values.SPOTIFY_CLIENT_SECRET ?? values.CLIENT_SECRET,
      accessToken: values.SPOTIFY_ACCESS_TOKEN,
      market: values.SPOTIFY_MARKET,
      maxAttempts: values.CHAPTIFY_CATALOG_ATTEMPTS,
      minIntervalMs: values.CHAPTIFY_CATALOG_INTERVAL_MS,
    },
    mediaTools: {
      ffmpeg: values.FFMPEG_PATH,
      ffprobe: values.FFPROBE_PATH,
    },
    pipeline: {
      durationTolerance: values.CHAPTIFY_DURATION_TOLERANCE,
      remuxTimeoutMs: values.CHAPTIFY_REMUX_TIMEOUT_MS,
    },
  };
}

/**
 * Credentials are only needed once the catalog is actually called
 */
export function requireCatalogCredentials(config: AppConfig): CatalogCredentials {
  const { clientId, clientSecret, accessToken } = config.catalog;
  if (accessToken) {
    return { kind: 'token', accessToken };
  }
  if (!clientId || !clientSecret) {
    throw new ConfigError(
      'SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET (or SPOTIFY_ACCESS_TOKEN) must be set'
    );
  }
  return { kind: 'clientCredentials', clientId, clientSecret };
}
