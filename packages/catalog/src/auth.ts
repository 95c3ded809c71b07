/**
 * Access Token Providers
 *
 * The catalog client never handles credentials itself; it asks one of these.
 */

import type { Dispatcher } from 'undici';
import { CatalogError } from '@chaptify/core';
import { requestJson } from './http.js';
import { tokenResponseSchema } from './schemas.js';
import type { AccessTokenProvider } from './types.js';

const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';
const EXPIRY_MARGIN_MS = 60000;

/**
 * Fixed, pre-issued token. `invalidate` is a no-op; an expired token
 * keeps failing with `unauthorized`.
 */
export class StaticTokenProvider implements AccessTokenProvider {
  constructor(private readonly token: string) {}

  async getToken(): Promise<string> {
    return this.token;
  }

  invalidate(): void {}
}

export interface ClientCredentialsOptions {
  clientId: string;
  clientSecret: string;
  tokenUrl?: string;
  dispatcher?: Dispatcher;
  now?: () => number;
}

/**
 * OAuth client credentials flow. The token is cached until shortly before
 * it expires, and concurrent callers share one in-flight exchange.
 */
export class ClientCredentialsTokenProvider implements AccessTokenProvider {
  private token: string | null = null;
  private expiresAt = 0;
  private pending: Promise<string> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: ClientCredentialsOptions) {
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.token && this.now() < this.expiresAt - EXPIRY_MARGIN_MS) {
      return this.token;
    }
    if (!this.pending) {
      this.pending = this.exchange().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }

  private async exchange(): Promise<string> {
    const credentials = Buffer.from(
      `${this.options.clientId}:${this.options.clientSecret}`
    ).toString('base64');

    const tokenUrl = this.options.tokenUrl ?? SPOTIFY_TOKEN_URL;
    const data = await requestJson(tokenUrl, tokenResponseSchema, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
      dispatcher: this.options.dispatcher,
    }).catch((error: unknown) => {
      // The token endpoint answers bad credentials with 400 invalid_client
      if (error instanceof CatalogError && error.statusCode === 400) {
        throw new CatalogError(
          'unauthorized',
          `Client credentials rejected: ${error.message}`,
          { statusCode: 400, url: tokenUrl },
          { cause: error }
        );
      }
      throw error;
    });

    this.token = data.access_token;
    this.expiresAt = this.now() + data.expires_in * 1000;
    return data.access_token;
  }
}
