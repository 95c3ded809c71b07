/**
 * Component: Access Token Provider Tests
 */

import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ClientCredentialsTokenProvider, StaticTokenProvider } from '@chaptify/catalog';

const ORIGIN = 'https://accounts.spotify.com';

describe('ClientCredentialsTokenProvider', () => {
  let agent: MockAgent;
  let now: number;
  let provider: ClientCredentialsTokenProvider;

  const tokenReply = (token: string, expiresIn = 3600) =>
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/token', method: 'POST', body: 'grant_type=client_credentials' })
      .reply(200, { access_token: token, token_type: 'Bearer', expires_in: expiresIn });

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    now = 1_000_000;
    provider = new ClientCredentialsTokenProvider({
      clientId: 'test-id',
      clientSecret: 'test-secret',
      dispatcher: agent,
      now: () => now,
    });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('exchanges credentials once and caches the token', async () => {
    tokenReply('token-1');

    await expect(provider.getToken()).resolves.toBe('token-1');
    await expect(provider.getToken()).resolves.toBe('token-1');
    agent.assertNoPendingInterceptors();
  });

  it('shares one exchange between concurrent callers', async () => {
    tokenReply('token-1');

    await expect(Promise.all([provider.getToken(), provider.getToken()])).resolves.toEqual([
      'token-1',
      'token-1',
    ]);
  });

  it('refreshes a minute before expiry', async () => {
    tokenReply('token-1', 3600);
    tokenReply('token-2', 3600);

    await provider.getToken();
    now += 3_540_000;

    await expect(provider.getToken()).resolves.toBe('token-2');
  });

  it('keeps other token endpoint failures as they are', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/token', method: 'POST' })
      .reply(503, 'unavailable');

    await expect(provider.getToken()).rejects.toMatchObject({ kind: 'transient', statusCode: 503 });
  });

  it('exchanges again after invalidate', async () => {
    tokenReply('token-1');
    tokenReply('token-2');

    await provider.getToken();
    provider.invalidate();

    await expect(provider.getToken()).resolves.toBe('token-2');
  });

  it('reports rejected credentials as unauthorized', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/token', method: 'POST' })
      .reply(400, { error: 'invalid_client' });
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/token', method: 'POST' })
      .reply(401, { error: 'invalid_client' });

    await expect(provider.getToken()).rejects.toMatchObject({ kind: 'unauthorized', statusCode: 400 });
    await expect(provider.getToken()).rejects.toMatchObject({ kind: 'unauthorized', statusCode: 401 });
  });
});

describe('StaticTokenProvider', () => {
  it('always returns the given token', async () => {
    const provider = new StaticTokenProvider('test-token');
    provider.invalidate();

    await expect(provider.getToken()).resolves.toBe('test-token');
  });
});
