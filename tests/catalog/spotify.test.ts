/**
 * Component: Spotify Catalog Client Tests
 */

import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { CatalogError } from '@chaptify/core';
import { SpotifyCatalogClient } from '@chaptify/catalog';

const ORIGIN = 'https://api.spotify.com';
const query = { author: 'diana wynne jones', title: 'howls moving castle' };

describe('SpotifyCatalogClient', () => {
  let agent: MockAgent;
  let tokens: { getToken: Mock<() => Promise<string>>; invalidate: Mock<() => void> };
  let client: SpotifyCatalogClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    tokens = {
      getToken: vi.fn(async () => 'test-token'),
      invalidate: vi.fn<() => void>(),
    };
    client = new SpotifyCatalogClient({ tokens, dispatcher: agent, market: 'US', pageSize: 2 });
  });

  afterEach(async () => {
    await agent.close();
  });

  describe('search', () => {
    it('queries audiobooks and maps them to catalog works', async () => {
      const paths: string[] = [];
      agent
        .get(ORIGIN)
        .intercept({
          path: (path: string) => {
            paths.push(path);
            return path.startsWith('/v1/search?');
          },
          method: 'GET',
        })
        .reply(200, {
          audiobooks: {
            items: [
              {
                id: 'a1',
                name: "Howl's Moving Castle",
                authors: [{ name: ' Diana Wynne Jones ' }],
                total_chapters: 3,
                external_urls: { spotify: 'https://open.spotify.com/audiobook/a1' },
              },
              null,
            ],
          },
        });

      const works = await client.search(query);

      expect(works).toEqual([
        {
          id: 'a1',
          title: "Howl's Moving Castle",
          authors: ['Diana Wynne Jones'],
          author: 'Diana Wynne Jones',
          tracks: [],
          totalTracks: 3,
          url: 'https://open.spotify.com/audiobook/a1',
        },
      ]);

      const params = new URL(`${ORIGIN}${paths[0] ?? ''}`).searchParams;
      expect(params.get('q')).toBe('howls moving castle diana wynne jones');
      expect(params.get('type')).toBe('audiobook');
      expect(params.get('limit')).toBe('10');
      expect(params.get('market')).toBe('US');
    });

    it('returns an empty list when nothing is found', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: (path: string) => path.startsWith('/v1/search?'), method: 'GET' })
        .reply(200, { audiobooks: { items: [] } });

      await expect(client.search(query)).resolves.toEqual([]);
    });
  });

  describe('fetchTracks', () => {
    it('follows pagination until next is null', async () => {
      const pool = agent.get(ORIGIN);
      pool
        .intercept({ path: '/v1/audiobooks/a1/chapters?limit=2&market=US', method: 'GET' })
        .reply(200, {
          items: [
            { name: 'Opening', duration_ms: 1000 },
            { name: null, duration_ms: 2000 },
          ],
          next: `${ORIGIN}/v1/audiobooks/a1/chapters?offset=2&limit=2&market=US`,
          total: 3,
        });
      pool
        .intercept({ path: '/v1/audiobooks/a1/chapters?offset=2&limit=2&market=US', method: 'GET' })
        .reply(200, {
          items: [{ name: ' Closing ', duration_ms: 3000 }],
          next: null,
          total: 3,
        });

      const tracks = await client.fetchTracks('a1');

      expect(tracks).toEqual([
        { index: 0, name: 'Opening', nominalDurationMs: 1000 },
        { index: 1, name: '', nominalDurationMs: 2000 },
        { index: 2, name: 'Closing', nominalDurationMs: 3000 },
      ]);
      expect(tokens.getToken).toHaveBeenCalledTimes(2);
      agent.assertNoPendingInterceptors();
    });

    it('stops on a listing that links back to itself', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/v1/audiobooks/a1/chapters?limit=2&market=US', method: 'GET' })
        .reply(200, {
          items: [{ name: 'Loop', duration_ms: 1000 }],
          next: `${ORIGIN}/v1/audiobooks/a1/chapters?limit=2&market=US`,
        });

      await expect(client.fetchTracks('a1')).rejects.toMatchObject({
        kind: 'invalidResponse',
        message: 'Chapter listing for a1 does not terminate',
      });
    });
  });

  describe('failures', () => {
    const intercept = () =>
      agent.get(ORIGIN).intercept({ path: (path: string) => path.startsWith('/v1/'), method: 'GET' });

    it('maps 404 to notFound', async () => {
      intercept().reply(404, { error: { status: 404, message: 'non existing id' } });

      await expect(client.fetchTracks('missing')).rejects.toMatchObject({
        kind: 'notFound',
        statusCode: 404,
      });
    });

    it('maps 429 and 5xx to transient', async () => {
      intercept().reply(429, { error: { status: 429 } });
      intercept().reply(503, 'upstream unavailable');

      await expect(client.search(query)).rejects.toMatchObject({ kind: 'transient', statusCode: 429 });
      await expect(client.search(query)).rejects.toMatchObject({ kind: 'transient', statusCode: 503 });
    });

    it('maps 401 to unauthorized and drops the cached token', async () => {
      intercept().reply(401, { error: { status: 401, message: 'The access token expired' } });

      await expect(client.search(query)).rejects.toMatchObject({ kind: 'unauthorized' });
      expect(tokens.invalidate).toHaveBeenCalledTimes(1);
    });

    it('maps other client errors to invalidResponse', async () => {
      intercept().reply(400, { error: { status: 400 } });

      await expect(client.search(query)).rejects.toMatchObject({ kind: 'invalidResponse' });
      expect(tokens.invalidate).not.toHaveBeenCalled();
    });

    it('rejects a body that does not match the expected shape', async () => {
      intercept().reply(200, { albums: {} });

      const error = await client.search(query).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(CatalogError);
      expect(error).toMatchObject({ kind: 'invalidResponse' });
    });

    it('rejects a body that is not JSON', async () => {
      intercept().reply(200, '<html>');

      await expect(client.search(query)).rejects.toThrow('Catalog response is not JSON');
    });

    it('treats network failures as transient', async () => {
      intercept().replyWithError(new Error('socket hang up'));

      await expect(client.search(query)).rejects.toMatchObject({ kind: 'transient' });
    });
  });
});
