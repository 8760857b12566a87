import { beforeAll, describe, expect, it, vi } from 'vitest';

import { BackgroundFetchError } from '../../errors';
import { solidPng, StubSearchClient } from '../../test/fixtures';
import type { FetchLike } from '../http/fetchWithRetry';
import { BackgroundResolver } from './backgroundResolver';
import { ImageSearchClient, PexelsClient } from './pexelsClient';

let photo: Buffer;

beforeAll(async () => {
  photo = await solidPng(32, 24, { r: 10, g: 20, b: 30 });
});

const failingClient = (error: Error): ImageSearchClient => ({
  search: async () => {
    throw error;
  },
});

describe('BackgroundResolver', () => {
  it('skips the search without a term', async () => {
    const search = new StubSearchClient({ 1: photo });
    const resolver = new BackgroundResolver(search, 15);

    expect(await resolver.resolve(undefined, 1)).toEqual({ kind: 'fallback', reason: 'no search term' });
    expect(await resolver.resolve('   ', 1)).toEqual({ kind: 'fallback', reason: 'no search term' });
    expect(search.requests).toEqual([]);
  });

  it('returns the photo for a trimmed term', async () => {
    const search = new StubSearchClient({ 2: photo });
    const resolved = await new BackgroundResolver(search, 15).resolve('  garden  ', 2);

    expect(resolved).toEqual({ kind: 'image', data: photo });
    expect(search.requests).toEqual([{ query: 'garden', page: 2, perPage: 15 }]);
  });

  it('falls back when the page has no hit', async () => {
    const resolved = await new BackgroundResolver(new StubSearchClient({}), 15).resolve('garden', 4);
    expect(resolved).toEqual({ kind: 'fallback', reason: 'no result for "garden" on page 4' });
  });

  it('turns client errors into a fallback', async () => {
    const client = failingClient(new BackgroundFetchError('Image search failed with HTTP 500', 500));
    const resolver = new BackgroundResolver(client, 15);
    expect(await resolver.resolve('garden', 1)).toEqual({
      kind: 'fallback',
      reason: 'Image search failed with HTTP 500',
    });
  });

  it('falls back when the downloaded bytes are not an image', async () => {
    const resolved = await new BackgroundResolver(new StubSearchClient({ 1: Buffer.from('<html>') }), 15).resolve(
      'garden',
      1
    );
    expect(resolved.kind).toBe('fallback');
  });

  it('falls back for a page past the end of the search results', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ photos: [] }), { status: 200 }));
    const client = new PexelsClient({
      endpoint: 'https://images.example.com/v1/search',
      apiKey: 'test-key',
      timeoutMs: 1000,
      retries: 0,
      fetchImpl,
    });

    const resolved = await new BackgroundResolver(client, 15).resolve('networking', 3);
    expect(resolved).toEqual({ kind: 'fallback', reason: 'no result for "networking" on page 3' });
  });
});
