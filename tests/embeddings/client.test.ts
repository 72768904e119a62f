import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { EmbeddingClient } from '../../src/lib/embeddings/client';
import { EmbeddingCache } from '../../src/lib/embeddings/cache';
import { MockModelAdapter, MockConfig, hashedEmbedding } from '../../src/lib/providers/mock/mock';
import { mock } from '../../src/lib/models';
import { Store } from '../../src/lib/storage';
import { EmbeddingUnavailableError, InvalidInputError, ProviderError } from '../../src/lib/errors';

const noSleep = async () => {};

function adapter(config: MockConfig = {}): MockModelAdapter {
  return new MockModelAdapter(mock('embedder', { dimensions: 8, ...config }));
}

function embedCalls(mockAdapter: MockModelAdapter): string[][] {
  return mockAdapter.calls.filter(call => call.kind === 'embed').map(call => call.texts ?? []);
}

describe('EmbeddingClient', () => {
  it('rejects empty text', async () => {
    const client = new EmbeddingClient(adapter());
    await expect(client.embed('')).rejects.toBeInstanceOf(InvalidInputError);
    await expect(client.embedBatch(['ok', '   '])).rejects.toThrow('Cannot embed empty text (position 1)');
  });

  it('embeds a single text', async () => {
    const client = new EmbeddingClient(adapter());
    expect(await client.embed('reset password')).toEqual(hashedEmbedding('reset password', 8));
  });

  it('keeps input order and requests duplicates once', async () => {
    const mockAdapter = adapter({ vectors: { x: [1, 0], y: [0, 1] } });
    const client = new EmbeddingClient(mockAdapter);

    expect(await client.embedBatch(['x', 'y', 'x'])).toEqual([[1, 0], [0, 1], [1, 0]]);
    expect(embedCalls(mockAdapter)).toEqual([['x', 'y']]);
  });

  it('splits requests into batches', async () => {
    const mockAdapter = adapter();
    const client = new EmbeddingClient(mockAdapter, { batchSize: 2 });

    const vectors = await client.embedBatch(['a', 'b', 'c', 'd', 'e']);

    expect(vectors).toHaveLength(5);
    expect(embedCalls(mockAdapter)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('returns an empty list for no texts without calling the provider', async () => {
    const mockAdapter = adapter();
    expect(await new EmbeddingClient(mockAdapter).embedBatch([])).toEqual([]);
    expect(mockAdapter.calls).toEqual([]);
  });

  it('retries transient failures', async () => {
    const mockAdapter = adapter({ failTimes: 2, failWith: 'rate_limited', vectors: { q: [1, 2] } });
    const sleep = vi.fn(noSleep);
    const client = new EmbeddingClient(mockAdapter, { retry: { sleep } });

    expect(await client.embed('q')).toEqual([1, 2]);
    expect(embedCalls(mockAdapter)).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('gives up with EmbeddingUnavailableError once retries are exhausted', async () => {
    const client = new EmbeddingClient(adapter({ shouldFail: true }), {
      retry: { sleep: noSleep, policy: { maxAttempts: 3 } },
    });

    const error = await client.embed('q').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingUnavailableError);
    expect(error).toMatchObject({
      message: 'Embedding API unavailable after 3 attempts: mock: Mock embedding failed (intentional test error)',
    });
    expect(error instanceof Error && error.cause).toBeInstanceOf(ProviderError);
  });

  it('propagates non-transient failures at once', async () => {
    const mockAdapter = adapter({ shouldFail: true, failWith: 'unauthorized' });
    const client = new EmbeddingClient(mockAdapter, { retry: { sleep: noSleep } });

    await expect(client.embed('q')).rejects.toMatchObject({ kind: 'unauthorized' });
    expect(embedCalls(mockAdapter)).toHaveLength(1);
  });
});

describe('EmbeddingCache', () => {
  let dir: string;
  let store: Store;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'query-optimizer-embeddings-'));
    store = new Store(dir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('serves repeated runs from disk', async () => {
    const first = adapter();
    await new EmbeddingClient(first, { cache: new EmbeddingCache(store, 'training', 'embedder') }).embedBatch(['a', 'b']);
    expect(embedCalls(first)).toEqual([['a', 'b']]);

    const second = adapter();
    const client = new EmbeddingClient(second, { cache: new EmbeddingCache(store, 'training', 'embedder') });
    const vectors = await client.embedBatch(['b', 'c']);

    expect(vectors[0]).toEqual(hashedEmbedding('b', 8));
    expect(embedCalls(second)).toEqual([['c']]);

    expect(await store.get('embedding', 'training')).toEqual({
      model: 'embedder',
      vectors: {
        a: hashedEmbedding('a', 8),
        b: hashedEmbedding('b', 8),
        c: hashedEmbedding('c', 8),
      },
    });
  });

  it('ignores a cache written by another model', async () => {
    await store.put('embedding', 'training', { model: 'other-model', vectors: { a: [1] } });
    const cache = new EmbeddingCache(store, 'training', 'embedder');
    await cache.load();

    expect(cache.size).toBe(0);
    expect(cache.get('a')).toBeUndefined();
  });

  it('warns about a malformed cache file and carries on', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await store.put('embedding', 'training', { vectors: 'not a map' });

    const cache = new EmbeddingCache(store, 'training', 'embedder');
    await cache.load();

    expect(cache.size).toBe(0);
    expect(warnSpy).toHaveBeenCalledWith('[embedding] warning: Ignoring malformed embedding cache "training"');
  });

  it('only writes when something changed', async () => {
    const cache = new EmbeddingCache(store, 'training', 'embedder');
    await cache.flush();
    expect(await store.get('embedding', 'training')).toBeUndefined();

    cache.set('a', [1, 2]);
    await cache.flush();
    expect(await store.get('embedding', 'training')).toEqual({ model: 'embedder', vectors: { a: [1, 2] } });
  });

  it('writes the cache once per batch and holds single embeds until flushed', async () => {
    const cache = new EmbeddingCache(store, 'training', 'embedder');
    const client = new EmbeddingClient(adapter(), { cache });
    const put = vi.spyOn(store, 'put');

    await client.embedBatch(['a', 'b', 'c']);
    expect(put).toHaveBeenCalledTimes(1);

    await client.embed('d');
    await client.embed('e');
    expect(put).toHaveBeenCalledTimes(1);

    await client.flush();
    expect(put).toHaveBeenCalledTimes(2);
    expect(await store.get('embedding', 'training')).toMatchObject({
      vectors: { d: hashedEmbedding('d', 8), e: hashedEmbedding('e', 8) },
    });
  });

  it('serialises overlapping flushes', async () => {
    const cache = new EmbeddingCache(store, 'training', 'embedder');

    cache.set('a', [1]);
    const first = cache.flush();
    cache.set('b', [2]);
    const second = cache.flush();

    await expect(Promise.all([first, second])).resolves.toEqual([undefined, undefined]);
    expect(await store.get('embedding', 'training')).toEqual({ model: 'embedder', vectors: { a: [1], b: [2] } });
  });
});
