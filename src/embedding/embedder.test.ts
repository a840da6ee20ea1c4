import { describe, expect, it } from 'vitest';
import { MemoryCache } from '../cache/memoryCache.js';
import { ResponseStore } from '../cache/responseStore.js';
import { InputError, PermanentProviderError, RateLimitError } from '../errors.js';
import type { EmbeddingProvider, ProviderIdentity } from '../providers/provider.js';
import { Embedder } from './embedder.js';

class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly identity: ProviderIdentity = { kind: 'openai', deployment: 'fake-embedding' };
  readonly batches: string[][] = [];

  constructor(
    readonly dimensions: number,
    private readonly vectorFor: (text: string, call: number) => number[] = (text) => [text.length, 0, 1],
  ) {}

  async invokeEmbedding(batch: readonly string[]): Promise<number[][]> {
    this.batches.push([...batch]);
    const call = this.batches.length;
    return batch.map((text) => this.vectorFor(text, call));
  }
}

function setup(provider: EmbeddingProvider, batchSize = 2) {
  const delays: number[] = [];
  const embedder = new Embedder(provider, new ResponseStore(new MemoryCache(), { namespace: 'embeddings' }), {
    batchSize,
    retry: { baseDelayMs: 10, maxDelayMs: 100 },
    defaultTimeoutMs: 1000,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  return { embedder, delays };
}

describe('Embedder', () => {
  it('returns vectors in input order and sends each distinct text once', async () => {
    const provider = new FakeEmbeddingProvider(3);
    const { embedder } = setup(provider);

    const vectors = await embedder.embed(['alpha', 'beta', 'alpha']);

    expect(vectors).toEqual([
      [5, 0, 1],
      [4, 0, 1],
      [5, 0, 1],
    ]);
    expect(provider.batches).toEqual([['alpha', 'beta']]);
  });

  it('only sends texts missing from the store', async () => {
    const provider = new FakeEmbeddingProvider(3);
    const { embedder } = setup(provider);

    await embedder.embed(['alpha']);
    const vectors = await embedder.embed(['alpha', 'gamma']);

    expect(vectors).toEqual([
      [5, 0, 1],
      [5, 0, 1],
    ]);
    expect(provider.batches).toEqual([['alpha'], ['gamma']]);
  });

  it('splits misses into batches of the configured size', async () => {
    const provider = new FakeEmbeddingProvider(3);
    const { embedder } = setup(provider, 2);

    await embedder.embed(['a1', 'b22', 'c333']);

    expect(provider.batches).toEqual([['a1', 'b22'], ['c333']]);
  });

  it('rejects vectors of the wrong dimensionality', async () => {
    const { embedder } = setup(new FakeEmbeddingProvider(3, () => [1, 2]));

    await expect(embedder.embed(['alpha'])).rejects.toThrow(
      new PermanentProviderError('Embedding has 2 dimensions; the configured dimensionality is 3.'),
    );
  });

  it('retries a rate-limited batch', async () => {
    let calls = 0;
    const provider: EmbeddingProvider = {
      identity: { kind: 'openai', deployment: 'fake-embedding' },
      dimensions: 2,
      invokeEmbedding: async (batch) => {
        calls += 1;
        if (calls === 1) {
          throw new RateLimitError('slow down');
        }
        return batch.map(() => [0.5, 0.5]);
      },
    };
    const { embedder, delays } = setup(provider);

    expect(await embedder.embed(['alpha'])).toEqual([[0.5, 0.5]]);
    expect(calls).toBe(2);
    expect(delays).toEqual([10]);
  });

  it('returns nothing for no texts and refuses empty ones', async () => {
    const provider = new FakeEmbeddingProvider(3);
    const { embedder } = setup(provider);

    expect(await embedder.embed([])).toEqual([]);
    await expect(embedder.embed(['alpha', '  '])).rejects.toBeInstanceOf(InputError);
    expect(provider.batches).toEqual([]);
  });
});
