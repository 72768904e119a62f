/**
 * Embedding client with batching, caching and retries
 */
import { EmbeddingAdapter } from '../types';
import {
  EmbeddingUnavailableError,
  InvalidInputError,
  ProviderError,
  errorMessage,
  isTransientProviderError,
} from '../errors';
import { withRetry, RetryOptions, resolvePolicy } from '../retry';
import { debug } from '../utils/debug';
import { EmbeddingCache } from './cache';

export const DEFAULT_BATCH_SIZE = 100;

export interface EmbeddingClientOptions {
  cache?: EmbeddingCache;
  /** Texts per provider request (default 100) */
  batchSize?: number;
  retry?: RetryOptions;
}

export class EmbeddingClient {
  private adapter: EmbeddingAdapter;
  private options: EmbeddingClientOptions;

  constructor(adapter: EmbeddingAdapter, options: EmbeddingClientOptions = {}) {
    this.adapter = adapter;
    this.options = options;
  }

  get model(): string {
    return this.adapter.embeddingModel;
  }

  /**
   * Embed a single text. A new vector stays in the in-memory cache until
   * `flush()`.
   *
   * @throws InvalidInputError for empty or whitespace-only text
   * @throws EmbeddingUnavailableError when retries are exhausted
   */
  async embed(text: string): Promise<number[]> {
    const [vector] = await this.resolve([text], this.options.batchSize ?? DEFAULT_BATCH_SIZE, false);
    return vector;
  }

  /**
   * Embed many texts. The result is index-aligned with `texts`. Cached texts
   * are not sent to the provider; the rest go out `batchSize` at a time and
   * the cache is written once at the end.
   */
  embedBatch(texts: readonly string[], batchSize: number = this.options.batchSize ?? DEFAULT_BATCH_SIZE): Promise<number[][]> {
    return this.resolve(texts, batchSize, true);
  }

  /**
   * Write embeddings gathered by `embed()` to the cache file
   */
  async flush(): Promise<void> {
    await this.options.cache?.flush();
  }

  private async resolve(texts: readonly string[], batchSize: number, persist: boolean): Promise<number[][]> {
    texts.forEach((text, index) => {
      if (!text.trim()) {
        throw new InvalidInputError(`Cannot embed empty text (position ${index})`);
      }
    });
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new InvalidInputError(`Batch size must be a positive integer, got ${batchSize}`);
    }

    const cache = this.options.cache;
    await cache?.load();

    const resolved = new Map<string, number[]>();
    const pending = new Set<string>();
    for (const text of texts) {
      const cached = cache?.get(text);
      if (cached) {
        resolved.set(text, cached);
      } else {
        pending.add(text);
      }
    }
    const missing = [...pending];

    debug('embedding', 'Embedding %d texts: %d cached, %d to request', texts.length, resolved.size, missing.length);

    for (let start = 0; start < missing.length; start += batchSize) {
      const batch = missing.slice(start, start + batchSize);
      const vectors = await this.request(batch);
      batch.forEach((text, i) => {
        resolved.set(text, vectors[i]);
        cache?.set(text, vectors[i]);
      });
    }

    if (persist && missing.length > 0) {
      await cache?.flush();
    }

    return texts.map(text => {
      const vector = resolved.get(text);
      if (!vector) {
        throw new ProviderError('malformed', this.model, `No embedding returned for "${text}"`);
      }
      return vector;
    });
  }

  private async request(batch: string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await withRetry(() => this.adapter.embed(batch), { label: 'embed', ...this.options.retry });
    } catch (error) {
      if (isTransientProviderError(error)) {
        const attempts = resolvePolicy(this.options.retry?.policy).maxAttempts;
        throw new EmbeddingUnavailableError(
          `Embedding API unavailable after ${attempts} attempts: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      throw error;
    }

    if (vectors.length !== batch.length) {
      throw new ProviderError('malformed', this.model, `Expected ${batch.length} embeddings, got ${vectors.length}`);
    }
    return vectors;
  }
}
