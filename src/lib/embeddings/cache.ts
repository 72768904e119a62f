/**
 * On-disk embedding cache
 *
 * Vectors are keyed by input text and stored in a single artifact per cache
 * name. The cache is advisory: read and write failures are reported and the
 * caller carries on without it.
 */
import { z } from 'zod';
import { Store } from '../storage';
import { errorMessage } from '../errors';
import { debug, warn } from '../utils/debug';

const CacheFileSchema = z.object({
  model: z.string(),
  vectors: z.record(z.array(z.number())),
});

export class EmbeddingCache {
  private store: Store;
  private name: string;
  private model: string;
  private vectors = new Map<string, number[]>();
  private dirty = false;
  private loading?: Promise<void>;
  private writing: Promise<void> = Promise.resolve();

  /**
   * @param store - Store the cache file lives in
   * @param name - Cache file name, e.g. the dataset it belongs to
   * @param model - Embedding model; a cache written by another model is ignored
   */
  constructor(store: Store, name: string, model: string) {
    this.store = store;
    this.name = name;
    this.model = model;
  }

  get size(): number {
    return this.vectors.size;
  }

  /**
   * Read the cache file once. Later calls reuse the first read.
   */
  load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.read();
    }
    return this.loading;
  }

  private async read(): Promise<void> {
    let raw: unknown;
    try {
      raw = await this.store.get('embedding', this.name);
    } catch (error) {
      warn('embedding', `Ignoring unreadable embedding cache "${this.name}": ${errorMessage(error)}`);
      return;
    }
    if (raw === undefined) return;

    const parsed = CacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      warn('embedding', `Ignoring malformed embedding cache "${this.name}"`);
      return;
    }
    if (parsed.data.model !== this.model) {
      debug('embedding', 'Cache "%s" was built with %s, not %s; starting empty', this.name, parsed.data.model, this.model);
      return;
    }

    for (const [text, vector] of Object.entries(parsed.data.vectors)) {
      if (!this.vectors.has(text)) this.vectors.set(text, vector);
    }
    debug('embedding', 'Loaded %d cached embeddings from "%s"', this.vectors.size, this.name);
  }

  get(text: string): number[] | undefined {
    return this.vectors.get(text);
  }

  set(text: string, vector: number[]): void {
    this.vectors.set(text, vector);
    this.dirty = true;
  }

  /**
   * Write pending entries to disk. Flushes run one after another.
   */
  flush(): Promise<void> {
    this.writing = this.writing.then(() => this.write());
    return this.writing;
  }

  private async write(): Promise<void> {
    if (!this.dirty) return;
    this.dirty = false;
    try {
      await this.store.put('embedding', this.name, {
        model: this.model,
        vectors: Object.fromEntries(this.vectors),
      });
      debug('embedding', 'Flushed %d embeddings to "%s"', this.vectors.size, this.name);
    } catch (error) {
      this.dirty = true;
      warn('embedding', `Could not write embedding cache "${this.name}": ${errorMessage(error)}`);
    }
  }
}
