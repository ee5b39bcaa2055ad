// Embedding Providers
// The text -> vector seam used by clustering, contextualization and search

import logger from './logger';
import { EmbeddingFailureError } from './errors';
import { DEFAULT_LOCAL_EMBEDDING_DIM, embedText } from './local-embeddings';
import { vectorNorm } from './similarity';
import { EmbeddingVector } from './types';

export interface EmbeddingProvider {
  readonly name: string;
  /** Rejects with {@link EmbeddingFailureError} when no vector can be produced. */
  embed(text: string): Promise<EmbeddingVector>;
  /** Releases connections held by the provider or its cache. */
  close?(): Promise<void>;
}

export interface EmbeddingCache {
  getEmbedding(text: string): Promise<EmbeddingVector | null>;
  setEmbedding(text: string, embedding: EmbeddingVector): Promise<boolean>;
  disconnect?(): Promise<void>;
}

export class LocalEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'local';

  constructor(private readonly dims: number = DEFAULT_LOCAL_EMBEDDING_DIM) {}

  async embed(text: string): Promise<EmbeddingVector> {
    const vector = embedText(text, this.dims);
    if (vectorNorm(vector) === 0) {
      throw new EmbeddingFailureError('Text has no embeddable tokens', { textLength: text.length });
    }
    return vector;
  }
}

/**
 * Bounded in-process cache; evicts the oldest entry once full.
 */
export class InMemoryEmbeddingCache implements EmbeddingCache {
  private entries = new Map<string, EmbeddingVector>();

  constructor(private readonly maxSize: number = 1000) {}

  async getEmbedding(text: string): Promise<EmbeddingVector | null> {
    return this.entries.get(text) ?? null;
  }

  async setEmbedding(text: string, embedding: EmbeddingVector): Promise<boolean> {
    if (!this.entries.has(text) && this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(text, embedding);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}

export class CachedEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  private cacheHits = 0;
  private cacheMisses = 0;

  constructor(private readonly inner: EmbeddingProvider, private readonly cache: EmbeddingCache) {
    this.name = `cached:${inner.name}`;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const cached = await this.cache.getEmbedding(text);
    if (cached) {
      this.cacheHits++;
      return cached;
    }
    this.cacheMisses++;

    const embedding = await this.inner.embed(text);
    const stored = await this.cache.setEmbedding(text, embedding);
    if (!stored) {
      logger.debug(`[EmbeddingCache] Could not cache embedding for ${this.inner.name}`);
    }
    return embedding;
  }

  async close(): Promise<void> {
    await this.cache.disconnect?.();
  }

  getCacheStats(): { hits: number; misses: number; hitRate: number } {
    const total = this.cacheHits + this.cacheMisses;
    return {
      hits: this.cacheHits,
      misses: this.cacheMisses,
      hitRate: total > 0 ? this.cacheHits / total : 0,
    };
  }
}
