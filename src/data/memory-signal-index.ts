// In-memory Signal Index
// Brute-force cosine search; used when the vector database is unavailable

import { cosineSimilarity, vectorNorm } from '../shared/similarity';
import { EmbeddingVector, Signal } from '../shared/types';
import { FindSimilarOptions, SignalIndex, SimilarSignal } from './signal-index';

interface IndexedSignal {
  signal: Signal;
  embedding: EmbeddingVector;
}

export class InMemorySignalIndex implements SignalIndex {
  readonly name = 'memory';
  private entries = new Map<string, IndexedSignal>();

  async indexSignal(signal: Signal, embedding: EmbeddingVector): Promise<boolean> {
    if (vectorNorm(embedding) === 0) {
      return false;
    }
    this.entries.set(signal.signalId, { signal, embedding });
    return true;
  }

  async findSimilar(embedding: EmbeddingVector, options: FindSimilarOptions): Promise<SimilarSignal[]> {
    if (options.limit <= 0 || vectorNorm(embedding) === 0) {
      return [];
    }

    const excluded = new Set(options.excludeIds ?? []);
    const matches: SimilarSignal[] = [];

    for (const entry of this.entries.values()) {
      if (excluded.has(entry.signal.signalId) || entry.embedding.length !== embedding.length) {
        continue;
      }
      const score = cosineSimilarity(embedding, entry.embedding);
      const distance = 1 - score;
      if (distance <= options.maxDistance) {
        matches.push({ signal: entry.signal, distance, score });
      }
    }

    return matches.sort((a, b) => a.distance - b.distance).slice(0, options.limit);
  }

  get size(): number {
    return this.entries.size;
  }
}
