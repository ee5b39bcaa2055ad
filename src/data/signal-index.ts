// Signal Index
// Neighbour lookup over previously seen signals

import { EmbeddingVector, Signal } from '../shared/types';

export interface SimilarSignal {
  signal: Signal;
  /** Cosine distance, 1 - cosine similarity. */
  distance: number;
  score: number;
}

export interface FindSimilarOptions {
  limit: number;
  maxDistance: number;
  excludeIds?: string[];
}

export interface SignalIndex {
  readonly name: string;
  indexSignal(signal: Signal, embedding: EmbeddingVector): Promise<boolean>;
  findSimilar(embedding: EmbeddingVector, options: FindSimilarOptions): Promise<SimilarSignal[]>;
}
