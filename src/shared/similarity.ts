// Similarity Primitives
// Cosine similarity and centroids over fixed-length embedding vectors

import { InvalidInputError } from './errors';
import { EmbeddingVector } from './types';

function assertComparable(a: EmbeddingVector, b: EmbeddingVector): void {
  if (a.length === 0 || b.length === 0) {
    throw new InvalidInputError('Cannot compare empty vectors');
  }
  if (a.length !== b.length) {
    throw new InvalidInputError(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
}

export function dotProduct(a: EmbeddingVector, b: EmbeddingVector): number {
  assertComparable(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function vectorNorm(v: EmbeddingVector): number {
  let sum = 0;
  for (const x of v) {
    sum += x * x;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine of the angle between two vectors, in [-1, 1].
 *
 * Throws {@link InvalidInputError} for empty or mismatched vectors and when
 * either vector has zero norm; callers that may hold zero vectors check
 * {@link vectorNorm} first.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  const dot = dotProduct(a, b);
  const normA = vectorNorm(a);
  const normB = vectorNorm(b);

  if (normA === 0 || normB === 0) {
    throw new InvalidInputError('Cosine similarity is undefined for a zero-norm vector');
  }

  return dot / (normA * normB);
}

/**
 * Element-wise arithmetic mean of a non-empty list of equal-length vectors.
 */
export function computeCentroid(vectors: EmbeddingVector[]): EmbeddingVector {
  if (vectors.length === 0) {
    throw new InvalidInputError('Cannot compute the centroid of zero vectors');
  }

  const dim = vectors[0].length;
  if (dim === 0) {
    throw new InvalidInputError('Cannot compute the centroid of empty vectors');
  }

  const sum = new Array<number>(dim).fill(0);
  for (const vector of vectors) {
    if (vector.length !== dim) {
      throw new InvalidInputError(`Vector dimension mismatch: ${vector.length} vs ${dim}`);
    }
    for (let i = 0; i < dim; i++) {
      sum[i] += vector[i];
    }
  }

  return sum.map(value => value / vectors.length);
}
