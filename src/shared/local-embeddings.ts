// Local Embeddings
// Deterministic feature-hashing embeddings; no model download, no network

import { EmbeddingVector } from './types';

export const DEFAULT_LOCAL_EMBEDDING_DIM = 384;

// FNV-1a, 32-bit
function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(token => token.length > 1);
}

function addFeature(vector: number[], feature: string, weight: number): void {
  const hash = hashToken(feature);
  const index = hash % vector.length;
  // Top bit picks the sign so unrelated collisions tend to cancel
  const sign = (hash & 0x80000000) === 0 ? 1 : -1;
  vector[index] += sign * weight;
}

/**
 * Embed text by hashing unigrams and adjacent bigrams into a fixed number
 * of buckets, then L2-normalizing. Identical token streams give identical
 * vectors; text with no tokens gives the zero vector.
 */
export function embedText(text: string, dims: number = DEFAULT_LOCAL_EMBEDDING_DIM): EmbeddingVector {
  const vector = new Array<number>(dims).fill(0);
  const tokens = tokenize(text);

  for (let i = 0; i < tokens.length; i++) {
    addFeature(vector, tokens[i], 1);
    if (i > 0) {
      addFeature(vector, `${tokens[i - 1]} ${tokens[i]}`, 0.5);
    }
  }

  let norm = 0;
  for (const x of vector) norm += x * x;
  norm = Math.sqrt(norm);
  if (norm === 0) return vector;

  return vector.map(x => x / norm);
}
