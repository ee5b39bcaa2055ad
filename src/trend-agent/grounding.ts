// Cluster Grounding
// Coherence of a cluster as the mean pairwise cosine similarity of its members

import { cosineSimilarity, vectorNorm } from '../shared/similarity';
import { EmbeddingVector } from '../shared/types';

export interface ClusterGrounding {
  coherence: number;
  pairCount: number;
  minSimilarity: number;
  maxSimilarity: number;
}

/**
 * Zero-norm members are left out of every pair. With fewer than two
 * usable embeddings there is nothing to compare and coherence is 0.
 */
export function computeClusterGrounding(cluster: { embeddings: EmbeddingVector[] }): ClusterGrounding {
  const usable = cluster.embeddings.filter(embedding => embedding.length > 0 && vectorNorm(embedding) > 0);

  let sum = 0;
  let pairCount = 0;
  let minSimilarity = Infinity;
  let maxSimilarity = -Infinity;

  for (let i = 0; i < usable.length; i++) {
    for (let j = i + 1; j < usable.length; j++) {
      const similarity = cosineSimilarity(usable[i], usable[j]);
      sum += similarity;
      pairCount++;
      minSimilarity = Math.min(minSimilarity, similarity);
      maxSimilarity = Math.max(maxSimilarity, similarity);
    }
  }

  if (pairCount === 0) {
    return { coherence: 0, pairCount: 0, minSimilarity: 0, maxSimilarity: 0 };
  }

  return {
    coherence: sum / pairCount,
    pairCount,
    minSimilarity,
    maxSimilarity,
  };
}
