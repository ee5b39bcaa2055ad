// Hybrid Search
// Ranks the cluster pool against a free-text query by semantic and keyword overlap

import logger from '../shared/logger';
import { EmbeddingFailureError } from '../shared/errors';
import { EmbeddingProvider } from '../shared/embedding-provider';
import { cosineSimilarity, vectorNorm } from '../shared/similarity';
import { EmbeddingVector, Signal } from '../shared/types';

export const STOPWORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'has', 'he',
  'in', 'is', 'it', 'its', 'of', 'on', 'that', 'the', 'to', 'was', 'will', 'with',
]);

export const SEARCH_WEIGHTS = {
  semantic: 0.7,
  lexical: 0.3,
} as const;

export const MIN_SEMANTIC_SCORE = 0.40;
export const MIN_LEXICAL_SCORE = 0.15;
export const DEFAULT_MIN_FINAL_SCORE = 0.35;
export const DEFAULT_LEGACY_THRESHOLD = 0.55;

const ACTIVE_MIN_SIGNALS = 3;

export interface SearchableCluster {
  clusterId: string;
  signals: Array<Pick<Signal, 'text'>>;
  signalCount: number;
  centroid?: EmbeddingVector;
}

export type ClusterType = 'Active' | 'Candidate';

export type HybridSearchResult<T extends SearchableCluster> = T & {
  semanticScore: number;
  lexicalScore: number;
  finalScore: number;
  clusterType: ClusterType;
};

export type LegacySearchResult<T extends SearchableCluster> = HybridSearchResult<T> & {
  similarityScore: number;
};

// ASCII punctuation becomes whitespace
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[!-\/:-@\[-`{-~]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function extractKeywords(text: string): Set<string> {
  const keywords = new Set<string>();
  for (const token of normalizeText(text).split(' ')) {
    if (token.length >= 3 && !STOPWORDS.has(token)) {
      keywords.add(token);
    }
  }
  return keywords;
}

/**
 * Share of query keywords found anywhere in the cluster's signal texts.
 */
export function computeLexicalScore(queryKeywords: Set<string>, signals: Array<Pick<Signal, 'text'>>): number {
  if (queryKeywords.size === 0) {
    return 0;
  }

  const clusterKeywords = new Set<string>();
  for (const signal of signals) {
    for (const keyword of extractKeywords(signal.text)) {
      clusterKeywords.add(keyword);
    }
  }

  let overlap = 0;
  for (const keyword of queryKeywords) {
    if (clusterKeywords.has(keyword)) overlap++;
  }
  return overlap / queryKeywords.size;
}

async function embedQuery(query: string, embedder: EmbeddingProvider): Promise<EmbeddingVector | null> {
  try {
    return await embedder.embed(query);
  } catch (error) {
    if (error instanceof EmbeddingFailureError) {
      logger.warn(`[HybridSearch] Could not embed query: ${error.message}`);
      return null;
    }
    throw error;
  }
}

/**
 * A cluster is kept when it clears either relevance floor (semantic or
 * lexical) and its blended score reaches `minFinalScore`. Results are
 * ordered by final score, then by signal count, both descending.
 */
export async function searchClustersHybrid<T extends SearchableCluster>(
  query: string,
  clusters: T[],
  embedder: EmbeddingProvider,
  minFinalScore: number = DEFAULT_MIN_FINAL_SCORE
): Promise<Array<HybridSearchResult<T>>> {
  if (query.trim() === '') {
    return [];
  }

  const queryKeywords = extractKeywords(query);
  const queryEmbedding = await embedQuery(query, embedder);
  if (!queryEmbedding) {
    return [];
  }
  if (vectorNorm(queryEmbedding) === 0) {
    logger.warn('[HybridSearch] Query embedding has zero norm');
    return [];
  }

  const results: Array<HybridSearchResult<T>> = [];

  for (const cluster of clusters) {
    const centroid = cluster.centroid;
    if (!centroid || centroid.length !== queryEmbedding.length || vectorNorm(centroid) === 0) {
      continue;
    }

    const semanticScore = cosineSimilarity(queryEmbedding, centroid);
    const lexicalScore = computeLexicalScore(queryKeywords, cluster.signals);
    const finalScore = SEARCH_WEIGHTS.semantic * semanticScore + SEARCH_WEIGHTS.lexical * lexicalScore;

    const relevant = semanticScore >= MIN_SEMANTIC_SCORE || lexicalScore >= MIN_LEXICAL_SCORE;
    if (relevant && finalScore >= minFinalScore) {
      results.push({
        ...cluster,
        semanticScore,
        lexicalScore,
        finalScore,
        clusterType: cluster.signalCount >= ACTIVE_MIN_SIGNALS ? 'Active' : 'Candidate',
      });
    }
  }

  results.sort((a, b) => b.finalScore - a.finalScore || b.signalCount - a.signalCount);

  logger.debug(`[HybridSearch] "${query}" matched ${results.length}/${clusters.length} clusters`);
  return results;
}

/**
 * Older entry point: one similarity threshold, scaled to a final-score floor.
 */
export async function searchClusters<T extends SearchableCluster>(
  query: string,
  clusters: T[],
  embedder: EmbeddingProvider,
  similarityThreshold: number = DEFAULT_LEGACY_THRESHOLD
): Promise<Array<LegacySearchResult<T>>> {
  const results = await searchClustersHybrid(query, clusters, embedder, similarityThreshold * 0.7);
  return results.map(result => ({ ...result, similarityScore: result.semanticScore }));
}
