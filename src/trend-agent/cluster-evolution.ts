// Cluster Evolution Engine
// Merges proto-clusters into the candidate pool by centroid similarity

import { v4 as uuidv4 } from 'uuid';
import logger from '../shared/logger';
import { InvalidInputError } from '../shared/errors';
import { EmbeddingProvider } from '../shared/embedding-provider';
import { computeCentroid, cosineSimilarity, vectorNorm } from '../shared/similarity';
import { CandidateCluster, EmbeddingVector, ProtoCluster, Signal } from '../shared/types';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.70;

export type EvolutionOutcomeKind = 'created' | 'merged' | 'duplicate';

export interface EvolutionOutcome {
  protoClusterId: string;
  clusterId: string;
  kind: EvolutionOutcomeKind;
  addedSignals: number;
  /** Centroid similarity of the accepted match; null for a new candidate. */
  similarity: number | null;
}

export interface EvolveOptions {
  similarityThreshold?: number;
  now?: () => Date;
  onOutcome?: (outcome: EvolutionOutcome) => void;
  /** Called for each existing candidate whose vectors were rebuilt. */
  onReembed?: (clusterId: string) => void;
}

interface CandidateMatch {
  candidate: CandidateCluster;
  similarity: number;
}

async function embedSignals(signals: Signal[], embedder: EmbeddingProvider): Promise<EmbeddingVector[]> {
  const embeddings: EmbeddingVector[] = [];
  for (const signal of signals) {
    embeddings.push(await embedder.embed(signal.text));
  }
  return embeddings;
}

export function dedupeSignals(signals: Signal[]): Signal[] {
  const seen = new Set<string>();
  const unique: Signal[] = [];
  for (const signal of signals) {
    if (!seen.has(signal.signalId)) {
      seen.add(signal.signalId);
      unique.push(signal);
    }
  }
  return unique;
}

/**
 * Embeddings are append-only once computed: a candidate whose embeddings
 * line up with its signals and that carries a centroid is left alone.
 * Anything else is re-embedded in full. Returns true when it re-embedded.
 */
export async function ensureCandidateEmbeddings(
  candidate: CandidateCluster,
  embedder: EmbeddingProvider
): Promise<boolean> {
  if (candidate.signals.length === 0) {
    throw new InvalidInputError(`Candidate ${candidate.clusterId} has no signals`);
  }

  if (candidate.embeddings.length === candidate.signals.length && candidate.centroid.length > 0) {
    return false;
  }

  const embeddings = await embedSignals(candidate.signals, embedder);
  candidate.embeddings = embeddings;
  candidate.centroid = computeCentroid(embeddings);
  candidate.signalCount = candidate.signals.length;
  logger.debug(`[ClusterEvolution] Re-embedded candidate ${candidate.clusterId} (${embeddings.length} signals)`);
  return true;
}

function findFirstMatch(
  candidates: CandidateCluster[],
  centroid: EmbeddingVector,
  threshold: number
): CandidateMatch | null {
  for (const candidate of candidates) {
    if (vectorNorm(candidate.centroid) === 0) {
      continue;
    }
    const similarity = cosineSimilarity(centroid, candidate.centroid);
    if (similarity >= threshold) {
      return { candidate, similarity };
    }
  }
  return null;
}

/**
 * Fold a batch of proto-clusters into the candidate pool.
 *
 * Each proto-cluster, in order, joins the first candidate (in pool order)
 * whose centroid is within `similarityThreshold` cosine similarity, or
 * seeds a new candidate at the end of the pool. Later proto-clusters can
 * match candidates created earlier in the same batch.
 *
 * The pool is updated in place and returned. If the provider fails, the
 * error propagates; work already merged stays in `existingCandidates` and
 * the proto-cluster being processed leaves the pool untouched.
 */
export async function evolveClusters(
  existingCandidates: CandidateCluster[],
  newProtoClusters: ProtoCluster[],
  embedder: EmbeddingProvider,
  options: EvolveOptions = {}
): Promise<CandidateCluster[]> {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const now = options.now ?? (() => new Date());

  for (const candidate of existingCandidates) {
    if (await ensureCandidateEmbeddings(candidate, embedder)) {
      options.onReembed?.(candidate.clusterId);
    }
  }

  for (const proto of newProtoClusters) {
    const signals = dedupeSignals(proto.signals);
    if (signals.length === 0) {
      logger.warn(`[ClusterEvolution] Skipping empty proto-cluster ${proto.clusterId}`);
      continue;
    }

    // Everything that can fail happens before the pool is touched
    const embeddings = await embedSignals(signals, embedder);
    const protoCentroid = computeCentroid(embeddings);
    const match = findFirstMatch(existingCandidates, protoCentroid, threshold);

    if (!match) {
      const createdAt = now();
      const candidate: CandidateCluster = {
        clusterId: uuidv4(),
        signals,
        embeddings,
        centroid: protoCentroid,
        signalCount: signals.length,
        createdAt,
        lastUpdated: createdAt,
        growthRatio: 1.0,
      };
      existingCandidates.push(candidate);
      options.onOutcome?.({
        protoClusterId: proto.clusterId,
        clusterId: candidate.clusterId,
        kind: 'created',
        addedSignals: signals.length,
        similarity: null,
      });
      continue;
    }

    const { candidate, similarity } = match;
    const known = new Set(candidate.signals.map(signal => signal.signalId));
    const freshSignals: Signal[] = [];
    const freshEmbeddings: EmbeddingVector[] = [];
    signals.forEach((signal, index) => {
      if (!known.has(signal.signalId)) {
        freshSignals.push(signal);
        freshEmbeddings.push(embeddings[index]);
      }
    });

    if (freshSignals.length === 0) {
      options.onOutcome?.({
        protoClusterId: proto.clusterId,
        clusterId: candidate.clusterId,
        kind: 'duplicate',
        addedSignals: 0,
        similarity,
      });
      continue;
    }

    const before = candidate.signals.length;
    candidate.signals = [...candidate.signals, ...freshSignals];
    candidate.embeddings = [...candidate.embeddings, ...freshEmbeddings];
    candidate.centroid = computeCentroid(candidate.embeddings);
    candidate.signalCount = candidate.signals.length;
    candidate.lastUpdated = now();
    candidate.growthRatio = candidate.signalCount / before;
    // Cached coherence describes the old membership
    candidate.coherence = undefined;

    options.onOutcome?.({
      protoClusterId: proto.clusterId,
      clusterId: candidate.clusterId,
      kind: 'merged',
      addedSignals: freshSignals.length,
      similarity,
    });
  }

  return existingCandidates;
}
