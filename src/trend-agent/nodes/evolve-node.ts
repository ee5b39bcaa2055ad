// Evolve Node
// Folds the cycle's proto-clusters into the persisted candidate pool under the run lock

import { TrendAgentState } from '../state';
import { TrendServices } from '../services';
import { EvolutionOutcome, evolveClusters } from '../cluster-evolution';
import logger from '../../shared/logger';
import { EmbeddingFailureError } from '../../shared/errors';

export async function evolveNode(
  state: TrendAgentState,
  services: TrendServices
): Promise<Partial<TrendAgentState>> {
  if (state.protoClusters.length === 0) {
    return { currentStep: 'EVOLUTION_SKIPPED_NO_PROTO_CLUSTERS' };
  }

  const store = services.candidateStore;
  const owner = state.cycleId;

  if (!store.acquireRunLock(owner, services.config.agent.runLockTtlMs)) {
    return {
      currentStep: 'EVOLUTION_SKIPPED_LOCKED',
      thoughts: [...state.thoughts, 'Another evolution pass holds the run lock'],
    };
  }

  try {
    const candidates = await store.loadAllCandidates();
    const outcomes: EvolutionOutcome[] = [];
    const reembedded = new Set<string>();
    const errors: string[] = [];

    try {
      await evolveClusters(candidates, state.protoClusters, services.embedder, {
        similarityThreshold: services.config.clustering.similarityThreshold,
        onOutcome: outcome => outcomes.push(outcome),
        onReembed: clusterId => reembedded.add(clusterId),
      });
    } catch (error) {
      if (!(error instanceof EmbeddingFailureError)) throw error;
      errors.push(`Evolution stopped after ${outcomes.length}/${state.protoClusters.length} proto-clusters: ${error.message}`);
      logger.warn(`[EvolveNode] Embedding failed mid-pass, keeping ${outcomes.length} completed merges: ${error.message}`);
    }

    const touched = new Set(outcomes.filter(o => o.kind !== 'duplicate').map(o => o.clusterId));
    // Rebuilt vectors are persisted too, or every later pass would re-embed them
    const changed = candidates.filter(candidate => touched.has(candidate.clusterId) || reembedded.has(candidate.clusterId));
    store.upsertCandidates(changed);

    const created = outcomes.filter(o => o.kind === 'created').length;
    const merged = outcomes.filter(o => o.kind === 'merged').length;
    const duplicates = outcomes.filter(o => o.kind === 'duplicate').length;

    logger.info(
      `[EvolveNode] ${created} created, ${merged} merged, ${duplicates} duplicate-only ` +
      `(pool: ${candidates.length} candidates, ${reembedded.size} re-embedded)`
    );

    return {
      currentStep: errors.length > 0 ? 'EVOLUTION_PARTIAL' : 'EVOLVED',
      touchedClusterIds: [...touched],
      errors: [...state.errors, ...errors],
      thoughts: [...state.thoughts, `Evolution: ${created} new, ${merged} grown, ${duplicates} already known`],
      stats: { ...state.stats, created, merged, duplicates },
    };
  } finally {
    store.releaseRunLock(owner);
  }
}
