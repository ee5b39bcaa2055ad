// Contextualize Node
// Embeds each incoming signal, finds its nearest known signals, then indexes it

import { TrendAgentState } from '../state';
import { TrendServices } from '../services';
import logger from '../../shared/logger';
import { EmbeddingFailureError } from '../../shared/errors';
import { ContextualizedSignal, EmbeddingVector } from '../../shared/types';

export async function contextualizeNode(
  state: TrendAgentState,
  services: TrendServices
): Promise<Partial<TrendAgentState>> {
  if (state.signals.length === 0) {
    return { currentStep: 'CONTEXTUALIZE_SKIPPED_NO_SIGNALS' };
  }

  const { neighborLimit, neighborMaxDistance } = services.config.clustering;
  const contextualized: ContextualizedSignal[] = [];
  const errors: string[] = [];
  const seen = new Set<string>();
  let embeddingFailures = 0;

  for (const signal of state.signals) {
    if (seen.has(signal.signalId)) {
      logger.debug(`[ContextualizeNode] Skipping repeated signal ${signal.signalId}`);
      continue;
    }
    seen.add(signal.signalId);

    let embedding: EmbeddingVector;
    try {
      embedding = await services.embedder.embed(signal.text);
    } catch (error) {
      if (!(error instanceof EmbeddingFailureError)) throw error;
      embeddingFailures++;
      errors.push(`Embedding failed for ${signal.signalId}: ${error.message}`);
      logger.warn(`[ContextualizeNode] Embedding failed for ${signal.signalId}: ${error.message}`);
      continue;
    }

    const neighbors = await services.signalIndex.findSimilar(embedding, {
      limit: neighborLimit,
      maxDistance: neighborMaxDistance,
      excludeIds: [signal.signalId],
    });

    contextualized.push({ signal, similarSignals: neighbors.map(neighbor => neighbor.signal) });
    await services.signalIndex.indexSignal(signal, embedding);
  }

  logger.info(
    `[ContextualizeNode] Contextualized ${contextualized.length}/${state.signals.length} signals ` +
    `via ${services.signalIndex.name} index`
  );

  return {
    currentStep: 'CONTEXTUALIZED',
    contextualized,
    errors: [...state.errors, ...errors],
    thoughts: [
      ...state.thoughts,
      `Contextualized ${contextualized.length} signals (${embeddingFailures} embedding failures)`,
    ],
    stats: {
      ...state.stats,
      contextualized: contextualized.length,
      embeddingFailures: state.stats.embeddingFailures + embeddingFailures,
    },
  };
}
