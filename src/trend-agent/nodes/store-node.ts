// Store Node
// Persists evaluation results and flushes the title cache

import { TrendAgentState } from '../state';
import { TrendServices } from '../services';
import logger from '../../shared/logger';

export async function storeNode(
  state: TrendAgentState,
  services: TrendServices
): Promise<Partial<TrendAgentState>> {
  let stored = 0;

  for (const evaluation of state.evaluations) {
    const updated = services.candidateStore.updateEvaluation(evaluation.clusterId, {
      criticReport: evaluation.criticReport,
      controllerDecision: evaluation.controllerDecision,
      title: evaluation.title,
    });
    if (updated) stored++;
  }

  services.titleCache.flush();

  const stats = services.candidateStore.getStats();
  logger.info(
    `[StoreNode] Stored ${stored} evaluations; pool has ${stats.total} clusters ` +
    `(${stats.byStatus.promoted} promoted, ${stats.byStatus.candidate} candidate, ${stats.byStatus.demoted} demoted)`
  );

  return {
    currentStep: 'STORED',
    thoughts: [...state.thoughts, `Stored ${stored} evaluations`],
  };
}
