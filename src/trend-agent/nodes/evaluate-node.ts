// Evaluate Node
// Critic and controller for every candidate this cycle touched

import { ClusterEvaluation, TrendAgentState } from '../state';
import { TrendServices } from '../services';
import { evaluateCluster } from '../critic';
import { controllerDecide } from '../controller';
import logger from '../../shared/logger';

export async function evaluateNode(
  state: TrendAgentState,
  services: TrendServices
): Promise<Partial<TrendAgentState>> {
  if (state.touchedClusterIds.length === 0) {
    return { currentStep: 'EVALUATION_SKIPPED_NO_CHANGES' };
  }

  const evaluations: ClusterEvaluation[] = [];
  let promoted = 0;
  let keptAsCandidate = 0;
  let demoted = 0;

  for (const clusterId of state.touchedClusterIds) {
    const cluster = services.candidateStore.getCandidate(clusterId);
    if (!cluster) {
      logger.warn(`[EvaluateNode] Candidate ${clusterId} vanished before evaluation`);
      continue;
    }

    const criticReport = evaluateCluster(cluster);
    const controllerDecision = controllerDecide(cluster, criticReport);
    const title = await services.titleGenerator.generateTitle(
      cluster.signals.map(signal => signal.text),
      cluster.clusterId
    );

    switch (controllerDecision.finalAction) {
      case 'promote':
        promoted++;
        break;
      case 'keep_candidate':
        keptAsCandidate++;
        break;
      case 'demote_wait':
        demoted++;
        break;
    }

    logger.debug(`[EvaluateNode] ${clusterId} "${title}": ${controllerDecision.decisionTrace}`);
    evaluations.push({ clusterId, criticReport, controllerDecision, title });
  }

  logger.info(`[EvaluateNode] ${promoted} promoted, ${keptAsCandidate} kept, ${demoted} demoted`);

  return {
    currentStep: 'EVALUATED',
    evaluations,
    thoughts: [...state.thoughts, ...evaluations.map(e => `${e.title}: ${e.controllerDecision.decisionTrace}`)],
    stats: { ...state.stats, evaluated: evaluations.length, promoted, keptAsCandidate, demoted },
  };
}
