// Proto-Cluster Node
// One proto-cluster per contextualized signal

import { TrendAgentState } from '../state';
import { createProtoCluster } from '../proto-cluster';
import logger from '../../shared/logger';

export async function protoClusterNode(state: TrendAgentState): Promise<Partial<TrendAgentState>> {
  const protoClusters = state.contextualized.map(item => createProtoCluster(item));

  logger.info(`[ProtoClusterNode] Built ${protoClusters.length} proto-clusters`);

  return {
    currentStep: 'PROTO_CLUSTERS_BUILT',
    protoClusters,
    thoughts: [...state.thoughts, `Built ${protoClusters.length} proto-clusters`],
    stats: { ...state.stats, protoClusters: protoClusters.length },
  };
}
