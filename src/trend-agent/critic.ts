// Critic
// Turns evidence metrics (breadth, source diversity, coherence) into a confidence call

import { computeClusterGrounding } from './grounding';
import {
  CandidateCluster,
  ClusterAction,
  Confidence,
  CriticFlag,
  CriticReport,
} from '../shared/types';

export type EvaluableCluster = Pick<CandidateCluster, 'signals'> &
  Partial<Pick<CandidateCluster, 'signalCount' | 'coherence' | 'embeddings'>>;

export const CRITIC_THRESHOLDS = {
  veryLowCoherence: 0.30,
  weakCoherence: 0.40,
  highCoherence: 0.70,
  promoteCoherence: 0.50,
  minSignals: 3,
  strongSignals: 10,
  promoteSources: 2,
  multiSource: 3,
} as const;

function sourceOf(source: string): string {
  return source.trim() === '' ? 'unknown' : source;
}

function resolveCoherence(cluster: EvaluableCluster): number {
  if (cluster.coherence !== undefined && cluster.coherence !== 0) {
    return cluster.coherence;
  }
  if (cluster.embeddings && cluster.embeddings.length > 0) {
    return computeClusterGrounding({ embeddings: cluster.embeddings }).coherence;
  }
  return 0;
}

export function classifyConfidence(signalCount: number, coherence: number, sourceDiversity: number): Confidence {
  const t = CRITIC_THRESHOLDS;

  if (signalCount >= t.strongSignals && coherence >= t.promoteCoherence && sourceDiversity >= t.promoteSources) {
    return 'high';
  }
  if (signalCount < t.minSignals || coherence < t.veryLowCoherence) {
    return 'low';
  }
  return 'medium';
}

export function recommendAction(confidence: Confidence, signalCount: number): ClusterAction {
  switch (confidence) {
    case 'high':
      return 'promote';
    case 'medium':
      // Low counts are already classified 'low', so the demote arm here never fires
      return signalCount >= CRITIC_THRESHOLDS.minSignals ? 'keep_candidate' : 'demote_wait';
    case 'low':
      return 'demote_wait';
  }
}

export function criticFlags(signalCount: number, coherence: number, sourceDiversity: number): CriticFlag[] {
  const t = CRITIC_THRESHOLDS;
  const flags: CriticFlag[] = [];

  if (coherence < t.veryLowCoherence) {
    flags.push('very low coherence');
  } else if (coherence < t.weakCoherence) {
    flags.push('weak coherence');
  } else if (coherence >= t.highCoherence) {
    flags.push('high coherence');
  }

  if (sourceDiversity === 1) {
    flags.push('single source');
  } else if (sourceDiversity >= t.multiSource) {
    flags.push('multi-source validated');
  }

  if (signalCount < t.minSignals) {
    flags.push('insufficient evidence');
  } else if (signalCount >= t.strongSignals) {
    flags.push('strong evidence');
  }

  return flags;
}

export function evaluateCluster(cluster: EvaluableCluster): CriticReport {
  const signalCount = cluster.signalCount ?? cluster.signals.length;
  const sourceDiversity = new Set(cluster.signals.map(signal => sourceOf(signal.source))).size;
  const coherence = resolveCoherence(cluster);
  const confidence = classifyConfidence(signalCount, coherence, sourceDiversity);

  return {
    confidence,
    flags: criticFlags(signalCount, coherence, sourceDiversity),
    recommendedAction: recommendAction(confidence, signalCount),
    metrics: {
      signalCount,
      sourceDiversity,
      coherence,
    },
  };
}
