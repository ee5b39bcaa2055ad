// Controller
// Maps a critic report to a lifecycle action with a readable decision trace

import {
  CandidateCluster,
  ClusterAction,
  ClusterStatus,
  ControllerDecision,
  CriticFlag,
  CriticReport,
} from '../shared/types';

const COHERENCE_FLAGS: readonly CriticFlag[] = ['very low coherence', 'weak coherence', 'low coherence'];

function blockingIssue(report: CriticReport): string {
  const { flags, metrics } = report;

  if (flags.some(flag => COHERENCE_FLAGS.includes(flag))) {
    return `coherence ${metrics.coherence.toFixed(2)} too low`;
  }
  if (flags.includes('single source')) {
    return 'single source only';
  }
  if (flags.includes('insufficient evidence')) {
    return `only ${metrics.signalCount} signals`;
  }
  return 'waiting for future evidence';
}

/**
 * Pure and idempotent: the same report always yields the same decision.
 * The cluster is accepted for callers that pass it along, but the
 * decision depends on the report alone.
 */
export function controllerDecide(_cluster: Partial<CandidateCluster>, report: CriticReport): ControllerDecision {
  const { confidence, flags, metrics } = report;
  let finalAction: ClusterAction;
  let decisionTrace: string;

  switch (confidence) {
    case 'high':
      finalAction = 'promote';
      decisionTrace =
        `High confidence → Promoted to active (${metrics.signalCount} signals, ` +
        `${metrics.sourceDiversity} sources, coherence ${metrics.coherence.toFixed(2)})`;
      break;
    case 'medium':
      finalAction = 'keep_candidate';
      decisionTrace = flags.includes('insufficient evidence')
        ? `Medium confidence → Kept as candidate (only ${metrics.signalCount} signals, waiting for more)`
        : 'Medium confidence → Kept as candidate (tracking for future promotion)';
      break;
    case 'low':
      finalAction = 'demote_wait';
      decisionTrace = `Low confidence → Demoted to wait state (${blockingIssue(report)})`;
      break;
  }

  return {
    finalAction,
    decisionTrace,
    confidence,
    flags: [...flags],
  };
}

export function statusForAction(action: ClusterAction): ClusterStatus {
  switch (action) {
    case 'promote':
      return 'promoted';
    case 'keep_candidate':
      return 'candidate';
    case 'demote_wait':
      return 'demoted';
  }
}
