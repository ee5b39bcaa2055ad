// Trend Agent State Definition
// Shared state that flows through one clustering cycle

import { v4 as uuidv4 } from 'uuid';
import {
  ContextualizedSignal,
  ControllerDecision,
  CriticReport,
  ProtoCluster,
  Signal,
} from '../shared/types';

/**
 * Critic and controller output for one candidate touched this cycle
 */
export interface ClusterEvaluation {
  clusterId: string;
  criticReport: CriticReport;
  controllerDecision: ControllerDecision;
  title: string;
}

export interface TrendCycleStats {
  received: number;
  contextualized: number;
  embeddingFailures: number;
  protoClusters: number;
  created: number;
  merged: number;
  duplicates: number;
  evaluated: number;
  promoted: number;
  keptAsCandidate: number;
  demoted: number;
}

export interface TrendAgentState {
  cycleId: string;
  cycleStartTime: Date;
  currentStep: string;

  signals: Signal[];
  contextualized: ContextualizedSignal[];
  protoClusters: ProtoCluster[];
  /** Candidates created or grown by this cycle's evolution pass */
  touchedClusterIds: string[];
  evaluations: ClusterEvaluation[];

  thoughts: string[];
  errors: string[];
  stats: TrendCycleStats;
}

export function createInitialTrendState(signals: Signal[] = []): TrendAgentState {
  return {
    cycleId: uuidv4(),
    cycleStartTime: new Date(),
    currentStep: 'INIT',
    signals,
    contextualized: [],
    protoClusters: [],
    touchedClusterIds: [],
    evaluations: [],
    thoughts: [],
    errors: [],
    stats: {
      received: signals.length,
      contextualized: 0,
      embeddingFailures: 0,
      protoClusters: 0,
      created: 0,
      merged: 0,
      duplicates: 0,
      evaluated: 0,
      promoted: 0,
      keptAsCandidate: 0,
      demoted: 0,
    },
  };
}
