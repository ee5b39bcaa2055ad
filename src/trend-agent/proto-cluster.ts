// Proto-Cluster Builder
// One signal plus its semantic neighbours becomes a unit of evidence

import { v4 as uuidv4 } from 'uuid';
import { ContextualizedSignal, ProtoCluster } from '../shared/types';

export function createProtoCluster(contextualized: ContextualizedSignal, now: Date = new Date()): ProtoCluster {
  const signals = [contextualized.signal, ...contextualized.similarSignals];

  return {
    clusterId: uuidv4(),
    signals,
    signalCount: signals.length,
    createdAt: now,
  };
}
