// Core Types for trendwatch
// Signals, clusters, evaluation results and configuration

export type EmbeddingVector = number[];

export interface Signal {
  signalId: string;
  text: string;
  timestamp: Date;
  source: string;
  domain: string;
  subdomain: string;
  metadata: Record<string, unknown>;
}

export interface ContextualizedSignal {
  signal: Signal;
  similarSignals: Signal[];
}

export interface ProtoCluster {
  clusterId: string;
  signals: Signal[];
  signalCount: number;
  createdAt: Date;
}

export type Confidence = 'high' | 'medium' | 'low';

export type ClusterAction = 'promote' | 'keep_candidate' | 'demote_wait';

export type ClusterStatus = 'candidate' | 'promoted' | 'demoted';

// 'low coherence' is never emitted by the critic but is honoured by the controller
export type CriticFlag =
  | 'very low coherence'
  | 'weak coherence'
  | 'low coherence'
  | 'high coherence'
  | 'single source'
  | 'multi-source validated'
  | 'insufficient evidence'
  | 'strong evidence';

export interface CriticMetrics {
  signalCount: number;
  sourceDiversity: number;
  coherence: number;
}

export interface CriticReport {
  confidence: Confidence;
  flags: CriticFlag[];
  recommendedAction: ClusterAction;
  metrics: CriticMetrics;
}

export interface ControllerDecision {
  finalAction: ClusterAction;
  decisionTrace: string;
  confidence: Confidence;
  flags: CriticFlag[];
}

export interface CandidateCluster {
  clusterId: string;
  signals: Signal[];
  embeddings: EmbeddingVector[];
  centroid: EmbeddingVector;
  signalCount: number;
  createdAt: Date;
  lastUpdated: Date;
  growthRatio: number;
  coherence?: number;
  status?: ClusterStatus;
  title?: string;
  criticReport?: CriticReport;
  controllerDecision?: ControllerDecision;
}

export interface Config {
  app: {
    name: string;
    version: string;
    environment: 'development' | 'production' | 'test';
    logLevel: 'debug' | 'info' | 'warn' | 'error';
  };
  clustering: {
    similarityThreshold: number;
    embeddingDim: number;
    neighborLimit: number;
    neighborMaxDistance: number;
  };
  search: {
    minFinalScore: number;
  };
  openrouter: {
    apiKey: string;
    baseUrl: string;
    embeddingModel: string;
    labelingModel: string;
    timeout: number;
    maxRetries: number;
  };
  database: {
    candidatesPath: string;
  };
  chroma: {
    enabled: boolean;
    host: string;
    port: number;
    collection: string;
  };
  redis: {
    enabled: boolean;
    host: string;
    port: number;
    password?: string;
    db: number;
    prefix: string;
  };
  titles: {
    cachePath: string;
  };
  agent: {
    cycleIntervalMs: number;
    signalsPath: string;
    runLockTtlMs: number;
    runOnce: boolean;
  };
}
