// Candidate Store - SQLite
// Persists the candidate cluster pool, evaluation results and the evolution run lock

import BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import configManager from '../shared/config';
import logger from '../shared/logger';
import { errorMessage } from '../shared/errors';
import { signalFromRecord, signalToRecord } from '../ingestion/signal';
import { statusForAction } from '../trend-agent/controller';
import {
  CandidateCluster,
  ClusterStatus,
  ControllerDecision,
  CriticReport,
} from '../shared/types';

const CRITIC_FLAGS = [
  'very low coherence',
  'weak coherence',
  'low coherence',
  'high coherence',
  'single source',
  'multi-source validated',
  'insufficient evidence',
  'strong evidence',
] as const;

const ConfidenceSchema = z.enum(['high', 'medium', 'low']);
const ActionSchema = z.enum(['promote', 'keep_candidate', 'demote_wait']);
const StatusSchema = z.enum(['candidate', 'promoted', 'demoted']);
const FlagsSchema = z.array(z.enum(CRITIC_FLAGS));

const CriticReportSchema = z.object({
  confidence: ConfidenceSchema,
  flags: FlagsSchema,
  recommendedAction: ActionSchema,
  metrics: z.object({
    signalCount: z.number(),
    sourceDiversity: z.number(),
    coherence: z.number(),
  }),
});

const ControllerDecisionSchema = z.object({
  finalAction: ActionSchema,
  decisionTrace: z.string(),
  confidence: ConfidenceSchema,
  flags: FlagsSchema,
});

const VectorSchema = z.array(z.number());
const VectorListSchema = z.array(VectorSchema);
const SignalListSchema = z.array(z.unknown());

export const RUN_LOCK_EVOLUTION = 'evolution';

interface CandidateRow {
  cluster_id: string;
  signals: string;
  embeddings: string;
  centroid: string;
  signal_count: number;
  created_at: string;
  last_updated: string;
  growth_ratio: number;
  coherence: number | null;
  status: string;
  title: string | null;
  critic_report: string | null;
  controller_decision: string | null;
}

interface CandidateParams {
  clusterId: string;
  signals: string;
  embeddings: string;
  centroid: string;
  signalCount: number;
  memberSignalIds: string;
  createdAt: string;
  lastUpdated: string;
  growthRatio: number;
  coherence: number | null;
  status: ClusterStatus;
  title: string | null;
  criticReport: string | null;
  controllerDecision: string | null;
}

interface RunLockRow {
  owner: string;
  expires_at: number;
}

export interface CandidatePage {
  candidates: CandidateCluster[];
  nextOffset: number | null;
}

export interface EvaluationUpdate {
  criticReport: CriticReport;
  controllerDecision: ControllerDecision;
  title?: string;
}

export interface CandidateStoreStats {
  total: number;
  byStatus: Record<ClusterStatus, number>;
}

function parseJson<T>(schema: z.ZodType<T>, text: string, column: string): T {
  const result = schema.safeParse(JSON.parse(text));
  if (!result.success) {
    throw new Error(`column ${column}: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

export class CandidateStore {
  private db: BetterSqlite3.Database | null = null;
  private initialized = false;

  constructor(
    private readonly dbPath: string = configManager.getSection('database').candidatesPath,
    private readonly clock: () => number = Date.now
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      if (this.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      this.db = new BetterSqlite3(this.dbPath);
      this.db.pragma('journal_mode = WAL');

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS candidate_clusters (
          cluster_id TEXT PRIMARY KEY,
          signals TEXT NOT NULL,
          embeddings TEXT NOT NULL,
          centroid TEXT NOT NULL,
          signal_count INTEGER NOT NULL,
          member_signal_ids TEXT NOT NULL,
          created_at TEXT NOT NULL,
          last_updated TEXT NOT NULL,
          growth_ratio REAL DEFAULT 1.0,
          coherence REAL,
          status TEXT DEFAULT 'candidate',
          title TEXT,
          critic_report TEXT,
          controller_decision TEXT,
          evaluated_at TEXT
        )
      `);

      this.db.exec(`
        CREATE INDEX IF NOT EXISTS idx_candidates_status
        ON candidate_clusters(status)
      `);

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS run_locks (
          name TEXT PRIMARY KEY,
          owner TEXT NOT NULL,
          acquired_at TEXT NOT NULL,
          expires_at INTEGER NOT NULL
        )
      `);

      this.initialized = true;
      logger.info(`[CandidateStore] Initialized at ${this.dbPath}`);
    } catch (error) {
      logger.error('[CandidateStore] Initialization failed:', error);
      this.db = null;
      throw error;
    }
  }

  private requireDb(): BetterSqlite3.Database {
    if (!this.db) {
      throw new Error('[CandidateStore] Not initialized; call initialize() first');
    }
    return this.db;
  }

  private toParams(candidate: CandidateCluster): CandidateParams {
    const status = candidate.status
      ?? (candidate.controllerDecision ? statusForAction(candidate.controllerDecision.finalAction) : 'candidate');

    return {
      clusterId: candidate.clusterId,
      signals: JSON.stringify(candidate.signals.map(signalToRecord)),
      embeddings: JSON.stringify(candidate.embeddings),
      centroid: JSON.stringify(candidate.centroid),
      signalCount: candidate.signalCount,
      memberSignalIds: JSON.stringify(candidate.signals.map(signal => signal.signalId)),
      createdAt: candidate.createdAt.toISOString(),
      lastUpdated: candidate.lastUpdated.toISOString(),
      growthRatio: candidate.growthRatio,
      coherence: candidate.coherence ?? null,
      status,
      title: candidate.title ?? null,
      criticReport: candidate.criticReport ? JSON.stringify(candidate.criticReport) : null,
      controllerDecision: candidate.controllerDecision ? JSON.stringify(candidate.controllerDecision) : null,
    };
  }

  private rowToCandidate(row: CandidateRow): CandidateCluster {
    const signals = parseJson(SignalListSchema, row.signals, 'signals').map(record => signalFromRecord(record));
    const candidate: CandidateCluster = {
      clusterId: row.cluster_id,
      signals,
      embeddings: parseJson(VectorListSchema, row.embeddings, 'embeddings'),
      centroid: parseJson(VectorSchema, row.centroid, 'centroid'),
      signalCount: row.signal_count,
      createdAt: new Date(row.created_at),
      lastUpdated: new Date(row.last_updated),
      growthRatio: row.growth_ratio,
      status: StatusSchema.catch('candidate').parse(row.status),
    };

    if (row.coherence !== null) candidate.coherence = row.coherence;
    if (row.title !== null) candidate.title = row.title;
    if (row.critic_report !== null) {
      candidate.criticReport = parseJson(CriticReportSchema, row.critic_report, 'critic_report');
    }
    if (row.controller_decision !== null) {
      candidate.controllerDecision = parseJson(ControllerDecisionSchema, row.controller_decision, 'controller_decision');
    }
    return candidate;
  }

  private mapRows(rows: CandidateRow[]): CandidateCluster[] {
    const candidates: CandidateCluster[] = [];
    for (const row of rows) {
      try {
        candidates.push(this.rowToCandidate(row));
      } catch (error) {
        logger.warn(`[CandidateStore] Skipping unreadable candidate ${row.cluster_id}: ${errorMessage(error)}`);
      }
    }
    return candidates;
  }

  upsertCandidate(candidate: CandidateCluster): void {
    const db = this.requireDb();
    db.prepare<CandidateParams>(`
      INSERT INTO candidate_clusters (
        cluster_id, signals, embeddings, centroid, signal_count, member_signal_ids,
        created_at, last_updated, growth_ratio, coherence, status, title,
        critic_report, controller_decision
      ) VALUES (
        @clusterId, @signals, @embeddings, @centroid, @signalCount, @memberSignalIds,
        @createdAt, @lastUpdated, @growthRatio, @coherence, @status, @title,
        @criticReport, @controllerDecision
      )
      ON CONFLICT(cluster_id) DO UPDATE SET
        signals = excluded.signals,
        embeddings = excluded.embeddings,
        centroid = excluded.centroid,
        signal_count = excluded.signal_count,
        member_signal_ids = excluded.member_signal_ids,
        last_updated = excluded.last_updated,
        growth_ratio = excluded.growth_ratio,
        coherence = excluded.coherence,
        status = excluded.status,
        title = COALESCE(excluded.title, candidate_clusters.title),
        critic_report = COALESCE(excluded.critic_report, candidate_clusters.critic_report),
        controller_decision = COALESCE(excluded.controller_decision, candidate_clusters.controller_decision)
    `).run(this.toParams(candidate));
  }

  /**
   * All-or-nothing write of several candidates.
   */
  upsertCandidates(candidates: CandidateCluster[]): number {
    if (candidates.length === 0) return 0;
    const db = this.requireDb();

    const writeAll = db.transaction((batch: CandidateCluster[]) => {
      for (const candidate of batch) {
        this.upsertCandidate(candidate);
      }
    });
    writeAll(candidates);

    logger.debug(`[CandidateStore] Upserted ${candidates.length} candidates`);
    return candidates.length;
  }

  getCandidate(clusterId: string): CandidateCluster | null {
    const row = this.requireDb()
      .prepare<[string], CandidateRow>('SELECT * FROM candidate_clusters WHERE cluster_id = ?')
      .get(clusterId);
    if (!row) return null;
    return this.mapRows([row])[0] ?? null;
  }

  /**
   * Pages follow insertion order, which is also the evolution scan order.
   */
  listCandidatesPage(limit: number, offset: number = 0): CandidatePage {
    const rows = this.requireDb()
      .prepare<[number, number], CandidateRow>('SELECT * FROM candidate_clusters ORDER BY rowid ASC LIMIT ? OFFSET ?')
      .all(limit, offset);

    return {
      candidates: this.mapRows(rows),
      nextOffset: rows.length === limit ? offset + limit : null,
    };
  }

  async loadAllCandidates(pageSize: number = 100): Promise<CandidateCluster[]> {
    const all: CandidateCluster[] = [];
    let offset: number | null = 0;

    while (offset !== null) {
      const page = this.listCandidatesPage(pageSize, offset);
      all.push(...page.candidates);
      offset = page.nextOffset;
    }

    return all;
  }

  countCandidates(): number {
    const row = this.requireDb()
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM candidate_clusters')
      .get();
    return row?.count ?? 0;
  }

  updateEvaluation(clusterId: string, update: EvaluationUpdate): boolean {
    const result = this.requireDb()
      .prepare<{
        clusterId: string;
        criticReport: string;
        controllerDecision: string;
        status: ClusterStatus;
        coherence: number;
        title: string | null;
        evaluatedAt: string;
      }>(`
        UPDATE candidate_clusters SET
          critic_report = @criticReport,
          controller_decision = @controllerDecision,
          status = @status,
          coherence = @coherence,
          title = COALESCE(@title, title),
          evaluated_at = @evaluatedAt
        WHERE cluster_id = @clusterId
      `)
      .run({
        clusterId,
        criticReport: JSON.stringify(update.criticReport),
        controllerDecision: JSON.stringify(update.controllerDecision),
        status: statusForAction(update.controllerDecision.finalAction),
        coherence: update.criticReport.metrics.coherence,
        title: update.title ?? null,
        evaluatedAt: new Date(this.clock()).toISOString(),
      });

    return result.changes > 0;
  }

  getStats(): CandidateStoreStats {
    const rows = this.requireDb()
      .prepare<[], { status: string; count: number }>(
        'SELECT status, COUNT(*) AS count FROM candidate_clusters GROUP BY status'
      )
      .all();

    const byStatus: Record<ClusterStatus, number> = { candidate: 0, promoted: 0, demoted: 0 };
    let total = 0;
    for (const row of rows) {
      const status = StatusSchema.safeParse(row.status);
      if (status.success) {
        byStatus[status.data] += row.count;
      }
      total += row.count;
    }
    return { total, byStatus };
  }

  /**
   * Takes the named lock for `owner` unless another owner holds an
   * unexpired one. Re-acquiring by the same owner extends the lease.
   */
  acquireRunLock(owner: string, ttlMs: number, name: string = RUN_LOCK_EVOLUTION): boolean {
    const db = this.requireDb();
    const now = this.clock();

    const tryAcquire = db.transaction((): boolean => {
      const current = db
        .prepare<[string], RunLockRow>('SELECT owner, expires_at FROM run_locks WHERE name = ?')
        .get(name);

      if (current && current.owner !== owner && current.expires_at > now) {
        return false;
      }

      db.prepare<[string, string, string, number]>(`
        INSERT INTO run_locks (name, owner, acquired_at, expires_at) VALUES (?, ?, ?, ?)
        ON CONFLICT(name) DO UPDATE SET
          owner = excluded.owner,
          acquired_at = excluded.acquired_at,
          expires_at = excluded.expires_at
      `).run(name, owner, new Date(now).toISOString(), now + ttlMs);
      return true;
    });

    const acquired = tryAcquire.immediate();
    if (!acquired) {
      logger.warn(`[CandidateStore] Run lock "${name}" is held by another owner`);
    }
    return acquired;
  }

  releaseRunLock(owner: string, name: string = RUN_LOCK_EVOLUTION): boolean {
    const result = this.requireDb()
      .prepare<[string, string]>('DELETE FROM run_locks WHERE name = ? AND owner = ?')
      .run(name, owner);
    return result.changes > 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.initialized = false;
      logger.info('[CandidateStore] Closed');
    }
  }
}
