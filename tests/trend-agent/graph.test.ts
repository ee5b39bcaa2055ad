/**
 * Trend Orchestrator Integration Tests
 * Full cycles over in-memory collaborators: SQLite in memory, brute-force signal index, fixed vectors
 */

import os from 'os';
import path from 'path';
import { TrendOrchestrator, createInitialTrendState, runTrendCycle } from '../../src/trend-agent/graph';
import { TrendServices } from '../../src/trend-agent/services';
import { TitleGenerator } from '../../src/trend-agent/title-generator';
import { CandidateStore } from '../../src/data/candidate-store';
import { InMemorySignalIndex } from '../../src/data/memory-signal-index';
import { TitleCache } from '../../src/data/title-cache';
import { CircuitBreakerSystem } from '../../src/shared/circuit-breaker';
import { Signal } from '../../src/shared/types';
import { FixedEmbeddingProvider, makeCandidate, makeSignal } from '../helpers/fixtures';

jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

const VECTORS: Record<string, number[]> = {
    east: [1, 0],
    'east again': [1, 0],
    north: [0, 1],
};

const SOURCES = ['energy_wire', 'regulatory_filing', 'market_research'];

function batteryBatch(): { signals: Signal[]; vectors: Record<string, number[]> } {
    const signals: Signal[] = [];
    const vectors: Record<string, number[]> = {};
    for (let i = 1; i <= 10; i++) {
        const text = `Battery storage report ${i}`;
        vectors[text] = [1, 0];
        signals.push(makeSignal(`bat_${i}`, text, { source: SOURCES[i % SOURCES.length] }));
    }
    return { signals, vectors };
}

describe('TrendOrchestrator', () => {
    let store: CandidateStore;
    let breakers: CircuitBreakerSystem;

    async function buildServices(vectors: Record<string, number[]> = VECTORS): Promise<TrendServices> {
        store = new CandidateStore(':memory:');
        await store.initialize();
        const titleCache = new TitleCache(path.join(os.tmpdir(), 'trendwatch-graph-test', 'titles.json'));

        return {
            config: {
                clustering: { similarityThreshold: 0.70, embeddingDim: 2, neighborLimit: 5, neighborMaxDistance: 0.45 },
                search: { minFinalScore: 0.35 },
                agent: { cycleIntervalMs: 1000, signalsPath: 'unused.json', runLockTtlMs: 60000, runOnce: true },
            },
            embedder: new FixedEmbeddingProvider(vectors),
            signalIndex: new InMemorySignalIndex(),
            candidateStore: store,
            titleCache,
            titleGenerator: new TitleGenerator(titleCache),
        };
    }

    const s1 = makeSignal('s1', 'east');
    const s2 = makeSignal('s2', 'east again');
    const s3 = makeSignal('s3', 'north');

    beforeEach(() => {
        breakers = new CircuitBreakerSystem();
    });

    afterEach(() => {
        store.close();
    });

    it('should run a full cycle and persist the evolved pool', async () => {
        const orchestrator = new TrendOrchestrator(await buildServices(), breakers);

        const result = await orchestrator.invoke(createInitialTrendState([s1, s2, s3]));

        expect(result.currentStep).toBe('STORED');
        expect(result.errors).toEqual([]);
        expect(result.stats).toEqual({
            received: 3,
            contextualized: 3,
            embeddingFailures: 0,
            protoClusters: 3,
            created: 2,
            merged: 1,
            duplicates: 0,
            evaluated: 2,
            promoted: 0,
            keptAsCandidate: 0,
            demoted: 2,
        });

        const pool = await store.loadAllCandidates();
        expect(pool.map(candidate => candidate.signals.map(signal => signal.signalId))).toEqual([['s1', 's2'], ['s3']]);
        expect(pool.every(candidate => candidate.status === 'demoted')).toBe(true);
        expect(pool[0].controllerDecision?.decisionTrace)
            .toBe('Low confidence → Demoted to wait state (single source only)');
        expect(orchestrator.getHealthStatus().status).toBe('HEALTHY');
    });

    it('should report nothing changed when the same batch arrives again', async () => {
        const orchestrator = new TrendOrchestrator(await buildServices(), breakers);

        await orchestrator.invoke(createInitialTrendState([s1, s2, s3]));
        const second = await orchestrator.invoke(createInitialTrendState([s1, s2, s3]));

        expect(second.currentStep).toBe('NO_CLUSTERS_CHANGED');
        expect(second.stats.duplicates).toBe(3);
        expect(store.countCandidates()).toBe(2);
    });

    it('should promote a broad, coherent, multi-source cluster', async () => {
        const { signals, vectors } = batteryBatch();
        const orchestrator = new TrendOrchestrator(await buildServices(vectors), breakers);

        const result = await orchestrator.invoke(createInitialTrendState(signals));

        expect(result.stats.created).toBe(1);
        expect(result.stats.merged).toBe(9);
        expect(result.evaluations).toHaveLength(1);
        expect(result.evaluations[0].title).toBe('Battery');
        expect(result.evaluations[0].controllerDecision.decisionTrace)
            .toBe('High confidence → Promoted to active (10 signals, 3 sources, coherence 1.00)');
        expect(store.getStats()).toEqual({ total: 1, byStatus: { candidate: 0, promoted: 1, demoted: 0 } });
    });

    describe('early exits', () => {

        it('should end without signals', async () => {
            const orchestrator = new TrendOrchestrator(await buildServices(), breakers);
            const result = await orchestrator.invoke(createInitialTrendState([]));

            expect(result.currentStep).toBe('NO_SIGNALS');
        });

        it('should end when no signal can be embedded', async () => {
            const orchestrator = new TrendOrchestrator(await buildServices(), breakers);
            const result = await orchestrator.invoke(createInitialTrendState([makeSignal('x1', 'mystery')]));

            expect(result.currentStep).toBe('NO_SIGNALS_CONTEXTUALIZED');
            expect(result.stats.embeddingFailures).toBe(1);
            expect(result.errors).toEqual(['Embedding failed for x1: No vector for "mystery"']);
        });

        it('should cluster the signals that could be embedded', async () => {
            const orchestrator = new TrendOrchestrator(await buildServices(), breakers);
            const result = await orchestrator.invoke(createInitialTrendState([s1, makeSignal('x1', 'mystery')]));

            expect(result.currentStep).toBe('STORED');
            expect(result.stats.contextualized).toBe(1);
            expect(result.stats.created).toBe(1);
        });

        it('should skip evolution while another owner holds the run lock', async () => {
            const orchestrator = new TrendOrchestrator(await buildServices(), breakers);
            store.acquireRunLock('other-worker', 60000);

            const result = await orchestrator.invoke(createInitialTrendState([s1]));

            expect(result.currentStep).toBe('EVOLUTION_SKIPPED_LOCKED');
            expect(store.countCandidates()).toBe(0);
        });

        it('should keep going after a failed embedding during evolution and release the lock', async () => {
            const orchestrator = new TrendOrchestrator(await buildServices(), breakers);
            store.upsertCandidate(makeCandidate('stale', [makeSignal('old', 'forgotten text')], [], []));

            const result = await orchestrator.invoke(createInitialTrendState([s1]));

            expect(result.currentStep).toBe('NO_CLUSTERS_CHANGED');
            expect(result.errors).toEqual([
                'Evolution stopped after 0/1 proto-clusters: No vector for "forgotten text"',
            ]);
            expect(store.acquireRunLock('next-worker', 60000)).toBe(true);
        });

        it('should persist candidates whose vectors were rebuilt during evolution', async () => {
            const orchestrator = new TrendOrchestrator(await buildServices(), breakers);
            store.upsertCandidate(makeCandidate('stale', [makeSignal('old', 'north')], [], []));

            const result = await orchestrator.invoke(createInitialTrendState([s1]));

            expect(result.currentStep).toBe('STORED');
            expect(result.touchedClusterIds).not.toContain('stale');
            const stale = store.getCandidate('stale');
            expect(stale?.embeddings).toEqual([[0, 1]]);
            expect(stale?.centroid).toEqual([0, 1]);
        });

        it('should skip the cycle while the execution breaker is open', async () => {
            const orchestrator = new TrendOrchestrator(await buildServices(), breakers);
            breakers.openBreaker('trend-execution');

            const result = await orchestrator.invoke(createInitialTrendState([s1]));

            expect(result.currentStep).toBe('SKIPPED_CIRCUIT_BREAKER');
            expect(result.errors).toEqual(['Execution circuit breaker is open']);
            expect(orchestrator.getHealthStatus().status).toBe('CRITICAL');
        });
    });

    describe('failures', () => {

        it('should fall back when a node throws unexpectedly', async () => {
            const services = await buildServices();
            jest.spyOn(services.signalIndex, 'findSimilar').mockRejectedValue(new Error('index corrupted'));
            const orchestrator = new TrendOrchestrator(services, breakers);

            const result = await orchestrator.invoke(createInitialTrendState([s1]));

            expect(result.currentStep).toBe('NO_SIGNALS_CONTEXTUALIZED');
            expect(result.errors).toEqual(['Node contextualize failed']);
            expect(breakers.getBreakerStatus('contextualize')?.errorCount).toBe(1);
        });

        it('should fail the cycle when storing fails', async () => {
            const services = await buildServices();
            jest.spyOn(store, 'updateEvaluation').mockImplementation(() => {
                throw new Error('disk full');
            });
            const orchestrator = new TrendOrchestrator(services, breakers);

            const result = await orchestrator.invoke(createInitialTrendState([s1]));

            expect(result.currentStep).toBe('ERROR');
            expect(result.errors).toEqual(['Orchestrator error: disk full']);
            expect(orchestrator.getHealthStatus()).toEqual({
                consecutiveErrors: 1,
                maxConsecutiveErrors: 5,
                executionBreakerOpen: false,
                status: 'DEGRADED',
            });

        });
    });

    it('should run a single cycle through runTrendCycle', async () => {
        const services = await buildServices();
        const result = await runTrendCycle([s3], services);

        expect(result.currentStep).toBe('STORED');
        expect(store.countCandidates()).toBe(1);
    });
});
