/**
 * Candidate Store Unit Tests
 * Runs against an in-memory SQLite database
 */

import { CandidateStore } from '../../src/data/candidate-store';
import { evaluateCluster } from '../../src/trend-agent/critic';
import { controllerDecide } from '../../src/trend-agent/controller';
import { makeCandidate, makeSignal } from '../helpers/fixtures';

jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

describe('CandidateStore', () => {
    let now: number;
    let store: CandidateStore;

    const signals = [
        makeSignal('sig_1', 'Battery storage wins auction', { source: 'wire', metadata: { confidence_hint: 0.7 } }),
        makeSignal('sig_2', 'Battery bids undercut peakers', { source: 'filing' }),
    ];

    beforeEach(async () => {
        now = Date.parse('2026-09-20T10:00:00.000Z');
        store = new CandidateStore(':memory:', () => now);
        await store.initialize();
    });

    afterEach(() => {
        store.close();
    });

    it('should round-trip a candidate', () => {
        const candidate = makeCandidate('c1', signals, [[1, 0], [0.8, 0.6]], [0.9, 0.3], {
            growthRatio: 2,
            coherence: 0.8,
        });

        store.upsertCandidate(candidate);
        const loaded = store.getCandidate('c1');

        expect(loaded).toEqual({ ...candidate, status: 'candidate' });
    });

    it('should return null for an unknown id', () => {
        expect(store.getCandidate('missing')).toBeNull();
    });

    it('should update in place and keep insertion order', async () => {
        store.upsertCandidates([
            makeCandidate('c1', [signals[0]], [[1, 0]], [1, 0]),
            makeCandidate('c2', [signals[1]], [[0, 1]], [0, 1]),
        ]);

        store.upsertCandidate(makeCandidate('c1', signals, [[1, 0], [0, 1]], [0.5, 0.5], { growthRatio: 2 }));

        const all = await store.loadAllCandidates();
        expect(all.map(candidate => candidate.clusterId)).toEqual(['c1', 'c2']);
        expect(all[0].signalCount).toBe(2);
        expect(all[0].growthRatio).toBe(2);
        expect(store.countCandidates()).toBe(2);
    });

    it('should page through the pool', async () => {
        const ids = ['c1', 'c2', 'c3', 'c4', 'c5'];
        store.upsertCandidates(ids.map(id => makeCandidate(id, [signals[0]], [[1, 0]], [1, 0])));

        const first = store.listCandidatesPage(2, 0);
        expect(first.candidates.map(candidate => candidate.clusterId)).toEqual(['c1', 'c2']);
        expect(first.nextOffset).toBe(2);

        const last = store.listCandidatesPage(2, 4);
        expect(last.candidates.map(candidate => candidate.clusterId)).toEqual(['c5']);
        expect(last.nextOffset).toBeNull();

        const all = await store.loadAllCandidates(2);
        expect(all.map(candidate => candidate.clusterId)).toEqual(ids);
    });

    it('should store evaluations and derive the status', () => {
        const candidate = makeCandidate('c1', signals, [[1, 0], [1, 0]], [1, 0]);
        store.upsertCandidate(candidate);

        const criticReport = evaluateCluster(candidate);
        const controllerDecision = controllerDecide(candidate, criticReport);

        expect(store.updateEvaluation('c1', { criticReport, controllerDecision, title: 'Battery Auctions' })).toBe(true);

        const loaded = store.getCandidate('c1');
        expect(loaded?.status).toBe('demoted');
        expect(loaded?.coherence).toBe(1);
        expect(loaded?.title).toBe('Battery Auctions');
        expect(loaded?.criticReport).toEqual(criticReport);
        expect(loaded?.controllerDecision).toEqual(controllerDecision);
        expect(store.getStats()).toEqual({ total: 1, byStatus: { candidate: 0, promoted: 0, demoted: 1 } });
    });

    it('should keep the stored title when an evaluation brings none', () => {
        store.upsertCandidate(makeCandidate('c1', signals, [[1, 0], [1, 0]], [1, 0], { title: 'Battery Auctions' }));
        const candidate = store.getCandidate('c1');
        if (!candidate) throw new Error('candidate missing');

        const criticReport = evaluateCluster(candidate);
        store.updateEvaluation('c1', { criticReport, controllerDecision: controllerDecide(candidate, criticReport) });

        expect(store.getCandidate('c1')?.title).toBe('Battery Auctions');
    });

    it('should keep evaluation results when a merge rewrites the row', () => {
        const candidate = makeCandidate('c1', signals, [[1, 0], [1, 0]], [1, 0]);
        store.upsertCandidate(candidate);
        const criticReport = evaluateCluster(candidate);
        store.updateEvaluation('c1', { criticReport, controllerDecision: controllerDecide(candidate, criticReport) });

        store.upsertCandidate(makeCandidate('c1', signals, [[1, 0], [1, 0]], [1, 0]));

        expect(store.getCandidate('c1')?.criticReport).toEqual(criticReport);
    });

    it('should report a missing cluster when updating an evaluation', () => {
        const candidate = makeCandidate('ghost', signals, [], []);
        const criticReport = evaluateCluster(candidate);

        expect(store.updateEvaluation('ghost', {
            criticReport,
            controllerDecision: controllerDecide(candidate, criticReport),
        })).toBe(false);
    });

    describe('run lock', () => {

        it('should refuse a second owner until the lease expires', () => {
            expect(store.acquireRunLock('worker-a', 1000)).toBe(true);
            expect(store.acquireRunLock('worker-b', 1000)).toBe(false);

            now += 1001;
            expect(store.acquireRunLock('worker-b', 1000)).toBe(true);
        });

        it('should let the holder extend its lease', () => {
            expect(store.acquireRunLock('worker-a', 1000)).toBe(true);
            now += 800;
            expect(store.acquireRunLock('worker-a', 1000)).toBe(true);

            now += 800;
            expect(store.acquireRunLock('worker-b', 1000)).toBe(false);
        });

        it('should only be released by its owner', () => {
            store.acquireRunLock('worker-a', 1000);

            expect(store.releaseRunLock('worker-b')).toBe(false);
            expect(store.releaseRunLock('worker-a')).toBe(true);
            expect(store.acquireRunLock('worker-b', 1000)).toBe(true);
        });

        it('should keep named locks independent', () => {
            expect(store.acquireRunLock('worker-a', 1000, 'evolution')).toBe(true);
            expect(store.acquireRunLock('worker-b', 1000, 'reindex')).toBe(true);
        });
    });

    it('should refuse to work before initialize', () => {
        const fresh = new CandidateStore(':memory:');
        expect(() => fresh.countCandidates()).toThrow('Not initialized');
    });
});
