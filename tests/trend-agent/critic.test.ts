/**
 * Critic Unit Tests
 */

import {
    classifyConfidence,
    criticFlags,
    evaluateCluster,
    recommendAction,
} from '../../src/trend-agent/critic';
import { Confidence, Signal } from '../../src/shared/types';
import { makeSignal } from '../helpers/fixtures';

function signalsFrom(sources: string[]): Signal[] {
    return sources.map((source, index) => makeSignal(`sig_${index}`, `signal ${index}`, { source }));
}

function repeatSource(source: string, count: number): string[] {
    return new Array<string>(count).fill(source);
}

const RANK: Record<Confidence, number> = { low: 0, medium: 1, high: 2 };

describe('critic', () => {

    describe('evaluateCluster', () => {

        it('should keep a broad single-source cluster as a medium candidate', () => {
            const report = evaluateCluster({ signals: signalsFrom(repeatSource('blog', 8)), coherence: 0.45 });

            expect(report).toEqual({
                confidence: 'medium',
                flags: ['single source'],
                recommendedAction: 'keep_candidate',
                metrics: { signalCount: 8, sourceDiversity: 1, coherence: 0.45 },
            });
        });

        it('should promote a large, coherent, multi-source cluster', () => {
            const sources = [...repeatSource('wire', 5), ...repeatSource('filing', 4), ...repeatSource('journal', 3)];
            const report = evaluateCluster({ signals: signalsFrom(sources), coherence: 0.8 });

            expect(report.confidence).toBe('high');
            expect(report.flags).toEqual(['high coherence', 'multi-source validated', 'strong evidence']);
            expect(report.recommendedAction).toBe('promote');
            expect(report.metrics).toEqual({ signalCount: 12, sourceDiversity: 3, coherence: 0.8 });
        });

        it('should demote a cluster with too few signals', () => {
            const report = evaluateCluster({ signals: signalsFrom(['wire', 'filing']), coherence: 0.9 });

            expect(report.confidence).toBe('low');
            expect(report.flags).toEqual(['high coherence', 'insufficient evidence']);
            expect(report.recommendedAction).toBe('demote_wait');
        });

        it('should demote an incoherent cluster', () => {
            const report = evaluateCluster({ signals: signalsFrom(['a', 'b', 'c', 'd']), coherence: 0.25 });

            expect(report.confidence).toBe('low');
            expect(report.flags).toEqual(['very low coherence', 'multi-source validated']);
        });

        it('should flag weak coherence without demoting', () => {
            const report = evaluateCluster({ signals: signalsFrom(['a', 'b', 'a']), coherence: 0.35 });

            expect(report.confidence).toBe('medium');
            expect(report.flags).toEqual(['weak coherence']);
        });

        it('should compute coherence from embeddings when none is cached', () => {
            const report = evaluateCluster({
                signals: signalsFrom(['a', 'b', 'c']),
                embeddings: [[1, 0], [1, 0], [0, 1]],
            });

            expect(report.metrics.coherence).toBeCloseTo(1 / 3, 10);
        });

        it('should recompute a cached coherence of zero', () => {
            const report = evaluateCluster({
                signals: signalsFrom(['a', 'b']),
                coherence: 0,
                embeddings: [[1, 0], [1, 0]],
            });

            expect(report.metrics.coherence).toBe(1);
        });

        it('should use zero coherence without embeddings', () => {
            const report = evaluateCluster({ signals: signalsFrom(['a', 'b', 'c']) });

            expect(report.metrics.coherence).toBe(0);
            expect(report.confidence).toBe('low');
        });

        it('should count blank sources as one unknown source', () => {
            const report = evaluateCluster({ signals: signalsFrom(['', '  ', 'wire']), coherence: 0.5 });
            expect(report.metrics.sourceDiversity).toBe(2);
        });

        it('should prefer an explicit signal count', () => {
            const report = evaluateCluster({ signals: signalsFrom(['a', 'b']), signalCount: 10, coherence: 0.6 });

            expect(report.metrics.signalCount).toBe(10);
            expect(report.confidence).toBe('high');
        });
    });

    describe('classifyConfidence', () => {

        it('should require every promotion threshold for high', () => {
            expect(classifyConfidence(10, 0.5, 2)).toBe('high');
            expect(classifyConfidence(9, 0.5, 2)).toBe('medium');
            expect(classifyConfidence(10, 0.49, 2)).toBe('medium');
            expect(classifyConfidence(10, 0.5, 1)).toBe('medium');
        });

        it('should classify low below three signals or very low coherence', () => {
            expect(classifyConfidence(2, 0.9, 5)).toBe('low');
            expect(classifyConfidence(3, 0.29, 5)).toBe('low');
            expect(classifyConfidence(3, 0.3, 1)).toBe('medium');
        });

        it('should never lose confidence as evidence grows', () => {
            for (const coherence of [0, 0.3, 0.5, 0.8]) {
                for (const diversity of [1, 2, 3]) {
                    for (let count = 0; count < 15; count++) {
                        expect(RANK[classifyConfidence(count + 1, coherence, diversity)])
                            .toBeGreaterThanOrEqual(RANK[classifyConfidence(count, coherence, diversity)]);
                    }
                }
            }
        });

        it('should never lose confidence as coherence rises', () => {
            for (const count of [2, 3, 9, 10, 20]) {
                for (const diversity of [1, 2, 3]) {
                    let previous = RANK[classifyConfidence(count, 0, diversity)];
                    for (let step = 1; step <= 20; step++) {
                        const current = RANK[classifyConfidence(count, step / 20, diversity)];
                        expect(current).toBeGreaterThanOrEqual(previous);
                        previous = current;
                    }
                }
            }
        });

        it('should walk a strong multi-source cluster from low to high as coherence rises', () => {
            expect(classifyConfidence(10, 0.29, 3)).toBe('low');
            expect(classifyConfidence(10, 0.3, 3)).toBe('medium');
            expect(classifyConfidence(10, 0.49, 3)).toBe('medium');
            expect(classifyConfidence(10, 0.5, 3)).toBe('high');
        });
    });

    describe('recommendAction', () => {

        it('should map confidence to an action', () => {
            expect(recommendAction('high', 12)).toBe('promote');
            expect(recommendAction('medium', 5)).toBe('keep_candidate');
            expect(recommendAction('low', 5)).toBe('demote_wait');
        });

        it('should demote a medium call with fewer than three signals', () => {
            expect(recommendAction('medium', 2)).toBe('demote_wait');
        });
    });

    describe('criticFlags', () => {

        it('should emit no flags for a middling cluster', () => {
            expect(criticFlags(5, 0.5, 2)).toEqual([]);
        });

        it('should treat the coherence bands as exclusive', () => {
            expect(criticFlags(5, 0.1, 2)).toEqual(['very low coherence']);
            expect(criticFlags(5, 0.3, 2)).toEqual(['weak coherence']);
            expect(criticFlags(5, 0.4, 2)).toEqual([]);
            expect(criticFlags(5, 0.7, 2)).toEqual(['high coherence']);
        });
    });
});
