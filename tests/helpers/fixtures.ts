/**
 * Shared test fixtures: signals and a fixed-vector embedding provider
 */

import { EmbeddingFailureError } from '../../src/shared/errors';
import { EmbeddingProvider } from '../../src/shared/embedding-provider';
import { CandidateCluster, EmbeddingVector, Signal } from '../../src/shared/types';

export function makeSignal(signalId: string, text: string, overrides: Partial<Signal> = {}): Signal {
    return {
        signalId,
        text,
        timestamp: new Date('2025-03-01T12:00:00.000Z'),
        source: 'newswire',
        domain: 'technology',
        subdomain: 'general',
        metadata: {},
        ...overrides,
    };
}

/**
 * Returns the vector registered for a text; unknown texts fail like a
 * provider outage would.
 */
export class FixedEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'fixed';
    readonly calls: string[] = [];

    constructor(private readonly vectors: Record<string, EmbeddingVector>) {}

    async embed(text: string): Promise<EmbeddingVector> {
        this.calls.push(text);
        const vector = this.vectors[text];
        if (!vector) {
            throw new EmbeddingFailureError(`No vector for "${text}"`, { textLength: text.length });
        }
        return [...vector];
    }
}

export function makeCandidate(
    clusterId: string,
    signals: Signal[],
    embeddings: EmbeddingVector[],
    centroid: EmbeddingVector,
    overrides: Partial<CandidateCluster> = {}
): CandidateCluster {
    return {
        clusterId,
        signals,
        embeddings,
        centroid,
        signalCount: signals.length,
        createdAt: new Date('2025-03-01T00:00:00.000Z'),
        lastUpdated: new Date('2025-03-01T00:00:00.000Z'),
        growthRatio: 1.0,
        ...overrides,
    };
}
