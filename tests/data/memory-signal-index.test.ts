/**
 * In-memory Signal Index Unit Tests
 */

import { InMemorySignalIndex } from '../../src/data/memory-signal-index';
import { makeSignal } from '../helpers/fixtures';

describe('InMemorySignalIndex', () => {
    let index: InMemorySignalIndex;

    beforeEach(async () => {
        index = new InMemorySignalIndex();
        await index.indexSignal(makeSignal('east', 'east'), [1, 0]);
        await index.indexSignal(makeSignal('north-east', 'north-east'), [1, 1]);
        await index.indexSignal(makeSignal('north', 'north'), [0, 1]);
    });

    it('should return neighbours by ascending distance', async () => {
        const matches = await index.findSimilar([1, 0], { limit: 5, maxDistance: 1 });

        expect(matches.map(match => match.signal.signalId)).toEqual(['east', 'north-east', 'north']);
        expect(matches[0].distance).toBeCloseTo(0, 10);
        expect(matches[0].score).toBeCloseTo(1, 10);
        expect(matches[1].distance).toBeCloseTo(1 - Math.SQRT1_2, 10);
    });

    it('should drop neighbours beyond the distance limit', async () => {
        const matches = await index.findSimilar([1, 0], { limit: 5, maxDistance: 0.45 });
        expect(matches.map(match => match.signal.signalId)).toEqual(['east', 'north-east']);
    });

    it('should honour the result limit and exclusions', async () => {
        const matches = await index.findSimilar([1, 0], { limit: 1, maxDistance: 1, excludeIds: ['east'] });
        expect(matches.map(match => match.signal.signalId)).toEqual(['north-east']);
    });

    it('should return nothing for a zero limit or zero query', async () => {
        expect(await index.findSimilar([1, 0], { limit: 0, maxDistance: 1 })).toEqual([]);
        expect(await index.findSimilar([0, 0], { limit: 5, maxDistance: 1 })).toEqual([]);
    });

    it('should ignore entries of another dimension', async () => {
        await index.indexSignal(makeSignal('wide', 'wide'), [1, 0, 0]);
        const matches = await index.findSimilar([1, 0], { limit: 5, maxDistance: 1 });

        expect(matches).toHaveLength(3);
    });

    it('should refuse zero vectors and replace re-indexed signals', async () => {
        expect(await index.indexSignal(makeSignal('zero', 'zero'), [0, 0])).toBe(false);
        expect(await index.indexSignal(makeSignal('east', 'east'), [0, 1])).toBe(true);

        expect(index.size).toBe(3);
        const [nearest] = await index.findSimilar([0, 1], { limit: 1, maxDistance: 1 });
        expect(['east', 'north']).toContain(nearest.signal.signalId);
    });
});
