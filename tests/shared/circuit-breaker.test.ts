/**
 * Circuit Breaker Unit Tests
 */

import { CircuitBreakerSystem } from '../../src/shared/circuit-breaker';

jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

describe('CircuitBreakerSystem', () => {
    let now: number;
    let breakers: CircuitBreakerSystem;

    const failing = () => Promise.reject(new Error('boom'));
    const fallback = () => 'fallback';

    beforeEach(() => {
        now = 1_000_000;
        breakers = new CircuitBreakerSystem({ test: { threshold: 2, timeout: 1000 } }, () => now);
    });

    it('should pass through results while closed', async () => {
        expect(await breakers.execute('test', async () => 'ok', fallback)).toBe('ok');
        expect(breakers.getBreakerStatus('test')?.isOpen).toBe(false);
    });

    it('should use the fallback when the call fails', async () => {
        expect(await breakers.execute('test', failing, fallback)).toBe('fallback');
        expect(breakers.getBreakerStatus('test')?.errorCount).toBe(1);
    });

    it('should rethrow without a fallback', async () => {
        await expect(breakers.execute('test', failing)).rejects.toThrow('boom');
    });

    it('should open after reaching the error threshold', async () => {
        await breakers.execute('test', failing, fallback);
        await breakers.execute('test', failing, fallback);

        expect(breakers.getBreakerStatus('test')?.isOpen).toBe(true);
        expect(breakers.isBlocking('test')).toBe(true);
    });

    it('should block calls while open', async () => {
        await breakers.execute('test', failing, fallback);
        await breakers.execute('test', failing, fallback);

        now += 500;
        const fn = jest.fn(async () => 'ok');

        expect(await breakers.execute('test', fn, fallback)).toBe('fallback');
        await expect(breakers.execute('test', fn)).rejects.toThrow('Circuit breaker test is OPEN');
        expect(fn).not.toHaveBeenCalled();
    });

    it('should close after three successes once the cool-down passes', async () => {
        await breakers.execute('test', failing, fallback);
        await breakers.execute('test', failing, fallback);

        now += 1000;
        expect(breakers.isBlocking('test')).toBe(false);

        await breakers.execute('test', async () => 'ok');
        await breakers.execute('test', async () => 'ok');
        expect(breakers.getBreakerStatus('test')?.isOpen).toBe(true);

        await breakers.execute('test', async () => 'ok');
        expect(breakers.getBreakerStatus('test')).toMatchObject({ isOpen: false, errorCount: 0, successCount: 0 });
    });

    it('should reset the error count after a success while closed', async () => {
        await breakers.execute('test', failing, fallback);
        await breakers.execute('test', async () => 'ok');
        await breakers.execute('test', failing, fallback);

        expect(breakers.getBreakerStatus('test')).toMatchObject({ isOpen: false, errorCount: 1 });
    });

    it('should run unknown breakers without protection', async () => {
        expect(await breakers.execute('unregistered', async () => 42)).toBe(42);
        expect(breakers.isBlocking('unregistered')).toBe(false);
    });

    it('should open manually until the cool-down elapses', () => {
        breakers.openBreaker('test');
        expect(breakers.isBlocking('test')).toBe(true);

        now += 1000;
        expect(breakers.isBlocking('test')).toBe(false);
        expect(breakers.getAllBreakerStatuses()).toHaveLength(1);
    });

    it('should register the trend breakers by default', () => {
        const defaults = new CircuitBreakerSystem();
        const names = defaults.getAllBreakerStatuses().map(status => status.name);

        expect(names).toEqual(['trend-execution', 'contextualize', 'proto-cluster', 'evolve', 'evaluate', 'store']);
    });
});
