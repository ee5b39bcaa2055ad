// Circuit Breaker System
// Per-component breakers that stop calling a failing pipeline stage for a cool-down period

import logger from './logger';

export interface CircuitBreakerState {
    name: string;
    isOpen: boolean;
    openAt: Date | null;
    lastError: Date | null;
    errorCount: number;
    successCount: number;
    threshold: number;
    timeout: number;
}

export interface BreakerConfig {
    threshold: number;
    timeout: number;
}

// Successful calls needed after a cool-down before the breaker closes again
const RECOVERY_SUCCESSES = 3;

export const DEFAULT_TREND_BREAKERS: Record<string, BreakerConfig> = {
    'trend-execution': { threshold: 5, timeout: 60000 },
    contextualize: { threshold: 5, timeout: 30000 },
    'proto-cluster': { threshold: 5, timeout: 30000 },
    evolve: { threshold: 4, timeout: 45000 },
    evaluate: { threshold: 4, timeout: 30000 },
    store: { threshold: 5, timeout: 30000 },
};

export class CircuitBreakerSystem {
    private breakers: Map<string, CircuitBreakerState> = new Map();

    constructor(
        defaults: Record<string, BreakerConfig> = DEFAULT_TREND_BREAKERS,
        private readonly clock: () => number = Date.now
    ) {
        for (const [name, config] of Object.entries(defaults)) {
            this.registerBreaker(name, config);
        }
    }

    registerBreaker(name: string, config: BreakerConfig): void {
        this.breakers.set(name, {
            name,
            isOpen: false,
            openAt: null,
            lastError: null,
            errorCount: 0,
            successCount: 0,
            threshold: config.threshold,
            timeout: config.timeout,
        });

        logger.debug(`[CircuitBreaker] Registered breaker: ${name} (threshold: ${config.threshold}, timeout: ${config.timeout}ms)`);
    }

    /**
     * Run `fn` under the named breaker. While the breaker is open, or when
     * `fn` throws, the fallback result is returned instead; without a
     * fallback the error is rethrown.
     */
    async execute<T>(
        breakerName: string,
        fn: () => Promise<T>,
        fallback?: () => T | Promise<T>
    ): Promise<T> {
        const breaker = this.breakers.get(breakerName);

        if (!breaker) {
            logger.warn(`[CircuitBreaker] Unknown breaker: ${breakerName}, executing without protection`);
            return fn();
        }

        if (breaker.isOpen) {
            const timeSinceOpen = breaker.openAt ? this.clock() - breaker.openAt.getTime() : 0;

            if (timeSinceOpen < breaker.timeout) {
                logger.warn(`[CircuitBreaker] ${breakerName} is OPEN, blocking execution`);
                if (fallback) {
                    return fallback();
                }
                throw new Error(`Circuit breaker ${breakerName} is OPEN`);
            }

            logger.info(`[CircuitBreaker] ${breakerName} attempting recovery`);
        }

        try {
            const result = await fn();
            this.onSuccess(breaker);
            return result;
        } catch (error) {
            this.onError(breaker, error);

            if (fallback) {
                logger.warn(`[CircuitBreaker] ${breakerName} failed, using fallback`);
                return fallback();
            }
            throw error;
        }
    }

    private onSuccess(breaker: CircuitBreakerState): void {
        breaker.successCount++;

        if (!breaker.isOpen) {
            breaker.errorCount = 0;
        } else if (breaker.successCount >= RECOVERY_SUCCESSES) {
            breaker.isOpen = false;
            breaker.openAt = null;
            breaker.errorCount = 0;
            breaker.successCount = 0;
            logger.info(`[CircuitBreaker] ${breaker.name} circuit CLOSED after successful recovery`);
        }
    }

    private onError(breaker: CircuitBreakerState, error: unknown): void {
        breaker.errorCount++;
        breaker.lastError = new Date(this.clock());

        const errorMsg = error instanceof Error ? error.message : String(error);
        logger.error(`[CircuitBreaker] ${breaker.name} error (${breaker.errorCount}/${breaker.threshold}): ${errorMsg}`);

        if (breaker.errorCount >= breaker.threshold && !breaker.isOpen) {
            this.open(breaker);
            logger.error(`[CircuitBreaker] ${breaker.name} circuit OPENED after ${breaker.errorCount} errors: ${errorMsg}`);
        }
    }

    private open(breaker: CircuitBreakerState): void {
        breaker.isOpen = true;
        breaker.openAt = new Date(this.clock());
        breaker.successCount = 0;
    }

    openBreaker(name: string): void {
        const breaker = this.breakers.get(name);
        if (breaker && !breaker.isOpen) {
            this.open(breaker);
            logger.warn(`[CircuitBreaker] ${name} opened manually`);
        }
    }

    /**
     * True while the breaker is open and its cool-down has not elapsed.
     */
    isBlocking(name: string): boolean {
        const breaker = this.breakers.get(name);
        if (!breaker || !breaker.isOpen) return false;
        const openedAt = breaker.openAt ? breaker.openAt.getTime() : this.clock();
        return this.clock() - openedAt < breaker.timeout;
    }

    getBreakerStatus(name: string): CircuitBreakerState | undefined {
        const breaker = this.breakers.get(name);
        return breaker ? { ...breaker } : undefined;
    }

    getAllBreakerStatuses(): CircuitBreakerState[] {
        return Array.from(this.breakers.values(), breaker => ({ ...breaker }));
    }
}

const circuitBreaker = new CircuitBreakerSystem();
export default circuitBreaker;
