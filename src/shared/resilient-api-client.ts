// Resilient API Client - Retries, Exponential Backoff and Circuit Breaking
// POST client for the remote embedding and labeling endpoints

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import logger from './logger';
import circuitBreaker, { BreakerConfig, CircuitBreakerSystem } from './circuit-breaker';

export interface ResilientClientConfig {
  name: string;
  baseURL?: string;
  headers?: Record<string, string>;
  timeout?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  breaker?: BreakerConfig;
}

/**
 * The slice of the client that services call; tests substitute a fake.
 */
export interface HttpPoster {
  post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T>;
}

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const RATE_LIMIT_STATUS = 429;
const DEFAULT_HTTP_BREAKER: BreakerConfig = { threshold: 5, timeout: 60000 };

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Timeouts, resets and DNS failures have no response and are retried,
 * as are throttling and gateway statuses. Anything else is final.
 */
export function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === undefined || RETRYABLE_STATUSES.has(status);
}

/**
 * Retry-After (seconds) on a 429 when the server sends one, otherwise
 * exponential backoff from `baseDelayMs` with up to 30% jitter.
 */
export function retryDelay(error: unknown, attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  if (axios.isAxiosError(error) && error.response?.status === RATE_LIMIT_STATUS) {
    const header: unknown = error.response.headers?.['retry-after'];
    const seconds = typeof header === 'string' || typeof header === 'number' ? Number(header) : NaN;
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.min(seconds * 1000, maxDelayMs);
    }
  }

  const backoff = baseDelayMs * Math.pow(2, attempt);
  return Math.min(backoff + Math.random() * 0.3 * backoff, maxDelayMs);
}

function failureLabel(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.code ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export class ResilientApiClient implements HttpPoster {
  private readonly client: AxiosInstance;
  private readonly breakerName: string;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  constructor(
    private readonly options: ResilientClientConfig,
    private readonly breakers: CircuitBreakerSystem = circuitBreaker,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30000;

    this.breakerName = `http:${options.name}`;
    breakers.registerBreaker(this.breakerName, options.breaker ?? DEFAULT_HTTP_BREAKER);

    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': `trendwatch/1.0 (${options.name})`,
        ...options.headers,
      },
    });
  }

  /**
   * One logical request: all of its retries count as a single success or
   * failure against the client's breaker.
   */
  post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    return this.breakers.execute(this.breakerName, () => this.postWithRetry<T>(url, data, config));
  }

  private async postWithRetry<T>(url: string, data: unknown, config: AxiosRequestConfig | undefined): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.client.post<T>(url, data, config);
        return response.data;
      } catch (error) {
        if (attempt >= this.maxRetries || !isRetryable(error)) {
          throw error;
        }

        const delay = retryDelay(error, attempt, this.baseDelayMs, this.maxDelayMs);
        logger.warn(
          `[ResilientClient:${this.options.name}] POST ${url} failed with ${failureLabel(error)} ` +
          `(attempt ${attempt + 1}/${this.maxRetries + 1}), retrying in ${delay.toFixed(0)}ms`
        );
        await this.sleep(delay);
      }
    }
  }
}

export default ResilientApiClient;
