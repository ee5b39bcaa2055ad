// Redis Cache Service - Embedding Cache
// Shares computed embeddings across processes and restarts

import Redis from 'ioredis';
import crypto from 'crypto';
import logger from './logger';
import { EmbeddingCache } from './embedding-provider';
import { Config, EmbeddingVector } from './types';

type RedisConfig = Config['redis'];

export const CacheTTL = {
  EMBEDDING: 86400, // 24 hours - embeddings are stable
} as const;

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

export class RedisCache implements EmbeddingCache {
  private client: Redis | null = null;
  private isConnected = false;

  /**
   * @param embeddingNamespace keeps vectors of different providers apart
   */
  constructor(
    private readonly config: RedisConfig,
    private readonly embeddingNamespace: string = 'embedding'
  ) {}

  async connect(): Promise<void> {
    if (this.isConnected) return;

    try {
      this.client = new Redis({
        host: this.config.host,
        port: this.config.port,
        password: this.config.password,
        db: this.config.db,
        retryStrategy: (times) => Math.min(times * 50, 2000),
        maxRetriesPerRequest: 3,
        lazyConnect: true,
      });

      this.client.on('error', (error) => {
        logger.error('[RedisCache] Error:', error);
      });

      await this.client.connect();
      await this.client.ping();

      this.isConnected = true;
      logger.info(`[RedisCache] Connected to redis://${this.config.host}:${this.config.port}/${this.config.db}`);
    } catch (error) {
      logger.error('[RedisCache] Failed to connect:', error);
      this.client = null;
      throw error;
    }
  }

  private generateKey(namespace: string, identifier: string): string {
    return `${this.config.prefix}${namespace}:${identifier}`;
  }

  private hash(content: string): string {
    return crypto.createHash('sha256').update(content).digest('hex').slice(0, 16);
  }

  async get(namespace: string, key: string): Promise<unknown> {
    if (!this.isConnected || !this.client) return null;

    try {
      const data = await this.client.get(this.generateKey(namespace, key));
      return data ? JSON.parse(data) : null;
    } catch (error) {
      logger.error(`[RedisCache] Get failed for ${namespace}:${key}:`, error);
      return null;
    }
  }

  async set(namespace: string, key: string, value: unknown, ttl: number): Promise<boolean> {
    if (!this.isConnected || !this.client) return false;

    try {
      await this.client.setex(this.generateKey(namespace, key), ttl, JSON.stringify(value));
      return true;
    } catch (error) {
      logger.error(`[RedisCache] Set failed for ${namespace}:${key}:`, error);
      return false;
    }
  }

  async getEmbedding(text: string): Promise<EmbeddingVector | null> {
    const value = await this.get(this.embeddingNamespace, this.hash(text));
    return isNumberArray(value) && value.length > 0 ? value : null;
  }

  async setEmbedding(text: string, embedding: EmbeddingVector): Promise<boolean> {
    return this.set(this.embeddingNamespace, this.hash(text), embedding, CacheTTL.EMBEDDING);
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;

    try {
      await client.quit();
    } catch (error) {
      logger.warn('[RedisCache] Quit failed, forcing disconnect:', error);
      client.disconnect();
    }
    this.client = null;
    this.isConnected = false;
    logger.info('[RedisCache] Disconnected');
  }
}

export default RedisCache;
