// Signal Vector Store - ChromaDB
// Persistent neighbour lookup for incoming signals

import { ChromaClient, Collection } from 'chromadb';
import logger from '../shared/logger';
import { errorMessage } from '../shared/errors';
import { signalFromRecord, signalToRecord } from '../ingestion/signal';
import { Config, EmbeddingVector, Signal } from '../shared/types';
import { FindSimilarOptions, SignalIndex, SimilarSignal } from './signal-index';

type ChromaConfig = Config['chroma'];

const MAX_FAILURES = 3;
const RESET_TIMEOUT_MS = 60000;
const MAX_DOCUMENT_CHARS = 1000;

export class SignalVectorStore implements SignalIndex {
  readonly name = 'chroma';
  private client: ChromaClient;
  private collection: Collection | null = null;
  private consecutiveFailures = 0;
  private lastFailureTime = 0;
  private circuitOpen = false;

  constructor(private readonly config: ChromaConfig) {
    this.client = new ChromaClient({ host: config.host, port: config.port });
  }

  private checkCircuitBreaker(): boolean {
    if (!this.circuitOpen) return true;

    if (Date.now() - this.lastFailureTime > RESET_TIMEOUT_MS) {
      logger.info('[SignalVectorStore] Circuit breaker reset timeout passed, attempting recovery...');
      this.circuitOpen = false;
      this.consecutiveFailures = 0;
      return true;
    }
    return false;
  }

  private reportFailure(error: unknown): void {
    this.consecutiveFailures++;
    this.lastFailureTime = Date.now();

    logger.warn(`[SignalVectorStore] Operation failed (${this.consecutiveFailures}/${MAX_FAILURES}): ${errorMessage(error)}`);

    if (this.consecutiveFailures >= MAX_FAILURES && !this.circuitOpen) {
      logger.error(`[SignalVectorStore] Circuit breaker tripped; vector operations disabled for ${RESET_TIMEOUT_MS / 1000}s`);
      this.circuitOpen = true;
      this.collection = null;
    }
  }

  async ensureReady(): Promise<boolean> {
    if (!this.checkCircuitBreaker()) return false;
    if (this.collection) return true;

    try {
      await this.client.heartbeat();
      this.collection = await this.client.getOrCreateCollection({
        name: this.config.collection,
        metadata: { description: 'Incoming signals for neighbour lookup', 'hnsw:space': 'cosine' },
        embeddingFunction: null,
      });
      this.consecutiveFailures = 0;
      logger.info(`[SignalVectorStore] Connected to collection: ${this.config.collection}`);
      return true;
    } catch (error) {
      this.reportFailure(error);
      return false;
    }
  }

  async indexSignal(signal: Signal, embedding: EmbeddingVector): Promise<boolean> {
    const ready = await this.ensureReady();
    if (!ready || !this.collection) return false;

    try {
      await this.collection.upsert({
        ids: [signal.signalId],
        embeddings: [embedding],
        metadatas: [{
          source: signal.source,
          domain: signal.domain,
          subdomain: signal.subdomain,
          timestamp: signal.timestamp.toISOString(),
          payload: JSON.stringify(signalToRecord(signal)),
        }],
        documents: [signal.text.substring(0, MAX_DOCUMENT_CHARS)],
      });
      this.consecutiveFailures = 0;
      return true;
    } catch (error) {
      this.reportFailure(error);
      return false;
    }
  }

  async findSimilar(embedding: EmbeddingVector, options: FindSimilarOptions): Promise<SimilarSignal[]> {
    if (options.limit <= 0) return [];
    const ready = await this.ensureReady();
    if (!ready || !this.collection) return [];

    const excluded = new Set(options.excludeIds ?? []);

    try {
      const results = await this.collection.query({
        queryEmbeddings: [embedding],
        nResults: options.limit + excluded.size,
      });

      const ids = results.ids?.[0] ?? [];
      const distances = results.distances?.[0] ?? [];
      const metadatas = results.metadatas?.[0] ?? [];
      const matches: SimilarSignal[] = [];

      for (let i = 0; i < ids.length && matches.length < options.limit; i++) {
        const distance = distances[i];
        if (excluded.has(ids[i]) || distance === null || distance === undefined || distance > options.maxDistance) {
          continue;
        }

        const payload = metadatas[i]?.payload;
        if (typeof payload !== 'string') continue;

        try {
          matches.push({
            signal: signalFromRecord(JSON.parse(payload)),
            distance,
            score: 1 - distance,
          });
        } catch (error) {
          logger.debug(`[SignalVectorStore] Skipping unreadable payload for ${ids[i]}: ${errorMessage(error)}`);
        }
      }

      this.consecutiveFailures = 0;
      return matches;
    } catch (error) {
      this.reportFailure(error);
      return [];
    }
  }

  async getStats(): Promise<{ count: number; status: 'ok' | 'degraded' | 'down' }> {
    const ready = await this.ensureReady();
    if (!ready || !this.collection) return { count: 0, status: 'down' };

    try {
      return { count: await this.collection.count(), status: 'ok' };
    } catch (error) {
      logger.debug(`[SignalVectorStore] Count failed: ${errorMessage(error)}`);
      return { count: 0, status: 'degraded' };
    }
  }
}

export default SignalVectorStore;
