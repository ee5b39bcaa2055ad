// Trend Agent Services
// Wires the collaborators a clustering cycle depends on

import configManager from '../shared/config';
import logger from '../shared/logger';
import {
  CachedEmbeddingProvider,
  EmbeddingCache,
  EmbeddingProvider,
  InMemoryEmbeddingCache,
  LocalEmbeddingProvider,
} from '../shared/embedding-provider';
import { OpenRouterEmbeddingProvider, OpenRouterService } from '../shared/openrouter-service';
import RedisCache from '../shared/redis-cache';
import { CandidateStore } from '../data/candidate-store';
import { InMemorySignalIndex } from '../data/memory-signal-index';
import { SignalIndex } from '../data/signal-index';
import SignalVectorStore from '../data/signal-vector-store';
import { TitleCache } from '../data/title-cache';
import { TitleGenerator } from './title-generator';
import { Config } from '../shared/types';

export interface TrendServices {
  config: Pick<Config, 'clustering' | 'search' | 'agent'>;
  embedder: EmbeddingProvider;
  signalIndex: SignalIndex;
  candidateStore: CandidateStore;
  titleCache: TitleCache;
  titleGenerator: TitleGenerator;
}

/**
 * Remote embeddings when an API key is configured, local feature hashing
 * otherwise. A pool only ever holds vectors from one of them.
 */
export function createBaseEmbeddingProvider(config: Config, openrouter: OpenRouterService): EmbeddingProvider {
  if (openrouter.canUseService()) {
    logger.info(`[TrendServices] Embeddings: OpenRouter (${config.openrouter.embeddingModel})`);
    return new OpenRouterEmbeddingProvider(openrouter);
  }
  logger.info(`[TrendServices] Embeddings: local feature hashing (${config.clustering.embeddingDim} dims)`);
  return new LocalEmbeddingProvider(config.clustering.embeddingDim);
}

async function createEmbeddingCache(config: Config, providerName: string): Promise<EmbeddingCache> {
  if (config.redis.enabled) {
    const redis = new RedisCache(config.redis, `embedding:${providerName}`);
    try {
      await redis.connect();
      return redis;
    } catch (error) {
      logger.warn('[TrendServices] Redis unavailable, caching embeddings in memory:', error);
    }
  }
  return new InMemoryEmbeddingCache();
}

export async function createEmbeddingProvider(config: Config, openrouter: OpenRouterService): Promise<CachedEmbeddingProvider> {
  const base = createBaseEmbeddingProvider(config, openrouter);
  return new CachedEmbeddingProvider(base, await createEmbeddingCache(config, base.name));
}

async function createSignalIndex(config: Config): Promise<SignalIndex> {
  if (config.chroma.enabled) {
    const vectorStore = new SignalVectorStore(config.chroma);
    const stats = await vectorStore.getStats();
    if (stats.status === 'ok') {
      logger.info(`[TrendServices] Signal index: ChromaDB (${stats.count} signals)`);
      return vectorStore;
    }
    logger.warn('[TrendServices] ChromaDB unavailable, using in-memory signal index');
  }
  return new InMemorySignalIndex();
}

export async function createDefaultServices(config: Config = configManager.get()): Promise<TrendServices> {
  const openrouter = new OpenRouterService(config.openrouter);

  const candidateStore = new CandidateStore(config.database.candidatesPath);
  await candidateStore.initialize();

  const titleCache = new TitleCache(config.titles.cachePath);
  const loaded = titleCache.load();
  logger.info(`[TrendServices] Loaded ${loaded} cached cluster titles`);

  return {
    config: { clustering: config.clustering, search: config.search, agent: config.agent },
    embedder: await createEmbeddingProvider(config, openrouter),
    signalIndex: await createSignalIndex(config),
    candidateStore,
    titleCache,
    titleGenerator: new TitleGenerator(titleCache, openrouter),
  };
}

/**
 * Flushes titles, closes the store and releases the embedding cache connection.
 */
export async function closeServices(services: TrendServices): Promise<void> {
  services.titleCache.flush();
  services.candidateStore.close();
  await services.embedder.close?.();
  logger.info('[TrendServices] Services closed');
}
