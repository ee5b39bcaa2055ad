import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Config } from './types';

type Environment = Config['app']['environment'];
type LogLevel = Config['app']['logLevel'];

export type PartialConfig = { [K in keyof Config]?: Partial<Config[K]> };

const ConfigFileSchema = z
  .object({
    app: z
      .object({
        name: z.string(),
        version: z.string(),
        environment: z.enum(['development', 'production', 'test']),
        logLevel: z.enum(['debug', 'info', 'warn', 'error']),
      })
      .partial(),
    clustering: z
      .object({
        similarityThreshold: z.number().min(0).max(1),
        embeddingDim: z.number().int().positive(),
        neighborLimit: z.number().int().nonnegative(),
        neighborMaxDistance: z.number().min(0).max(2),
      })
      .partial(),
    search: z.object({ minFinalScore: z.number() }).partial(),
    openrouter: z
      .object({
        apiKey: z.string(),
        baseUrl: z.string(),
        embeddingModel: z.string(),
        labelingModel: z.string(),
        timeout: z.number().int().positive(),
        maxRetries: z.number().int().nonnegative(),
      })
      .partial(),
    database: z.object({ candidatesPath: z.string() }).partial(),
    chroma: z
      .object({
        enabled: z.boolean(),
        host: z.string(),
        port: z.number().int().positive(),
        collection: z.string(),
      })
      .partial(),
    redis: z
      .object({
        enabled: z.boolean(),
        host: z.string(),
        port: z.number().int().positive(),
        password: z.string(),
        db: z.number().int().nonnegative(),
        prefix: z.string(),
      })
      .partial(),
    titles: z.object({ cachePath: z.string() }).partial(),
    agent: z
      .object({
        cycleIntervalMs: z.number().int().positive(),
        signalsPath: z.string(),
        runLockTtlMs: z.number().int().positive(),
        runOnce: z.boolean(),
      })
      .partial(),
  })
  .partial();

function toEnvironment(value: string | undefined): Environment {
  return value === 'production' || value === 'test' ? value : 'development';
}

function toLogLevel(value: string | undefined): LogLevel {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

function parseChromaUrl(raw: string | undefined): { host?: string; port?: number } {
  if (!raw) return {};
  try {
    const url = new URL(raw);
    return {
      host: url.hostname || undefined,
      port: url.port ? Number.parseInt(url.port, 10) : undefined,
    };
  } catch {
    return {};
  }
}

export function buildDefaultConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const chromaUrl = parseChromaUrl(env.CHROMA_URL);

  return {
    app: {
      name: 'trendwatch',
      version: '1.0.0',
      environment: toEnvironment(env.NODE_ENV),
      logLevel: toLogLevel(env.LOG_LEVEL),
    },
    clustering: {
      similarityThreshold: parseFloat(env.CLUSTER_SIMILARITY_THRESHOLD || '0.70'),
      embeddingDim: parseInt(env.EMBEDDING_DIM || '384', 10),
      neighborLimit: parseInt(env.NEIGHBOR_LIMIT || '5', 10),
      neighborMaxDistance: parseFloat(env.NEIGHBOR_MAX_DISTANCE || '0.45'),
    },
    search: {
      minFinalScore: parseFloat(env.SEARCH_MIN_FINAL_SCORE || '0.35'),
    },
    openrouter: {
      apiKey: env.OPENROUTER_API_KEY || '',
      baseUrl: env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1',
      embeddingModel: env.OPENROUTER_EMBEDDING_MODEL || 'openai/text-embedding-3-small',
      labelingModel: env.OPENROUTER_LABELING_MODEL || 'openai/gpt-4o-mini',
      timeout: parseInt(env.OPENROUTER_TIMEOUT || '30000', 10),
      maxRetries: parseInt(env.OPENROUTER_MAX_RETRIES || '3', 10),
    },
    database: {
      candidatesPath: env.CANDIDATES_DB_PATH || path.join(__dirname, '../../data/candidates.db'),
    },
    chroma: {
      enabled: env.CHROMA_ENABLED !== 'false',
      host: env.CHROMA_HOST || chromaUrl.host || '127.0.0.1',
      port: env.CHROMA_PORT ? parseInt(env.CHROMA_PORT, 10) : chromaUrl.port ?? 8001,
      collection: env.CHROMA_SIGNAL_COLLECTION || 'signals_hot',
    },
    redis: {
      enabled: env.REDIS_CACHE_ENABLED === 'true',
      host: env.REDIS_HOST || '127.0.0.1',
      port: parseInt(env.REDIS_PORT || '6379', 10),
      password: env.REDIS_PASSWORD || undefined,
      db: parseInt(env.REDIS_CACHE_DB || '1', 10),
      prefix: env.REDIS_CACHE_PREFIX || 'trendwatch:cache:',
    },
    titles: {
      cachePath: env.TITLE_CACHE_PATH || path.join(__dirname, '../../data/cluster-title-cache.json'),
    },
    agent: {
      cycleIntervalMs: parseInt(env.TREND_CYCLE_INTERVAL_MS || '300000', 10),
      signalsPath: env.TREND_SIGNALS_PATH || path.join(__dirname, '../../data/mock-signals.json'),
      runLockTtlMs: parseInt(env.TREND_RUN_LOCK_TTL_MS || '600000', 10),
      runOnce: env.TREND_RUN_ONCE === 'true',
    },
  };
}

function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  const merged: T = { ...base };
  if (!override) return merged;
  for (const key in base) {
    const value = override[key];
    // Blank strings in config.json mean "not set"
    if (value !== undefined && value !== '') {
      merged[key] = value;
    }
  }
  return merged;
}

export function mergeConfig(base: Config, overrides: PartialConfig): Config {
  return {
    app: mergeSection(base.app, overrides.app),
    clustering: mergeSection(base.clustering, overrides.clustering),
    search: mergeSection(base.search, overrides.search),
    openrouter: mergeSection(base.openrouter, overrides.openrouter),
    database: mergeSection(base.database, overrides.database),
    chroma: mergeSection(base.chroma, overrides.chroma),
    redis: mergeSection(base.redis, overrides.redis),
    titles: mergeSection(base.titles, overrides.titles),
    agent: mergeSection(base.agent, overrides.agent),
  };
}

export class ConfigManager {
  private config: Config;
  private configPath: string;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(__dirname, '../../config/config.json');
    this.config = this.loadConfig(env);
  }

  private loadConfig(env: NodeJS.ProcessEnv): Config {
    const defaultConfig = buildDefaultConfig(env);

    try {
      if (fs.existsSync(this.configPath)) {
        const raw: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
        const parsed = ConfigFileSchema.safeParse(raw);
        if (!parsed.success) {
          console.warn(`Ignoring invalid config file ${this.configPath}: ${parsed.error.message}`);
          return defaultConfig;
        }
        return mergeConfig(defaultConfig, parsed.data);
      }
    } catch (error) {
      console.warn('Could not load config file, using defaults:', error);
    }

    return defaultConfig;
  }

  public get(): Config {
    return this.config;
  }

  public getSection<K extends keyof Config>(section: K): Config[K] {
    return this.config[section];
  }

  public update<K extends keyof Config>(section: K, updates: Partial<Config[K]>): void {
    this.config[section] = mergeSection(this.config[section], updates);
  }
}

const configManager = new ConfigManager();
export default configManager;
