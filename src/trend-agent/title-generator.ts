// Title Generator
// Short human-readable names for clusters, cached per cluster

import logger from '../shared/logger';
import { TitleCache, titleCacheKey } from '../data/title-cache';

export const FALLBACK_TITLE = 'Emerging Technology Cluster';

const FALLBACK_SAMPLE_SIZE = 5;
const FALLBACK_WORD_COUNT = 3;
const MAX_TITLE_WORDS = 12;
const TRUNCATED_TITLE_WORDS = 10;

export interface TitleSource {
  canUseService(): boolean;
  generateClusterTitle(texts: string[]): Promise<string | null>;
}

/**
 * The most frequent capitalized words across the first five texts, ties
 * broken by first appearance.
 */
export function fallbackTitle(texts: string[]): string {
  const counts = new Map<string, number>();
  for (const text of texts.slice(0, FALLBACK_SAMPLE_SIZE)) {
    for (const word of text.match(/\b[A-Z][a-z]+\b/g) ?? []) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }

  if (counts.size === 0) {
    return FALLBACK_TITLE;
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, FALLBACK_WORD_COUNT)
    .map(([word]) => word)
    .join(' / ');
}

export function clampTitle(title: string): string {
  const words = title.split(/\s+/).filter(Boolean);
  if (words.length > MAX_TITLE_WORDS) {
    return `${words.slice(0, TRUNCATED_TITLE_WORDS).join(' ')}...`;
  }
  return title;
}

export class TitleGenerator {
  constructor(
    private readonly cache: TitleCache,
    private readonly source: TitleSource | null = null
  ) {}

  async generateTitle(texts: string[], clusterId?: string, useCache = true): Promise<string> {
    // Without a labeling service nothing is worth caching
    if (!this.source || !this.source.canUseService()) {
      return fallbackTitle(texts);
    }

    const key = titleCacheKey(texts, clusterId);
    const cached = useCache ? this.cache.get(key) : undefined;
    if (cached) {
      return cached;
    }

    const generated = await this.source.generateClusterTitle(texts);
    const title = generated ? clampTitle(generated) : fallbackTitle(texts);
    if (!generated) {
      logger.debug(`[TitleGenerator] Using keyword title for ${clusterId ?? key}`);
    }

    this.cache.set(key, title);
    return title;
  }
}
