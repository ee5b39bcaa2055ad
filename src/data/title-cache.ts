// Title Cache
// Cluster titles persisted as a flat JSON object; load() and flush() are explicit

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import logger from '../shared/logger';

const KEY_SAMPLE_SIZE = 3;

/**
 * `cluster_<id>` when the cluster id is known, otherwise an md5 of the
 * first three texts, sorted and joined with "|".
 */
export function titleCacheKey(texts: string[], clusterId?: string): string {
  if (clusterId) {
    return `cluster_${clusterId}`;
  }
  const sample = texts.slice(0, KEY_SAMPLE_SIZE).sort();
  return crypto.createHash('md5').update(sample.join('|'), 'utf8').digest('hex');
}

export class TitleCache {
  private entries = new Map<string, string>();
  private dirty = false;

  constructor(private readonly filePath: string) {}

  load(): number {
    this.entries.clear();
    this.dirty = false;

    if (!fs.existsSync(this.filePath)) {
      return 0;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
      if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        logger.warn(`[TitleCache] Ignoring ${this.filePath}: expected a JSON object`);
        return 0;
      }
      for (const [key, value] of Object.entries(raw)) {
        if (typeof value === 'string') {
          this.entries.set(key, value);
        }
      }
    } catch (error) {
      logger.warn(`[TitleCache] Could not load ${this.filePath}, starting empty:`, error);
      this.entries.clear();
    }

    return this.entries.size;
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  set(key: string, title: string): void {
    if (this.entries.get(key) === title) return;
    this.entries.set(key, title);
    this.dirty = true;
  }

  /**
   * Writes the cache when it changed since the last load or flush.
   * Returns true when a write happened.
   */
  flush(): boolean {
    if (!this.dirty) {
      return false;
    }

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(Object.fromEntries(this.entries), null, 2), 'utf8');
    this.dirty = false;
    logger.debug(`[TitleCache] Flushed ${this.entries.size} titles to ${this.filePath}`);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}
