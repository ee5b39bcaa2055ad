// Title Backfill
// Writes keyword titles for every cluster in the pool without calling a labeling service

import logger from '../shared/logger';
import { TitleCache, titleCacheKey } from '../data/title-cache';
import { CandidateCluster } from '../shared/types';
import { fallbackTitle } from './title-generator';

export interface TitleBackfillOptions {
  /** Keep titles that are already cached. */
  missingOnly?: boolean;
  dryRun?: boolean;
}

export interface TitleBackfillEntry {
  clusterId: string;
  title: string;
  status: 'written' | 'kept' | 'no-signals';
}

export interface TitleBackfillResult {
  written: number;
  kept: number;
  skipped: number;
  entries: TitleBackfillEntry[];
}

export function backfillFallbackTitles(
  candidates: Array<Pick<CandidateCluster, 'clusterId' | 'signals'>>,
  cache: TitleCache,
  options: TitleBackfillOptions = {}
): TitleBackfillResult {
  const result: TitleBackfillResult = { written: 0, kept: 0, skipped: 0, entries: [] };

  for (const candidate of candidates) {
    const texts = candidate.signals.map(signal => signal.text).filter(text => text.length > 0);
    if (texts.length === 0) {
      result.skipped++;
      result.entries.push({ clusterId: candidate.clusterId, title: '', status: 'no-signals' });
      continue;
    }

    const key = titleCacheKey(texts, candidate.clusterId);
    const existing = cache.get(key);
    if (options.missingOnly && existing) {
      result.kept++;
      result.entries.push({ clusterId: candidate.clusterId, title: existing, status: 'kept' });
      continue;
    }

    const title = fallbackTitle(texts);
    if (!options.dryRun) {
      cache.set(key, title);
    }
    result.written++;
    result.entries.push({ clusterId: candidate.clusterId, title, status: 'written' });
  }

  if (!options.dryRun) {
    cache.flush();
  }

  logger.info(
    `[TitleBackfill] ${result.written} ${options.dryRun ? 'would be written' : 'written'}, ` +
    `${result.kept} kept, ${result.skipped} without signals`
  );
  return result;
}
