import 'dotenv/config';

import configManager from '../shared/config';
import { CandidateStore } from '../data/candidate-store';
import { TitleCache } from '../data/title-cache';
import { backfillFallbackTitles } from '../trend-agent/title-backfill';
import { BackfillTitleArgs, UsageError, parseBackfillTitleArgs } from './cli-args';

async function main(): Promise<void> {
  let args: BackfillTitleArgs;
  try {
    args = parseBackfillTitleArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.log('Usage: backfill-titles [--missing-only] [--dry-run]');
    process.exitCode = 1;
    return;
  }

  const config = configManager.get();
  const store = new CandidateStore(config.database.candidatesPath);
  await store.initialize();

  try {
    const cache = new TitleCache(config.titles.cachePath);
    const loaded = cache.load();
    const candidates = await store.loadAllCandidates();
    console.log(`[backfill-titles] ${candidates.length} clusters, ${loaded} cached titles`);

    if (args.dryRun) {
      console.log('[backfill-titles] DRY RUN: the title cache will not be written');
    }

    const result = backfillFallbackTitles(candidates, cache, args);
    for (const entry of result.entries) {
      if (entry.status === 'written') {
        console.log(`  [${entry.clusterId.slice(0, 8)}...] -> ${entry.title}`);
      }
    }

    console.log(
      `[backfill-titles] ${args.dryRun ? 'Would write' : 'Wrote'} ${result.written} keyword titles ` +
      `(${result.kept} kept, ${result.skipped} without signals)`
    );
  } finally {
    store.close();
  }
}

main().catch((error) => {
  console.error('[backfill-titles] Failed:', error);
  process.exit(1);
});
