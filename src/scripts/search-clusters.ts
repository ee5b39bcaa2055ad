// Search the candidate pool from the command line
// Usage: npm run search -- "battery storage" [--min-score 0.35] [--legacy]

import configManager from '../shared/config';
import { CandidateStore } from '../data/candidate-store';
import { createEmbeddingProvider } from '../trend-agent/services';
import { searchClusters, searchClustersHybrid } from '../trend-agent/hybrid-search';
import { CachedEmbeddingProvider } from '../shared/embedding-provider';
import { OpenRouterService } from '../shared/openrouter-service';
import { SearchArgs, UsageError, parseSearchArgs } from './cli-args';

const USAGE = 'Usage: search-clusters <query> [--min-score N] [--legacy]';

async function main(): Promise<void> {
  let args: SearchArgs;
  try {
    args = parseSearchArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  if (args.minScore !== undefined && !args.legacy) {
    configManager.update('search', { minFinalScore: args.minScore });
  }

  const config = configManager.get();
  const store = new CandidateStore(config.database.candidatesPath);
  await store.initialize();
  let embedder: CachedEmbeddingProvider | null = null;

  try {
    const clusters = await store.loadAllCandidates();
    embedder = await createEmbeddingProvider(config, new OpenRouterService(config.openrouter));

    console.log(`Searching ${clusters.length} clusters for "${args.query}"\n`);

    const results = args.legacy
      ? await searchClusters(args.query, clusters, embedder, args.minScore)
      : await searchClustersHybrid(args.query, clusters, embedder, config.search.minFinalScore);

    if (results.length === 0) {
      console.log('No matching clusters.');
      return;
    }

    for (const result of results) {
      console.log(
        `${result.finalScore.toFixed(3)}  [${result.clusterType}] ${result.title ?? result.clusterId} ` +
        `(${result.signalCount} signals, semantic ${result.semanticScore.toFixed(2)}, lexical ${result.lexicalScore.toFixed(2)})`
      );
    }
  } finally {
    store.close();
    await embedder?.close();
  }
}

main().catch((error) => {
  console.error('Search failed:', error);
  process.exit(1);
});
