// Ask a question about one candidate cluster
// Usage: npm run explain -- <clusterId> "Why is this growing?"

import configManager from '../shared/config';
import { CandidateStore } from '../data/candidate-store';
import { OpenRouterService } from '../shared/openrouter-service';
import { ExplainArgs, UsageError, parseExplainArgs } from './cli-args';

async function main(): Promise<void> {
  let args: ExplainArgs;
  try {
    args = parseExplainArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.log('Usage: explain-cluster <clusterId> <question>');
    process.exitCode = 1;
    return;
  }

  const config = configManager.get();
  const store = new CandidateStore(config.database.candidatesPath);
  await store.initialize();

  try {
    const cluster = store.getCandidate(args.clusterId);
    if (!cluster) {
      console.error(`No cluster with id ${args.clusterId}`);
      process.exitCode = 1;
      return;
    }

    const service = new OpenRouterService(config.openrouter);
    console.log(`${cluster.title ?? cluster.clusterId} (${cluster.signalCount} signals)\n`);
    console.log(await service.explainCluster(cluster.signals.map(signal => signal.text), args.question));
  } finally {
    store.close();
  }
}

main().catch((error) => {
  console.error('Explain failed:', error);
  process.exit(1);
});
