// Main Entry Point - Trend Agent
// Runs clustering cycles over ingested signals on a fixed interval

import { TrendOrchestrator, createInitialTrendState } from './graph';
import { TrendServices, closeServices, createDefaultServices } from './services';
import { loadMockSignals } from '../ingestion/mock-ingestor';
import circuitBreaker from '../shared/circuit-breaker';
import configManager from '../shared/config';
import { CachedEmbeddingProvider } from '../shared/embedding-provider';
import logger from '../shared/logger';

const agentConfig = configManager.getSection('agent');
const appConfig = configManager.getSection('app');

let services: TrendServices | null = null;

async function main(): Promise<void> {
  logger.info(`[Main] Trend agent ${appConfig.version} starting (${appConfig.environment})`);
  logger.info('[Main] Initializing services...');

  const active = await createDefaultServices();
  services = active;
  const orchestrator = new TrendOrchestrator(active);
  logger.info(`[Main] Candidate pool: ${active.candidateStore.countCandidates()} clusters`);
  logger.info(`[Main] Cycle interval: ${agentConfig.cycleIntervalMs / 1000}s`);

  let cycleCount = 0;
  while (true) {
    cycleCount++;
    logger.info(`[Main] Trend cycle ${cycleCount} - ${new Date().toISOString()}`);

    try {
      const signals = loadMockSignals(agentConfig.signalsPath);
      const result = await orchestrator.invoke(createInitialTrendState(signals));

      logger.info(`[Main] Cycle ${cycleCount} finished at ${result.currentStep}:`);
      logger.info(`  - Signals: ${result.stats.received} received, ${result.stats.contextualized} contextualized`);
      logger.info(`  - Clusters: ${result.stats.created} created, ${result.stats.merged} merged, ${result.stats.duplicates} unchanged`);
      logger.info(`  - Decisions: ${result.stats.promoted} promoted, ${result.stats.keptAsCandidate} kept, ${result.stats.demoted} demoted`);

      if (result.errors.length > 0) {
        logger.warn(`  - Errors: ${result.errors.length}`);
        for (const err of result.errors) {
          logger.warn(`    -> ${err}`);
        }
      }

      if (active.embedder instanceof CachedEmbeddingProvider) {
        const cache = active.embedder.getCacheStats();
        logger.info(`  - Embedding cache: ${cache.hits} hits, ${cache.misses} misses (${(cache.hitRate * 100).toFixed(1)}% hit rate)`);
      }

      const health = orchestrator.getHealthStatus();
      if (health.status !== 'HEALTHY') {
        logger.warn(`[Main] Orchestrator health: ${health.status} (${health.consecutiveErrors}/${health.maxConsecutiveErrors} errors)`);
        for (const breaker of circuitBreaker.getAllBreakerStatuses().filter(status => status.isOpen)) {
          logger.warn(`    -> Breaker ${breaker.name} open (${breaker.errorCount} errors)`);
        }
      }
    } catch (error) {
      logger.error(`[Main] Cycle ${cycleCount} failed:`, error);
    }

    if (agentConfig.runOnce) {
      break;
    }

    logger.info(`[Main] Waiting ${agentConfig.cycleIntervalMs / 1000}s before next cycle...`);
    await sleep(agentConfig.cycleIntervalMs);
  }

  await shutdownServices();
}

async function shutdownServices(): Promise<void> {
  if (services) {
    const current = services;
    services = null;
    await closeServices(current);
  }
}

function setupShutdown(): void {
  const shutdown = async (signal: string) => {
    logger.info(`[Main] Received ${signal}, shutting down...`);
    await shutdownServices();
    logger.info('[Main] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error('[Main] Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error('[Main] Unhandled Rejection:', reason);
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

setupShutdown();
main().catch(async (error) => {
  logger.error('[Main] Fatal error:', error);
  try {
    await shutdownServices();
  } catch (closeError) {
    logger.error('[Main] Shutdown failed:', closeError);
  }
  process.exit(1);
});
