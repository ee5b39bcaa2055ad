// Trend Agent Orchestrator
// Runs one clustering cycle: contextualize -> proto-cluster -> evolve -> evaluate -> store

import { TrendAgentState, createInitialTrendState } from './state';
import { TrendServices, createDefaultServices } from './services';
import {
  contextualizeNode,
  protoClusterNode,
  evolveNode,
  evaluateNode,
  storeNode,
} from './nodes';
import logger from '../shared/logger';
import circuitBreaker, { CircuitBreakerSystem } from '../shared/circuit-breaker';
import { errorMessage } from '../shared/errors';
import { Signal } from '../shared/types';

export { TrendAgentState, createInitialTrendState };

const EXECUTION_BREAKER = 'trend-execution';

type NodeName = 'contextualize' | 'proto-cluster' | 'evolve' | 'evaluate' | 'store';

export type OrchestratorHealth = 'HEALTHY' | 'DEGRADED' | 'CRITICAL';

/**
 * Trend Orchestrator - runs the cycle nodes in order, ending early with a
 * named step as soon as a stage leaves nothing for the next one
 */
export class TrendOrchestrator {
  private consecutiveErrors: number = 0;
  private maxConsecutiveErrors: number = 5;

  constructor(
    private readonly services: TrendServices,
    private readonly breakers: CircuitBreakerSystem = circuitBreaker
  ) {}

  async invoke(initialState: TrendAgentState): Promise<TrendAgentState> {
    if (this.breakers.isBlocking(EXECUTION_BREAKER)) {
      logger.warn('[TrendOrchestrator] Execution circuit breaker is OPEN, skipping cycle');
      return {
        ...initialState,
        currentStep: 'SKIPPED_CIRCUIT_BREAKER',
        thoughts: [...initialState.thoughts, 'Cycle skipped: execution circuit breaker is open'],
        errors: [...initialState.errors, 'Execution circuit breaker is open'],
      };
    }

    let state: TrendAgentState = { ...initialState };

    try {
      logger.info(`[TrendOrchestrator] Starting trend cycle ${state.cycleId} with ${state.signals.length} signals`);

      if (state.signals.length === 0) {
        return {
          ...state,
          currentStep: 'NO_SIGNALS',
          thoughts: [...state.thoughts, 'No incoming signals'],
        };
      }

      state = { ...state, ...await this.safeExecute('contextualize', state, () => contextualizeNode(state, this.services)) };
      if (state.contextualized.length === 0) {
        logger.warn('[TrendOrchestrator] No signals could be contextualized, ending cycle');
        return {
          ...state,
          currentStep: 'NO_SIGNALS_CONTEXTUALIZED',
          thoughts: [...state.thoughts, 'Every signal failed embedding or lookup'],
        };
      }

      state = { ...state, ...await this.safeExecute('proto-cluster', state, () => protoClusterNode(state)) };
      if (state.protoClusters.length === 0) {
        return {
          ...state,
          currentStep: 'NO_PROTO_CLUSTERS',
          thoughts: [...state.thoughts, 'No proto-clusters were built'],
        };
      }

      state = { ...state, ...await this.safeExecute('evolve', state, () => evolveNode(state, this.services)) };
      if (state.currentStep === 'EVOLUTION_SKIPPED_LOCKED') {
        logger.warn('[TrendOrchestrator] Candidate pool is locked by another pass, ending cycle');
        return state;
      }
      if (state.touchedClusterIds.length === 0) {
        logger.info('[TrendOrchestrator] No candidates changed, ending cycle');
        return {
          ...state,
          currentStep: 'NO_CLUSTERS_CHANGED',
          thoughts: [...state.thoughts, 'All proto-clusters were already known'],
        };
      }

      state = { ...state, ...await this.safeExecute('evaluate', state, () => evaluateNode(state, this.services)) };

      state = { ...state, ...await this.safeExecute('store', state, () => storeNode(state, this.services), true) };

      this.consecutiveErrors = 0;
      logger.info(
        `[TrendOrchestrator] Cycle ${state.cycleId} complete: ${state.stats.created} created, ` +
        `${state.stats.merged} merged, ${state.stats.promoted} promoted`
      );
      return state;
    } catch (error) {
      this.consecutiveErrors++;
      logger.error('[TrendOrchestrator] Cycle failed:', error);

      const errorMsg = errorMessage(error);

      if (this.consecutiveErrors >= this.maxConsecutiveErrors) {
        this.breakers.openBreaker(EXECUTION_BREAKER);
        logger.error(`[TrendOrchestrator] Opened execution circuit breaker after ${this.consecutiveErrors} consecutive errors`);
      }

      return {
        ...state,
        errors: [...state.errors, `Orchestrator error: ${errorMsg}`],
        currentStep: 'ERROR',
        thoughts: [
          ...state.thoughts,
          `Cycle failed with error: ${errorMsg}`,
          `Consecutive errors: ${this.consecutiveErrors}/${this.maxConsecutiveErrors}`,
        ],
      };
    }
  }

  /**
   * Critical nodes run under the execution breaker with no fallback, so
   * their failures fail the whole cycle.
   */
  private async safeExecute(
    nodeName: NodeName,
    state: TrendAgentState,
    fn: () => Promise<Partial<TrendAgentState>>,
    isCritical: boolean = false
  ): Promise<Partial<TrendAgentState>> {
    const breakerName = isCritical ? EXECUTION_BREAKER : nodeName;
    return this.breakers.execute(
      breakerName,
      fn,
      isCritical ? undefined : () => this.getFallbackResult(nodeName, state)
    );
  }

  private getFallbackResult(nodeName: NodeName, state: TrendAgentState): Partial<TrendAgentState> {
    logger.warn(`[TrendOrchestrator] Using fallback for ${nodeName}`);
    const errors = [...state.errors, `Node ${nodeName} failed`];

    switch (nodeName) {
      case 'contextualize':
        return {
          currentStep: 'CONTEXTUALIZE_FALLBACK',
          contextualized: [],
          errors,
          thoughts: [...state.thoughts, 'Contextualization failed, no signals to cluster'],
        };
      case 'proto-cluster':
        return {
          currentStep: 'PROTO_CLUSTER_FALLBACK',
          protoClusters: [],
          errors,
          thoughts: [...state.thoughts, 'Proto-cluster building failed'],
        };
      case 'evolve':
        return {
          currentStep: 'EVOLVE_FALLBACK',
          touchedClusterIds: [],
          errors,
          thoughts: [...state.thoughts, 'Evolution failed, candidate pool left as it was'],
        };
      case 'evaluate':
        return {
          currentStep: 'EVALUATE_FALLBACK',
          evaluations: [],
          errors,
          thoughts: [...state.thoughts, 'Evaluation failed, decisions deferred to the next cycle'],
        };
      case 'store':
        return {
          currentStep: 'STORE_FALLBACK',
          errors,
          thoughts: [...state.thoughts, 'Storing evaluations failed'],
        };
    }
  }

  getHealthStatus(): {
    consecutiveErrors: number;
    maxConsecutiveErrors: number;
    executionBreakerOpen: boolean;
    status: OrchestratorHealth;
  } {
    const executionBreakerOpen = this.breakers.getBreakerStatus(EXECUTION_BREAKER)?.isOpen ?? false;

    let status: OrchestratorHealth = 'HEALTHY';
    if (executionBreakerOpen || this.consecutiveErrors >= this.maxConsecutiveErrors) {
      status = 'CRITICAL';
    } else if (this.consecutiveErrors > 0) {
      status = 'DEGRADED';
    }

    return {
      consecutiveErrors: this.consecutiveErrors,
      maxConsecutiveErrors: this.maxConsecutiveErrors,
      executionBreakerOpen,
      status,
    };
  }
}

/**
 * Run one cycle over `signals`, building the default services when none
 * are supplied.
 */
export async function runTrendCycle(signals: Signal[], services?: TrendServices): Promise<TrendAgentState> {
  const resolved = services ?? await createDefaultServices();
  const orchestrator = new TrendOrchestrator(resolved);
  return orchestrator.invoke(createInitialTrendState(signals));
}
