/**
 * Execution Coordinator
 *
 * Fans one request out to every selected worker concurrently and waits
 * for all of them to settle. Partial results are never returned: ensemble
 * voting needs the complete set for the pass.
 *
 * @module execution/coordinator
 */

import type { ClassificationRequest } from '../schemas/request.js';
import type { TaskOutcome, WorkerTarget } from '../schemas/worker.js';
import { WORKER_ERROR_CODES, createErrorOutcome } from '../schemas/worker.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that can dispatch one task; WorkerClient in production.
 */
export interface Dispatcher {
  dispatch(target: WorkerTarget, request: ClassificationRequest, prompt?: string): Promise<TaskOutcome>;
}

export interface OutcomeSummary {
  total: number;
  success: number;
  error: number;
  timeout: number;
  /** Latency of the slowest dispatch; bounds the pass */
  slowestMs: number;
}

// ============================================================================
// Coordinator
// ============================================================================

export class ExecutionCoordinator {
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;

  constructor(dispatcher: Dispatcher, logger: Logger = silentLogger) {
    this.dispatcher = dispatcher;
    this.logger = logger;
  }

  /**
   * Dispatch to every target at once and collect one outcome per target,
   * in target order.
   *
   * @param prompt - Prompt for this pass (defaults to the request's)
   */
  async execute(
    targets: readonly WorkerTarget[],
    request: ClassificationRequest,
    prompt: string = request.prompt
  ): Promise<TaskOutcome[]> {
    const startTime = Date.now();

    const results = await Promise.allSettled(
      targets.map((target) => this.dispatcher.dispatch(target, request, prompt))
    );

    const outcomes = results.map((result, index): TaskOutcome => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      // The client should never reject; keep the outcome count intact if it does
      const target = targets[index];
      const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
      this.logger.error(`Dispatch to ${target.workerId} rejected: ${message}`);
      return createErrorOutcome(target, WORKER_ERROR_CODES.WORKER_ERROR, message, Date.now() - startTime);
    });

    const summary = summarizeOutcomes(outcomes);
    this.logger.info(
      `Executed ${summary.total} dispatches in ${Date.now() - startTime}ms ` +
        `(${summary.success} ok, ${summary.error} error, ${summary.timeout} timeout)`
    );

    return outcomes;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function summarizeOutcomes(outcomes: readonly TaskOutcome[]): OutcomeSummary {
  const summary: OutcomeSummary = { total: outcomes.length, success: 0, error: 0, timeout: 0, slowestMs: 0 };

  for (const outcome of outcomes) {
    summary[outcome.kind] += 1;
    summary.slowestMs = Math.max(summary.slowestMs, outcome.latencyMs);
  }

  return summary;
}
