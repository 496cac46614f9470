/**
 * Orchestration State Machine
 *
 * Drives one request through its passes:
 *
 * ```
 * INTENT -> DISCOVER -> ROUTE -> EXECUTE -> VERIFY -> ACCEPT
 *                                  |          |
 *                       (no targets)+--------->+-> REFLECT -> INTENT (replan)
 *                                                     |----> ACCEPT (mismatch)
 *                                                     +----> FAIL
 * ```
 *
 * The machine is an explicit loop over the current phase. Every phase
 * change is published as a deep-copied snapshot through `onTransition`;
 * the live state never leaves this module.
 *
 * @module orchestrator/state-machine
 */

import type { Domain } from '../schemas/common.js';
import type { ClassificationRequest } from '../schemas/request.js';
import type { IntentResult } from '../schemas/intent.js';
import type { SuccessOutcome, TaskOutcome, WorkerTarget } from '../schemas/worker.js';
import { INITIAL_STRATEGY, type ReplanDecision, type RoutingDecision } from '../schemas/routing.js';
import type { VerdictReason, VerificationVerdict } from '../schemas/verification.js';
import { TERMINAL_PHASES, type Phase, type RequestState } from '../schemas/state.js';
import type { IntentClassifier } from '../intent/classifier.js';
import type { WorkerRegistry } from '../registry/types.js';
import type { Router } from '../routing/router.js';
import { selectTargets } from '../routing/router.js';
import type { ExecutionCoordinator } from '../execution/coordinator.js';
import { verify, verifyNoTargets } from '../verification/verifier.js';
import type { Reflector } from '../reflection/reflector.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { withTimeout } from '../utils/timeout.js';

// ============================================================================
// Types
// ============================================================================

export type TransitionListener = (snapshot: RequestState) => void;

export interface StateMachineDependencies {
  classifier: IntentClassifier;
  registry: WorkerRegistry;
  router: Router;
  coordinator: ExecutionCoordinator;
  reflector: Reflector;
  /** Bound on one registry lookup */
  registryTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Working data of the pass in progress. Only VERIFY copies it into
 * the persisted history.
 */
interface PassWork {
  prompt: string;
  intent: IntentResult | null;
  resolved: Map<Domain, WorkerTarget[]>;
  decision: RoutingDecision | null;
  targets: WorkerTarget[];
  outcomes: TaskOutcome[];
}

function emptyPass(prompt: string): PassWork {
  return { prompt, intent: null, resolved: new Map(), decision: null, targets: [], outcomes: [] };
}

function required<T>(value: T | null, what: string, phase: Phase): T {
  if (value === null) {
    throw new Error(`${phase} reached without ${what}`);
  }
  return value;
}

// ============================================================================
// State Helpers
// ============================================================================

export function createInitialState(request: ClassificationRequest, now: Date = new Date()): RequestState {
  return {
    request,
    phase: 'INTENT',
    iteration: 0,
    history: [],
    strategy: { ...INITIAL_STRATEGY, excludeWorkers: [] },
    finalResult: null,
    status: 'PROCESSING',
    error: null,
    updatedAt: now.toISOString(),
  };
}

/**
 * Caller-facing message for a failed request.
 */
export function describeFailure(reason: VerdictReason, request: ClassificationRequest, attempts: number): string {
  const suffix = attempts === 1 ? '1 attempt' : `${attempts} attempts`;
  switch (reason) {
    case 'below-threshold':
      return `No worker reached the minimum confidence of ${request.minConfidence} after ${suffix}`;
    case 'ensemble-disagreement':
      return `Workers could not agree on a label after ${suffix}`;
    case 'worker-error':
      return `Not enough workers answered after ${suffix}`;
    case 'ok':
      return `Classification was abandoned after ${suffix}`;
  }
}

// ============================================================================
// State Machine
// ============================================================================

export class RequestStateMachine {
  private readonly deps: StateMachineDependencies;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: StateMachineDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run a request to a terminal phase and return the final state.
   */
  async run(request: ClassificationRequest, onTransition?: TransitionListener): Promise<RequestState> {
    const state = createInitialState(request, this.now());
    const publish = (): void => {
      state.updatedAt = this.now().toISOString();
      onTransition?.(structuredClone(state));
    };
    const moveTo = (phase: Phase): void => {
      this.logger.debug(`${request.requestId}: ${state.phase} -> ${phase}`);
      state.phase = phase;
      publish();
    };

    let pass = emptyPass(request.prompt);
    publish();

    while (!TERMINAL_PHASES.includes(state.phase)) {
      switch (state.phase) {
        case 'INTENT': {
          pass = emptyPass(state.strategy.adjustedPrompt ?? request.prompt);
          pass.intent = await this.deps.classifier.classify(pass.prompt, request.imageReference);
          moveTo('DISCOVER');
          break;
        }

        case 'DISCOVER': {
          const intent = required(pass.intent, 'an intent', state.phase);
          const planned = this.deps.router.route(intent, state.strategy);
          pass.resolved = await this.discover([
            ...intent.ranked.map((score) => score.domain),
            ...planned.domains,
            ...(request.preferredDomains ?? []),
          ]);
          moveTo('ROUTE');
          break;
        }

        case 'ROUTE': {
          const intent = required(pass.intent, 'an intent', state.phase);
          pass.decision = this.deps.router.route(intent, state.strategy);
          pass.targets = selectTargets(pass.decision, pass.resolved, state.strategy);
          this.logger.info(
            `Pass ${state.iteration + 1}: ${pass.decision.mode} over ${pass.decision.domains.join(', ')} ` +
              `(${pass.targets.length} workers; ${pass.decision.reason})`
          );
          moveTo(pass.targets.length > 0 ? 'EXECUTE' : 'VERIFY');
          break;
        }

        case 'EXECUTE': {
          pass.outcomes = await this.deps.coordinator.execute(pass.targets, request, pass.prompt);
          moveTo('VERIFY');
          break;
        }

        case 'VERIFY': {
          const intent = required(pass.intent, 'an intent', state.phase);
          const decision = required(pass.decision, 'a routing decision', state.phase);
          const verdict =
            pass.targets.length === 0
              ? verifyNoTargets(decision.mode, decision.domains)
              : verify(pass.outcomes, request.minConfidence, decision.mode, intent.topDomain);

          state.history.push({
            iteration: state.history.length + 1,
            intent,
            decision,
            targets: pass.targets,
            outcomes: pass.outcomes,
            verdict,
            prompt: pass.prompt,
          });
          state.iteration = state.history.length;
          this.logger.info(`Pass ${state.iteration} verdict: ${verdict.reason} (${verdict.notes})`);

          if (verdict.chosenOutcome) {
            this.accept(state, verdict.chosenOutcome, verdict.mismatchWarning);
            moveTo('ACCEPT');
          } else {
            moveTo('REFLECT');
          }
          break;
        }

        case 'REFLECT': {
          const replan = await this.deps.reflector.reflect(state);
          this.applyReplan(state, replan);
          moveTo(nextPhaseAfter(replan));
          break;
        }

        case 'ACCEPT':
        case 'FAIL':
          break;
      }
    }

    return structuredClone(state);
  }

  /**
   * Resolve the ranked, routed and preferred domains at once. A failed or
   * slow lookup leaves its domain empty.
   */
  private async discover(candidates: readonly Domain[]): Promise<Map<Domain, WorkerTarget[]>> {
    const domains = [...new Set(candidates)];

    const entries = await Promise.all(
      domains.map(async (domain): Promise<[Domain, WorkerTarget[]]> => {
        try {
          const targets = await withTimeout(
            this.deps.registry.resolve(domain),
            this.deps.registryTimeoutMs,
            `Registry lookup for '${domain}'`
          );
          return [domain, targets];
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`${message}; treating ${domain} as empty`);
          return [domain, []];
        }
      })
    );

    return new Map(entries);
  }

  private accept(state: RequestState, outcome: SuccessOutcome, mismatchWarning: string | null): void {
    state.finalResult = { kind: 'accepted', outcome, mismatchWarning };
    state.status = mismatchWarning ? 'COMPLETED_WITH_WARNING' : 'COMPLETED';
  }

  private applyReplan(state: RequestState, replan: ReplanDecision): void {
    switch (replan.action) {
      case 'SUCCEED':
        this.logger.warn(`Accepting with warning: ${replan.mismatchWarning}`);
        this.accept(state, replan.outcome, replan.mismatchWarning);
        return;

      case 'REPLAN':
        this.logger.info(`Replanning: ${replan.reason}`);
        state.strategy = replan.strategy;
        return;

      case 'GIVE_UP': {
        const verdict = lastVerdict(state);
        const message = `${describeFailure(verdict.reason, state.request, state.iteration)}: ${replan.reason}`;
        this.logger.warn(`Giving up on ${state.request.requestId}: ${message}`);
        state.finalResult = { kind: 'failed', reason: verdict.reason, message };
        state.status = 'FAILED';
        state.error = message;
        return;
      }
    }
  }
}

function nextPhaseAfter(replan: ReplanDecision): Phase {
  switch (replan.action) {
    case 'SUCCEED':
      return 'ACCEPT';
    case 'REPLAN':
      return 'INTENT';
    case 'GIVE_UP':
      return 'FAIL';
  }
}

function lastVerdict(state: RequestState): VerificationVerdict {
  const entry = state.history[state.history.length - 1];
  if (!entry) {
    throw new Error('REFLECT reached without a recorded pass');
  }
  return entry.verdict;
}
