/**
 * Orchestrator Factory
 *
 * Wires the components of a request lifecycle together from
 * configuration. Every collaborator can be swapped, which is how tests
 * run the whole machine in process.
 *
 * @module orchestrator/factory
 */

import {
  config,
  buildOrchestratorConfig,
  maxRequestDurationMs,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from '../config/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger, withScope } from '../logging/logger.js';
import type { JudgmentFunction } from '../judgment/types.js';
import { createJudgment, callConfigWithinBudget } from '../judgment/index.js';
import type { WorkerRegistry } from '../registry/types.js';
import { createWorkerRegistry } from '../registry/index.js';
import type { WorkerTransport } from '../workers/transport.js';
import { HttpWorkerTransport } from '../workers/transport.js';
import { WorkerClient } from '../workers/client.js';
import { ExecutionCoordinator } from '../execution/coordinator.js';
import { IntentClassifier } from '../intent/classifier.js';
import { Router } from '../routing/router.js';
import { Reflector } from '../reflection/reflector.js';
import type { RequestStore } from '../storage/requests.js';
import type { RequestState } from '../schemas/state.js';
import { RequestStateMachine } from './state-machine.js';
import { OrchestratorService } from './service.js';

export interface MachineComponents {
  registry: WorkerRegistry;
  judgment: JudgmentFunction;
  transport: WorkerTransport;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Build a state machine over the given collaborators.
 */
export function createStateMachine(cfg: OrchestratorConfig, components: MachineComponents): RequestStateMachine {
  const logger = components.logger ?? silentLogger;
  const client = new WorkerClient({
    transport: components.transport,
    timeoutMs: cfg.workerTimeoutMs,
    logger: withScope(logger, 'workers'),
  });

  return new RequestStateMachine({
    classifier: new IntentClassifier({
      judgment: components.judgment,
      timeoutMs: cfg.judgmentTimeoutMs,
      logger: withScope(logger, 'intent'),
    }),
    registry: components.registry,
    router: new Router({ routingThreshold: cfg.routingThreshold, ambiguityMargin: cfg.ambiguityMargin }),
    coordinator: new ExecutionCoordinator(client, withScope(logger, 'execute')),
    reflector: new Reflector({
      judgment: components.judgment,
      maxReplans: cfg.maxReplans,
      timeoutMs: cfg.judgmentTimeoutMs,
      logger: withScope(logger, 'reflect'),
    }),
    registryTimeoutMs: cfg.registryTimeoutMs,
    logger,
    now: components.now,
  });
}

export interface CreateOrchestratorOptions extends Partial<MachineComponents> {
  /** Overrides on top of the environment configuration */
  config?: OrchestratorConfigInput;
  store?: RequestStore;
  onTransition?: (snapshot: RequestState) => void;
}

/**
 * Build an orchestrator service from the environment, with any
 * collaborator replaced by the caller.
 *
 * @throws Error when the registry cannot be built (dynamic mode without a URL, bad registry file)
 */
export async function createOrchestrator(options: CreateOrchestratorOptions = {}): Promise<OrchestratorService> {
  const logger = options.logger ?? silentLogger;
  const cfg = buildOrchestratorConfig({ ...config.orchestration, ...options.config });

  const registry =
    options.registry ??
    (await createWorkerRegistry({
      mode: config.registry.mode,
      url: config.registry.url,
      file: config.registry.file,
      timeoutMs: cfg.registryTimeoutMs,
      logger: withScope(logger, 'registry'),
    }));
  const judgment =
    options.judgment ?? createJudgment({ logger, callConfig: callConfigWithinBudget(cfg.judgmentTimeoutMs) });
  const transport = options.transport ?? new HttpWorkerTransport();

  logger.debug(
    `Registry: ${registry.mode}; judgment: ${judgment.name}; ` +
      `a request takes at most ${maxRequestDurationMs(cfg)}ms`
  );

  return new OrchestratorService({
    machine: createStateMachine(cfg, { registry, judgment, transport, logger, now: options.now }),
    store: options.store,
    defaultMinConfidence: cfg.minConfidence,
    logger,
    now: options.now,
    onTransition: options.onTransition,
  });
}
