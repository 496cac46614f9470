/**
 * Orchestrator Service
 *
 * Ingress surface: submit a request, poll its status, wait for it to
 * finish. Each submitted request runs on its own state machine in the
 * background; readers only ever see deep copies of its snapshots.
 *
 * @module orchestrator/service
 */

import {
  DEFAULT_MIN_CONFIDENCE,
  SubmitInputSchema,
  type ClassificationRequest,
  type SubmitInput,
} from '../schemas/request.js';
import type { PollResponse, RequestState } from '../schemas/state.js';
import type { RequestStore } from '../storage/requests.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { createInitialState, type RequestStateMachine } from './state-machine.js';
import { generateRequestId } from './request-id.js';

// ============================================================================
// Errors
// ============================================================================

export class RequestNotFoundError extends Error {
  constructor(public readonly requestId: string) {
    super(`Request not found: ${requestId}`);
    this.name = 'RequestNotFoundError';
  }
}

// ============================================================================
// Types
// ============================================================================

export type SubmitOptions = Omit<SubmitInput, 'imageReference' | 'prompt'>;

export interface OrchestratorServiceOptions {
  machine: RequestStateMachine;
  /** Snapshots are persisted here when set */
  store?: RequestStore;
  /** Applied when a submission names no minimum confidence */
  defaultMinConfidence?: number;
  logger?: Logger;
  now?: () => Date;
  generateId?: (now: Date) => string;
  /** Called with every published snapshot, after it is recorded */
  onTransition?: (snapshot: RequestState) => void;
}

// ============================================================================
// Service
// ============================================================================

export class OrchestratorService {
  private readonly machine: RequestStateMachine;
  private readonly store: RequestStore | undefined;
  private readonly defaultMinConfidence: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: (now: Date) => string;
  private readonly onTransition: ((snapshot: RequestState) => void) | undefined;

  private readonly states = new Map<string, RequestState>();
  private readonly runs = new Map<string, Promise<void>>();
  private readonly writes = new Map<string, Promise<void>>();

  constructor(options: OrchestratorServiceOptions) {
    this.machine = options.machine;
    this.store = options.store;
    this.defaultMinConfidence = options.defaultMinConfidence ?? DEFAULT_MIN_CONFIDENCE;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? generateRequestId;
    this.onTransition = options.onTransition;
  }

  /**
   * Accept a request and start processing it.
   *
   * @returns The new request ID
   * @throws ZodError when the input is invalid
   */
  submit(imageReference: string, prompt: string, options: SubmitOptions = {}): string {
    const input = SubmitInputSchema.parse({ imageReference, prompt, ...options });
    const createdAt = this.now();

    const request: ClassificationRequest = {
      requestId: this.generateId(createdAt),
      imageReference: input.imageReference,
      prompt: input.prompt,
      minConfidence: input.minConfidence ?? this.defaultMinConfidence,
      timeoutMs: input.timeoutMs,
      preferredDomains: input.preferredDomains,
      createdAt: createdAt.toISOString(),
    };

    this.record(createInitialState(request, createdAt));
    this.runs.set(
      request.requestId,
      this.run(request).finally(() => this.runs.delete(request.requestId))
    );
    this.logger.info(`Submitted ${request.requestId}`);

    return request.requestId;
  }

  /**
   * Current externally visible status. Safe to call any number of times.
   *
   * @throws RequestNotFoundError for an unknown request ID
   */
  async poll(requestId: string): Promise<PollResponse> {
    return toPollResponse(await this.getState(requestId));
  }

  /**
   * Full snapshot of a request, including its pass history.
   *
   * @throws RequestNotFoundError for an unknown request ID
   */
  async getState(requestId: string): Promise<RequestState> {
    const state = this.states.get(requestId) ?? (await this.store?.load(requestId)) ?? null;
    if (!state) {
      throw new RequestNotFoundError(requestId);
    }
    return structuredClone(state);
  }

  /**
   * Number of requests still being processed.
   */
  activeCount(): number {
    return this.runs.size;
  }

  /**
   * Resolve once the request is terminal and its snapshots are persisted.
   *
   * @throws RequestNotFoundError for an unknown request ID
   */
  async waitFor(requestId: string): Promise<PollResponse> {
    const run = this.runs.get(requestId);
    if (run) {
      await run;
    }
    return this.poll(requestId);
  }

  private async run(request: ClassificationRequest): Promise<void> {
    try {
      await this.machine.run(request, (snapshot) => this.record(snapshot));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Request ${request.requestId} failed unexpectedly: ${message}`);

      const current = this.states.get(request.requestId) ?? createInitialState(request, this.now());
      const userMessage = 'Internal error while processing the request';
      this.record({
        ...current,
        phase: 'FAIL',
        status: 'FAILED',
        finalResult: { kind: 'failed', reason: 'internal-error', message: userMessage },
        error: userMessage,
        updatedAt: this.now().toISOString(),
      });
    }

    await this.writes.get(request.requestId);
    this.writes.delete(request.requestId);
  }

  private record(snapshot: RequestState): void {
    const requestId = snapshot.request.requestId;
    this.states.set(requestId, snapshot);
    this.onTransition?.(structuredClone(snapshot));

    const store = this.store;
    if (!store) {
      return;
    }
    const previous = this.writes.get(requestId) ?? Promise.resolve();
    const copy = structuredClone(snapshot);
    this.writes.set(
      requestId,
      previous
        .then(() => store.save(copy))
        .catch((error: unknown) => {
          this.logger.warn(
            `Failed to persist ${requestId}: ${error instanceof Error ? error.message : String(error)}`
          );
        })
    );
  }
}

// ============================================================================
// Poll View
// ============================================================================

export function toPollResponse(state: RequestState): PollResponse {
  const last = state.history[state.history.length - 1];
  const response: PollResponse = {
    requestId: state.request.requestId,
    status: state.status,
    iterations: state.iteration,
  };

  if (state.finalResult?.kind === 'accepted') {
    response.result = state.finalResult;
  }
  if (state.error !== null) {
    response.error = state.error;
  }
  if (last) {
    response.intent = last.intent;
  }
  return response;
}
