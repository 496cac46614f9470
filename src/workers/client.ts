/**
 * Worker Client
 *
 * Sends one classification task to one worker and folds every result,
 * including timeouts and transport failures, into a TaskOutcome.
 * `dispatch` never rejects.
 *
 * @module workers/client
 */

import type { ClassificationRequest } from '../schemas/request.js';
import type { TaskOutcome, WorkerTarget, WorkerTaskPayload } from '../schemas/worker.js';
import { WORKER_ERROR_CODES, createErrorOutcome, createTimeoutOutcome } from '../schemas/worker.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { TransportUnavailableError, WorkerApiError } from './errors.js';
import { parseWorkerResponse } from './parser.js';
import type { WorkerTransport } from './transport.js';

// ============================================================================
// Constants
// ============================================================================

/** Default timeout for one dispatch (30 seconds) */
export const DEFAULT_WORKER_TIMEOUT_MS = 30000;

export interface WorkerClientOptions {
  transport: WorkerTransport;
  /** Per-call timeout unless the request overrides it */
  timeoutMs?: number;
  logger?: Logger;
}

export class WorkerClient {
  private readonly transport: WorkerTransport;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: WorkerClientOptions) {
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WORKER_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Dispatch the request to one worker.
   *
   * @param prompt - Prompt to send; differs from the request's after an adjusted replan
   */
  async dispatch(
    target: WorkerTarget,
    request: ClassificationRequest,
    prompt: string = request.prompt
  ): Promise<TaskOutcome> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const payload: WorkerTaskPayload = {
      request_id: request.requestId,
      image_reference: request.imageReference,
      prompt,
    };

    const controller = new AbortController();
    const startTime = Date.now();

    try {
      const body = await withTimeout(
        this.transport.send(target, payload, controller.signal),
        timeoutMs,
        `Worker ${target.workerId}`
      );
      const latencyMs = Date.now() - startTime;
      const parsed = parseWorkerResponse(body);

      if (!parsed) {
        this.logger.warn(`${target.workerId} returned an unreadable response`);
        return createErrorOutcome(
          target,
          WORKER_ERROR_CODES.MALFORMED_RESPONSE,
          `Unreadable response: ${body.substring(0, 200)}`,
          latencyMs
        );
      }

      if (parsed.kind === 'error') {
        return createErrorOutcome(target, parsed.code, parsed.message, latencyMs);
      }

      this.logger.debug(`${target.workerId}: ${parsed.label} @ ${parsed.confidence} (${latencyMs}ms)`);
      return {
        kind: 'success',
        workerId: target.workerId,
        domain: target.domain,
        label: parsed.label,
        confidence: parsed.confidence,
        topK: parsed.topK,
        latencyMs,
      };
    } catch (error) {
      return this.toFailureOutcome(target, error, timeoutMs, Date.now() - startTime, controller);
    }
  }

  private toFailureOutcome(
    target: WorkerTarget,
    error: unknown,
    timeoutMs: number,
    latencyMs: number,
    controller: AbortController
  ): TaskOutcome {
    if (error instanceof TimeoutError || (error instanceof Error && error.name === 'AbortError')) {
      controller.abort();
      this.logger.warn(`${target.workerId} timed out after ${timeoutMs}ms`);
      return createTimeoutOutcome(target, timeoutMs, latencyMs);
    }

    if (error instanceof WorkerApiError) {
      this.logger.warn(`${target.workerId} returned ${error.statusCode} (${error.code})`);
      return createErrorOutcome(target, error.code, error.message, latencyMs);
    }

    const message = error instanceof Error ? error.message : String(error);
    if (!(error instanceof TransportUnavailableError)) {
      this.logger.error(`Unexpected transport failure for ${target.workerId}`, error);
    } else {
      this.logger.warn(message);
    }
    return createErrorOutcome(target, WORKER_ERROR_CODES.TRANSPORT_UNAVAILABLE, message, latencyMs);
  }
}
