/**
 * Worker Transport
 *
 * Moves one task payload to one worker and returns the raw reply body.
 * The transport is pluggable; the orchestrator only sees this interface.
 *
 * @module workers/transport
 */

import type { WorkerTarget, WorkerTaskPayload } from '../schemas/worker.js';
import { WorkerErrorResponseSchema } from '../schemas/worker.js';
import { TransportUnavailableError, WorkerApiError } from './errors.js';

export interface WorkerTransport {
  /**
   * @returns Raw body of a successful (2xx) reply
   * @throws TransportUnavailableError when the worker cannot be reached
   * @throws WorkerApiError when the worker answers with an error status
   */
  send(target: WorkerTarget, payload: WorkerTaskPayload, signal: AbortSignal): Promise<string>;
}

export interface HttpWorkerTransportOptions {
  /** Injected for tests */
  fetchFn?: typeof fetch;
  /** Path appended to the worker endpoint (default: /classify) */
  path?: string;
}

/**
 * Point-to-point HTTP transport: `POST {endpoint}/classify` with a JSON
 * body.
 */
export class HttpWorkerTransport implements WorkerTransport {
  private readonly fetchFn: typeof fetch;
  private readonly path: string;

  constructor(options: HttpWorkerTransportOptions = {}) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.path = options.path ?? '/classify';
  }

  async send(target: WorkerTarget, payload: WorkerTaskPayload, signal: AbortSignal): Promise<string> {
    const url = `${target.endpoint.replace(/\/+$/, '')}${this.path}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json, text/plain',
        },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportUnavailableError(target.workerId, message, error);
    }

    const text = await response.text();

    if (!response.ok) {
      throw this.toApiError(response.status, text);
    }

    return text;
  }

  /**
   * Keep the worker's own error code when the body carries one.
   */
  private toApiError(status: number, text: string): WorkerApiError {
    let code = `HTTP_${status}`;
    let message = text || `Worker returned ${status}`;

    try {
      const parsed = WorkerErrorResponseSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        code = parsed.data.error.code;
        message = parsed.data.error.message ?? message;
      }
    } catch {
      // Not JSON; the raw text is the message
    }

    return new WorkerApiError(message, status, code);
  }
}
