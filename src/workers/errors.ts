/**
 * Worker transport errors. Both are folded into error outcomes by the
 * worker client and never reach the state machine.
 *
 * @module workers/errors
 */

/**
 * The worker endpoint could not be reached at all.
 */
export class TransportUnavailableError extends Error {
  constructor(
    public readonly workerId: string,
    message: string,
    cause?: unknown
  ) {
    super(`Transport to ${workerId} unavailable: ${message}`, { cause });
    this.name = 'TransportUnavailableError';
  }
}

/**
 * The worker answered with a non-2xx status.
 */
export class WorkerApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string
  ) {
    super(message);
    this.name = 'WorkerApiError';
  }
}
