/**
 * Worker Client Exports
 *
 * Everything the orchestrator needs to talk to classification workers.
 *
 * @module workers
 */

// ============================================================================
// Client
// ============================================================================

export { WorkerClient, DEFAULT_WORKER_TIMEOUT_MS, type WorkerClientOptions } from './client.js';

// ============================================================================
// Transport
// ============================================================================

export {
  HttpWorkerTransport,
  type WorkerTransport,
  type HttpWorkerTransportOptions,
} from './transport.js';

export { TransportUnavailableError, WorkerApiError } from './errors.js';

// ============================================================================
// Parsing
// ============================================================================

export { parseWorkerResponse, normalizeTopK, type ParsedWorkerResponse } from './parser.js';
