/**
 * Worker Registry Types
 *
 * @module registry/types
 */

import type { Domain } from '../schemas/common.js';
import type { WorkerTarget } from '../schemas/worker.js';

export type RegistryMode = 'static' | 'dynamic';

/**
 * Resolves a domain to reachable worker endpoints.
 *
 * Resolution has no side effects and is idempotent. Callers re-resolve on
 * every pass rather than cache, since worker health changes between
 * replans. An empty list is a valid answer, distinct from a lookup error.
 */
export interface WorkerRegistry {
  readonly mode: RegistryMode;

  /**
   * @throws RegistryLookupFailedError when the directory cannot be queried
   */
  resolve(domain: Domain): Promise<WorkerTarget[]>;
}
