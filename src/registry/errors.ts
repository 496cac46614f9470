import type { Domain } from '../schemas/common.js';

/**
 * The directory could not be queried for a domain: transport failure,
 * non-2xx status or an unreadable body. Recovered by the state machine as
 * an empty resolution.
 */
export class RegistryLookupFailedError extends Error {
  constructor(
    public readonly domain: Domain,
    message: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(`Registry lookup for '${domain}' failed: ${message}`, { cause });
    this.name = 'RegistryLookupFailedError';
  }
}
