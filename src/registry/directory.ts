/**
 * Directory Worker Registry
 *
 * Dynamic registry backed by an HTTP worker directory:
 * `GET {directoryUrl}/workers?domain=<domain>` returning
 * `{ "workers": [record, ...] }`.
 *
 * The directory may be partially unavailable. Records that fail
 * validation, report themselves unhealthy, or whose heartbeat is older
 * than their TTL are skipped, and whatever remains is returned.
 *
 * @module registry/directory
 */

import { z } from 'zod';
import type { Domain } from '../schemas/common.js';
import type { WorkerTarget } from '../schemas/worker.js';
import { WorkerTargetSchema } from '../schemas/worker.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { RegistryLookupFailedError } from './errors.js';
import type { WorkerRegistry } from './types.js';

// ============================================================================
// Wire Schemas
// ============================================================================

export const DirectoryRecordSchema = z.object({
  worker_id: z.string().min(1),
  domain: z.string().min(1),
  endpoint: z.string().url(),
  organization: z.string().min(1),
  name: z.string().optional(),
  healthy: z.boolean().default(true),
  last_heartbeat: z.string().datetime().optional(),
  ttl_seconds: z.number().int().positive().default(60),
});

export type DirectoryRecord = z.infer<typeof DirectoryRecordSchema>;

const DirectoryResponseSchema = z.object({
  workers: z.array(z.unknown()),
});

// ============================================================================
// Registry
// ============================================================================

export interface DirectoryWorkerRegistryOptions {
  /** Base URL of the directory service */
  directoryUrl: string;
  /** Per-lookup timeout (default: 5000) */
  timeoutMs?: number;
  /** Injected for tests */
  fetchFn?: typeof fetch;
  /** Clock for heartbeat expiry */
  now?: () => Date;
  logger?: Logger;
}

export class DirectoryWorkerRegistry implements WorkerRegistry {
  readonly mode = 'dynamic' as const;
  private readonly directoryUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: DirectoryWorkerRegistryOptions) {
    this.directoryUrl = options.directoryUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(domain: Domain): Promise<WorkerTarget[]> {
    const url = `${this.directoryUrl}/workers?domain=${encodeURIComponent(domain)}`;
    const body = await this.fetchJson(domain, url);

    const envelope = DirectoryResponseSchema.safeParse(body);
    if (!envelope.success) {
      throw new RegistryLookupFailedError(domain, 'response is missing a workers array');
    }

    const targets: WorkerTarget[] = [];
    for (const raw of envelope.data.workers) {
      const target = this.toTarget(domain, raw);
      if (target) {
        targets.push(target);
      }
    }

    this.logger.debug(`Directory resolved ${targets.length}/${envelope.data.workers.length} ${domain} workers`);
    return targets;
  }

  /**
   * Convert one record, or return null when it should be skipped.
   */
  private toTarget(domain: Domain, raw: unknown): WorkerTarget | null {
    const record = DirectoryRecordSchema.safeParse(raw);
    if (!record.success) {
      this.logger.debug('Skipping invalid directory record', record.error.issues);
      return null;
    }

    const data = record.data;
    if (data.domain !== domain || !data.healthy) {
      return null;
    }

    if (data.last_heartbeat) {
      const ageMs = this.now().getTime() - new Date(data.last_heartbeat).getTime();
      if (ageMs > data.ttl_seconds * 1000) {
        this.logger.debug(`Skipping ${data.worker_id}: heartbeat expired ${Math.round(ageMs / 1000)}s ago`);
        return null;
      }
    }

    const target = WorkerTargetSchema.safeParse({
      workerId: data.worker_id,
      domain: data.domain,
      endpoint: data.endpoint,
      organization: data.organization,
      name: data.name,
    });
    return target.success ? target.data : null;
  }

  /**
   * Fetch with an AbortController timeout. Every failure becomes a
   * RegistryLookupFailedError.
   */
  private async fetchJson(domain: Domain, url: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
    } catch (error) {
      const message =
        error instanceof Error && error.name === 'AbortError'
          ? `timed out after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new RegistryLookupFailedError(domain, message, undefined, error);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new RegistryLookupFailedError(domain, `directory returned ${response.status}`, response.status);
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new RegistryLookupFailedError(domain, 'response body is not JSON', response.status, error);
    }
  }
}
