/**
 * Static Worker Registry
 *
 * Fixed table of workers, either the built-in default or one loaded from a
 * JSON file.
 *
 * @module registry/static
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import type { Domain } from '../schemas/common.js';
import { WorkerTargetSchema, type WorkerTarget } from '../schemas/worker.js';
import type { WorkerRegistry } from './types.js';

/**
 * Default table: one medical, one satellite and two general workers.
 */
export const DEFAULT_STATIC_WORKERS: readonly WorkerTarget[] = [
  {
    workerId: 'org-a-medical-clf-001',
    domain: 'medical',
    endpoint: 'http://localhost:9001',
    organization: 'hospital-a',
    name: 'Medical Image Classifier - Organization A',
  },
  {
    workerId: 'org-b-satellite-clf-001',
    domain: 'satellite',
    endpoint: 'http://localhost:9002',
    organization: 'geo-analytics-b',
    name: 'Satellite Image Classifier - Organization B',
  },
  {
    workerId: 'org-c-general-clf-001',
    domain: 'general',
    endpoint: 'http://localhost:9003',
    organization: 'ai-services-c',
    name: 'General Image Classifier - Organization C',
  },
  {
    workerId: 'org-d-general-clf-001',
    domain: 'general',
    endpoint: 'http://localhost:9004',
    organization: 'ai-research-d',
    name: 'General Image Classifier - Organization D',
  },
];

export const StaticRegistryFileSchema = z.object({
  workers: z.array(WorkerTargetSchema),
});

export class StaticWorkerRegistry implements WorkerRegistry {
  readonly mode = 'static' as const;
  private readonly workers: readonly WorkerTarget[];

  constructor(workers: readonly WorkerTarget[] = DEFAULT_STATIC_WORKERS) {
    const ids = new Set<string>();
    for (const worker of workers) {
      if (ids.has(worker.workerId)) {
        throw new Error(`Worker '${worker.workerId}' is already registered`);
      }
      ids.add(worker.workerId);
    }
    this.workers = workers;
  }

  /**
   * Table order is preserved. Copies are returned so callers cannot edit
   * the table.
   */
  async resolve(domain: Domain): Promise<WorkerTarget[]> {
    return this.workers.filter((worker) => worker.domain === domain).map((worker) => ({ ...worker }));
  }

  /** All registered workers */
  getAll(): WorkerTarget[] {
    return this.workers.map((worker) => ({ ...worker }));
  }
}

/**
 * Load a static table from a JSON file of the form `{ "workers": [...] }`.
 *
 * @throws Error if the file is unreadable or fails validation
 */
export async function loadStaticRegistry(filePath: string): Promise<StaticWorkerRegistry> {
  const content = await fs.readFile(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  const result = StaticRegistryFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid registry file ${filePath}: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return new StaticWorkerRegistry(result.data.workers);
}
