/**
 * Worker Registry Module
 *
 * @module registry
 */

import type { Logger } from '../logging/logger.js';
import { DirectoryWorkerRegistry } from './directory.js';
import { StaticWorkerRegistry, loadStaticRegistry } from './static.js';
import type { RegistryMode, WorkerRegistry } from './types.js';

export interface RegistrySettings {
  mode: RegistryMode;
  /** Directory base URL (dynamic mode) */
  url?: string;
  /** JSON table (static mode) */
  file?: string;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Build the registry selected by configuration.
 *
 * @throws Error when dynamic mode has no directory URL
 */
export async function createWorkerRegistry(settings: RegistrySettings): Promise<WorkerRegistry> {
  if (settings.mode === 'dynamic') {
    if (!settings.url) {
      throw new Error('REGISTRY_URL is required when REGISTRY_MODE=dynamic');
    }
    return new DirectoryWorkerRegistry({
      directoryUrl: settings.url,
      timeoutMs: settings.timeoutMs,
      logger: settings.logger,
    });
  }

  return settings.file ? loadStaticRegistry(settings.file) : new StaticWorkerRegistry();
}

export { StaticWorkerRegistry, loadStaticRegistry, DEFAULT_STATIC_WORKERS } from './static.js';
export { DirectoryWorkerRegistry, DirectoryRecordSchema, type DirectoryRecord } from './directory.js';
export { RegistryLookupFailedError } from './errors.js';
export type { WorkerRegistry, RegistryMode } from './types.js';
