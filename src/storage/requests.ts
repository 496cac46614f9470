/**
 * Request Storage Operations
 *
 * Persistence of RequestState snapshots. The orchestrator works without a
 * store; with one, every published snapshot is saved so that requests can
 * be inspected after the process that ran them has exited.
 *
 * @module storage/requests
 */

import * as fs from 'node:fs/promises';
import { RequestStateSchema, type RequestState } from '../schemas/state.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { atomicWriteJson, fileExists, readJson } from './atomic.js';
import { getDataDir, getRequestFilePath, getRequestsDir } from './paths.js';

export interface RequestStore {
  save(state: RequestState): Promise<void>;

  /** The stored snapshot, or null when the request is unknown */
  load(requestId: string): Promise<RequestState | null>;

  /** Every stored request, newest first */
  list(): Promise<RequestState[]>;
}

function newestFirst(a: RequestState, b: RequestState): number {
  return new Date(b.request.createdAt).getTime() - new Date(a.request.createdAt).getTime();
}

// ============================================================================
// In-Memory Store
// ============================================================================

export class InMemoryRequestStore implements RequestStore {
  private readonly states = new Map<string, RequestState>();

  async save(state: RequestState): Promise<void> {
    this.states.set(state.request.requestId, structuredClone(state));
  }

  async load(requestId: string): Promise<RequestState | null> {
    const state = this.states.get(requestId);
    return state ? structuredClone(state) : null;
  }

  async list(): Promise<RequestState[]> {
    return [...this.states.values()].map((state) => structuredClone(state)).sort(newestFirst);
  }
}

// ============================================================================
// File Store
// ============================================================================

/**
 * One JSON file per request under `<dataDir>/requests/`.
 */
export class FileRequestStore implements RequestStore {
  private readonly dataDir: string;
  private readonly logger: Logger;

  constructor(dataDir: string = getDataDir(), logger: Logger = silentLogger) {
    this.dataDir = dataDir;
    this.logger = logger;
  }

  async save(state: RequestState): Promise<void> {
    const validated = RequestStateSchema.parse(state);
    await atomicWriteJson(getRequestFilePath(validated.request.requestId, this.dataDir), validated);
  }

  /**
   * @throws Error if the stored file is not a valid request snapshot
   */
  async load(requestId: string): Promise<RequestState | null> {
    const filePath = getRequestFilePath(requestId, this.dataDir);
    if (!(await fileExists(filePath))) {
      return null;
    }

    const parsed = RequestStateSchema.safeParse(await readJson(filePath));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid request file ${filePath}: ${issue.path.join('.')}: ${issue.message}`);
    }
    return parsed.data;
  }

  async list(): Promise<RequestState[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(getRequestsDir(this.dataDir));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const states: RequestState[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;

      const requestId = entry.slice(0, -'.json'.length);
      try {
        const state = await this.load(requestId);
        if (state) {
          states.push(state);
        }
      } catch (error) {
        this.logger.warn(
          `Failed to load request '${requestId}': ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    return states.sort(newestFirst);
  }
}
