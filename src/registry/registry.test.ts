/**
 * Tests for the worker registries
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { StaticWorkerRegistry, loadStaticRegistry, DEFAULT_STATIC_WORKERS } from './static.js';
import { DirectoryWorkerRegistry } from './directory.js';
import { RegistryLookupFailedError } from './errors.js';
import { createWorkerRegistry } from './index.js';
import { createMockTarget } from '../testing/helpers.js';

// ============================================================================
// Mock Helpers
// ============================================================================

const NOW = new Date('2026-01-15T10:30:00.000Z');

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function directoryRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    worker_id: 'org-b-satellite-clf-001',
    domain: 'satellite',
    endpoint: 'http://localhost:9002',
    organization: 'geo-analytics-b',
    last_heartbeat: '2026-01-15T10:29:30.000Z',
    ttl_seconds: 60,
    ...overrides,
  };
}

function createDirectory(fetchFn: typeof fetch): DirectoryWorkerRegistry {
  return new DirectoryWorkerRegistry({
    directoryUrl: 'http://directory.test/',
    timeoutMs: 50,
    fetchFn,
    now: () => NOW,
  });
}

// ============================================================================
// Static Registry
// ============================================================================

describe('StaticWorkerRegistry', () => {
  it('resolves the default table by domain', async () => {
    const registry = new StaticWorkerRegistry();

    const general = await registry.resolve('general');
    expect(general.map((target) => target.workerId)).toEqual(['org-c-general-clf-001', 'org-d-general-clf-001']);

    const medical = await registry.resolve('medical');
    expect(medical).toHaveLength(1);
    expect(medical[0].endpoint).toBe('http://localhost:9001');
  });

  it('returns an empty list for a domain with no workers', async () => {
    const registry = new StaticWorkerRegistry([createMockTarget('only-general', 'general')]);
    await expect(registry.resolve('medical')).resolves.toEqual([]);
  });

  it('is idempotent and hands out copies', async () => {
    const registry = new StaticWorkerRegistry();
    const first = await registry.resolve('satellite');
    first[0].endpoint = 'http://tampered';
    const second = await registry.resolve('satellite');
    expect(second[0].endpoint).toBe('http://localhost:9002');
    expect(registry.getAll()).toHaveLength(DEFAULT_STATIC_WORKERS.length);
  });

  it('rejects duplicate worker ids', () => {
    const target = createMockTarget('dup', 'general');
    expect(() => new StaticWorkerRegistry([target, target])).toThrow("Worker 'dup' is already registered");
  });
});

describe('loadStaticRegistry', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('loads a validated table from JSON', async () => {
    const file = path.join(tempDir, 'workers.json');
    await fs.writeFile(file, JSON.stringify({ workers: [createMockTarget('custom-medical', 'medical', 9100)] }));

    const registry = await loadStaticRegistry(file);
    const targets = await registry.resolve('medical');
    expect(targets).toEqual([createMockTarget('custom-medical', 'medical', 9100)]);
  });

  it('rejects an invalid table', async () => {
    const file = path.join(tempDir, 'workers.json');
    await fs.writeFile(file, JSON.stringify({ workers: [{ workerId: 'x', domain: 'dental' }] }));

    await expect(loadStaticRegistry(file)).rejects.toThrow(/Invalid registry file/);
  });
});

// ============================================================================
// Directory Registry
// ============================================================================

describe('DirectoryWorkerRegistry', () => {
  it('queries the directory by domain', async () => {
    const fetchFn = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse({ workers: [directoryRecord()] }));
    const registry = createDirectory(fetchFn);

    const targets = await registry.resolve('satellite');

    expect(fetchFn.mock.calls[0][0]).toBe('http://directory.test/workers?domain=satellite');
    expect(targets).toEqual([
      {
        workerId: 'org-b-satellite-clf-001',
        domain: 'satellite',
        endpoint: 'http://localhost:9002',
        organization: 'geo-analytics-b',
      },
    ]);
  });

  it('skips invalid, unhealthy, expired and foreign records', async () => {
    const fetchFn = jest.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        workers: [
          directoryRecord({ worker_id: 'healthy' }),
          directoryRecord({ worker_id: 'down', healthy: false }),
          directoryRecord({ worker_id: 'stale', last_heartbeat: '2026-01-15T10:00:00.000Z' }),
          directoryRecord({ worker_id: 'wrong-domain', domain: 'medical' }),
          directoryRecord({ worker_id: 'no-endpoint', endpoint: 'not a url' }),
          directoryRecord({ worker_id: 'no-heartbeat', last_heartbeat: undefined }),
        ],
      })
    );

    const targets = await createDirectory(fetchFn).resolve('satellite');
    expect(targets.map((target) => target.workerId)).toEqual(['healthy', 'no-heartbeat']);
  });

  it('treats an empty list as a valid result', async () => {
    const fetchFn = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse({ workers: [] }));
    await expect(createDirectory(fetchFn).resolve('medical')).resolves.toEqual([]);
  });

  it('throws RegistryLookupFailedError on a non-2xx status', async () => {
    const fetchFn = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'down' }, 503));

    const error = await createDirectory(fetchFn).resolve('medical').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RegistryLookupFailedError);
    expect(error).toMatchObject({ domain: 'medical', statusCode: 503 });
  });

  it('throws RegistryLookupFailedError on transport failure', async () => {
    const fetchFn = jest.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    await expect(createDirectory(fetchFn).resolve('general')).rejects.toThrow(
      "Registry lookup for 'general' failed: fetch failed"
    );
  });

  it('throws RegistryLookupFailedError on a body without workers', async () => {
    const fetchFn = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse({ items: [] }));

    await expect(createDirectory(fetchFn).resolve('general')).rejects.toBeInstanceOf(RegistryLookupFailedError);
  });
});

describe('createWorkerRegistry', () => {
  it('defaults to the static table', async () => {
    const registry = await createWorkerRegistry({ mode: 'static' });
    expect(registry.mode).toBe('static');
  });

  it('builds a directory registry in dynamic mode', async () => {
    const registry = await createWorkerRegistry({ mode: 'dynamic', url: 'http://directory.test' });
    expect(registry).toBeInstanceOf(DirectoryWorkerRegistry);
  });

  it('requires a URL in dynamic mode', async () => {
    await expect(createWorkerRegistry({ mode: 'dynamic' })).rejects.toThrow('REGISTRY_URL is required');
  });
});
