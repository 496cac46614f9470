/**
 * CLI Command Tests
 *
 * Runs the command handlers against a temporary data directory and
 * in-process fakes for the registry, the workers and the judgment
 * function.
 *
 * @module cli/commands/commands.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { BaseCommand, EXIT_CODES } from '../base-command.js';
import { CliError } from '../errors.js';
import { handleSubmit, parseSubmitOptions, type SubmitDependencies } from './submit.js';
import { handleStatus } from './status.js';
import { handleRequests } from './requests.js';
import { handleWorkers, formatWorkerRow } from './workers.js';
import { handleDomains } from './domains.js';
import { getSuggestedPrompts, SUGGESTED_PROMPTS } from '../../intent/suggested-prompts.js';
import { RequestNotFoundError } from '../../orchestrator/service.js';
import { RegistryLookupFailedError } from '../../registry/errors.js';
import { getRequestFilePath } from '../../storage/paths.js';
import { FakeRegistry, FakeTransport, ScriptedJudgment, createMockTarget } from '../../testing/helpers.js';

// ============================================================================
// Test Setup
// ============================================================================

let testDataDir: string;
let logSpy: jest.SpiedFunction<typeof console.log>;

beforeEach(async () => {
  testDataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'classify-cli-test-'));
  logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  jest.restoreAllMocks();
  await fs.rm(testDataDir, { recursive: true, force: true });
});

function createBase(): BaseCommand {
  return new BaseCommand({ dataDir: testDataDir, color: false });
}

function createDependencies(): SubmitDependencies {
  return {
    registry: new FakeRegistry({ medical: [createMockTarget('medical-1', 'medical')] }),
    transport: new FakeTransport({ 'medical-1': { reply: { label: 'pneumonia', confidence: 0.89 }, delayMs: 5 } }),
    judgment: new ScriptedJudgment({ intent: [{ scores: [{ domain: 'medical', confidence: 0.95 }] }] }),
    config: { workerTimeoutMs: 50 },
    spinner: { enabled: false },
  };
}

async function submitOne(base: BaseCommand): Promise<string> {
  const response = await handleSubmit('s3://uploads/chest.png', 'Analyze this chest X-ray', { json: true }, base, createDependencies());
  return response.requestId;
}

// ============================================================================
// submit
// ============================================================================

describe('submit', () => {
  it('runs the request, prints the poll response and stores the request', async () => {
    const base = createBase();

    const response = await handleSubmit(
      's3://uploads/chest.png',
      'Analyze this chest X-ray',
      { json: true, minConfidence: '0.8' },
      base,
      createDependencies()
    );

    expect(response.status).toBe('COMPLETED');
    expect(response.iterations).toBe(1);
    expect(response.result?.outcome.label).toBe('pneumonia');
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(response, null, 2));

    const stored: unknown = JSON.parse(await fs.readFile(getRequestFilePath(response.requestId, testDataDir), 'utf-8'));
    expect(stored).toMatchObject({ status: 'COMPLETED', phase: 'ACCEPT', request: { minConfidence: 0.8 } });
  });

  it('shows phase lines and the summary without --json', async () => {
    const response = await handleSubmit('s3://uploads/chest.png', 'Analyze this chest X-ray', {}, createBase(), createDependencies());

    const lines = logSpy.mock.calls.map((call) => call[0]);
    expect(lines.slice(0, 5)).toEqual([
      '[*] Pass 1: Classifying intent...',
      '[*] Pass 1: Resolving workers...',
      '[*] Pass 1: Routing...',
      '[*] Pass 1: Dispatching to workers...',
      '[*] Pass 1: Verifying results...',
    ]);
    expect(lines).toContain('[+] COMPLETED after 1 pass');
    expect(lines[lines.length - 1]).toContain(`Request:    ${response.requestId}`);
  });

  it('parses numeric options and preferred domains', () => {
    expect(parseSubmitOptions({ minConfidence: '0.85', timeout: '3000', domain: ['Satellite', 'general'] })).toEqual({
      minConfidence: 0.85,
      timeoutMs: 3000,
      preferredDomains: ['satellite', 'general'],
    });
    expect(parseSubmitOptions({})).toEqual({});
  });

  it('rejects bad options with a usage error', () => {
    expect(() => parseSubmitOptions({ minConfidence: 'high' })).toThrow(
      "--min-confidence must be a number between 0 and 1, got 'high'"
    );
    expect(() => parseSubmitOptions({ timeout: '-5' })).toThrow(CliError);

    try {
      parseSubmitOptions({ domain: ['thermal'] });
      throw new Error('expected a usage error');
    } catch (error) {
      expect(error).toBeInstanceOf(CliError);
      expect(error instanceof CliError && error.exitCode).toBe(EXIT_CODES.USAGE_ERROR);
      expect(error instanceof Error && error.message).toBe(
        "Unknown domain 'thermal' (expected one of: medical, satellite, general)"
      );
    }
  });
});

// ============================================================================
// status
// ============================================================================

describe('status', () => {
  it('prints the stored state as JSON', async () => {
    const base = createBase();
    const requestId = await submitOne(base);
    logSpy.mockClear();

    const state = await handleStatus(requestId, { json: true }, base);

    expect(state.status).toBe('COMPLETED');
    expect(state.history).toHaveLength(1);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(state, null, 2));
  });

  it('prints the pass history', async () => {
    const base = createBase();
    const requestId = await submitOne(base);
    logSpy.mockClear();

    await handleStatus(requestId, {}, base);

    const lines = logSpy.mock.calls.map((call) => call[0]);
    expect(lines).toContain('History');
    expect(lines).toContain('Image: s3://uploads/chest.png');
    expect(lines[lines.length - 1]).toContain('Pass 1: SINGLE over medical');
  });

  it('throws RequestNotFoundError for unknown requests', async () => {
    await expect(handleStatus('req-20260101-000000-ffffffff', {}, createBase())).rejects.toThrow(RequestNotFoundError);
  });
});

// ============================================================================
// requests
// ============================================================================

describe('requests', () => {
  it('says so when nothing is stored', async () => {
    const shown = await handleRequests({}, createBase());

    expect(shown).toEqual([]);
    expect(logSpy).toHaveBeenCalledWith('No requests found.');
  });

  it('lists stored requests as a table', async () => {
    const base = createBase();
    const requestId = await submitOne(base);
    logSpy.mockClear();

    const shown = await handleRequests({ limit: '5' }, base);

    expect(shown.map((state) => state.request.requestId)).toEqual([requestId]);
    expect(logSpy).toHaveBeenCalledWith('Total: 1 request');
  });

  it('lists poll responses as JSON', async () => {
    const base = createBase();
    const requestId = await submitOne(base);
    logSpy.mockClear();

    await handleRequests({ format: 'json' }, base);

    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject([{ requestId, status: 'COMPLETED', iterations: 1 }]);
  });

  it('rejects a bad limit or format', async () => {
    await expect(handleRequests({ limit: 'all' }, createBase())).rejects.toThrow("--limit must be a positive integer, got 'all'");
    await expect(handleRequests({ format: 'csv' }, createBase())).rejects.toThrow('Unknown format');
  });
});

// ============================================================================
// workers
// ============================================================================

describe('workers', () => {
  const medical = createMockTarget('medical-1', 'medical', 9001);
  const general = createMockTarget('general-1', 'general', 9003);

  it('resolves every known domain by default', async () => {
    const registry = new FakeRegistry({ medical: [medical], general: [general] });

    const workers = await handleWorkers(undefined, {}, createBase(), registry);

    expect(registry.resolved).toEqual(['medical', 'satellite', 'general']);
    expect(workers.map((worker) => worker.workerId)).toEqual(['medical-1', 'general-1']);
    expect(logSpy).toHaveBeenCalledWith(formatWorkerRow(medical));
  });

  it('resolves a single domain given in any case', async () => {
    const registry = new FakeRegistry({ medical: [medical], general: [general] });

    const workers = await handleWorkers('General', { json: true }, createBase(), registry);

    expect(registry.resolved).toEqual(['general']);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(workers, null, 2));
  });

  it('reports failed lookups with the API exit code after listing the rest', async () => {
    const registry = new FakeRegistry({
      medical: [medical],
      satellite: new RegistryLookupFailedError('satellite', 'HTTP 503'),
    });

    const result = handleWorkers(undefined, {}, createBase(), registry);

    await expect(result).rejects.toThrow("Registry lookup for 'satellite' failed: HTTP 503");
    await expect(result).rejects.toMatchObject({ exitCode: EXIT_CODES.API_ERROR });
    expect(logSpy).toHaveBeenCalledWith(formatWorkerRow(medical));
  });

  it('rejects unknown domains', async () => {
    await expect(handleWorkers('thermal', {}, createBase(), new FakeRegistry({}))).rejects.toThrow(
      "Unknown domain 'thermal'"
    );
  });
});

// ============================================================================
// domains
// ============================================================================

describe('domains', () => {
  it('lists suggested prompts for each domain', () => {
    expect(getSuggestedPrompts().length).toBe(SUGGESTED_PROMPTS.length);
    expect(getSuggestedPrompts('medical').map((entry) => entry.id)).toEqual(['medical-xray', 'medical-diagnosis']);
  });

  it('prints the prompts of one domain', () => {
    const prompts = handleDomains('satellite', {}, createBase());

    expect(prompts.map((entry) => entry.id)).toEqual(['satellite-landuse', 'satellite-urban']);
    expect(logSpy).toHaveBeenCalledWith('  "Analyze this aerial image and identify urban development patterns"');
  });

  it('rejects unknown domains', () => {
    expect(() => handleDomains('thermal', {}, createBase())).toThrow(CliError);
  });
});
