/**
 * Tests for the orchestrator service
 */

import { describe, it, expect } from '@jest/globals';
import { OrchestratorService, RequestNotFoundError, toPollResponse } from './service.js';
import { createStateMachine } from './factory.js';
import { createInitialState, RequestStateMachine } from './state-machine.js';
import { generateRequestId, formatTimestamp } from './request-id.js';
import { buildOrchestratorConfig } from '../config/orchestration.js';
import { REQUEST_ID_PATTERN } from '../schemas/request.js';
import { InMemoryRequestStore } from '../storage/requests.js';
import {
  FakeRegistry,
  FakeTransport,
  ScriptedJudgment,
  TEST_REQUEST_ID,
  createMockRequest,
  createMockTarget,
} from '../testing/helpers.js';

// ============================================================================
// Mock Helpers
// ============================================================================

const SUBMITTED_AT = new Date('2026-01-15T10:30:00.000Z');

function createMachine(): RequestStateMachine {
  return createStateMachine(buildOrchestratorConfig({ workerTimeoutMs: 50 }), {
    registry: new FakeRegistry({ medical: [createMockTarget('medical-1', 'medical')] }),
    transport: new FakeTransport({ 'medical-1': { reply: { label: 'pneumonia', confidence: 0.89 }, delayMs: 5 } }),
    judgment: new ScriptedJudgment({ intent: [{ scores: [{ domain: 'medical', confidence: 0.95 }] }] }),
  });
}

function createService(overrides: Partial<ConstructorParameters<typeof OrchestratorService>[0]> = {}) {
  return new OrchestratorService({
    machine: createMachine(),
    now: () => SUBMITTED_AT,
    generateId: () => TEST_REQUEST_ID,
    ...overrides,
  });
}

// ============================================================================
// Tests
// ============================================================================

describe('OrchestratorService', () => {
  it('reports PROCESSING right after submit, then the accepted result', async () => {
    const service = createService();
    const requestId = service.submit('s3://uploads/chest.png', 'Analyze this chest X-ray');

    expect(requestId).toBe(TEST_REQUEST_ID);
    expect(await service.poll(requestId)).toEqual({ requestId, status: 'PROCESSING', iterations: 0 });
    expect(service.activeCount()).toBe(1);

    const response = await service.waitFor(requestId);

    expect(response.status).toBe('COMPLETED');
    expect(response.iterations).toBe(1);
    expect(response.result?.outcome.label).toBe('pneumonia');
    expect(response.intent?.topDomain).toBe('medical');
    expect(response.error).toBeUndefined();
  });

  it('forgets a run once it settles but still answers polls for it', async () => {
    const service = createService();
    const requestId = service.submit('s3://uploads/chest.png', 'Analyze this chest X-ray');

    await service.waitFor(requestId);

    expect(service.activeCount()).toBe(0);
    expect((await service.waitFor(requestId)).status).toBe('COMPLETED');
  });

  it('returns identical responses on repeated polls of a finished request', async () => {
    const service = createService();
    const requestId = service.submit('s3://uploads/chest.png', 'Analyze this chest X-ray');
    await service.waitFor(requestId);

    const first = await service.poll(requestId);
    const second = await service.poll(requestId);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it('hands out copies of the request state', async () => {
    const service = createService();
    const requestId = service.submit('s3://uploads/chest.png', 'Analyze this chest X-ray');
    await service.waitFor(requestId);

    const state = await service.getState(requestId);
    state.status = 'FAILED';
    state.history.length = 0;

    expect((await service.getState(requestId)).status).toBe('COMPLETED');
    expect((await service.getState(requestId)).history).toHaveLength(1);
  });

  it('applies the submission options to the request', async () => {
    const service = createService({ defaultMinConfidence: 0.8 });
    const requestId = service.submit('s3://uploads/chest.png', '  Analyze this chest X-ray ', {
      timeoutMs: 2000,
      preferredDomains: ['general'],
    });

    const { request } = await service.getState(requestId);
    await service.waitFor(requestId);

    expect(request).toEqual({
      requestId: TEST_REQUEST_ID,
      imageReference: 's3://uploads/chest.png',
      prompt: 'Analyze this chest X-ray',
      minConfidence: 0.8,
      timeoutMs: 2000,
      preferredDomains: ['general'],
      createdAt: '2026-01-15T10:30:00.000Z',
    });
  });

  it('rejects invalid submissions', () => {
    const service = createService();
    expect(() => service.submit('', 'Analyze this')).toThrow('Image reference is required');
    expect(() => service.submit('s3://uploads/a.png', 'x', { minConfidence: 1.5 })).toThrow();
  });

  it('throws RequestNotFoundError for unknown IDs', async () => {
    const service = createService();
    await expect(service.poll('req-20260101-000000-ffffffff')).rejects.toThrow(RequestNotFoundError);
    await expect(service.waitFor('req-20260101-000000-ffffffff')).rejects.toThrow(
      'Request not found: req-20260101-000000-ffffffff'
    );
  });

  it('persists every snapshot to the store', async () => {
    const store = new InMemoryRequestStore();
    const service = createService({ store });
    const requestId = service.submit('s3://uploads/chest.png', 'Analyze this chest X-ray');
    await service.waitFor(requestId);

    const stored = await store.load(requestId);
    expect(stored?.status).toBe('COMPLETED');
    expect(stored?.phase).toBe('ACCEPT');

    const restarted = createService({ store });
    expect((await restarted.poll(requestId)).status).toBe('COMPLETED');
  });

  it('stores an unexpected exception as a failed request', async () => {
    const broken = createMachine();
    broken.run = async () => {
      throw new Error('disk on fire');
    };
    const service = createService({ machine: broken });

    const requestId = service.submit('s3://uploads/chest.png', 'Analyze this chest X-ray');
    const response = await service.waitFor(requestId);

    expect(response).toEqual({
      requestId,
      status: 'FAILED',
      error: 'Internal error while processing the request',
      iterations: 0,
    });
    expect((await service.getState(requestId)).finalResult).toEqual({
      kind: 'failed',
      reason: 'internal-error',
      message: 'Internal error while processing the request',
    });
  });
});

describe('toPollResponse', () => {
  it('omits result, error and intent while nothing is known', () => {
    expect(toPollResponse(createInitialState(createMockRequest()))).toEqual({
      requestId: TEST_REQUEST_ID,
      status: 'PROCESSING',
      iterations: 0,
    });
  });
});

describe('generateRequestId', () => {
  it('formats the local submission time and a random suffix', () => {
    const date = new Date(2026, 0, 15, 10, 30, 0);

    expect(formatTimestamp(date)).toBe('20260115-103000');
    expect(generateRequestId(date)).toMatch(/^req-20260115-103000-[0-9a-f]{8}$/);
    expect(generateRequestId()).toMatch(REQUEST_ID_PATTERN);
  });
});
