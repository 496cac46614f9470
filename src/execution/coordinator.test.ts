/**
 * Tests for the execution coordinator
 */

import { describe, it, expect } from '@jest/globals';
import { ExecutionCoordinator, summarizeOutcomes, type Dispatcher } from './coordinator.js';
import { WorkerClient } from '../workers/client.js';
import { FakeTransport, createMockRequest, createMockTarget, createSuccessOutcome } from '../testing/helpers.js';

const targets = [
  createMockTarget('fast', 'satellite', 9002),
  createMockTarget('slow-a', 'general', 9003),
  createMockTarget('slow-b', 'general', 9004),
];

describe('ExecutionCoordinator', () => {
  it('dispatches concurrently so the pass takes as long as the slowest worker', async () => {
    const transport = new FakeTransport({
      fast: { delayMs: 10, reply: 'Label: forest\nConfidence: 0.6' },
      'slow-a': { delayMs: 300, reply: 'Label: forest\nConfidence: 0.55' },
      'slow-b': { delayMs: 300, reply: 'Label: field\nConfidence: 0.5' },
    });
    const coordinator = new ExecutionCoordinator(new WorkerClient({ transport }));

    const start = Date.now();
    const outcomes = await coordinator.execute(targets, createMockRequest());
    const elapsed = Date.now() - start;

    expect(outcomes.map((outcome) => outcome.kind)).toEqual(['success', 'success', 'success']);
    // Serial dispatch would take at least 610ms
    expect(elapsed).toBeGreaterThanOrEqual(290);
    expect(elapsed).toBeLessThan(550);
  });

  it('waits for every dispatch, including timeouts', async () => {
    const transport = new FakeTransport({
      fast: { reply: { label: 'forest', confidence: 0.6 } },
      'slow-a': { reply: { label: 'forest', confidence: 0.55 } },
      'slow-b': { hang: true },
    });
    const coordinator = new ExecutionCoordinator(new WorkerClient({ transport, timeoutMs: 50 }));

    const outcomes = await coordinator.execute(targets, createMockRequest());

    expect(outcomes).toHaveLength(3);
    expect(outcomes[2]).toMatchObject({ kind: 'timeout', workerId: 'slow-b', timeoutMs: 50 });
  });

  it('converts a rejected dispatch into a WORKER_ERROR outcome', async () => {
    const dispatcher: Dispatcher = {
      dispatch: async (target) => {
        if (target.workerId === 'slow-a') {
          throw new Error('client bug');
        }
        return createSuccessOutcome(target.workerId, target.domain, 'forest', 0.6);
      },
    };

    const outcomes = await new ExecutionCoordinator(dispatcher).execute(targets, createMockRequest());

    expect(outcomes[1]).toMatchObject({ kind: 'error', workerId: 'slow-a', code: 'WORKER_ERROR', message: 'client bug' });
    expect(outcomes[0].kind).toBe('success');
  });

  it('forwards the pass prompt to every worker', async () => {
    const transport = new FakeTransport({
      fast: { reply: 'Label: a\nConfidence: 0.9' },
      'slow-a': { reply: 'Label: a\nConfidence: 0.9' },
      'slow-b': { reply: 'Label: a\nConfidence: 0.9' },
    });
    await new ExecutionCoordinator(new WorkerClient({ transport })).execute(
      targets,
      createMockRequest(),
      'Identify land use'
    );

    expect(transport.sent.map((entry) => entry.payload.prompt)).toEqual([
      'Identify land use',
      'Identify land use',
      'Identify land use',
    ]);
  });

  it('returns nothing for an empty target set', async () => {
    const transport = new FakeTransport({});
    await expect(new ExecutionCoordinator(new WorkerClient({ transport })).execute([], createMockRequest())).resolves.toEqual([]);
    expect(transport.sent).toEqual([]);
  });
});

describe('summarizeOutcomes', () => {
  it('counts outcome kinds and the slowest latency', () => {
    expect(
      summarizeOutcomes([
        createSuccessOutcome('a', 'general', 'cat', 0.9, 40),
        { kind: 'timeout', workerId: 'b', domain: 'general', timeoutMs: 100, latencyMs: 101 },
        { kind: 'error', workerId: 'c', domain: 'general', code: 'X', message: 'x', latencyMs: 5 },
      ])
    ).toEqual({ total: 3, success: 1, error: 1, timeout: 1, slowestMs: 101 });
  });
});
