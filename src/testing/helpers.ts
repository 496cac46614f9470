/**
 * Test Helpers
 *
 * In-process stand-ins for the orchestrator's external collaborators:
 * a scripted judgment function, a fake worker transport and a fake
 * registry. Used by the *.test.ts files only.
 *
 * @module testing/helpers
 */

import type { Domain } from '../schemas/common.js';
import type { ClassificationRequest } from '../schemas/request.js';
import type { IntentResult, IntentSource } from '../schemas/intent.js';
import type { SuccessOutcome, TaskOutcome, WorkerTarget, WorkerTaskPayload } from '../schemas/worker.js';
import type { RoutingMode } from '../schemas/routing.js';
import type { HistoryEntry } from '../schemas/state.js';
import type { JudgmentFunction, JudgmentInput } from '../judgment/types.js';
import type { WorkerRegistry } from '../registry/types.js';
import type { WorkerTransport } from '../workers/transport.js';
import { verify } from '../verification/verifier.js';

// ============================================================================
// Data Builders
// ============================================================================

export const TEST_REQUEST_ID = 'req-20260115-103000-0a1b2c3d';

export function createMockRequest(overrides: Partial<ClassificationRequest> = {}): ClassificationRequest {
  return {
    requestId: TEST_REQUEST_ID,
    imageReference: 's3://uploads/test-image.png',
    prompt: 'Classify this image',
    minConfidence: 0.7,
    createdAt: '2026-01-15T10:30:00.000Z',
    ...overrides,
  };
}

export function createMockTarget(workerId: string, domain: Domain, port = 9000): WorkerTarget {
  return {
    workerId,
    domain,
    endpoint: `http://localhost:${port}`,
    organization: `${workerId}-org`,
  };
}

export function createSuccessOutcome(
  workerId: string,
  domain: Domain,
  label: string,
  confidence: number,
  latencyMs = 10
): SuccessOutcome {
  return {
    kind: 'success',
    workerId,
    domain,
    label,
    confidence,
    topK: [{ label, confidence, rank: 1 }],
    latencyMs,
  };
}

export function createMockIntent(
  ranked: ReadonlyArray<readonly [Domain, number]>,
  source: IntentSource = 'judgment'
): IntentResult {
  const scores = ranked.map(([domain, confidence]) => ({ domain, confidence }));
  return {
    ranked: scores,
    topDomain: scores[0]?.domain ?? 'general',
    reasoning: 'test intent',
    source,
  };
}

/**
 * A recorded pass over the given outcomes, verified as the orchestrator would.
 */
export function createHistoryEntry(
  iteration: number,
  mode: RoutingMode,
  outcomes: TaskOutcome[],
  intent: IntentResult = createMockIntent([[outcomes[0]?.domain ?? 'general', 0.9]])
): HistoryEntry {
  return {
    iteration,
    intent,
    decision: { mode, domains: [intent.topDomain], reason: 'test routing' },
    targets: outcomes.map((outcome) => createMockTarget(outcome.workerId, outcome.domain)),
    outcomes,
    verdict: verify(outcomes, 0.7, mode, intent.topDomain),
    prompt: 'Classify this image',
  };
}

// ============================================================================
// Scripted Judgment
// ============================================================================

/** A fixed output, or a function of the judgment input */
type ScriptStep = unknown;

function isStepFunction(step: ScriptStep): step is (input: JudgmentInput) => unknown {
  return typeof step === 'function';
}

/**
 * Replays scripted outputs per judgment kind. An Error step is thrown; the
 * last step repeats once the script runs out.
 */
export class ScriptedJudgment implements JudgmentFunction {
  readonly name = 'scripted';
  readonly calls: JudgmentInput[] = [];
  private readonly intentSteps: ScriptStep[];
  private readonly reflectionSteps: ScriptStep[];

  constructor(script: { intent?: ScriptStep[]; reflection?: ScriptStep[] }) {
    this.intentSteps = [...(script.intent ?? [])];
    this.reflectionSteps = [...(script.reflection ?? [])];
  }

  async judge(input: JudgmentInput): Promise<unknown> {
    this.calls.push(input);
    const steps = input.kind === 'intent' ? this.intentSteps : this.reflectionSteps;
    const step = steps.length > 1 ? steps.shift() : steps[0];

    if (step === undefined) {
      throw new Error(`No scripted ${input.kind} judgment`);
    }
    const value = isStepFunction(step) ? step(input) : step;
    if (value instanceof Error) {
      throw value;
    }
    return value;
  }

  callsOf(kind: JudgmentInput['kind']): JudgmentInput[] {
    return this.calls.filter((call) => call.kind === kind);
  }
}

// ============================================================================
// Fake Transport
// ============================================================================

export interface FakeWorkerBehaviour {
  /** Reply body; objects are JSON-encoded */
  reply?: string | object;
  /** Error to throw instead of replying */
  error?: Error;
  /** Delay before replying */
  delayMs?: number;
  /** Never reply (until aborted) */
  hang?: boolean;
}

/**
 * Worker transport answering from a per-worker script. Pending replies
 * settle when the client aborts, so no timer outlives a test.
 */
export class FakeTransport implements WorkerTransport {
  readonly sent: Array<{ workerId: string; payload: WorkerTaskPayload }> = [];
  private readonly behaviours: Map<string, FakeWorkerBehaviour>;

  constructor(behaviours: Record<string, FakeWorkerBehaviour>) {
    this.behaviours = new Map(Object.entries(behaviours));
  }

  setBehaviour(workerId: string, behaviour: FakeWorkerBehaviour): void {
    this.behaviours.set(workerId, behaviour);
  }

  async send(target: WorkerTarget, payload: WorkerTaskPayload, signal: AbortSignal): Promise<string> {
    this.sent.push({ workerId: target.workerId, payload });
    const behaviour = this.behaviours.get(target.workerId) ?? { error: new Error(`No fake for ${target.workerId}`) };

    if (behaviour.hang || behaviour.delayMs) {
      await waitOrAbort(behaviour.hang ? undefined : behaviour.delayMs, signal);
    }
    if (behaviour.error) {
      throw behaviour.error;
    }
    const reply = behaviour.reply ?? '';
    return typeof reply === 'string' ? reply : JSON.stringify(reply);
  }

  sentTo(): string[] {
    return this.sent.map((entry) => entry.workerId);
  }
}

function waitOrAbort(delayMs: number | undefined, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      if (timer) {
        clearTimeout(timer);
      }
      const error = new Error('aborted');
      error.name = 'AbortError';
      reject(error);
    };
    const timer =
      delayMs === undefined
        ? undefined
        : setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
          }, delayMs);

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// Fake Registry
// ============================================================================

/**
 * Registry answering from a per-domain table. An Error entry is thrown.
 */
export class FakeRegistry implements WorkerRegistry {
  readonly mode = 'static' as const;
  readonly resolved: Domain[] = [];
  private readonly table: Partial<Record<Domain, WorkerTarget[] | Error>>;

  constructor(table: Partial<Record<Domain, WorkerTarget[] | Error>>) {
    this.table = table;
  }

  async resolve(domain: Domain): Promise<WorkerTarget[]> {
    this.resolved.push(domain);
    const entry = this.table[domain] ?? [];
    if (entry instanceof Error) {
      throw entry;
    }
    return entry.map((target) => ({ ...target }));
  }
}
