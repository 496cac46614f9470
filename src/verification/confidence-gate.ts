/**
 * Confidence Gate
 *
 * SINGLE-mode check: exactly one worker answered and it is confident
 * enough.
 *
 * @module verification/confidence-gate
 */

import type { SuccessOutcome, TaskOutcome } from '../schemas/worker.js';
import { isSuccessOutcome } from '../schemas/worker.js';
import type { VerdictReason } from '../schemas/verification.js';
import { describeFailures } from './describe.js';

export interface GateResult {
  reason: VerdictReason;
  chosen: SuccessOutcome | null;
  notes: string;
}

export function applyConfidenceGate(outcomes: readonly TaskOutcome[], minConfidence: number): GateResult {
  const successes = outcomes.filter(isSuccessOutcome);

  if (successes.length === 0) {
    return { reason: 'worker-error', chosen: null, notes: `No worker answered: ${describeFailures(outcomes)}` };
  }

  if (successes.length > 1) {
    return {
      reason: 'below-threshold',
      chosen: null,
      notes: `Expected one answer in single mode, got ${successes.length}`,
    };
  }

  const [only] = successes;
  if (only.confidence < minConfidence) {
    return {
      reason: 'below-threshold',
      chosen: null,
      notes: `${only.workerId} returned '${only.label}' at ${only.confidence}, below ${minConfidence}`,
    };
  }

  return {
    reason: 'ok',
    chosen: only,
    notes: `${only.workerId} returned '${only.label}' at ${only.confidence}`,
  };
}
