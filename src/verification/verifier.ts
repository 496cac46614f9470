/**
 * Verifier
 *
 * Turns one pass's outcomes into a verdict. SINGLE passes go through the
 * confidence gate, ENSEMBLE passes through the strict-majority vote.
 *
 * @module verification/verifier
 */

import type { Domain } from '../schemas/common.js';
import type { RoutingMode } from '../schemas/routing.js';
import type { SuccessOutcome, TaskOutcome } from '../schemas/worker.js';
import type { VerificationVerdict } from '../schemas/verification.js';
import { applyConfidenceGate } from './confidence-gate.js';
import { applyEnsembleVote, countVotes } from './ensemble-vote.js';
import { isSuccessOutcome } from '../schemas/worker.js';

export function buildMismatchWarning(chosen: SuccessOutcome, topDomain: Domain): string | null {
  if (chosen.domain === topDomain) {
    return null;
  }
  return `Accepted label came from ${chosen.domain} worker ${chosen.workerId}, but intent ranked ${topDomain} first`;
}

export function verify(
  outcomes: readonly TaskOutcome[],
  minConfidence: number,
  mode: RoutingMode,
  topDomain: Domain
): VerificationVerdict {
  if (mode === 'SINGLE') {
    const gate = applyConfidenceGate(outcomes, minConfidence);
    return {
      accepted: gate.chosen !== null,
      reason: gate.reason,
      mode,
      chosenOutcome: gate.chosen,
      mismatchWarning: gate.chosen ? buildMismatchWarning(gate.chosen, topDomain) : null,
      votes: countVotes(outcomes.filter(isSuccessOutcome)),
      notes: gate.notes,
    };
  }

  const vote = applyEnsembleVote(outcomes);
  return {
    accepted: vote.chosen !== null,
    reason: vote.reason,
    mode,
    chosenOutcome: vote.chosen,
    mismatchWarning: vote.chosen ? buildMismatchWarning(vote.chosen, topDomain) : null,
    votes: vote.votes,
    notes: vote.notes,
  };
}

/**
 * Verdict for a pass whose routing resolved no workers at all.
 */
export function verifyNoTargets(mode: RoutingMode, domains: readonly Domain[]): VerificationVerdict {
  return {
    accepted: false,
    reason: 'worker-error',
    mode,
    chosenOutcome: null,
    mismatchWarning: null,
    votes: {},
    notes: `No workers available for ${domains.join(', ')}`,
  };
}
