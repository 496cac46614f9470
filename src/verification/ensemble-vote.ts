/**
 * Ensemble Vote
 *
 * ENSEMBLE-mode check: a label must be held by strictly more than half of
 * the workers that answered, and at least two must have answered. An
 * exact 50/50 split is a disagreement. Labels are compared trimmed and
 * case-insensitively.
 *
 * The result does not depend on outcome order: the canonical outcome is
 * the highest-confidence agreeing one, ties broken by worker ID.
 *
 * @module verification/ensemble-vote
 */

import type { SuccessOutcome, TaskOutcome } from '../schemas/worker.js';
import { isSuccessOutcome } from '../schemas/worker.js';
import type { VerdictReason } from '../schemas/verification.js';
import { describeFailures } from './describe.js';

export const MIN_RESPONDING_WORKERS = 2;

export interface VoteResult {
  reason: VerdictReason;
  chosen: SuccessOutcome | null;
  votes: Record<string, number>;
  notes: string;
}

export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase();
}

export function countVotes(outcomes: readonly SuccessOutcome[]): Record<string, number> {
  const votes: Record<string, number> = {};
  for (const outcome of outcomes) {
    const label = normalizeLabel(outcome.label);
    votes[label] = (votes[label] ?? 0) + 1;
  }
  return votes;
}

function pickCanonical(agreeing: readonly SuccessOutcome[]): SuccessOutcome | null {
  let best: SuccessOutcome | null = null;
  for (const outcome of agreeing) {
    if (
      !best ||
      outcome.confidence > best.confidence ||
      (outcome.confidence === best.confidence && outcome.workerId < best.workerId)
    ) {
      best = outcome;
    }
  }
  return best;
}

export function applyEnsembleVote(outcomes: readonly TaskOutcome[]): VoteResult {
  const successes = outcomes.filter(isSuccessOutcome);
  const votes = countVotes(successes);

  if (successes.length < MIN_RESPONDING_WORKERS) {
    return {
      reason: 'worker-error',
      chosen: null,
      votes,
      notes: `Only ${successes.length} of ${outcomes.length} workers answered (${describeFailures(outcomes)})`,
    };
  }

  const [leader, count] = Object.entries(votes).reduce(
    (top, entry) => (entry[1] > top[1] || (entry[1] === top[1] && entry[0] < top[0]) ? entry : top),
    ['', 0]
  );

  if (count * 2 <= successes.length) {
    return {
      reason: 'ensemble-disagreement',
      chosen: null,
      votes,
      notes: `No strict majority among ${successes.length} answers: ${formatVotes(votes)}`,
    };
  }

  const chosen = pickCanonical(successes.filter((outcome) => normalizeLabel(outcome.label) === leader));
  return {
    reason: chosen ? 'ok' : 'ensemble-disagreement',
    chosen,
    votes,
    notes: `${count}/${successes.length} workers agreed on '${leader}'`,
  };
}

function formatVotes(votes: Record<string, number>): string {
  return Object.entries(votes)
    .map(([label, count]) => `${label}=${count}`)
    .join(', ');
}
