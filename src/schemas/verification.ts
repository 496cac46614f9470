/**
 * Verification Schemas
 */

import { z } from 'zod';
import { SuccessOutcomeSchema } from './worker.js';
import { RoutingModeSchema } from './routing.js';

/**
 * Verdict reason
 * - ok: accepted
 * - below-threshold: the single responding worker was not confident enough
 * - ensemble-disagreement: no strict majority among responding workers
 * - worker-error: too few workers answered (or none could be resolved)
 */
export const VerdictReasonSchema = z.enum([
  'ok',
  'below-threshold',
  'ensemble-disagreement',
  'worker-error',
]);

export type VerdictReason = z.infer<typeof VerdictReasonSchema>;

export const VerificationVerdictSchema = z
  .object({
    accepted: z.boolean(),
    reason: VerdictReasonSchema,
    mode: RoutingModeSchema,

    /** The canonical outcome; set iff accepted */
    chosenOutcome: SuccessOutcomeSchema.nullable(),

    /** Non-fatal note that the chosen worker's domain differs from the intent */
    mismatchWarning: z.string().nullable(),

    /** Label vote counts among responding workers */
    votes: z.record(z.string(), z.number().int().nonnegative()),

    /** Human-readable summary */
    notes: z.string(),
  })
  .refine((verdict) => verdict.accepted === (verdict.chosenOutcome !== null), {
    message: 'chosenOutcome must be set exactly when the verdict is accepted',
    path: ['chosenOutcome'],
  });

export type VerificationVerdict = z.infer<typeof VerificationVerdictSchema>;

/**
 * Whether reflection may still accept an outcome from this rejected
 * verdict as a domain mismatch. An ensemble that disagreed or fell short
 * of two answers stays rejected.
 */
export function isOverridableVerdict(verdict: VerificationVerdict): boolean {
  if (verdict.accepted || verdict.reason === 'ensemble-disagreement') {
    return false;
  }
  return !(verdict.reason === 'worker-error' && verdict.mode === 'ENSEMBLE');
}
