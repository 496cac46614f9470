/**
 * Request State Schemas
 *
 * RequestState is the aggregate record for one request across its
 * lifetime. Only the state machine writes it; everyone else reads
 * snapshots.
 */

import { z } from 'zod';
import { ISO8601TimestampSchema } from './common.js';
import { ClassificationRequestSchema } from './request.js';
import { IntentResultSchema } from './intent.js';
import { WorkerTargetSchema, TaskOutcomeSchema, SuccessOutcomeSchema } from './worker.js';
import { RoutingDecisionSchema, ReplanStrategySchema } from './routing.js';
import { VerificationVerdictSchema, VerdictReasonSchema } from './verification.js';

// ============================================================================
// Phase and Status
// ============================================================================

/**
 * State machine phases. ACCEPT and FAIL are terminal.
 */
export const PhaseSchema = z.enum([
  'INTENT',
  'DISCOVER',
  'ROUTE',
  'EXECUTE',
  'VERIFY',
  'REFLECT',
  'ACCEPT',
  'FAIL',
]);

export type Phase = z.infer<typeof PhaseSchema>;

export const TERMINAL_PHASES: readonly Phase[] = ['ACCEPT', 'FAIL'];

/**
 * Externally observable request status.
 */
export const RequestStatusSchema = z.enum([
  'PROCESSING',
  'COMPLETED',
  'COMPLETED_WITH_WARNING',
  'FAILED',
]);

export type RequestStatus = z.infer<typeof RequestStatusSchema>;

export function isTerminalStatus(status: RequestStatus): boolean {
  return status !== 'PROCESSING';
}

// ============================================================================
// History
// ============================================================================

/**
 * One complete supervisor pass.
 */
export const HistoryEntrySchema = z.object({
  /** 1-based pass number */
  iteration: z.number().int().positive(),
  intent: IntentResultSchema,
  decision: RoutingDecisionSchema,
  targets: z.array(WorkerTargetSchema),
  outcomes: z.array(TaskOutcomeSchema),
  verdict: VerificationVerdictSchema,
  /** Prompt used for this pass (differs from the request after an adjusted replan) */
  prompt: z.string().min(1),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

// ============================================================================
// Final Result
// ============================================================================

/**
 * Terminal result. Set exactly when the request leaves PROCESSING.
 * - accepted: the canonical outcome plus any mismatch warning
 * - failed: the last verdict's reason and a readable message
 */
export const AcceptedResultSchema = z.object({
  kind: z.literal('accepted'),
  outcome: SuccessOutcomeSchema,
  mismatchWarning: z.string().nullable(),
});

export const FailedResultSchema = z.object({
  kind: z.literal('failed'),
  /** Last verdict reason, or internal-error for an unexpected exception */
  reason: z.union([VerdictReasonSchema, z.literal('internal-error')]),
  message: z.string().min(1),
});

export const FinalResultSchema = z.discriminatedUnion('kind', [
  AcceptedResultSchema,
  FailedResultSchema,
]);

export type FinalResult = z.infer<typeof FinalResultSchema>;
export type AcceptedResult = z.infer<typeof AcceptedResultSchema>;
export type FailedResult = z.infer<typeof FailedResultSchema>;

// ============================================================================
// Request State
// ============================================================================

export const RequestStateSchema = z.object({
  request: ClassificationRequestSchema,
  phase: PhaseSchema,

  /** Number of recorded passes; always equals history.length */
  iteration: z.number().int().nonnegative(),

  history: z.array(HistoryEntrySchema),

  /** Strategy applied to the current (or next) pass */
  strategy: ReplanStrategySchema,

  finalResult: FinalResultSchema.nullable(),
  status: RequestStatusSchema,

  /** Human-readable failure reason when status is FAILED */
  error: z.string().nullable(),

  updatedAt: ISO8601TimestampSchema,
});

export type RequestState = z.infer<typeof RequestStateSchema>;

// ============================================================================
// Poll Response
// ============================================================================

/**
 * The only view of a request exposed to the ingress. Intermediate phases
 * are not part of it.
 */
export const PollResponseSchema = z.object({
  requestId: z.string().min(1),
  status: RequestStatusSchema,
  result: AcceptedResultSchema.optional(),
  error: z.string().optional(),
  intent: IntentResultSchema.optional(),
  iterations: z.number().int().nonnegative(),
});

export type PollResponse = z.infer<typeof PollResponseSchema>;
