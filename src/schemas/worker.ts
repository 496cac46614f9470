/**
 * Worker Schemas
 *
 * Targets resolved by the registry, the wire shapes exchanged with
 * classification workers, and the closed set of per-worker outcomes.
 */

import { z } from 'zod';
import { ConfidenceSchema, DomainSchema } from './common.js';

// ============================================================================
// Worker Target Schema
// ============================================================================

/**
 * A resolved, reachable worker endpoint for one domain.
 */
export const WorkerTargetSchema = z.object({
  /** Stable worker identifier (e.g., "org-a-medical-clf-001") */
  workerId: z.string().min(1),

  /** Domain the worker specialises in */
  domain: DomainSchema,

  /** Resolved base address */
  endpoint: z.string().url(),

  /** Organisation operating the worker */
  organization: z.string().min(1),

  /** Display name */
  name: z.string().optional(),
});

export type WorkerTarget = z.infer<typeof WorkerTargetSchema>;

// ============================================================================
// Top-K Prediction Schema
// ============================================================================

export const TopKPredictionSchema = z.object({
  label: z.string().min(1),
  confidence: ConfidenceSchema,
  rank: z.number().int().positive(),
});

export type TopKPrediction = z.infer<typeof TopKPredictionSchema>;

// ============================================================================
// Wire Schemas
// ============================================================================

/**
 * Task payload sent to a worker.
 */
export interface WorkerTaskPayload {
  request_id: string;
  image_reference: string;
  prompt: string;
}

/**
 * Successful worker reply. `top_k` ranks may be omitted by the worker.
 */
export const WorkerSuccessResponseSchema = z.object({
  label: z.string().min(1),
  confidence: ConfidenceSchema,
  top_k: z
    .array(
      z.object({
        label: z.string().min(1),
        confidence: ConfidenceSchema,
        rank: z.number().int().positive().optional(),
      })
    )
    .optional(),
});

export type WorkerSuccessResponse = z.infer<typeof WorkerSuccessResponseSchema>;

/**
 * Worker-reported failure.
 */
export const WorkerErrorResponseSchema = z.object({
  error: z.object({
    code: z.string().min(1),
    message: z.string().optional(),
  }),
});

export type WorkerErrorResponse = z.infer<typeof WorkerErrorResponseSchema>;

// ============================================================================
// Task Outcome Schema
// ============================================================================

/**
 * Fields shared by every outcome variant.
 */
const OutcomeBaseSchema = z.object({
  workerId: z.string().min(1),
  domain: DomainSchema,
  latencyMs: z.number().nonnegative(),
});

export const SuccessOutcomeSchema = OutcomeBaseSchema.extend({
  kind: z.literal('success'),
  label: z.string().min(1),
  confidence: ConfidenceSchema,
  topK: z.array(TopKPredictionSchema),
});

export const ErrorOutcomeSchema = OutcomeBaseSchema.extend({
  kind: z.literal('error'),
  code: z.string().min(1),
  message: z.string(),
});

export const TimeoutOutcomeSchema = OutcomeBaseSchema.extend({
  kind: z.literal('timeout'),
  timeoutMs: z.number().int().positive(),
});

/**
 * TaskOutcome: result of one dispatch in one iteration.
 * - success: the worker returned a label
 * - error: the worker or transport reported a failure
 * - timeout: no reply within the per-call timeout
 */
export const TaskOutcomeSchema = z.discriminatedUnion('kind', [
  SuccessOutcomeSchema,
  ErrorOutcomeSchema,
  TimeoutOutcomeSchema,
]);

export type TaskOutcome = z.infer<typeof TaskOutcomeSchema>;

export type SuccessOutcome = z.infer<typeof SuccessOutcomeSchema>;
export type ErrorOutcome = z.infer<typeof ErrorOutcomeSchema>;
export type TimeoutOutcome = z.infer<typeof TimeoutOutcomeSchema>;

/**
 * Error codes produced by the orchestrator itself (workers may report others).
 */
export const WORKER_ERROR_CODES = {
  TRANSPORT_UNAVAILABLE: 'TRANSPORT_UNAVAILABLE',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
  WORKER_ERROR: 'WORKER_ERROR',
} as const;

// ============================================================================
// Helper Functions
// ============================================================================

export function isSuccessOutcome(outcome: TaskOutcome): outcome is SuccessOutcome {
  return outcome.kind === 'success';
}

/**
 * Create an error outcome for a target
 */
export function createErrorOutcome(
  target: Pick<WorkerTarget, 'workerId' | 'domain'>,
  code: string,
  message: string,
  latencyMs: number
): ErrorOutcome {
  return {
    kind: 'error',
    workerId: target.workerId,
    domain: target.domain,
    code,
    message,
    latencyMs,
  };
}

/**
 * Create a timeout outcome for a target
 */
export function createTimeoutOutcome(
  target: Pick<WorkerTarget, 'workerId' | 'domain'>,
  timeoutMs: number,
  latencyMs: number
): TimeoutOutcome {
  return {
    kind: 'timeout',
    workerId: target.workerId,
    domain: target.domain,
    timeoutMs,
    latencyMs,
  };
}
