/**
 * Routing Schemas
 *
 * Routing decisions and the replan strategy that can adjust them between
 * iterations.
 */

import { z } from 'zod';
import { DomainSchema } from './common.js';
import type { SuccessOutcome } from './worker.js';

/**
 * Routing mode
 * - SINGLE: dispatch to one worker of the top domain
 * - ENSEMBLE: dispatch to every worker of every routed domain and vote
 */
export const RoutingModeSchema = z.enum(['SINGLE', 'ENSEMBLE']);

export type RoutingMode = z.infer<typeof RoutingModeSchema>;

export const RoutingDecisionSchema = z.object({
  mode: RoutingModeSchema,

  /** Domains to dispatch to, in intent rank order */
  domains: z.array(DomainSchema).min(1),

  /** Why this mode was chosen */
  reason: z.string(),
});

export type RoutingDecision = z.infer<typeof RoutingDecisionSchema>;

/**
 * Adjustments carried from a rejected pass into the next one.
 */
export const ReplanStrategySchema = z.object({
  /** Route ENSEMBLE regardless of intent confidence */
  forceEnsemble: z.boolean(),

  /** Worker IDs to leave out of the next dispatch */
  excludeWorkers: z.array(z.string().min(1)),

  /** Replacement prompt for the next intent pass */
  adjustedPrompt: z.string().min(1).nullable(),
});

export type ReplanStrategy = z.infer<typeof ReplanStrategySchema>;

export const INITIAL_STRATEGY: ReplanStrategy = {
  forceEnsemble: false,
  excludeWorkers: [],
  adjustedPrompt: null,
};

/**
 * Reflector output. SUCCEED carries the outcome to accept despite the
 * rejected verdict.
 */
export type ReplanDecision =
  | { action: 'SUCCEED'; reason: string; mismatchWarning: string; outcome: SuccessOutcome }
  | { action: 'REPLAN'; reason: string; strategy: ReplanStrategy }
  | { action: 'GIVE_UP'; reason: string };
