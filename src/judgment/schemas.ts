/**
 * Judgment Output Schemas
 *
 * Shapes the orchestrator accepts back from the judgment function.
 * Field names follow the snake_case JSON that models are asked for.
 *
 * @module judgment/schemas
 */

import { z } from 'zod';
import { ConfidenceSchema, DomainSchema } from '../schemas/common.js';

export const IntentJudgmentSchema = z.object({
  scores: z
    .array(
      z.object({
        domain: DomainSchema,
        confidence: ConfidenceSchema,
      })
    )
    .min(1),
  reasoning: z.string().default(''),
});

export type IntentJudgment = z.infer<typeof IntentJudgmentSchema>;

export const ReflectionDecisionSchema = z.enum(['replan', 'give_up', 'succeed']);

export type ReflectionDecision = z.infer<typeof ReflectionDecisionSchema>;

export const ReflectionJudgmentSchema = z.object({
  decision: ReflectionDecisionSchema,
  reason: z.string().min(1),

  /** The image does not belong to the requested domain; retrying won't help */
  mismatch_detected: z.boolean().default(false),

  force_ensemble: z.boolean().default(false),
  exclude_workers: z.array(z.string().min(1)).default([]),
  adjusted_prompt: z.string().min(1).nullable().default(null),
});

export type ReflectionJudgment = z.infer<typeof ReflectionJudgmentSchema>;

export type ReflectionJudgmentInputShape = z.input<typeof ReflectionJudgmentSchema>;
