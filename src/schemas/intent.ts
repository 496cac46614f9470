/**
 * Intent Schemas
 *
 * Ranked domain candidates produced by the intent classifier on every
 * supervisor pass.
 */

import { z } from 'zod';
import { ConfidenceSchema, DomainSchema } from './common.js';

export const DomainScoreSchema = z.object({
  domain: DomainSchema,
  confidence: ConfidenceSchema,
});

export type DomainScore = z.infer<typeof DomainScoreSchema>;

/**
 * Where an intent came from
 * - judgment: validated output of the judgment function
 * - fallback: conservative default after a malformed or failed judgment
 */
export const IntentSourceSchema = z.enum(['judgment', 'fallback']);

export type IntentSource = z.infer<typeof IntentSourceSchema>;

export const IntentResultSchema = z
  .object({
    /** Candidate domains, highest confidence first */
    ranked: z.array(DomainScoreSchema).min(1),

    /** Domain of ranked[0] */
    topDomain: DomainSchema,

    /** Short explanation for logs and poll responses */
    reasoning: z.string(),

    source: IntentSourceSchema,
  })
  .refine((intent) => intent.ranked[0]?.domain === intent.topDomain, {
    message: 'topDomain must be the first ranked domain',
    path: ['topDomain'],
  });

export type IntentResult = z.infer<typeof IntentResultSchema>;
