/**
 * Orchestration Configuration
 *
 * Thresholds, ceilings and timeouts that shape the request lifecycle.
 * Every blocking wait is bounded by one of these timeouts, so a request
 * reaches a terminal state within
 * maxReplans * (registryTimeoutMs + workerTimeoutMs + 2 * judgmentTimeoutMs).
 *
 * @module config/orchestration
 */

import { z } from 'zod';

export const OrchestratorConfigSchema = z.object({
  /** Default confidence gate for requests that don't set one */
  minConfidence: z.number().min(0).max(1).default(0.7),

  /** Minimum top-domain confidence for SINGLE routing */
  routingThreshold: z.number().min(0).max(1).default(0.75),

  /** Domains within this distance of the top domain count as ambiguous */
  ambiguityMargin: z.number().min(0).max(1).default(0.15),

  /** Hard ceiling on supervisor passes per request */
  maxReplans: z.number().int().positive().default(3),

  /** Per-dispatch worker timeout */
  workerTimeoutMs: z.number().int().positive().default(30000),

  /** Timeout for one judgment call (intent or reflection) */
  judgmentTimeoutMs: z.number().int().positive().default(15000),

  /** Timeout for one registry resolution */
  registryTimeoutMs: z.number().int().positive().default(5000),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;

export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;

/**
 * Build a validated orchestrator config. Undefined overrides fall back to
 * the defaults above.
 *
 * @example
 * ```typescript
 * const cfg = buildOrchestratorConfig({ maxReplans: 2 });
 * cfg.routingThreshold; // 0.75
 * ```
 */
export function buildOrchestratorConfig(overrides: OrchestratorConfigInput = {}): OrchestratorConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return OrchestratorConfigSchema.parse(defined);
}

/**
 * Upper bound on how long one request can stay PROCESSING.
 */
export function maxRequestDurationMs(cfg: OrchestratorConfig): number {
  return cfg.maxReplans * (cfg.registryTimeoutMs + cfg.workerTimeoutMs + 2 * cfg.judgmentTimeoutMs);
}
