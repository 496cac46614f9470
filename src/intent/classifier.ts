/**
 * Intent Classifier
 *
 * Maps a prompt to ranked candidate domains through the judgment
 * function. Any bad judgment (failure, timeout, schema violation, unknown
 * domain) is a MalformedJudgmentError, recovered as a low-confidence
 * general intent rather than a crash.
 *
 * @module intent/classifier
 */

import { KNOWN_DOMAINS, type Domain } from '../schemas/common.js';
import type { DomainScore, IntentResult } from '../schemas/intent.js';
import type { JudgmentFunction } from '../judgment/types.js';
import { IntentJudgmentSchema } from '../judgment/schemas.js';
import { MalformedJudgmentError } from '../judgment/errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { withTimeout } from '../utils/timeout.js';

/** Conservative default when the judgment is unusable */
export const FALLBACK_INTENT: IntentResult = {
  ranked: [{ domain: 'general', confidence: 0.5 }],
  topDomain: 'general',
  reasoning: 'Fallback: judgment unavailable',
  source: 'fallback',
};

export interface IntentClassifierOptions {
  judgment: JudgmentFunction;
  /** Bound on one judgment call */
  timeoutMs: number;
  logger?: Logger;
}

export class IntentClassifier {
  private readonly judgment: JudgmentFunction;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: IntentClassifierOptions) {
    this.judgment = options.judgment;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Rank candidate domains for the prompt. Never rejects.
   */
  async classify(prompt: string, imageReference: string): Promise<IntentResult> {
    try {
      return await this.judge(prompt, imageReference);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${message}; falling back to general intent`);
      return { ...FALLBACK_INTENT, ranked: [...FALLBACK_INTENT.ranked], reasoning: `Fallback: ${message}` };
    }
  }

  /**
   * @throws MalformedJudgmentError
   */
  private async judge(prompt: string, imageReference: string): Promise<IntentResult> {
    let output: unknown;
    try {
      output = await withTimeout(
        this.judgment.judge({ kind: 'intent', prompt, imageReference, knownDomains: KNOWN_DOMAINS }),
        this.timeoutMs,
        'Intent judgment'
      );
    } catch (error) {
      throw new MalformedJudgmentError('intent', error instanceof Error ? error.message : String(error), error);
    }

    const parsed = IntentJudgmentSchema.safeParse(output);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MalformedJudgmentError('intent', `${issue.path.join('.')}: ${issue.message}`, parsed.error);
    }

    const ranked = rankScores(parsed.data.scores);
    const top = ranked[0];
    this.logger.debug(`Intent: ${ranked.map((score) => `${score.domain}=${score.confidence}`).join(', ')}`);

    return {
      ranked,
      topDomain: top.domain,
      reasoning: parsed.data.reasoning,
      source: 'judgment',
    };
  }
}

/**
 * Deduplicate by domain (keeping the highest score) and sort highest
 * first. Ties keep known-domain order.
 */
export function rankScores(scores: readonly DomainScore[]): DomainScore[] {
  const best = new Map<Domain, number>();
  for (const score of scores) {
    best.set(score.domain, Math.max(best.get(score.domain) ?? 0, score.confidence));
  }

  return KNOWN_DOMAINS.filter((domain) => best.has(domain))
    .map((domain) => ({ domain, confidence: best.get(domain) ?? 0 }))
    .sort((a, b) => b.confidence - a.confidence);
}
