/**
 * Keyword Judgment
 *
 * Deterministic, offline judgment function used when no model API key is
 * configured. Intent comes from keyword matches on the prompt; reflection
 * always replans.
 *
 * @module judgment/keyword-judgment
 */

import type { Domain } from '../schemas/common.js';
import { isSuccessOutcome } from '../schemas/worker.js';
import type { IntentJudgment, ReflectionJudgmentInputShape } from './schemas.js';
import type { IntentJudgmentInput, JudgmentFunction, JudgmentInput, ReflectionJudgmentInput } from './types.js';

const KEYWORD_CONFIDENCE = 0.7;
const DEFAULT_CONFIDENCE = 0.5;

const DOMAIN_KEYWORDS: ReadonlyArray<{ domain: Domain; keywords: readonly string[] }> = [
  { domain: 'medical', keywords: ['xray', 'x-ray', 'ct', 'mri', 'medical', 'pneumonia', 'diagnosis'] },
  { domain: 'satellite', keywords: ['satellite', 'aerial', 'landsat', 'urban', 'forest'] },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');
}

/**
 * Whole-word match, so "ct" does not fire on "objects".
 */
function containsKeyword(text: string, keyword: string): boolean {
  return new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i').test(text);
}

/**
 * Rank domains from keyword matches on the prompt. First matching group
 * wins; no match means general.
 */
export function classifyByKeywords(prompt: string): IntentJudgment {
  for (const group of DOMAIN_KEYWORDS) {
    const matched = group.keywords.find((keyword) => containsKeyword(prompt, keyword));
    if (matched) {
      return {
        scores: [{ domain: group.domain, confidence: KEYWORD_CONFIDENCE }],
        reasoning: `Keyword match: ${group.domain} terms ("${matched}")`,
      };
    }
  }

  return {
    scores: [{ domain: 'general', confidence: DEFAULT_CONFIDENCE }],
    reasoning: 'No domain keywords found; defaulting to general',
  };
}

/**
 * Rule-based reflection: never asks to accept. Replans as an ensemble
 * without the failed workers; the iteration ceiling ends the loop.
 */
export function reflectByRules(input: ReflectionJudgmentInput): ReflectionJudgmentInputShape {
  const last = input.history[input.history.length - 1];
  const outcomes = last?.outcomes ?? [];
  const best = Math.max(0, ...outcomes.filter(isSuccessOutcome).map((outcome) => outcome.confidence));
  const verdict = last?.verdict.reason ?? 'worker-error';

  return {
    decision: 'replan',
    reason: `Rule-based reflection: ${verdict} with best confidence ${best.toFixed(2)} (threshold ${input.minConfidence})`,
    force_ensemble: true,
    exclude_workers: outcomes.filter((outcome) => !isSuccessOutcome(outcome)).map((outcome) => outcome.workerId),
  };
}

export class KeywordJudgment implements JudgmentFunction {
  readonly name = 'keyword';

  async judge(input: JudgmentInput): Promise<unknown> {
    return input.kind === 'intent' ? this.judgeIntent(input) : reflectByRules(input);
  }

  private judgeIntent(input: IntentJudgmentInput): IntentJudgment {
    return classifyByKeywords(input.prompt);
  }
}
