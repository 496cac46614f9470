/**
 * Judgment Prompt Templates
 *
 * Prompts for the two judgment kinds. Both ask for a single JSON object
 * matching the schemas in ./schemas.ts.
 *
 * @module judgment/prompts
 */

import type { Domain } from '../schemas/common.js';
import type { HistoryEntry } from '../schemas/state.js';
import type { TaskOutcome } from '../schemas/worker.js';
import type { IntentJudgmentInput, ReflectionJudgmentInput } from './types.js';

/**
 * Domain descriptions shown to the model when ranking intent.
 */
const DOMAIN_DESCRIPTIONS: Record<Domain, string> = {
  medical:
    'Medical imaging - chest X-rays, CT, MRI and other diagnostic scans. Finds abnormalities and signs of disease.',
  satellite:
    'Satellite and aerial imagery - land use, urban development, forest cover, water bodies, agriculture.',
  general:
    'General-purpose classification - everyday objects, scenes and animals. Use when no specialty clearly applies.',
};

/**
 * Build the prompt that ranks candidate domains for a classification request
 *
 * @example
 * ```typescript
 * const prompt = buildIntentPrompt({ kind: 'intent', prompt: 'Analyze this chest X-ray', imageReference, knownDomains: KNOWN_DOMAINS });
 * ```
 */
export function buildIntentPrompt(input: IntentJudgmentInput): string {
  const domains = input.knownDomains
    .map((domain) => `- **${domain}**: ${DOMAIN_DESCRIPTIONS[domain]}`)
    .join('\n');

  return `You are the intent classifier for an image classification network. Decide which specialist domains should handle the request below.

## Request

- **Prompt**: ${input.prompt}
- **Image reference**: ${input.imageReference}

## Known Domains

${domains}

## Instructions

1. Score every domain that could plausibly apply with a confidence between 0 and 1.
2. Order scores from most to least likely.
3. Use only the domain names listed above.
4. When the prompt is ambiguous, give close scores to the competing domains.

## Output Format

Return ONLY a JSON object:

{
  "scores": [{ "domain": "medical", "confidence": 0.92 }],
  "reasoning": "One sentence explaining the ranking"
}`;
}

function formatOutcome(outcome: TaskOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return `  - ${outcome.workerId} (${outcome.domain}): ${outcome.label} @ ${outcome.confidence.toFixed(2)}`;
    case 'error':
      return `  - ${outcome.workerId} (${outcome.domain}): error ${outcome.code} - ${outcome.message}`;
    case 'timeout':
      return `  - ${outcome.workerId} (${outcome.domain}): timed out after ${outcome.timeoutMs}ms`;
  }
}

function formatPass(entry: HistoryEntry): string {
  const outcomes = entry.outcomes.length > 0
    ? entry.outcomes.map(formatOutcome).join('\n')
    : '  - (no workers dispatched)';

  return `### Pass ${entry.iteration}
- Top domain: ${entry.intent.topDomain} (${entry.intent.source})
- Routing: ${entry.decision.mode} to ${entry.decision.domains.join(', ')}
- Verdict: ${entry.verdict.reason} - ${entry.verdict.notes}
- Outcomes:
${outcomes}`;
}

/**
 * Build the reflection prompt from the full pass history
 */
export function buildReflectionPrompt(input: ReflectionJudgmentInput): string {
  const passes = input.history.map(formatPass).join('\n\n');

  return `You are evaluating image classification results that failed verification.

Request: ${input.prompt}
Required confidence: ${input.minConfidence}
Iteration: ${input.iteration}/${input.maxReplans}

## History

${passes}

## Decide

- "replan": results are poor and a different strategy could help. You may force ensemble routing, exclude workers that failed, or rephrase the prompt.
- "give_up": retrying is unlikely to help.
- "succeed": only together with "mismatch_detected" (see below). An ensemble that disagreed or got fewer than two answers cannot be accepted.

Mismatch detection: if the results show the image does NOT belong to the requested domain (for example a medical classifier labels it "non-medical image"), set "mismatch_detected": true and "decision": "succeed", and explain in "reason" what the image appears to be versus what was requested. Retrying will not fix a mismatch.

## Output Format

Return ONLY a JSON object:

{
  "decision": "replan",
  "reason": "Short explanation",
  "mismatch_detected": false,
  "force_ensemble": true,
  "exclude_workers": [],
  "adjusted_prompt": null
}`;
}
