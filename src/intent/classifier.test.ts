/**
 * Tests for the intent classifier
 */

import { describe, it, expect } from '@jest/globals';
import { IntentClassifier, rankScores } from './classifier.js';
import { ScriptedJudgment } from '../testing/helpers.js';
import { sleep } from '../utils/timeout.js';
import { classifyByKeywords } from '../judgment/keyword-judgment.js';
import { SUGGESTED_PROMPTS, getSuggestedPrompts } from './suggested-prompts.js';

function createClassifier(judgment: ScriptedJudgment, timeoutMs = 1000): IntentClassifier {
  return new IntentClassifier({ judgment, timeoutMs });
}

describe('IntentClassifier', () => {
  it('returns the validated, ranked judgment', async () => {
    const judgment = new ScriptedJudgment({
      intent: [
        {
          scores: [
            { domain: 'general', confidence: 0.48 },
            { domain: 'satellite', confidence: 0.55 },
          ],
          reasoning: 'aerial photo of a field',
        },
      ],
    });

    const intent = await createClassifier(judgment).classify('What is in this aerial photo?', 's3://img');

    expect(intent).toEqual({
      ranked: [
        { domain: 'satellite', confidence: 0.55 },
        { domain: 'general', confidence: 0.48 },
      ],
      topDomain: 'satellite',
      reasoning: 'aerial photo of a field',
      source: 'judgment',
    });
    expect(judgment.calls[0]).toEqual({
      kind: 'intent',
      prompt: 'What is in this aerial photo?',
      imageReference: 's3://img',
      knownDomains: ['medical', 'satellite', 'general'],
    });
  });

  it('falls back to general on an unknown domain', async () => {
    const judgment = new ScriptedJudgment({
      intent: [{ scores: [{ domain: 'dental', confidence: 0.9 }], reasoning: 'teeth' }],
    });

    const intent = await createClassifier(judgment).classify('Check these teeth', 's3://img');

    expect(intent.source).toBe('fallback');
    expect(intent.ranked).toEqual([{ domain: 'general', confidence: 0.5 }]);
    expect(intent.topDomain).toBe('general');
  });

  it('falls back on out-of-range confidence and empty scores', async () => {
    const outOfRange = new ScriptedJudgment({ intent: [{ scores: [{ domain: 'medical', confidence: 1.4 }] }] });
    const empty = new ScriptedJudgment({ intent: [{ scores: [] }] });

    expect((await createClassifier(outOfRange).classify('x', 'y')).source).toBe('fallback');
    expect((await createClassifier(empty).classify('x', 'y')).source).toBe('fallback');
  });

  it('falls back when the judgment throws', async () => {
    const judgment = new ScriptedJudgment({ intent: [new Error('quota exceeded')] });

    const intent = await createClassifier(judgment).classify('x', 'y');

    expect(intent.source).toBe('fallback');
    expect(intent.reasoning).toBe('Fallback: Malformed intent judgment: quota exceeded');
  });

  it('falls back when the judgment is too slow', async () => {
    const judgment = new ScriptedJudgment({
      intent: [() => sleep(200).then(() => ({ scores: [{ domain: 'medical', confidence: 0.9 }] }))],
    });

    const intent = await createClassifier(judgment, 20).classify('x', 'y');

    expect(intent.source).toBe('fallback');
    expect(intent.reasoning).toBe('Fallback: Malformed intent judgment: Intent judgment timed out after 20ms');
  });

  it('defaults missing reasoning to an empty string', async () => {
    const judgment = new ScriptedJudgment({ intent: [{ scores: [{ domain: 'medical', confidence: 0.95 }] }] });
    const intent = await createClassifier(judgment).classify('x', 'y');
    expect(intent.reasoning).toBe('');
    expect(intent.source).toBe('judgment');
  });
});

describe('rankScores', () => {
  it('keeps the highest score per domain', () => {
    expect(
      rankScores([
        { domain: 'medical', confidence: 0.3 },
        { domain: 'general', confidence: 0.6 },
        { domain: 'medical', confidence: 0.8 },
      ])
    ).toEqual([
      { domain: 'medical', confidence: 0.8 },
      { domain: 'general', confidence: 0.6 },
    ]);
  });
});

describe('suggested prompts', () => {
  it.each(SUGGESTED_PROMPTS.map((entry) => [entry.id, entry.prompt, entry.domain] as const))(
    '%s routes to its domain offline',
    (_id, prompt, domain) => {
      expect(classifyByKeywords(prompt).scores[0]?.domain).toBe(domain);
    }
  );

  it('filters by domain', () => {
    expect(getSuggestedPrompts('satellite').map((entry) => entry.id)).toEqual(['satellite-landuse', 'satellite-urban']);
    expect(getSuggestedPrompts()).toHaveLength(7);
  });
});
