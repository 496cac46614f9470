/**
 * Judgment Function Types
 *
 * The judgment function is a black box: structured context in, structured
 * output out. Output is `unknown` here on purpose; every call site
 * validates it against its own schema.
 *
 * @module judgment/types
 */

import type { Domain } from '../schemas/common.js';
import type { HistoryEntry } from '../schemas/state.js';
import type { JudgmentKind } from '../config/models.js';

export type { JudgmentKind };

/**
 * Context for ranking candidate domains for a prompt.
 */
export interface IntentJudgmentInput {
  kind: 'intent';
  prompt: string;
  imageReference: string;
  knownDomains: readonly Domain[];
}

/**
 * Context for deciding what to do after a rejected verdict.
 */
export interface ReflectionJudgmentInput {
  kind: 'reflection';
  prompt: string;
  minConfidence: number;
  /** Passes recorded so far */
  iteration: number;
  maxReplans: number;
  history: readonly HistoryEntry[];
}

export type JudgmentInput = IntentJudgmentInput | ReflectionJudgmentInput;

export interface JudgmentFunction {
  /** Short identifier for logs, e.g. "llm:gemini-2.0-flash" */
  readonly name: string;

  judge(input: JudgmentInput): Promise<unknown>;
}
