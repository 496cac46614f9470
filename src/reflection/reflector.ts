/**
 * Reflector / Replanner
 *
 * Decides what follows a rejected verdict: try again with an adjusted
 * strategy, give up, or accept a confident answer whose domain did not
 * match the request.
 *
 * The iteration ceiling is checked first and is not negotiable; the
 * judgment function is never consulted once it is reached. Acceptance
 * needs `mismatch_detected`; a plain `succeed` is not enough, and ensemble
 * rejections (disagreement, too few answers) are never overridden.
 *
 * @module reflection/reflector
 */

import type { RequestState, HistoryEntry } from '../schemas/state.js';
import type { ReplanDecision, ReplanStrategy } from '../schemas/routing.js';
import { isSuccessOutcome, type SuccessOutcome } from '../schemas/worker.js';
import { isOverridableVerdict } from '../schemas/verification.js';
import type { JudgmentFunction, ReflectionJudgmentInput } from '../judgment/types.js';
import { ReflectionJudgmentSchema, type ReflectionJudgment } from '../judgment/schemas.js';
import { MalformedJudgmentError } from '../judgment/errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { withTimeout } from '../utils/timeout.js';

export type ReflectableState = Pick<RequestState, 'request' | 'iteration' | 'history' | 'strategy'>;

export interface ReflectorOptions {
  judgment: JudgmentFunction;
  maxReplans: number;
  /** Bound on one judgment call */
  timeoutMs: number;
  logger?: Logger;
}

export class Reflector {
  private readonly judgment: JudgmentFunction;
  private readonly maxReplans: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ReflectorOptions) {
    this.judgment = options.judgment;
    this.maxReplans = options.maxReplans;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  async reflect(state: ReflectableState): Promise<ReplanDecision> {
    if (state.iteration >= this.maxReplans) {
      return {
        action: 'GIVE_UP',
        reason: `Reached iteration ceiling (${state.iteration}/${this.maxReplans})`,
      };
    }

    const last = state.history[state.history.length - 1];
    if (!last) {
      return { action: 'REPLAN', reason: 'No pass recorded yet', strategy: { ...state.strategy } };
    }

    let judgment: ReflectionJudgment;
    try {
      judgment = await this.judge(state);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${message}; replanning with default strategy`);
      return {
        action: 'REPLAN',
        reason: `Default replan after unusable reflection (${message})`,
        strategy: buildStrategy(state.strategy, last, null),
      };
    }

    if (judgment.mismatch_detected && isOverridableVerdict(last.verdict)) {
      const outcome = bestQualifyingOutcome(last, state.request.minConfidence);
      if (outcome) {
        return { action: 'SUCCEED', reason: judgment.reason, mismatchWarning: judgment.reason, outcome };
      }
    }

    if (judgment.decision === 'give_up') {
      return { action: 'GIVE_UP', reason: judgment.reason };
    }

    const reason =
      judgment.decision === 'replan'
        ? judgment.reason
        : `${judgment.reason} (${refusedAcceptance(judgment, last, state.request.minConfidence)}; replanning)`;
    if (judgment.decision === 'succeed') {
      this.logger.debug(`Reflection asked to accept: ${reason}`);
    }
    return { action: 'REPLAN', reason, strategy: buildStrategy(state.strategy, last, judgment) };
  }

  /**
   * @throws MalformedJudgmentError
   */
  private async judge(state: ReflectableState): Promise<ReflectionJudgment> {
    const input: ReflectionJudgmentInput = {
      kind: 'reflection',
      prompt: state.strategy.adjustedPrompt ?? state.request.prompt,
      minConfidence: state.request.minConfidence,
      iteration: state.iteration,
      maxReplans: this.maxReplans,
      history: state.history,
    };

    let output: unknown;
    try {
      output = await withTimeout(this.judgment.judge(input), this.timeoutMs, 'Reflection judgment');
    } catch (error) {
      throw new MalformedJudgmentError('reflection', error instanceof Error ? error.message : String(error), error);
    }

    const parsed = ReflectionJudgmentSchema.safeParse(output);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MalformedJudgmentError('reflection', `${issue.path.join('.')}: ${issue.message}`, parsed.error);
    }
    return parsed.data;
  }
}

// ============================================================================
// Strategy Helpers
// ============================================================================

/**
 * Workers that errored or timed out in a pass.
 */
export function failedWorkers(entry: HistoryEntry): string[] {
  return entry.outcomes.filter((outcome) => !isSuccessOutcome(outcome)).map((outcome) => outcome.workerId);
}

/**
 * Next strategy. Exclusions accumulate across passes; a SINGLE pass is
 * always followed by an ensemble.
 */
export function buildStrategy(
  previous: ReplanStrategy,
  last: HistoryEntry,
  judgment: ReflectionJudgment | null
): ReplanStrategy {
  const excluded = new Set([...previous.excludeWorkers, ...failedWorkers(last), ...(judgment?.exclude_workers ?? [])]);

  return {
    forceEnsemble: last.decision.mode === 'SINGLE' || (judgment?.force_ensemble ?? false) || previous.forceEnsemble,
    excludeWorkers: [...excluded],
    adjustedPrompt: judgment?.adjusted_prompt ?? previous.adjustedPrompt,
  };
}

/**
 * Why a `succeed` judgment did not become SUCCEED.
 */
function refusedAcceptance(judgment: ReflectionJudgment, last: HistoryEntry, minConfidence: number): string {
  if (!isOverridableVerdict(last.verdict)) {
    return `${last.verdict.mode} ${last.verdict.reason} verdict stands`;
  }
  if (!judgment.mismatch_detected) {
    return 'no mismatch detected';
  }
  return `no outcome meets ${minConfidence}`;
}

/**
 * Most confident success of a pass at or above the threshold, ties
 * broken by worker ID.
 */
export function bestQualifyingOutcome(entry: HistoryEntry, minConfidence: number): SuccessOutcome | null {
  const qualifying = entry.outcomes
    .filter(isSuccessOutcome)
    .filter((outcome) => outcome.confidence >= minConfidence)
    .sort((a, b) => b.confidence - a.confidence || a.workerId.localeCompare(b.workerId));
  return qualifying[0] ?? null;
}
