/**
 * Judgment errors
 *
 * @module judgment/errors
 */

import type { JudgmentKind } from './types.js';

/**
 * The judgment function returned something unusable: unparseable JSON,
 * a schema violation, an unknown domain, or it failed outright.
 * Always recovered by the caller.
 */
export class MalformedJudgmentError extends Error {
  constructor(
    public readonly kind: JudgmentKind,
    message: string,
    cause?: unknown
  ) {
    super(`Malformed ${kind} judgment: ${message}`, { cause });
    this.name = 'MalformedJudgmentError';
  }
}

/**
 * Provider API error with additional context.
 */
export class JudgmentApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'JudgmentApiError';
  }
}
