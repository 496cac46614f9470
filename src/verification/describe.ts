import type { TaskOutcome } from '../schemas/worker.js';

/**
 * One-line summary of the outcomes that did not answer, for verdict notes.
 */
export function describeFailures(outcomes: readonly TaskOutcome[]): string {
  const failures = outcomes.flatMap((outcome) => {
    switch (outcome.kind) {
      case 'success':
        return [];
      case 'error':
        return [`${outcome.workerId} ${outcome.code}`];
      case 'timeout':
        return [`${outcome.workerId} timed out`];
    }
  });
  return failures.length > 0 ? failures.join(', ') : 'no dispatches';
}
