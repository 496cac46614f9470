/**
 * Result Formatters
 *
 * Terminal output for requests: the poll summary printed after submit and
 * status, the per-pass history shown by status, and the request table.
 *
 * @module cli/formatters/result
 */

import chalk from 'chalk';
import type { TaskOutcome } from '../../schemas/worker.js';
import type { IntentResult } from '../../schemas/intent.js';
import type { HistoryEntry, PollResponse, RequestState, RequestStatus } from '../../schemas/state.js';
import { formatDate, formatRow, tableWidth, type Column } from './table.js';

// ============================================================================
// Pieces
// ============================================================================

export function formatConfidence(value: number): string {
  return value.toFixed(2);
}

export function colorStatus(status: RequestStatus): string {
  switch (status) {
    case 'COMPLETED':
      return chalk.green(status);
    case 'COMPLETED_WITH_WARNING':
      return chalk.yellow(status);
    case 'FAILED':
      return chalk.red(status);
    case 'PROCESSING':
      return chalk.cyan(status);
  }
}

/**
 * "medical 0.95, general 0.05"
 */
export function formatIntent(intent: IntentResult): string {
  return intent.ranked.map((score) => `${score.domain} ${formatConfidence(score.confidence)}`).join(', ');
}

/**
 * One line per dispatch, e.g. "medical-1: pneumonia @ 0.89 (12ms)".
 */
export function formatOutcome(outcome: TaskOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return `${outcome.workerId}: ${outcome.label} @ ${formatConfidence(outcome.confidence)} (${outcome.latencyMs}ms)`;
    case 'error':
      return `${outcome.workerId}: ${chalk.red(outcome.code)}${outcome.message ? ` - ${outcome.message}` : ''}`;
    case 'timeout':
      return `${outcome.workerId}: ${chalk.yellow(`timed out after ${outcome.timeoutMs}ms`)}`;
  }
}

// ============================================================================
// Summary
// ============================================================================

/**
 * Format the caller-facing view of a request.
 *
 * @example
 * ```
 * === Request COMPLETED ===
 * Request:    req-20260115-103000-0a1b2c3d
 * Passes:     1
 * Intent:     medical 0.95
 * Label:      pneumonia
 * Confidence: 0.89
 * Worker:     org-a-medical-clf-001 (medical)
 * ```
 */
export function formatPollSummary(response: PollResponse): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`=== Request ${colorStatus(response.status)} ===`));
  lines.push(`Request:    ${chalk.cyan(response.requestId)}`);
  lines.push(`Passes:     ${response.iterations}`);

  if (response.intent) {
    lines.push(`Intent:     ${formatIntent(response.intent)}`);
  }

  if (response.result) {
    const { outcome, mismatchWarning } = response.result;
    lines.push(`Label:      ${chalk.bold(outcome.label)}`);
    lines.push(`Confidence: ${formatConfidence(outcome.confidence)}`);
    lines.push(`Worker:     ${outcome.workerId} (${outcome.domain})`);
    if (mismatchWarning) {
      lines.push(chalk.yellow(`Warning:    ${mismatchWarning}`));
    }
  }

  if (response.error) {
    lines.push(chalk.red(`Error:      ${response.error}`));
  }

  return lines.join('\n');
}

// ============================================================================
// History
// ============================================================================

export function formatHistoryEntry(entry: HistoryEntry): string {
  const lines: string[] = [];
  const { decision, verdict } = entry;

  lines.push(chalk.bold(`Pass ${entry.iteration}: ${decision.mode} over ${decision.domains.join(', ')}`));
  lines.push(`  Prompt:  ${entry.prompt}`);
  lines.push(`  Intent:  ${formatIntent(entry.intent)} [${entry.intent.source}]`);
  lines.push(`  Routing: ${decision.reason}`);

  if (entry.outcomes.length === 0) {
    lines.push(chalk.dim('  (no dispatches)'));
  }
  for (const outcome of entry.outcomes) {
    lines.push(`  - ${formatOutcome(outcome)}`);
  }

  const reason = verdict.accepted ? chalk.green(verdict.reason) : chalk.yellow(verdict.reason);
  lines.push(`  Verdict: ${reason} (${verdict.notes})`);

  return lines.join('\n');
}

export function formatHistory(history: readonly HistoryEntry[]): string {
  if (history.length === 0) {
    return chalk.dim('No passes recorded yet.');
  }
  return history.map(formatHistoryEntry).join('\n\n');
}

// ============================================================================
// Request Table
// ============================================================================

export const REQUEST_COLUMNS: readonly Column[] = [
  { header: 'REQUEST ID', width: 32 },
  { header: 'STATUS', width: 25 },
  { header: 'PASSES', width: 8 },
  { header: 'RESULT', width: 24 },
  { header: 'CREATED', width: 22 },
];

export function formatRequestTableHeader(): string {
  return chalk.bold(
    formatRow(
      REQUEST_COLUMNS,
      REQUEST_COLUMNS.map((column) => column.header)
    )
  );
}

export function formatRequestTableDivider(): string {
  return chalk.dim('-'.repeat(tableWidth(REQUEST_COLUMNS)));
}

/**
 * Label and confidence of an accepted request, the failure reason of a
 * failed one, "-" while processing.
 */
export function describeResult(state: RequestState): string {
  const result = state.finalResult;
  if (!result) {
    return '-';
  }
  if (result.kind === 'accepted') {
    return `${result.outcome.label} @ ${formatConfidence(result.outcome.confidence)}`;
  }
  return result.reason;
}

export function formatRequestRow(state: RequestState): string {
  return formatRow(REQUEST_COLUMNS, [
    state.request.requestId,
    state.status,
    String(state.iteration),
    describeResult(state),
    formatDate(state.request.createdAt),
  ]);
}
