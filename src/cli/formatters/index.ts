/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  PhaseProgressDisplay,
  PHASE_LABELS,
  createSpinner,
  formatDuration,
  formatPhaseLine,
  passNumber,
  type SpinnerOptions,
} from './progress.js';

// Request output
export {
  formatPollSummary,
  formatHistory,
  formatHistoryEntry,
  formatOutcome,
  formatIntent,
  formatConfidence,
  formatRequestRow,
  formatRequestTableHeader,
  formatRequestTableDivider,
  describeResult,
  colorStatus,
  REQUEST_COLUMNS,
} from './result.js';

// Table helpers
export { formatDate, truncate, padRight, formatRow, tableWidth, type Column } from './table.js';
