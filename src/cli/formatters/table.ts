/**
 * Table Helpers
 *
 * Fixed-width column helpers for list output.
 *
 * @module cli/formatters/table
 */

/**
 * Format an ISO8601 timestamp for display, e.g. "Jan 15, 2026, 10:30".
 */
export function formatDate(isoDate: string): string {
  const date = new Date(isoDate);
  return date.toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hour12: false,
  });
}

/**
 * Truncate a string to a maximum length, ending with "..." when cut.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width.
 */
export function padRight(str: string, width: number): string {
  // Account for ANSI codes by calculating visible length
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  const padding = Math.max(0, width - visibleLength);
  return str + ' '.repeat(padding);
}

export interface Column {
  header: string;
  width: number;
}

export function formatRow(columns: readonly Column[], values: readonly string[]): string {
  return columns.map((column, index) => padRight(truncate(values[index] ?? '', column.width - 2), column.width)).join('');
}

export function tableWidth(columns: readonly Column[]): number {
  return columns.reduce((sum, column) => sum + column.width, 0);
}
