/**
 * Request ID Generation
 *
 * Request ID Format: req-YYYYMMDD-HHMMSS-<8 hex chars>
 *
 * The timestamp keeps IDs sortable by submission time in local time; the
 * random suffix keeps requests submitted in the same second apart.
 *
 * @module orchestrator/request-id
 */

import * as crypto from 'node:crypto';

/**
 * Format a date as YYYYMMDD-HHMMSS string.
 */
export function formatTimestamp(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${year}${month}${day}-${hours}${minutes}${seconds}`;
}

/**
 * Generate a request ID.
 *
 * @example
 * ```typescript
 * generateRequestId(new Date('2026-01-15T10:30:00'));
 * // Returns: 'req-20260115-103000-9f86d081'
 * ```
 */
export function generateRequestId(date: Date = new Date()): string {
  return `req-${formatTimestamp(date)}-${crypto.randomBytes(4).toString('hex')}`;
}
