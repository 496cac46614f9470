/**
 * Path Resolution Utilities
 *
 * Directory Structure:
 * ```
 * ~/.classify/                                  # Default data directory
 * └── requests/
 *     └── <request_id>.json                     # e.g., req-20260115-103000-0a1b2c3d.json
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing `..`, `/` or `\`.
 *
 * @throws {Error} If the ID contains path traversal characters
 */
function validateIdSecurity(id: string, idName: string): void {
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the application.
 *
 * Uses the `CLASSIFY_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.classify/`.
 */
export function getDataDir(): string {
  const envDir = process.env.CLASSIFY_DATA_DIR;

  if (envDir) {
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), '.classify');
}

/**
 * Gets the directory holding request snapshots.
 *
 * @param dataDir - Data directory (defaults to getDataDir())
 */
export function getRequestsDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'requests');
}

/**
 * Gets the snapshot file for one request.
 *
 * @throws {Error} If requestId is empty or contains path separators
 * @example
 * ```typescript
 * getRequestFilePath('req-20260115-103000-0a1b2c3d', '/data');
 * // '/data/requests/req-20260115-103000-0a1b2c3d.json'
 * ```
 */
export function getRequestFilePath(requestId: string, dataDir: string = getDataDir()): string {
  if (!requestId || requestId.trim() === '') {
    throw new Error('requestId is required');
  }
  validateIdSecurity(requestId, 'requestId');

  return path.join(getRequestsDir(dataDir), `${requestId}.json`);
}
