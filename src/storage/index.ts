/**
 * Storage Layer
 *
 * File-based persistence for request snapshots.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export { getDataDir, getRequestsDir, getRequestFilePath } from './paths.js';

// Atomic operations
export { atomicWriteJson, readJson, fileExists } from './atomic.js';

// Request operations
export { InMemoryRequestStore, FileRequestStore, type RequestStore } from './requests.js';
