/**
 * Logger
 *
 * Minimal logger interface shared by every orchestrator component, plus a
 * console-backed implementation with chalk colouring.
 *
 * @module logging/logger
 */

import chalk from 'chalk';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Allows components to log at various levels without depending on a
 * specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Show debug output */
  verbose?: boolean;
  /** Only warnings and errors */
  quiet?: boolean;
  /** Prefix for every line, e.g. "Orchestrator" */
  scope?: string;
}

// ============================================================================
// Implementations
// ============================================================================

/**
 * Create a logger that writes through `console`. Errors and warnings go
 * to stderr.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.scope ? chalk.dim(`[${options.scope}] `) : '';
  const quiet = options.quiet === true;
  const verbose = options.verbose === true && !quiet;

  return {
    debug(message, ...args) {
      if (verbose) {
        console.log(prefix + chalk.gray(`[debug] ${message}`), ...args);
      }
    },
    info(message, ...args) {
      if (!quiet) {
        console.log(prefix + message, ...args);
      }
    },
    warn(message, ...args) {
      console.error(prefix + chalk.yellow(`Warning: ${message}`), ...args);
    },
    error(message, ...args) {
      console.error(prefix + chalk.red(`Error: ${message}`), ...args);
    },
  };
}

/**
 * Derive a logger with a nested scope.
 */
export function withScope(logger: Logger, scope: string): Logger {
  const tag = `[${scope}] `;
  return {
    debug: (message, ...args) => logger.debug(tag + message, ...args),
    info: (message, ...args) => logger.info(tag + message, ...args),
    warn: (message, ...args) => logger.warn(tag + message, ...args),
    error: (message, ...args) => logger.error(tag + message, ...args),
  };
}

const noop = (): void => undefined;

/** Discards everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
