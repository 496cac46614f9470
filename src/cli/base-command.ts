/**
 * Base Command
 *
 * Shared state for the `classify` commands: the global flags, the data
 * directory, exit codes and the handful of output helpers the command
 * handlers print through.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { getDataDir } from '../storage/paths.js';
import { createConsoleLogger, type Logger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Flags accepted before any subcommand.
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** False when --no-color is given */
  color?: boolean;
  dataDir?: string;
}

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Unexpected error, or a submitted request that ended FAILED */
  ERROR: 1,
  USAGE_ERROR: 2,
  /** No stored request with that ID */
  NOT_FOUND: 3,
  /** Worker directory unreachable */
  API_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand
// ============================================================================

export class BaseCommand {
  readonly dataDir: string;
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(options: GlobalOptions) {
    this.verbose = options.verbose === true;
    this.quiet = options.quiet === true;
    this.dataDir = options.dataDir ?? getDataDir();

    if (options.color === false || process.stdout.isTTY !== true) {
      chalk.level = 0;
    }
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  /**
   * Logger for the orchestrator components a command builds. Their info
   * lines only show with --verbose so they stay off the spinner line.
   */
  createLogger(scope: string): Logger {
    return createConsoleLogger({ verbose: this.verbose, quiet: !this.verbose, scope });
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(message);
    }
  }

  blank(): void {
    this.info('');
  }

  section(title: string): void {
    if (!this.quiet) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  keyValue(key: string, value: string | number): void {
    this.info(`${chalk.dim(`${key}:`)} ${value}`);
  }

  /**
   * Printed even under --quiet.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  error(message: string, code: ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));
    process.exit(code);
  }

  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Lookup
// ============================================================================

interface CommandLike {
  opts(): Record<string, unknown>;
  parent: CommandLike | null;
}

/**
 * The base command the preAction hook stored on the root program.
 * Handlers called outside the program get one with default flags.
 */
export function getBaseCommand(cmd: CommandLike): BaseCommand {
  let root: CommandLike = cmd;
  while (root.parent) {
    root = root.parent;
  }

  const base = root.opts()['_baseCommand'];
  return base instanceof BaseCommand ? base : new BaseCommand({});
}
