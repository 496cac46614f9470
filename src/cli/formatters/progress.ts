/**
 * Progress Formatters
 *
 * CLI progress display utilities:
 * - Spinner for long-running operations
 * - Phase progress for a request moving through the state machine
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { TERMINAL_PHASES, type Phase, type RequestState } from '../../schemas/state.js';

// ============================================================================
// Types
// ============================================================================

export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Force the animated spinner on or off (defaults to stdout being a TTY) */
  enabled?: boolean;
}

// ============================================================================
// Phase Labels
// ============================================================================

/**
 * Human-readable labels for each phase.
 */
export const PHASE_LABELS: Record<Phase, string> = {
  INTENT: 'Classifying intent',
  DISCOVER: 'Resolving workers',
  ROUTE: 'Routing',
  EXECUTE: 'Dispatching to workers',
  VERIFY: 'Verifying results',
  REFLECT: 'Reflecting on the pass',
  ACCEPT: 'Accepted',
  FAIL: 'Failed',
};

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Resolving workers...');
 * spinner.start();
 *
 * try {
 *   await registry.resolve('medical');
 *   spinner.succeed('Resolved');
 * } catch (err) {
 *   spinner.fail('Lookup failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.enabled ?? process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  getText(): string {
    return this.spinner.text;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Phase Progress Display
// ============================================================================

/**
 * 1-based pass a snapshot belongs to. The iteration counter only moves
 * when VERIFY records the pass.
 */
export function passNumber(snapshot: Pick<RequestState, 'phase' | 'iteration'>): number {
  if (snapshot.phase === 'REFLECT' || TERMINAL_PHASES.includes(snapshot.phase)) {
    return Math.max(snapshot.iteration, 1);
  }
  return snapshot.iteration + 1;
}

export function formatPhaseLine(snapshot: Pick<RequestState, 'phase' | 'iteration'>): string {
  return `Pass ${passNumber(snapshot)}: ${PHASE_LABELS[snapshot.phase]}...`;
}

/**
 * Shows the phase of a running request, fed by the orchestrator's
 * transition listener.
 *
 * @example
 * ```typescript
 * const progress = new PhaseProgressDisplay();
 * const service = await createOrchestrator({ onTransition: (s) => progress.update(s) });
 * const response = await service.waitFor(service.submit(imageRef, prompt));
 * progress.finish(await service.getState(response.requestId));
 * ```
 */
export class PhaseProgressDisplay {
  private readonly spinner: ProgressSpinner;
  private readonly animated: boolean;
  private started = false;
  private lastLine: string | null = null;

  constructor(options: SpinnerOptions = {}) {
    this.animated = options.enabled ?? process.stdout.isTTY === true;
    this.spinner = new ProgressSpinner('Submitting request...', { ...options, enabled: this.animated });
  }

  update(snapshot: RequestState): void {
    if (TERMINAL_PHASES.includes(snapshot.phase)) {
      return;
    }

    const line = formatPhaseLine(snapshot);
    if (line === this.lastLine) {
      return;
    }
    this.lastLine = line;

    if (!this.animated) {
      console.log(`[*] ${line}`);
      return;
    }

    if (this.started) {
      this.spinner.update(line);
    } else {
      this.spinner.start(line);
      this.started = true;
    }
  }

  /**
   * Stop with a symbol matching the request's status.
   */
  finish(state: Pick<RequestState, 'status' | 'iteration'>): void {
    const passes = state.iteration === 1 ? '1 pass' : `${state.iteration} passes`;
    const text = `${state.status} after ${passes}`;

    if (!this.animated) {
      console.log(`[${state.status === 'FAILED' ? 'X' : '+'}] ${text}`);
      return;
    }

    switch (state.status) {
      case 'COMPLETED':
        this.spinner.succeed(text);
        break;
      case 'COMPLETED_WITH_WARNING':
        this.spinner.warn(text);
        break;
      case 'FAILED':
        this.spinner.fail(text);
        break;
      case 'PROCESSING':
        this.spinner.stop();
        break;
    }
  }

  getLastLine(): string | null {
    return this.lastLine;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
