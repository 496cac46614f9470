/**
 * CLI Errors
 *
 * Handlers throw; the action wrapper maps what they throw to a message
 * and an exit code.
 *
 * @module cli/errors
 */

import { ZodError } from 'zod';
import { RequestNotFoundError } from '../orchestrator/service.js';
import { RegistryLookupFailedError } from '../registry/errors.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from './base-command.js';

/**
 * Error carrying the exit code the CLI should end with.
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = EXIT_CODES.ERROR
  ) {
    super(message);
    this.name = 'CliError';
  }
}

/**
 * Map an error thrown by a handler to its exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CliError) return error.exitCode;
  if (error instanceof ZodError) return EXIT_CODES.USAGE_ERROR;
  if (error instanceof RequestNotFoundError) return EXIT_CODES.NOT_FOUND;
  if (error instanceof RegistryLookupFailedError) return EXIT_CODES.API_ERROR;
  return EXIT_CODES.ERROR;
}

export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => issue.message).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a command handler, reporting any error through the base command.
 */
export async function runAction(base: BaseCommand, handler: () => Promise<void>): Promise<void> {
  try {
    await handler();
  } catch (error) {
    base.debug(error instanceof Error ? (error.stack ?? error.message) : String(error));
    base.error(describeError(error), exitCodeFor(error));
  }
}
