/**
 * Submit Command
 *
 * Runs one classification request in process, showing the phase on a
 * spinner, and prints the final poll response. The request is persisted
 * to the data directory so `classify status` can show it later.
 *
 * @module cli/commands/submit
 */

import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { CliError, runAction } from '../errors.js';
import { PhaseProgressDisplay, type SpinnerOptions } from '../formatters/progress.js';
import { formatPollSummary } from '../formatters/result.js';
import { createOrchestrator, type CreateOrchestratorOptions } from '../../orchestrator/factory.js';
import type { SubmitOptions } from '../../orchestrator/service.js';
import { FileRequestStore } from '../../storage/requests.js';
import { isKnownDomain, KNOWN_DOMAINS, type Domain } from '../../schemas/common.js';
import type { PollResponse } from '../../schemas/state.js';

// ============================================================================
// Types
// ============================================================================

export interface SubmitCommandOptions {
  minConfidence?: string;
  timeout?: string;
  domain?: string[];
  json?: boolean;
}

/**
 * Collaborators handed to createOrchestrator on top of the file store.
 * Tests use it to run against in-process fakes.
 */
export interface SubmitDependencies extends Omit<CreateOrchestratorOptions, 'store' | 'onTransition'> {
  spinner?: SpinnerOptions;
}

// ============================================================================
// Option Parsing
// ============================================================================

/**
 * Turn raw command-line options into submission options.
 *
 * @throws CliError (usage) for a non-numeric value or unknown domain
 */
export function parseSubmitOptions(options: SubmitCommandOptions): SubmitOptions {
  const parsed: SubmitOptions = {};

  if (options.minConfidence !== undefined) {
    const value = Number(options.minConfidence);
    if (Number.isNaN(value) || value < 0 || value > 1) {
      throw new CliError(`--min-confidence must be a number between 0 and 1, got '${options.minConfidence}'`, EXIT_CODES.USAGE_ERROR);
    }
    parsed.minConfidence = value;
  }

  if (options.timeout !== undefined) {
    const value = Number(options.timeout);
    if (!Number.isInteger(value) || value <= 0) {
      throw new CliError(`--timeout must be a positive number of milliseconds, got '${options.timeout}'`, EXIT_CODES.USAGE_ERROR);
    }
    parsed.timeoutMs = value;
  }

  if (options.domain && options.domain.length > 0) {
    const domains: Domain[] = [];
    for (const raw of options.domain) {
      const domain = raw.trim().toLowerCase();
      if (!isKnownDomain(domain)) {
        throw new CliError(`Unknown domain '${raw}' (expected one of: ${KNOWN_DOMAINS.join(', ')})`, EXIT_CODES.USAGE_ERROR);
      }
      domains.push(domain);
    }
    parsed.preferredDomains = domains;
  }

  return parsed;
}

// ============================================================================
// Handler
// ============================================================================

export async function handleSubmit(
  imageRef: string,
  prompt: string,
  options: SubmitCommandOptions,
  base: BaseCommand,
  dependencies: SubmitDependencies = {}
): Promise<PollResponse> {
  const submitOptions = parseSubmitOptions(options);
  const { spinner, ...components } = dependencies;
  const progress = options.json || base.isQuiet() ? null : new PhaseProgressDisplay(spinner);

  const service = await createOrchestrator({
    logger: base.createLogger('orchestrator'),
    ...components,
    store: new FileRequestStore(base.dataDir, base.createLogger('storage')),
    onTransition: (snapshot) => progress?.update(snapshot),
  });

  const requestId = service.submit(imageRef, prompt, submitOptions);
  base.debug(`Submitted ${requestId}`);

  const response = await service.waitFor(requestId);
  progress?.finish(await service.getState(requestId));

  if (options.json) {
    base.json(response);
  } else {
    base.blank();
    base.info(formatPollSummary(response));
  }

  return response;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerSubmitCommand(program: Command): void {
  program
    .command('submit <image-ref> <prompt>')
    .description('Classify an image and wait for the verified result')
    .option('-c, --min-confidence <n>', 'Minimum confidence to accept a label (0-1)')
    .option('-t, --timeout <ms>', 'Timeout for each worker dispatch in milliseconds')
    .option('-d, --domain <domain...>', `Preferred domains (${KNOWN_DOMAINS.join(', ')})`)
    .option('--json', 'Print the poll response as JSON')
    .action(async (imageRef: string, prompt: string, options: SubmitCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runAction(base, async () => {
        const response = await handleSubmit(imageRef, prompt, options, base);
        if (response.status === 'FAILED') {
          base.exitWith(EXIT_CODES.ERROR);
        }
      });
    });
}
