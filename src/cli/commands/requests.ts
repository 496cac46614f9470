/**
 * Requests Command
 *
 * Lists stored requests, newest first, in table or JSON format.
 *
 * @module cli/commands/requests
 */

import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { CliError, runAction } from '../errors.js';
import {
  formatRequestRow,
  formatRequestTableDivider,
  formatRequestTableHeader,
} from '../formatters/result.js';
import { toPollResponse } from '../../orchestrator/service.js';
import { FileRequestStore } from '../../storage/requests.js';
import type { RequestState } from '../../schemas/state.js';

// ============================================================================
// Types
// ============================================================================

export interface RequestsCommandOptions {
  /** Maximum number of requests to display */
  limit?: string;
  /** Output format */
  format?: string;
}

// ============================================================================
// Handler
// ============================================================================

/**
 * @returns The requests that were displayed
 */
export async function handleRequests(options: RequestsCommandOptions, base: BaseCommand): Promise<RequestState[]> {
  const limit = Number.parseInt(options.limit ?? '20', 10);
  if (Number.isNaN(limit) || limit <= 0) {
    throw new CliError(`--limit must be a positive integer, got '${options.limit}'`, EXIT_CODES.USAGE_ERROR);
  }
  const format = options.format ?? 'table';
  if (format !== 'table' && format !== 'json') {
    throw new CliError(`Unknown format '${format}' (expected table or json)`, EXIT_CODES.USAGE_ERROR);
  }

  base.debug(`Listing requests in ${base.dataDir} (limit: ${limit})`);
  const store = new FileRequestStore(base.dataDir, base.createLogger('storage'));
  const requests = await store.list();
  const shown = requests.slice(0, limit);

  if (format === 'json') {
    base.json(shown.map(toPollResponse));
    return shown;
  }

  if (requests.length === 0) {
    base.info('No requests found.');
    base.blank();
    base.info('Submit one with: classify submit <image-ref> "<prompt>"');
    return shown;
  }

  base.section('Requests');
  base.info(formatRequestTableHeader());
  base.info(formatRequestTableDivider());
  for (const state of shown) {
    base.info(formatRequestRow(state));
  }
  base.info(formatRequestTableDivider());

  base.blank();
  if (shown.length < requests.length) {
    base.info(`Showing ${shown.length} of ${requests.length} requests (use --limit to show more)`);
  } else {
    base.info(`Total: ${requests.length} request${requests.length === 1 ? '' : 's'}`);
  }

  return shown;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerRequestsCommand(program: Command): void {
  program
    .command('requests')
    .description('List stored requests, newest first')
    .option('-n, --limit <count>', 'Maximum number of requests to show', '20')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (options: RequestsCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runAction(base, async () => {
        await handleRequests(options, base);
      });
    });
}
