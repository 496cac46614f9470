/**
 * Status Command
 *
 * Shows a request stored in the data directory: its poll response and,
 * unless --json is given, every recorded pass.
 *
 * @module cli/commands/status
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { runAction } from '../errors.js';
import { formatHistory, formatPollSummary } from '../formatters/result.js';
import { RequestNotFoundError, toPollResponse } from '../../orchestrator/service.js';
import { FileRequestStore } from '../../storage/requests.js';
import type { RequestState } from '../../schemas/state.js';

export interface StatusCommandOptions {
  json?: boolean;
}

/**
 * @throws RequestNotFoundError when nothing is stored under the ID
 */
export async function handleStatus(
  requestId: string,
  options: StatusCommandOptions,
  base: BaseCommand
): Promise<RequestState> {
  const store = new FileRequestStore(base.dataDir, base.createLogger('storage'));
  const state = await store.load(requestId);
  if (!state) {
    throw new RequestNotFoundError(requestId);
  }

  if (options.json) {
    base.json(state);
    return state;
  }

  base.info(formatPollSummary(toPollResponse(state)));
  base.keyValue('Image', state.request.imageReference);
  base.keyValue('Minimum confidence', state.request.minConfidence);
  base.keyValue('Updated', state.updatedAt);

  base.section('History');
  base.info(formatHistory(state.history));

  return state;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status <request-id>')
    .description('Show a stored request and its pass history')
    .option('--json', 'Print the full request state as JSON')
    .action(async (requestId: string, options: StatusCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runAction(base, async () => {
        await handleStatus(requestId, options, base);
      });
    });
}
