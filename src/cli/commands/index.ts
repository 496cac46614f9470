/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerSubmitCommand } from './submit.js';
import { registerStatusCommand } from './status.js';
import { registerRequestsCommand } from './requests.js';
import { registerWorkersCommand } from './workers.js';
import { registerDomainsCommand } from './domains.js';

export function registerCommands(program: Command): void {
  registerSubmitCommand(program);
  registerStatusCommand(program);
  registerRequestsCommand(program);
  registerWorkersCommand(program);
  registerDomainsCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'submit <image-ref> <prompt>', description: 'Classify an image and wait for the verified result' },
    { name: 'status <request-id>', description: 'Show a stored request and its pass history' },
    { name: 'requests', description: 'List stored requests, newest first' },
    { name: 'workers [domain]', description: 'List the workers the registry resolves' },
    { name: 'domains [domain]', description: 'List known domains with suggested prompts' },
  ];
}
