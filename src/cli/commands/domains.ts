/**
 * Domains Command
 *
 * Lists the known classification domains with prompts that route to
 * each of them.
 *
 * @module cli/commands/domains
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { CliError, runAction } from '../errors.js';
import { isKnownDomain, KNOWN_DOMAINS, type Domain } from '../../schemas/common.js';
import { getSuggestedPrompts, type SuggestedPrompt } from '../../intent/suggested-prompts.js';

export interface DomainsCommandOptions {
  json?: boolean;
}

export function handleDomains(domainArg: string | undefined, options: DomainsCommandOptions, base: BaseCommand): SuggestedPrompt[] {
  let domains: readonly Domain[] = KNOWN_DOMAINS;
  if (domainArg !== undefined) {
    const domain = domainArg.trim().toLowerCase();
    if (!isKnownDomain(domain)) {
      throw new CliError(`Unknown domain '${domainArg}' (expected one of: ${KNOWN_DOMAINS.join(', ')})`, EXIT_CODES.USAGE_ERROR);
    }
    domains = [domain];
  }

  const prompts = domains.flatMap((domain) => getSuggestedPrompts(domain));
  if (options.json) {
    base.json(prompts);
    return prompts;
  }

  for (const domain of domains) {
    base.section(domain);
    for (const entry of prompts.filter((candidate) => candidate.domain === domain)) {
      base.info(`${chalk.cyan(entry.description)} ${chalk.dim(`(${entry.id})`)}`);
      base.info(`  "${entry.prompt}"`);
    }
  }
  return prompts;
}

export function registerDomainsCommand(program: Command): void {
  program
    .command('domains [domain]')
    .description('List known domains with suggested prompts')
    .option('--json', 'Print the suggested prompts as JSON')
    .action(async (domain: string | undefined, options: DomainsCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runAction(base, async () => {
        handleDomains(domain, options, base);
      });
    });
}
