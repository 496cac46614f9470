/**
 * Workers Command
 *
 * Resolves one domain, or every known domain, through the configured
 * registry and lists the workers found.
 *
 * @module cli/commands/workers
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { CliError, runAction } from '../errors.js';
import { formatRow, tableWidth, type Column } from '../formatters/table.js';
import { config, buildOrchestratorConfig } from '../../config/index.js';
import { createWorkerRegistry, type WorkerRegistry } from '../../registry/index.js';
import { isKnownDomain, KNOWN_DOMAINS, type Domain } from '../../schemas/common.js';
import type { WorkerTarget } from '../../schemas/worker.js';

export interface WorkersCommandOptions {
  json?: boolean;
}

const WORKER_COLUMNS: readonly Column[] = [
  { header: 'WORKER ID', width: 28 },
  { header: 'DOMAIN', width: 11 },
  { header: 'ORGANIZATION', width: 20 },
  { header: 'ENDPOINT', width: 30 },
];

export function formatWorkerRow(worker: WorkerTarget): string {
  return formatRow(WORKER_COLUMNS, [worker.workerId, worker.domain, worker.organization, worker.endpoint]);
}

async function defaultRegistry(base: BaseCommand): Promise<WorkerRegistry> {
  const { registryTimeoutMs } = buildOrchestratorConfig(config.orchestration);
  return createWorkerRegistry({
    ...config.registry,
    timeoutMs: registryTimeoutMs,
    logger: base.createLogger('registry'),
  });
}

/**
 * Resolve and print workers. Domains whose lookup fails are reported
 * after the others.
 *
 * @throws CliError (usage) for an unknown domain, (API) when any lookup failed
 */
export async function handleWorkers(
  domainArg: string | undefined,
  options: WorkersCommandOptions,
  base: BaseCommand,
  registry?: WorkerRegistry
): Promise<WorkerTarget[]> {
  let domains: readonly Domain[] = KNOWN_DOMAINS;
  if (domainArg !== undefined) {
    const domain = domainArg.trim().toLowerCase();
    if (!isKnownDomain(domain)) {
      throw new CliError(`Unknown domain '${domainArg}' (expected one of: ${KNOWN_DOMAINS.join(', ')})`, EXIT_CODES.USAGE_ERROR);
    }
    domains = [domain];
  }

  const resolver = registry ?? (await defaultRegistry(base));
  base.debug(`Resolving ${domains.join(', ')} through the ${resolver.mode} registry`);

  const workers: WorkerTarget[] = [];
  const failures: string[] = [];
  for (const domain of domains) {
    try {
      workers.push(...(await resolver.resolve(domain)));
    } catch (error) {
      failures.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (options.json) {
    base.json(workers);
  } else if (workers.length === 0) {
    base.info(`No workers found for ${domains.join(', ')}.`);
  } else {
    base.section(`Workers (${resolver.mode} registry)`);
    base.info(chalk.bold(formatRow(WORKER_COLUMNS, WORKER_COLUMNS.map((column) => column.header))));
    base.info(chalk.dim('-'.repeat(tableWidth(WORKER_COLUMNS))));
    for (const worker of workers) {
      base.info(formatWorkerRow(worker));
    }
  }

  if (failures.length > 0) {
    throw new CliError(failures.join('; '), EXIT_CODES.API_ERROR);
  }
  return workers;
}

export function registerWorkersCommand(program: Command): void {
  program
    .command('workers [domain]')
    .description(`List the workers the registry resolves (${KNOWN_DOMAINS.join(', ')})`)
    .option('--json', 'Print the workers as JSON')
    .action(async (domain: string | undefined, options: WorkersCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runAction(base, async () => {
        await handleWorkers(domain, options, base);
      });
    });
}
