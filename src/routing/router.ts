/**
 * Router
 *
 * Decides between a single worker and an ensemble, and which workers
 * a pass dispatches to.
 *
 * SINGLE when the top domain is confident enough and clearly ahead of
 * every other domain. Otherwise ENSEMBLE over every domain within the
 * ambiguity margin of the top, padded to at least two domains: ambiguous
 * prompts (an aerial photo of a crop-disease lesion) get cross-domain
 * agreement instead of a forced single guess.
 *
 * @module routing/router
 */

import { KNOWN_DOMAINS, type Domain } from '../schemas/common.js';
import type { IntentResult } from '../schemas/intent.js';
import type { WorkerTarget } from '../schemas/worker.js';
import { INITIAL_STRATEGY, type ReplanStrategy, type RoutingDecision } from '../schemas/routing.js';

/** Absorbs float error in confidence differences (0.9 - 0.75) */
const EPSILON = 1e-9;

const MIN_ENSEMBLE_DOMAINS = 2;

export interface RouterOptions {
  /** Minimum top-domain confidence for SINGLE routing */
  routingThreshold: number;
  /** Domains this close to the top domain are ambiguous */
  ambiguityMargin: number;
}

export class Router {
  private readonly routingThreshold: number;
  private readonly ambiguityMargin: number;

  constructor(options: RouterOptions) {
    this.routingThreshold = options.routingThreshold;
    this.ambiguityMargin = options.ambiguityMargin;
  }

  route(intent: IntentResult, strategy: ReplanStrategy = INITIAL_STRATEGY): RoutingDecision {
    const [top, ...rest] = intent.ranked;
    const contenders = rest.filter((score) => top.confidence - score.confidence <= this.ambiguityMargin + EPSILON);
    const confident = top.confidence >= this.routingThreshold;

    if (!strategy.forceEnsemble && confident && contenders.length === 0) {
      return {
        mode: 'SINGLE',
        domains: [top.domain],
        reason: `${top.domain} at ${top.confidence} meets routing threshold ${this.routingThreshold} with no close contender`,
      };
    }

    const domains = padDomains(
      [top.domain, ...contenders.map((score) => score.domain)],
      rest.map((score) => score.domain)
    );

    let reason: string;
    if (strategy.forceEnsemble) {
      reason = 'Replan strategy forces ensemble';
    } else if (!confident) {
      reason = `${top.domain} at ${top.confidence} is below routing threshold ${this.routingThreshold}`;
    } else {
      reason = `${contenders.map((score) => score.domain).join(', ')} within ${this.ambiguityMargin} of ${top.domain}`;
    }

    return { mode: 'ENSEMBLE', domains, reason };
  }
}

/**
 * Pad an ensemble to at least two domains: next-ranked intent domains
 * first, then general, then the remaining known domains.
 */
function padDomains(selected: Domain[], ranked: readonly Domain[]): Domain[] {
  const domains = [...selected];
  const candidates: readonly Domain[] = [...ranked, 'general', ...KNOWN_DOMAINS];

  for (const candidate of candidates) {
    if (domains.length >= MIN_ENSEMBLE_DOMAINS) {
      break;
    }
    if (!domains.includes(candidate)) {
      domains.push(candidate);
    }
  }

  return domains;
}

/**
 * Pick the workers a pass dispatches to.
 *
 * SINGLE takes the first resolved worker of the routed domain; ENSEMBLE
 * takes every resolved worker of every routed domain. Excluded workers
 * are skipped, and a worker listed under two domains is dispatched once.
 */
export function selectTargets(
  decision: RoutingDecision,
  resolved: ReadonlyMap<Domain, readonly WorkerTarget[]>,
  strategy: ReplanStrategy = INITIAL_STRATEGY
): WorkerTarget[] {
  const excluded = new Set(strategy.excludeWorkers);
  const available = (domain: Domain): WorkerTarget[] =>
    (resolved.get(domain) ?? []).filter((target) => !excluded.has(target.workerId));

  if (decision.mode === 'SINGLE') {
    const first = available(decision.domains[0])[0];
    return first ? [first] : [];
  }

  const seen = new Set<string>();
  const targets: WorkerTarget[] = [];
  for (const domain of decision.domains) {
    for (const target of available(domain)) {
      if (!seen.has(target.workerId)) {
        seen.add(target.workerId);
        targets.push(target);
      }
    }
  }
  return targets;
}
