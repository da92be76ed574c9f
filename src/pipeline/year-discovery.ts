/**
 * Year discovery: which year-partitions of the product feeds exist right now.
 *
 * For each year in [current - lookback, current + 1] the products are probed
 * in configuration order until one feed resolves. Years run concurrently on
 * the shared pool; probes within one year run one after another so a year
 * stops probing as soon as it is known to exist.
 */

import type { FailureRecord, ProductSpec, ValidatedFeed } from '../types/feed';
import type { HttpClient } from '../utils/httpClient';
import type { WorkerPool } from '../utils/workerPool';
import { logger } from '../utils/logger';
import { buildFeedUrl, candidateYears } from './url-generator';
import { probeCandidate } from './feed-validator';

export interface YearDiscoveryOptions {
  baseUrl: string;
  products: readonly ProductSpec[];
  currentYear: number;
  lookback: number;
  /** Cap on products probed per year; defaults to all of them. */
  probesPerYear?: number;
}

export interface ProbeCounts {
  found: number;
  missing: number;
  unknown: number;
}

export interface YearDiscoveryResult {
  years: number[];              // Years with at least one resolvable feed, newest first
  yearsProbed: number[];
  confirmed: ValidatedFeed[];   // Feeds already proven to exist by the probes
  probes: ProbeCounts;
  failures: FailureRecord[];
}

interface YearProbe {
  year: number;
  confirmed?: ValidatedFeed;
  probes: ProbeCounts;
  failures: FailureRecord[];
}

const log = logger.child('discovery');

async function probeYear(
  client: HttpClient,
  options: YearDiscoveryOptions,
  year: number
): Promise<YearProbe> {
  const limit = Math.min(options.probesPerYear ?? options.products.length, options.products.length);
  const probes: ProbeCounts = { found: 0, missing: 0, unknown: 0 };
  const failures: FailureRecord[] = [];

  for (const product of options.products.slice(0, limit)) {
    const candidate = { product, year, url: buildFeedUrl(options.baseUrl, product, year) };
    const outcome = await probeCandidate(client, candidate, 'discovery');
    probes[outcome.status]++;

    if (outcome.status === 'found') {
      log.debug(`Year ${year} confirmed by ${product.slug}`);
      return { year, confirmed: outcome.feed, probes, failures };
    }

    if (outcome.status === 'unknown') {
      // Network trouble on one probe says nothing about the year; move on
      log.warn(`Probe for ${product.slug}/${year} skipped: ${outcome.failure.message}`);
      failures.push(outcome.failure);
    }
  }

  return { year, probes, failures };
}

export async function discoverYears(
  client: HttpClient,
  pool: WorkerPool,
  options: YearDiscoveryOptions
): Promise<YearDiscoveryResult> {
  const yearsProbed = candidateYears(options.currentYear, options.lookback);
  log.info(`Probing years ${yearsProbed[yearsProbed.length - 1]}-${yearsProbed[0]} across ${options.products.length} products`);

  const results = await pool.map(yearsProbed, year => probeYear(client, options, year));

  const probes: ProbeCounts = { found: 0, missing: 0, unknown: 0 };
  const years: number[] = [];
  const confirmed: ValidatedFeed[] = [];
  const failures: FailureRecord[] = [];

  for (const result of results) {
    probes.found += result.probes.found;
    probes.missing += result.probes.missing;
    probes.unknown += result.probes.unknown;
    failures.push(...result.failures);
    if (result.confirmed) {
      years.push(result.year);
      confirmed.push(result.confirmed);
    }
  }

  years.sort((a, b) => b - a);
  log.info(`Discovered years: ${years.length > 0 ? years.join(', ') : 'none'}`, probes);

  return { years, yearsProbed, confirmed, probes, failures };
}
