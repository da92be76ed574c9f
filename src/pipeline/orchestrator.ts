/**
 * Feed pipeline: wires discovery, URL generation, validation, parsing and
 * aggregation into one run and reports what each stage did.
 *
 * Workflow:
 * 1. Discover which year-partitions exist (year probing, the directory page or the sitemap)
 * 2. Generate candidate URLs for every product in every discovered year
 * 3. HEAD-check the candidates not already confirmed by discovery
 * 4. Fetch and parse every valid feed in parallel
 * 5. Filter, deduplicate and sort into the aggregated feed
 *
 * No single feed, product or year failure stops a run; only invalid
 * configuration does, and that is detected before any request is sent.
 */

import type { AggregatedFeed, CandidateUrl, FailureRecord, ProductSpec, RawFeedItem, ValidatedFeed } from '../types/feed';
import type { DiscoveryMode } from '../config/environment';
import type { HttpClient } from '../utils/httpClient';
import { FatalConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { WorkerPool } from '../utils/workerPool';
import { fetchAndParseFeed } from '../adapters/release-feed';
import { aggregateItems } from './aggregator';
import { discoverFromDirectory } from './directory-discovery';
import { discoverFromSitemap } from './sitemap-discovery';
import { validateCandidates } from './feed-validator';
import { generateCandidates } from './url-generator';
import { discoverYears, type ProbeCounts } from './year-discovery';

export interface PipelineConfig {
  readonly products: readonly ProductSpec[];
  readonly baseUrl: string;
  readonly backfillDays: number;
  readonly maxWorkers: number;
  readonly yearLookback: number;
  readonly discoveryMode: DiscoveryMode;
  readonly probesPerYear?: number;
  readonly fetchRetries: number;
  readonly retryMinTimeoutMs: number;
}

export interface PipelineDependencies {
  client: HttpClient;
  now?: () => Date;
}

export type RunOutcome = 'completed' | 'failed';

export interface RunReport {
  outcome: RunOutcome;
  discoveryMode: DiscoveryMode;
  discoveredYears: number[];
  yearsProbed: number[];
  probes: ProbeCounts;
  candidates: number;
  validFeeds: number;
  invalidFeeds: number;
  parsedFeeds: number;
  failedFeeds: number;
  rawItems: number;
  droppedEntries: number;
  duplicates: number;
  outsideWindow: number;
  finalItems: number;
  failures: FailureRecord[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface PipelineRun {
  feed: AggregatedFeed;
  report: RunReport;
}

export type PipelineState =
  | { status: 'idle' }
  | { status: 'running'; startedAt: Date }
  | { status: 'done'; report: RunReport };

interface DiscoveryOutcome {
  years: number[];
  yearsProbed: number[];
  candidates: CandidateUrl[];
  confirmed: ValidatedFeed[];
  probes: ProbeCounts;
  failures: FailureRecord[];
}

const log = logger.child('pipeline');

/**
 * Reject configuration that can never produce a meaningful run.
 * @throws FatalConfigurationError
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  const issues: string[] = [];

  if (config.products.length === 0) {
    issues.push('no products configured');
  }
  const slugs = config.products.map(product => product.slug);
  const duplicated = slugs.filter((slug, index) => slugs.indexOf(slug) !== index);
  if (duplicated.length > 0) {
    issues.push(`duplicate product slugs: ${[...new Set(duplicated)].join(', ')}`);
  }
  if (config.products.some(product => !product.slug.trim() || !product.domain.trim())) {
    issues.push('every product needs a slug and a domain');
  }
  if (!Number.isInteger(config.maxWorkers) || config.maxWorkers < 1) {
    issues.push(`maxWorkers must be a positive integer, got ${config.maxWorkers}`);
  }
  if (!Number.isInteger(config.backfillDays) || config.backfillDays < 0) {
    issues.push(`backfillDays must be a non-negative integer, got ${config.backfillDays}`);
  }
  if (!Number.isInteger(config.yearLookback) || config.yearLookback < 0) {
    issues.push(`yearLookback must be a non-negative integer, got ${config.yearLookback}`);
  }
  try {
    new URL(config.baseUrl);
  } catch {
    issues.push(`baseUrl is not a URL: ${config.baseUrl}`);
  }

  if (issues.length > 0) {
    throw new FatalConfigurationError('Invalid pipeline configuration', issues);
  }
}

export class FeedPipeline {
  private readonly config: PipelineConfig;
  private readonly client: HttpClient;
  private readonly now: () => Date;
  private currentState: PipelineState = { status: 'idle' };

  constructor(config: PipelineConfig, dependencies: PipelineDependencies) {
    validatePipelineConfig(config);
    this.config = Object.freeze({ ...config, products: Object.freeze([...config.products]) });
    this.client = dependencies.client;
    this.now = dependencies.now ?? (() => new Date());
  }

  get state(): PipelineState {
    return this.currentState;
  }

  /**
   * Run the pipeline once. Every call is a fresh run; nothing carries over
   * from a previous one.
   */
  async run(): Promise<PipelineRun> {
    if (this.currentState.status === 'running') {
      throw new Error('Pipeline run already in progress');
    }

    const startedAt = this.now();
    this.currentState = { status: 'running', startedAt };

    try {
      const run = await this.execute(startedAt);
      this.currentState = { status: 'done', report: run.report };
      return run;
    } catch (error) {
      this.currentState = { status: 'idle' };
      throw error;
    }
  }

  private async execute(startedAt: Date): Promise<PipelineRun> {
    const pool = new WorkerPool(this.config.maxWorkers);
    const failures: FailureRecord[] = [];

    log.info('Starting feed pipeline run', {
      products: this.config.products.length,
      discovery: this.config.discoveryMode,
      backfillDays: this.config.backfillDays,
      workers: pool.width
    });

    // Stage 1-2: discovery and candidate generation
    const discovery = await this.discover(pool, startedAt);
    failures.push(...discovery.failures);

    // Stage 3: validation of what discovery has not already confirmed
    const confirmedUrls = new Set(discovery.confirmed.map(feed => feed.url));
    const unchecked = discovery.candidates.filter(candidate => !confirmedUrls.has(candidate.url));
    const validation = await validateCandidates(unchecked, this.client, pool);
    failures.push(...validation.failures);

    const validFeeds = [...discovery.confirmed, ...validation.valid];

    // Stage 4: parallel fetch + parse
    log.info(`Fetching ${validFeeds.length} feeds`);
    const outcomes = await pool.map(validFeeds, feed =>
      fetchAndParseFeed(feed, this.client, {
        retries: this.config.fetchRetries,
        minTimeoutMs: this.config.retryMinTimeoutMs
      })
    );

    const rawItems: RawFeedItem[] = [];
    let parsedFeeds = 0;
    let droppedEntries = 0;
    for (const outcome of outcomes) {
      failures.push(...outcome.failures);
      droppedEntries += outcome.droppedEntries;
      if (outcome.ok) {
        parsedFeeds++;
        rawItems.push(...outcome.items);
      }
    }

    // Stage 5: aggregation
    const aggregation = aggregateItems(rawItems, {
      now: startedAt,
      backfillDays: this.config.backfillDays
    });

    const completedAt = this.now();
    const report: RunReport = {
      outcome: this.outcomeOf(discovery.probes),
      discoveryMode: this.config.discoveryMode,
      discoveredYears: discovery.years,
      yearsProbed: discovery.yearsProbed,
      probes: discovery.probes,
      candidates: discovery.candidates.length,
      validFeeds: validFeeds.length,
      invalidFeeds: validation.invalidCount,
      parsedFeeds,
      failedFeeds: outcomes.length - parsedFeeds,
      rawItems: rawItems.length,
      droppedEntries,
      duplicates: aggregation.stats.duplicates,
      outsideWindow: aggregation.stats.outsideWindow,
      finalItems: aggregation.feed.items.length,
      failures,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime()
    };

    log.info('Feed pipeline run finished', {
      outcome: report.outcome,
      years: report.discoveredYears,
      validFeeds: report.validFeeds,
      invalidFeeds: report.invalidFeeds,
      parsedFeeds: report.parsedFeeds,
      failedFeeds: report.failedFeeds,
      rawItems: report.rawItems,
      finalItems: report.finalItems
    });

    return { feed: aggregation.feed, report };
  }

  private async discover(pool: WorkerPool, now: Date): Promise<DiscoveryOutcome> {
    const { products, baseUrl, discoveryMode } = this.config;
    if (discoveryMode === 'years') {
      return this.probeYears(pool, now);
    }

    const listed = discoveryMode === 'directory'
      ? await discoverFromDirectory(this.client, baseUrl, products)
      : await discoverFromSitemap(this.client, baseUrl, products);

    if (listed.candidates.length > 0) {
      return {
        years: listed.years,
        yearsProbed: [],
        candidates: listed.candidates,
        confirmed: [],
        probes: { found: 0, missing: 0, unknown: 0 },
        failures: listed.failures
      };
    }

    log.warn(`No feeds listed by ${discoveryMode} discovery, falling back to year probing`);
    const probed = await this.probeYears(pool, now);
    return { ...probed, failures: [...listed.failures, ...probed.failures] };
  }

  private async probeYears(pool: WorkerPool, now: Date): Promise<DiscoveryOutcome> {
    const { products, baseUrl } = this.config;
    const discovery = await discoverYears(this.client, pool, {
      baseUrl,
      products,
      currentYear: now.getUTCFullYear(),
      lookback: this.config.yearLookback,
      probesPerYear: this.config.probesPerYear
    });

    return {
      years: discovery.years,
      yearsProbed: discovery.yearsProbed,
      candidates: generateCandidates(baseUrl, products, discovery.years),
      confirmed: discovery.confirmed,
      probes: discovery.probes,
      failures: discovery.failures
    };
  }

  // Every probe failing at the network level means the portal was unreachable
  private outcomeOf(probes: ProbeCounts): RunOutcome {
    const total = probes.found + probes.missing + probes.unknown;
    return total > 0 && probes.unknown === total ? 'failed' : 'completed';
  }
}
