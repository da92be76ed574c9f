#!/usr/bin/env tsx

/**
 * Runner for the feed pipeline
 * Loads environment variables, runs one aggregation and writes the RSS file.
 * Exit code 0 when the run completed (even with zero items), 1 otherwise.
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// Project root is one level up from scripts/
const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

// .env.local wins over .env; dotenv never overrides variables already set
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { loadEnvironmentConfig } from '../src/config/environment';
import { KNOWN_PRODUCTS, selectProducts } from '../src/config/products';
import { FeedPipeline } from '../src/pipeline/orchestrator';
import { buildRssFeed, saveFeed } from '../src/output/feed-writer';
import { FetchClient } from '../src/utils/httpClient';
import { FatalConfigurationError } from '../src/utils/errors';
import { logger } from '../src/utils/logger';

async function main(): Promise<number> {
  const config = loadEnvironmentConfig();
  logger.setLevel(config.logging.level);

  const client = new FetchClient({
    connections: config.pipeline.maxWorkers,
    timeoutMs: config.http.requestTimeoutMs,
    userAgent: config.portal.userAgent
  });

  try {
    const pipeline = new FeedPipeline({
      products: selectProducts(KNOWN_PRODUCTS, config.pipeline.productSlugs),
      baseUrl: config.portal.baseUrl,
      backfillDays: config.pipeline.backfillDays,
      maxWorkers: config.pipeline.maxWorkers,
      yearLookback: config.pipeline.yearLookback,
      discoveryMode: config.pipeline.discoveryMode,
      probesPerYear: config.pipeline.probesPerYear,
      fetchRetries: config.http.fetchRetries,
      retryMinTimeoutMs: config.http.retryMinTimeoutMs
    }, { client });

    const { feed, report } = await pipeline.run();

    const xml = buildRssFeed(feed, {
      title: config.output.title,
      link: config.portal.baseUrl,
      selfUrl: `${config.portal.baseUrl}/rss.xml`,
      description: config.output.description,
      language: config.output.language
    });
    const written = await saveFeed(config.output.path, xml);

    console.log('═'.repeat(60));
    console.log(`Feed written: ${written}`);
    console.log(`   • Years discovered: ${report.discoveredYears.join(', ') || 'none'}`);
    console.log(`   • Feeds valid/invalid: ${report.validFeeds}/${report.invalidFeeds}`);
    console.log(`   • Feeds parsed/failed: ${report.parsedFeeds}/${report.failedFeeds}`);
    console.log(`   • Items raw/final: ${report.rawItems}/${report.finalItems}`);
    console.log(`   • Failures recorded: ${report.failures.length}`);
    console.log(`   • Duration: ${report.durationMs}ms`);
    console.log('═'.repeat(60));

    if (report.outcome === 'failed') {
      logger.error('Portal unreachable: every discovery probe failed');
      return 1;
    }
    return 0;
  } finally {
    await client.close();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    if (error instanceof FatalConfigurationError) {
      logger.error(error.message);
    } else {
      logger.error('Feed generation failed', error);
    }
    process.exitCode = 1;
  });
