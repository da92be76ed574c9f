/**
 * Environment configuration for the feed pipeline
 * Loads and validates run parameters from environment variables
 */

import { z } from 'zod';
import { FatalConfigurationError } from '../utils/errors';
import type { LogLevel } from '../utils/logger';

export type DiscoveryMode = 'years' | 'directory' | 'sitemap';

export interface EnvironmentConfig {
  portal: {
    baseUrl: string;
    userAgent: string;
  };
  pipeline: {
    backfillDays: number;
    maxWorkers: number;
    yearLookback: number;
    discoveryMode: DiscoveryMode;
    probesPerYear?: number;
    productSlugs: string[];
  };
  http: {
    requestTimeoutMs: number;
    fetchRetries: number;
    retryMinTimeoutMs: number;
  };
  output: {
    path: string;
    title: string;
    description: string;
    language: string;
  };
  logging: {
    level: LogLevel;
  };
}

const integer = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  FEED_BASE_URL: z.string().url().default('https://help.zscaler.com'),
  USER_AGENT: z.string().min(1).default('Mozilla/5.0 (compatible; Release-Feed-Aggregator/1.0)'),
  BACKFILL_DAYS: integer(14, 0),
  MAX_WORKERS: integer(10, 1),
  YEAR_LOOKBACK: integer(3, 0),
  DISCOVERY_MODE: z.enum(['years', 'directory', 'sitemap']).default('years'),
  DISCOVERY_PROBES_PER_YEAR: z.coerce.number().int().min(1).optional(),
  PRODUCTS: z.string().default(''),
  REQUEST_TIMEOUT_MS: integer(15000, 1),
  FETCH_RETRIES: integer(2, 0),
  RETRY_MIN_TIMEOUT_MS: integer(500, 0),
  OUTPUT_PATH: z.string().min(1).default('public/rss.xml'),
  FEED_TITLE: z.string().min(1).default('Zscaler Releases (help.zscaler.com)'),
  FEED_DESCRIPTION: z.string().min(1).default('Aggregated release notes across all products.'),
  FEED_LANGUAGE: z.string().min(2).default('en'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

/**
 * Load and validate environment configuration.
 * Empty variables count as unset.
 * @throws FatalConfigurationError naming every invalid variable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new FatalConfigurationError('Invalid environment configuration', issues);
  }

  const vars = parsed.data;

  return {
    portal: {
      baseUrl: vars.FEED_BASE_URL.replace(/\/+$/, ''),
      userAgent: vars.USER_AGENT
    },
    pipeline: {
      backfillDays: vars.BACKFILL_DAYS,
      maxWorkers: vars.MAX_WORKERS,
      yearLookback: vars.YEAR_LOOKBACK,
      discoveryMode: vars.DISCOVERY_MODE,
      probesPerYear: vars.DISCOVERY_PROBES_PER_YEAR,
      productSlugs: vars.PRODUCTS.split(',').map(slug => slug.trim()).filter(Boolean)
    },
    http: {
      requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
      fetchRetries: vars.FETCH_RETRIES,
      retryMinTimeoutMs: vars.RETRY_MIN_TIMEOUT_MS
    },
    output: {
      path: vars.OUTPUT_PATH,
      title: vars.FEED_TITLE,
      description: vars.FEED_DESCRIPTION,
      language: vars.FEED_LANGUAGE
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}
