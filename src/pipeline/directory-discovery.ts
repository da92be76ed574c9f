/**
 * Alternative discovery front-end: read the portal's feed directory page and
 * take the year-partitioned feed links it lists, instead of probing years.
 * Feeds the same validator and parser stages as year probing.
 */

import * as cheerio from 'cheerio';
import type { CandidateUrl, ListedFeeds, ProductSpec } from '../types/feed';
import type { HttpClient } from '../utils/httpClient';
import { NotFoundOrInvalidError, TransientNetworkError, FeedPipelineError, errorMessage } from '../utils/errors';
import { isHttpUrl, resolveLink } from '../utils/links';
import { logger } from '../utils/logger';
import { isSuccessStatus } from './feed-validator';

export const DIRECTORY_PATH = '/rss';

const FEED_PATH = /\/rss-feed\/([^/]+)\/release-upgrade-summary-(\d{4})\/([^/?#]+)\/?$/;

const log = logger.child('directory');

/**
 * Candidate for an absolute feed URL of one of the given products, or null
 * when the URL is not a year-partitioned feed of a configured product.
 */
export function feedCandidateFromUrl(
  url: string,
  products: ReadonlyMap<string, ProductSpec>
): CandidateUrl | null {
  if (!isHttpUrl(url)) return null;

  const match = new URL(url).pathname.match(FEED_PATH);
  if (!match) return null;

  const product = products.get(decodeURIComponent(match[1]));
  if (!product) {
    log.debug(`Ignoring feed for unconfigured product: ${url}`);
    return null;
  }
  return { product, year: Number(match[2]), url };
}

export function productsBySlug(products: readonly ProductSpec[]): Map<string, ProductSpec> {
  return new Map(products.map(product => [product.slug, product]));
}

export function candidateYearsOf(candidates: readonly CandidateUrl[]): number[] {
  return [...new Set(candidates.map(candidate => candidate.year))].sort((a, b) => b - a);
}

/**
 * Extract candidate feed URLs for the configured products from directory
 * page HTML. Links to unconfigured products are ignored; duplicates collapse.
 */
export function extractDirectoryCandidates(
  html: string,
  baseUrl: string,
  products: readonly ProductSpec[]
): CandidateUrl[] {
  const $ = cheerio.load(html);
  const bySlug = productsBySlug(products);
  const seen = new Set<string>();
  const candidates: CandidateUrl[] = [];

  $('a[href*="/rss-feed/"]').each((_, element) => {
    const href = $(element).attr('href');
    const url = href ? resolveLink(href, baseUrl) : null;
    if (!url || seen.has(url)) return;

    const candidate = feedCandidateFromUrl(url, bySlug);
    if (!candidate) return;

    seen.add(url);
    candidates.push(candidate);
  });

  return candidates;
}

export async function discoverFromDirectory(
  client: HttpClient,
  baseUrl: string,
  products: readonly ProductSpec[]
): Promise<ListedFeeds> {
  const pageUrl = `${baseUrl.replace(/\/+$/, '')}${DIRECTORY_PATH}`;

  try {
    const response = await client.get(pageUrl);
    if (!isSuccessStatus(response.status)) {
      throw new NotFoundOrInvalidError(pageUrl, response.status);
    }

    const candidates = extractDirectoryCandidates(response.body, baseUrl, products);
    const years = candidateYearsOf(candidates);
    log.info(`Directory page lists ${candidates.length} feeds across ${years.length} years`);
    return { candidates, years, failures: [] };
  } catch (error) {
    const failure = error instanceof FeedPipelineError
      ? error
      : new TransientNetworkError(errorMessage(error), pageUrl, { cause: error });
    log.warn(`Directory page unavailable: ${failure.message}`);
    return {
      candidates: [],
      years: [],
      failures: [{ stage: 'discovery', kind: failure.kind, url: pageUrl, message: failure.message }]
    };
  }
}
