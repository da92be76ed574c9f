/**
 * Discovery front-end reading the portal's sitemap. A sitemap index is
 * followed into its child sitemaps; every <loc> on the portal's host that
 * names a year-partitioned product feed becomes a candidate.
 */

import * as cheerio from 'cheerio';
import { XMLValidator } from 'fast-xml-parser';
import type { CandidateUrl, FailureRecord, ListedFeeds, ProductSpec } from '../types/feed';
import type { HttpClient } from '../utils/httpClient';
import {
  FeedPipelineError,
  MalformedFeedBodyError,
  NotFoundOrInvalidError,
  TransientNetworkError,
  errorMessage
} from '../utils/errors';
import { logger } from '../utils/logger';
import { candidateYearsOf, feedCandidateFromUrl, productsBySlug } from './directory-discovery';
import { isSuccessStatus } from './feed-validator';

export const SITEMAP_PATH = '/sitemap.xml';

// Index nesting deeper than this is not followed
const MAX_DEPTH = 3;

export type SitemapDocument =
  | { kind: 'index'; sitemaps: string[] }
  | { kind: 'urlset'; urls: string[] };

const log = logger.child('sitemap');

/**
 * Read the <loc> values of a sitemap index or url set.
 * @throws MalformedFeedBodyError for anything that is not a well-formed sitemap
 */
export function parseSitemap(xml: string, url = ''): SitemapDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedFeedBodyError(`Malformed sitemap: ${validation.err.msg} (line ${validation.err.line})`, url);
  }

  const $ = cheerio.load(xml, { xml: true });
  const root = $.root().children().first();
  const rootName = root.get(0)?.name;

  const locations = (entry: string) => root.children(entry).toArray()
    .map(element => $(element).children('loc').first().text().trim())
    .filter(Boolean);

  if (rootName === 'sitemapindex') {
    return { kind: 'index', sitemaps: locations('sitemap') };
  }
  if (rootName === 'urlset') {
    return { kind: 'urlset', urls: locations('url') };
  }
  throw new MalformedFeedBodyError(
    rootName ? `Unexpected sitemap root element <${rootName}>` : 'Sitemap has no root element',
    url
  );
}

function isOnPortal(url: string, portalHost: string): boolean {
  try {
    const host = new URL(url).hostname;
    return host === portalHost || host.endsWith(`.${portalHost}`);
  } catch {
    return false;
  }
}

export async function discoverFromSitemap(
  client: HttpClient,
  baseUrl: string,
  products: readonly ProductSpec[]
): Promise<ListedFeeds> {
  const rootUrl = `${baseUrl.replace(/\/+$/, '')}${SITEMAP_PATH}`;
  const portalHost = new URL(baseUrl).hostname;
  const bySlug = productsBySlug(products);

  const visited = new Set<string>();
  const seen = new Set<string>();
  const candidates: CandidateUrl[] = [];
  const failures: FailureRecord[] = [];

  // Child sitemaps are read one after another
  const read = async (url: string, depth: number): Promise<void> => {
    if (visited.has(url)) return;
    visited.add(url);

    let sitemap: SitemapDocument;
    try {
      const response = await client.get(url);
      if (!isSuccessStatus(response.status)) {
        throw new NotFoundOrInvalidError(url, response.status);
      }
      sitemap = parseSitemap(response.body, url);
    } catch (error) {
      const failure = error instanceof FeedPipelineError
        ? error
        : new TransientNetworkError(errorMessage(error), url, { cause: error });
      log.warn(`Sitemap ${url} skipped: ${failure.message}`);
      failures.push({ stage: 'discovery', kind: failure.kind, url, message: failure.message });
      return;
    }

    if (sitemap.kind === 'index') {
      if (depth >= MAX_DEPTH) {
        log.warn(`Sitemap index ${url} nested too deeply, not followed`);
        return;
      }
      for (const child of sitemap.sitemaps) {
        await read(child, depth + 1);
      }
      return;
    }

    for (const location of sitemap.urls) {
      if (seen.has(location) || !isOnPortal(location, portalHost)) continue;
      const candidate = feedCandidateFromUrl(location, bySlug);
      if (candidate) {
        seen.add(location);
        candidates.push(candidate);
      }
    }
  };

  await read(rootUrl, 0);

  const years = candidateYearsOf(candidates);
  log.info(`Sitemap lists ${candidates.length} feeds across ${years.length} years`, { sitemaps: visited.size });
  return { candidates, years, failures };
}
