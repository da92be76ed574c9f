// Release-notes feed adapter
// Fetches one validated feed and normalizes its entries, whichever of the two
// wire formats (RSS 2.0 items or Atom entries) the portal served.
import * as cheerio from 'cheerio';
import { XMLValidator } from 'fast-xml-parser';
import Parser from 'rss-parser';
import pRetry, { AbortError } from 'p-retry';
import type { FailureRecord, RawFeedItem, ValidatedFeed } from '../types/feed';
import type { HttpClient } from '../utils/httpClient';
import {
  FeedPipelineError,
  MalformedFeedBodyError,
  NotFoundOrInvalidError,
  TransientNetworkError,
  UnparsableDateError,
  errorMessage
} from '../utils/errors';
import { normalizeDate } from '../utils/dates';
import { logger } from '../utils/logger';
import { isSuccessStatus } from '../pipeline/feed-validator';

export type FeedFormat = 'rss' | 'atom';

// Format-independent view of one entry before date normalization
export interface FeedEntry {
  title: string;
  link: string;
  rawDate?: string;
  description: string;
  category?: string;
}

export type ParsedFeedBody =
  | { format: 'rss'; entries: FeedEntry[] }
  | { format: 'atom'; entries: FeedEntry[] }
  | { format: 'unrecognized'; reason: string };

export interface FeedParseOutcome {
  feed: ValidatedFeed;
  format: FeedFormat | null;
  items: RawFeedItem[];
  droppedEntries: number;
  failures: FailureRecord[];
  ok: boolean;              // Body fetched and recognized as one of the two formats
}

export interface FetchFeedOptions {
  retries: number;
  minTimeoutMs: number;
}

interface RssCustomItem {
  description?: unknown;
  dcDate?: unknown;
  categoryList?: unknown[];
}

const parser = new Parser<Record<string, unknown>, RssCustomItem>({
  defaultRSS: 2,
  customFields: {
    item: [
      ['description', 'description'],
      ['dc:date', 'dcDate'],
      ['category', 'categoryList', { keepArray: true }]
    ]
  }
});

const log = logger.child('feed-parser');

// xml2js hands back either a string or { _: text, $: attributes }
function textOf(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (value && typeof value === 'object' && '_' in value && typeof value._ === 'string') {
    return value._.trim();
  }
  return '';
}

async function parseRssEntries(body: string): Promise<FeedEntry[]> {
  const feed = await parser.parseString(body);

  return feed.items.map(item => {
    const category = (item.categoryList ?? []).map(textOf).find(Boolean);
    return {
      title: textOf(item.title),
      link: textOf(item.link),
      rawDate: textOf(item.pubDate) || textOf(item.dcDate) || undefined,
      description: textOf(item.description) || textOf(item.content),
      category
    };
  });
}

function parseAtomEntries($: cheerio.CheerioAPI): FeedEntry[] {
  const feed = $.root().children('feed').first();
  return feed.children('entry').toArray().map(element => {
    const entry = $(element);
    const links = entry.children('link');
    const alternate = links.filter((_, link) => {
      const rel = $(link).attr('rel');
      return !rel || rel === 'alternate';
    });
    const published = entry.children('published').first().text().trim();
    const updated = entry.children('updated').first().text().trim();
    const summary = entry.children('summary').first().text().trim();

    return {
      title: entry.children('title').first().text().trim(),
      link: (alternate.first().attr('href') ?? links.first().attr('href') ?? '').trim(),
      rawDate: published || updated || undefined,
      description: summary || entry.children('content').first().text().trim(),
      category: entry.children('category').first().attr('term')?.trim() || undefined
    };
  });
}

/**
 * Detect the format from the document's root element and extract entries.
 * Bodies that are neither RSS nor Atom come back as `unrecognized`.
 * @throws MalformedFeedBodyError when the document is not well-formed XML
 */
export async function parseFeedBody(body: string, url = ''): Promise<ParsedFeedBody> {
  const $ = cheerio.load(body, { xml: true });
  const root = $.root().children().first();
  const rootName = root.get(0)?.name;

  if (!rootName) {
    return { format: 'unrecognized', reason: 'no root element' };
  }

  // cheerio repairs truncated documents, so well-formedness is checked separately
  const validation = XMLValidator.validate(body);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedFeedBodyError(`Malformed XML document: ${msg} (line ${line})`, url);
  }

  if (rootName === 'rss' && root.children('channel').length > 0) {
    try {
      return { format: 'rss', entries: await parseRssEntries(body) };
    } catch (error) {
      throw new MalformedFeedBodyError(`Malformed RSS document: ${errorMessage(error)}`, url, { cause: error });
    }
  }

  if (rootName === 'feed') {
    return { format: 'atom', entries: parseAtomEntries($) };
  }

  return { format: 'unrecognized', reason: `unexpected root element <${rootName}>` };
}

/**
 * Turn entries into feed items. Entries without a link or without a
 * parsable date are dropped, never given a substitute.
 */
export function toRawFeedItems(
  entries: readonly FeedEntry[],
  sourceFeed: string
): { items: RawFeedItem[]; droppedEntries: number; failures: FailureRecord[] } {
  const items: RawFeedItem[] = [];
  const failures: FailureRecord[] = [];
  let droppedEntries = 0;

  for (const entry of entries) {
    if (!entry.link) {
      droppedEntries++;
      log.debug(`Dropping entry without link in ${sourceFeed}`, { title: entry.title });
      continue;
    }

    const publishedAt = normalizeDate(entry.rawDate);
    if (!publishedAt) {
      droppedEntries++;
      const error = new UnparsableDateError(sourceFeed, entry.rawDate);
      log.warn(`Dropping "${entry.title || entry.link}": ${error.message}`);
      failures.push({ stage: 'parse', kind: error.kind, url: entry.link, message: error.message });
      continue;
    }

    items.push({
      title: entry.title || entry.link,
      link: entry.link,
      publishedAt,
      description: entry.description,
      category: entry.category,
      sourceFeed
    });
  }

  return { items, droppedEntries, failures };
}

async function fetchFeedBody(client: HttpClient, url: string, options: FetchFeedOptions): Promise<string> {
  return pRetry(async () => {
    const response = await client.get(url);
    if (!isSuccessStatus(response.status)) {
      // A status is an answer, not a transient failure: no retry
      throw new AbortError(new NotFoundOrInvalidError(url, response.status));
    }
    return response.body;
  }, {
    retries: options.retries,
    minTimeout: options.minTimeoutMs,
    factor: 2,
    onFailedAttempt: error => {
      log.debug(`Attempt ${error.attemptNumber} for ${url} failed (${error.retriesLeft} left): ${error.message}`);
    }
  });
}

/**
 * Fetch and parse one feed. Never throws: every failure becomes a
 * FailureRecord and an empty item list for this feed only.
 */
export async function fetchAndParseFeed(
  feed: ValidatedFeed,
  client: HttpClient,
  options: FetchFeedOptions
): Promise<FeedParseOutcome> {
  const empty = { feed, format: null, items: [], droppedEntries: 0, ok: false };

  try {
    const body = await fetchFeedBody(client, feed.url, options);
    const parsed = await parseFeedBody(body, feed.url);

    if (parsed.format === 'unrecognized') {
      throw new MalformedFeedBodyError(`Unrecognized feed structure: ${parsed.reason}`, feed.url);
    }

    const { items, droppedEntries, failures } = toRawFeedItems(parsed.entries, feed.url);
    log.debug(`Parsed ${items.length} items from ${feed.url} (${parsed.format})`, { droppedEntries });
    return { feed, format: parsed.format, items, droppedEntries, failures, ok: true };
  } catch (error) {
    const failure = error instanceof FeedPipelineError
      ? error
      : new TransientNetworkError(errorMessage(error), feed.url, { cause: error });
    log.warn(`Feed ${feed.url} yielded no items: ${failure.message}`);
    return {
      ...empty,
      failures: [{ stage: 'parse', kind: failure.kind, url: feed.url, message: failure.message }]
    };
  }
}
