/**
 * Shared test doubles: an in-memory HttpClient and item factories.
 */

import type { ProductSpec, RawFeedItem } from '../types/feed';
import type { HttpClient, HttpResponse, ProbeResponse } from '../utils/httpClient';
import { TransientNetworkError } from '../utils/errors';

export type FakeRoute =
  | { status: number; body?: string }
  | { error: string };

export interface RecordedCall {
  method: 'probe' | 'get';
  url: string;
}

/**
 * HttpClient answering from a route table. Unrouted URLs answer 404.
 * A route may also be a list, consumed one answer per call (the last one
 * repeats), to script retries.
 */
export class FakeHttpClient implements HttpClient {
  readonly calls: RecordedCall[] = [];
  closed = false;
  private readonly routes = new Map<string, FakeRoute[]>();

  constructor(routes: Record<string, FakeRoute | FakeRoute[]> = {}) {
    for (const [url, route] of Object.entries(routes)) {
      this.route(url, route);
    }
  }

  route(url: string, route: FakeRoute | FakeRoute[]): this {
    this.routes.set(url, Array.isArray(route) ? [...route] : [route]);
    return this;
  }

  callsTo(url: string, method?: RecordedCall['method']): number {
    return this.calls.filter(call => call.url === url && (!method || call.method === method)).length;
  }

  async probe(url: string): Promise<ProbeResponse> {
    this.calls.push({ method: 'probe', url });
    const response = this.answer(url);
    return { status: response.status, method: 'HEAD' };
  }

  async get(url: string): Promise<HttpResponse> {
    this.calls.push({ method: 'get', url });
    return this.answer(url);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private answer(url: string): HttpResponse {
    const queue = this.routes.get(url);
    const route = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!route) {
      return { status: 404, body: '' };
    }
    if ('error' in route) {
      throw new TransientNetworkError(route.error, url);
    }
    return { status: route.status, body: route.body ?? '' };
  }
}

export const BASE_URL = 'https://portal.test';

export function product(slug: string, domain = `${slug}.example.net`): ProductSpec {
  return { slug, domain };
}

export function feedItem(overrides: Partial<RawFeedItem> & Pick<RawFeedItem, 'link'>): RawFeedItem {
  return {
    title: overrides.link,
    publishedAt: new Date('2025-01-01T00:00:00Z'),
    description: '',
    sourceFeed: `${BASE_URL}/feed`,
    ...overrides
  };
}

export function rssDocument(items: Array<{ title?: string; link?: string; pubDate?: string; description?: string }>): string {
  const body = items.map(item => [
    '    <item>',
    item.title !== undefined ? `      <title>${item.title}</title>` : '',
    item.link !== undefined ? `      <link>${item.link}</link>` : '',
    item.pubDate !== undefined ? `      <pubDate>${item.pubDate}</pubDate>` : '',
    item.description !== undefined ? `      <description>${item.description}</description>` : '',
    '    </item>'
  ].filter(Boolean).join('\n')).join('\n');

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0">',
    '  <channel>',
    '    <title>Release notes</title>',
    `    <link>${BASE_URL}</link>`,
    '    <description>Test feed</description>',
    body,
    '  </channel>',
    '</rss>'
  ].join('\n');
}

export function atomDocument(entries: Array<{ title?: string; link?: string; published?: string; updated?: string; summary?: string }>): string {
  const body = entries.map(entry => [
    '  <entry>',
    entry.title !== undefined ? `    <title>${entry.title}</title>` : '',
    entry.link !== undefined ? `    <link rel="alternate" href="${entry.link}"/>` : '',
    entry.published !== undefined ? `    <published>${entry.published}</published>` : '',
    entry.updated !== undefined ? `    <updated>${entry.updated}</updated>` : '',
    entry.summary !== undefined ? `    <summary>${entry.summary}</summary>` : '',
    '  </entry>'
  ].filter(Boolean).join('\n')).join('\n');

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom">',
    '  <title>Release notes</title>',
    `  <id>${BASE_URL}/atom</id>`,
    '  <updated>2025-01-01T00:00:00Z</updated>',
    body,
    '</feed>'
  ].join('\n');
}
