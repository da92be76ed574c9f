/**
 * RSS 2.0 serialization of the aggregated feed.
 * The channel section is always written, so an empty feed is still a valid
 * document.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { XMLBuilder } from 'fast-xml-parser';
import type { AggregatedFeed, RawFeedItem } from '../types/feed';

export interface FeedMetadata {
  title: string;
  link: string;          // Portal home page
  selfUrl: string;       // Where the generated feed is published
  description: string;
  language: string;
  generator?: string;
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
  suppressBooleanAttributes: false,
  processEntities: true
});

function toRssItem(item: RawFeedItem) {
  return {
    title: item.title,
    link: item.link,
    guid: { '#text': item.link, '@_isPermaLink': 'true' },
    pubDate: item.publishedAt.toUTCString(),
    description: item.description || item.title,
    ...(item.category ? { category: item.category } : {})
  };
}

export function buildRssFeed(feed: AggregatedFeed, metadata: FeedMetadata): string {
  const document = {
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    rss: {
      '@_version': '2.0',
      '@_xmlns:atom': 'http://www.w3.org/2005/Atom',
      channel: {
        title: metadata.title,
        link: metadata.link,
        description: metadata.description,
        language: metadata.language,
        lastBuildDate: feed.generatedAt.toUTCString(),
        generator: metadata.generator ?? 'release-feed-aggregator',
        'atom:link': {
          '@_href': metadata.selfUrl,
          '@_rel': 'self',
          '@_type': 'application/rss+xml'
        },
        item: feed.items.map(toRssItem)
      }
    }
  };

  return builder.build(document);
}

/**
 * Write the document, creating parent directories as needed.
 * @returns the absolute path written
 */
export async function saveFeed(outputPath: string, xml: string): Promise<string> {
  const target = path.resolve(outputPath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, xml, 'utf8');
  return target;
}
