/**
 * Aggregation: merge the items of every feed into one list that is
 * restricted to the backfill window, unique by normalized link and ordered
 * newest first.
 */

import type { AggregatedFeed, RawFeedItem, TimeWindow } from '../types/feed';
import { startOfUtcDayBefore } from '../utils/dates';
import { normalizeLink } from '../utils/links';

export interface AggregationOptions {
  now: Date;
  backfillDays: number;
}

export interface AggregationStats {
  input: number;
  missingLink: number;
  outsideWindow: number;
  duplicates: number;
  output: number;
}

export interface AggregationResult {
  feed: AggregatedFeed;
  stats: AggregationStats;
}

/**
 * [midnight UTC `backfillDays` calendar days before today, now].
 * With now = 2025-01-03T08:00Z and 14 days the window opens 2024-12-20T00:00Z.
 */
export function computeWindow(now: Date, backfillDays: number): TimeWindow {
  return { start: startOfUtcDayBefore(now, backfillDays), end: new Date(now.getTime()) };
}

export function isWithinWindow(item: RawFeedItem, window: TimeWindow): boolean {
  const time = item.publishedAt.getTime();
  return time >= window.start.getTime() && time <= window.end.getTime();
}

/**
 * Keep one item per normalized link: the most recently published one,
 * the first seen on ties. Surviving items stay in first-seen order.
 */
export function deduplicateByLink(items: readonly RawFeedItem[]): { items: RawFeedItem[]; duplicates: number } {
  const byLink = new Map<string, RawFeedItem>();
  let duplicates = 0;

  for (const item of items) {
    const key = normalizeLink(item.link);
    const existing = byLink.get(key);
    if (!existing) {
      byLink.set(key, item);
      continue;
    }
    duplicates++;
    if (item.publishedAt.getTime() > existing.publishedAt.getTime()) {
      byLink.set(key, item);
    }
  }

  return { items: [...byLink.values()], duplicates };
}

// Array.prototype.sort is stable, so equal timestamps keep first-seen order
export function sortNewestFirst(items: readonly RawFeedItem[]): RawFeedItem[] {
  return [...items].sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime());
}

/**
 * Window filtering runs before deduplication so an item outside the window
 * cannot displace an in-window copy of the same link.
 */
export function aggregateItems(
  items: readonly RawFeedItem[],
  options: AggregationOptions
): AggregationResult {
  const window = computeWindow(options.now, options.backfillDays);

  const linked = items.filter(item => normalizeLink(item.link) !== '');
  const inWindow = linked.filter(item => isWithinWindow(item, window));
  const { items: unique, duplicates } = deduplicateByLink(inWindow);
  const sorted = sortNewestFirst(unique);

  return {
    feed: { items: sorted, window, generatedAt: new Date(options.now.getTime()) },
    stats: {
      input: items.length,
      missingLink: items.length - linked.length,
      outsideWindow: linked.length - inWindow.length,
      duplicates,
      output: sorted.length
    }
  };
}
