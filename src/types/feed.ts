import type { FailureKind } from '../utils/errors';

// A product whose release notes are published as one feed per calendar year.
export interface ProductSpec {
  readonly slug: string;    // Path segment of the feed URL, identity of the product
  readonly domain: string;  // Trailing path segment (the product's cloud domain)
}

export interface CandidateUrl {
  readonly product: ProductSpec;
  readonly year: number;
  readonly url: string;
}

// Candidate confirmed reachable by a HEAD (or ranged GET) probe; no body yet.
export interface ValidatedFeed extends CandidateUrl {
  readonly status: number;
}

export interface RawFeedItem {
  title: string;
  link: string;              // Stable identity used for dedup
  publishedAt: Date;         // Always UTC; entries without a parsable date never become items
  description: string;
  category?: string;
  sourceFeed: string;        // URL of the feed the item came from
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface AggregatedFeed {
  items: RawFeedItem[];      // Newest first, unique by normalized link
  window: TimeWindow;
  generatedAt: Date;
}

// What a listing front-end (directory page, sitemap) hands to validation
export interface ListedFeeds {
  candidates: CandidateUrl[];
  years: number[];           // Distinct candidate years, newest first
  failures: FailureRecord[];
}

export type PipelineStage = 'discovery' | 'validation' | 'parse';

export interface FailureRecord {
  stage: PipelineStage;
  kind: FailureKind;
  url: string;
  message: string;
}
