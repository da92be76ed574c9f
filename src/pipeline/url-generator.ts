import type { CandidateUrl, ProductSpec } from '../types/feed';

/**
 * Feed URL for one product and year:
 * {base}/rss-feed/{slug}/release-upgrade-summary-{year}/{domain}
 */
export function buildFeedUrl(baseUrl: string, product: ProductSpec, year: number): string {
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}/rss-feed/${product.slug}/release-upgrade-summary-${year}/${product.domain}`;
}

/**
 * One candidate per (product, year) pair, newest year first, products in
 * configuration order within a year.
 */
export function generateCandidates(
  baseUrl: string,
  products: readonly ProductSpec[],
  years: readonly number[]
): CandidateUrl[] {
  const orderedYears = [...new Set(years)].sort((a, b) => b - a);
  return orderedYears.flatMap(year =>
    products.map(product => ({ product, year, url: buildFeedUrl(baseUrl, product, year) }))
  );
}

/**
 * Years probed by discovery: `lookback` years back through next year,
 * newest first.
 */
export function candidateYears(currentYear: number, lookback: number): number[] {
  const years: number[] = [];
  for (let year = currentYear + 1; year >= currentYear - lookback; year--) {
    years.push(year);
  }
  return years;
}
