import type { ProductSpec } from '../types/feed';

/**
 * Products publishing release-note feeds on the help portal.
 * Format: slug, domain. New products are added here as they are released;
 * years are discovered at run time, so no per-year configuration is needed.
 */
export const KNOWN_PRODUCTS: readonly ProductSpec[] = Object.freeze([
  { slug: 'zia', domain: 'zscaler.net' },
  { slug: 'zpa', domain: 'private.zscaler.com' },
  { slug: 'zdx', domain: 'zdxcloud.net' },
  { slug: 'zscaler-client-connector', domain: 'mobile.zscaler.net' },
  { slug: 'cloud-branch-connector', domain: 'connector.zscaler.net' },
  { slug: 'dspm', domain: 'app.zsdpc.net' },
  { slug: 'workflow-automation', domain: 'Zscaler-Automation' },
  { slug: 'business-insights', domain: 'zscaleranalytics.net' },
  { slug: 'zidentity', domain: 'zslogin.net' },
  { slug: 'risk360', domain: 'zscalerrisk.net' },
  { slug: 'deception', domain: 'illusionblack.com' },
  { slug: 'itdr', domain: 'illusionblack.com' },
  { slug: 'breach-predictor', domain: 'zscalerbp.net' },
  { slug: 'zero-trust-branch', domain: 'goairgap.com' },
  { slug: 'zscaler-cellular', domain: 'admin.ztsim.com' },
  { slug: 'aem', domain: 'app.avalor.io' },
  { slug: 'zsdk', domain: 'ZSDK' },
  { slug: 'unified', domain: 'console.zscaler.com' },
].map(product => Object.freeze(product)));

/**
 * Restrict the product list to the given slugs, keeping configuration order.
 * An empty filter keeps every product.
 */
export function selectProducts(
  products: readonly ProductSpec[],
  slugs: readonly string[]
): ProductSpec[] {
  if (slugs.length === 0) {
    return [...products];
  }
  const wanted = new Set(slugs);
  return products.filter(product => wanted.has(product.slug));
}
