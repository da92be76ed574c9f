import { discoverFromDirectory, extractDirectoryCandidates } from '../directory-discovery';
import { BASE_URL, FakeHttpClient, product } from '../../__tests__/helpers';

const DIRECTORY_HTML = `
<html>
  <body>
    <ul>
      <li><a href="/rss-feed/zia/release-upgrade-summary-2025/zia.example.net">ZIA 2025</a></li>
      <li><a href="/rss-feed/zia/release-upgrade-summary-2025/zia.example.net">ZIA 2025 (again)</a></li>
      <li><a href="${BASE_URL}/rss-feed/zpa/release-upgrade-summary-2024/zpa.example.net/">ZPA 2024</a></li>
      <li><a href="/rss-feed/unlisted/release-upgrade-summary-2025/other.net">Unlisted</a></li>
      <li><a href="/rss-feed/zia/archive">Archive</a></li>
      <li><a href="/docs/zia">Docs</a></li>
    </ul>
  </body>
</html>`;

describe('extractDirectoryCandidates', () => {
  const products = [product('zia'), product('zpa')];

  it('keeps year-partitioned feed links of configured products once each', () => {
    const candidates = extractDirectoryCandidates(DIRECTORY_HTML, BASE_URL, products);

    expect(candidates.map(candidate => ({ slug: candidate.product.slug, year: candidate.year, url: candidate.url }))).toEqual([
      { slug: 'zia', year: 2025, url: `${BASE_URL}/rss-feed/zia/release-upgrade-summary-2025/zia.example.net` },
      { slug: 'zpa', year: 2024, url: `${BASE_URL}/rss-feed/zpa/release-upgrade-summary-2024/zpa.example.net/` }
    ]);
  });

  it('finds nothing in a page without feed links', () => {
    expect(extractDirectoryCandidates('<html><body><p>Maintenance</p></body></html>', BASE_URL, products)).toEqual([]);
  });
});

describe('discoverFromDirectory', () => {
  const products = [product('zia'), product('zpa')];

  it('reads the directory page and lists the years it covers', async () => {
    const client = new FakeHttpClient({ [`${BASE_URL}/rss`]: { status: 200, body: DIRECTORY_HTML } });

    const result = await discoverFromDirectory(client, BASE_URL, products);

    expect(result.candidates).toHaveLength(2);
    expect(result.years).toEqual([2025, 2024]);
    expect(result.failures).toEqual([]);
  });

  it('reports an unavailable page as a discovery failure', async () => {
    const client = new FakeHttpClient({ [`${BASE_URL}/rss`]: { status: 503 } });

    await expect(discoverFromDirectory(client, BASE_URL, products)).resolves.toEqual({
      candidates: [],
      years: [],
      failures: [{ stage: 'discovery', kind: 'not_found_or_invalid', url: `${BASE_URL}/rss`, message: 'HTTP 503' }]
    });
  });
});
