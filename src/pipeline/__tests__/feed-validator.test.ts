import { isSuccessStatus, probeCandidate, validateCandidates } from '../feed-validator';
import { generateCandidates } from '../url-generator';
import { WorkerPool } from '../../utils/workerPool';
import { BASE_URL, FakeHttpClient, product } from '../../__tests__/helpers';

describe('isSuccessStatus', () => {
  it.each([
    [200, true],
    [204, true],
    [206, true],
    [299, true],
    [301, false],
    [404, false],
    [500, false]
  ])('%s -> %s', (status, expected) => {
    expect(isSuccessStatus(status)).toBe(expected);
  });
});

describe('probeCandidate', () => {
  const [candidate] = generateCandidates(BASE_URL, [product('zia')], [2025]);

  it('reports a 2xx as found', async () => {
    const client = new FakeHttpClient({ [candidate.url]: { status: 200 } });

    await expect(probeCandidate(client, candidate, 'validation')).resolves.toEqual({
      status: 'found',
      feed: { ...candidate, status: 200 }
    });
  });

  it('reports other statuses as missing', async () => {
    const client = new FakeHttpClient({ [candidate.url]: { status: 403 } });

    await expect(probeCandidate(client, candidate, 'validation')).resolves.toEqual({
      status: 'missing',
      candidate,
      failure: { stage: 'validation', kind: 'not_found_or_invalid', url: candidate.url, message: 'HTTP 403' }
    });
  });

  it('reports network failures as unknown', async () => {
    const client = new FakeHttpClient({ [candidate.url]: { error: 'socket hang up' } });

    await expect(probeCandidate(client, candidate, 'discovery')).resolves.toEqual({
      status: 'unknown',
      candidate,
      failure: { stage: 'discovery', kind: 'transient_network', url: candidate.url, message: 'socket hang up' }
    });
  });
});

describe('validateCandidates', () => {
  const products = [product('zia'), product('zpa'), product('zdx')];
  const candidates = generateCandidates(BASE_URL, products, [2025]);

  it('keeps valid candidates in input order and records the rest', async () => {
    const client = new FakeHttpClient({
      [candidates[0].url]: { status: 200 },
      [candidates[1].url]: { error: 'timed out' },
      [candidates[2].url]: { status: 200 }
    });

    const result = await validateCandidates(candidates, client, new WorkerPool(2));

    expect(result.valid.map(feed => feed.product.slug)).toEqual(['zia', 'zdx']);
    expect(result.validCount).toBe(2);
    expect(result.invalidCount).toBe(1);
    expect(result.failures).toEqual([
      { stage: 'validation', kind: 'transient_network', url: candidates[1].url, message: 'timed out' }
    ]);
  });

  it('probes every candidate exactly once', async () => {
    const client = new FakeHttpClient();

    await validateCandidates(candidates, client, new WorkerPool(3));

    expect(client.calls).toHaveLength(3);
    expect(new Set(client.calls.map(call => call.url)).size).toBe(3);
  });

  it('returns zero counts for no candidates', async () => {
    const client = new FakeHttpClient();

    await expect(validateCandidates([], client, new WorkerPool(1))).resolves.toEqual({
      valid: [],
      validCount: 0,
      invalidCount: 0,
      failures: []
    });
    expect(client.calls).toEqual([]);
  });
});
