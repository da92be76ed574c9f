import { MockAgent } from 'undici';
import { FetchClient } from '../httpClient';
import { TransientNetworkError } from '../errors';

const ORIGIN = 'https://portal.test';
const FEED_PATH = '/rss-feed/zia/release-upgrade-summary-2025/zscaler.net';

describe('FetchClient', () => {
  let agent: MockAgent;
  let client: FetchClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    client = new FetchClient({ connections: 2, timeoutMs: 5000, userAgent: 'test-agent', dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('probes with HEAD', async () => {
    agent.get(ORIGIN).intercept({ path: FEED_PATH, method: 'HEAD' }).reply(200);

    await expect(client.probe(`${ORIGIN}${FEED_PATH}`)).resolves.toEqual({ status: 200, method: 'HEAD' });
  });

  it('returns non-2xx probe statuses instead of throwing', async () => {
    agent.get(ORIGIN).intercept({ path: FEED_PATH, method: 'HEAD' }).reply(404);

    await expect(client.probe(`${ORIGIN}${FEED_PATH}`)).resolves.toEqual({ status: 404, method: 'HEAD' });
  });

  it('falls back to a ranged GET when HEAD is not allowed', async () => {
    const origin = agent.get(ORIGIN);
    origin.intercept({ path: FEED_PATH, method: 'HEAD' }).reply(405);
    origin
      .intercept({ path: FEED_PATH, method: 'GET', headers: { range: 'bytes=0-0' } })
      .reply(206, '<');

    await expect(client.probe(`${ORIGIN}${FEED_PATH}`)).resolves.toEqual({ status: 206, method: 'GET' });
  });

  it('fetches bodies with the configured user agent', async () => {
    agent.get(ORIGIN)
      .intercept({ path: FEED_PATH, method: 'GET', headers: { 'user-agent': 'test-agent' } })
      .reply(200, '<rss version="2.0"><channel/></rss>');

    await expect(client.get(`${ORIGIN}${FEED_PATH}`)).resolves.toEqual({
      status: 200,
      body: '<rss version="2.0"><channel/></rss>'
    });
  });

  it('maps connection failures to TransientNetworkError', async () => {
    agent.get(ORIGIN).intercept({ path: FEED_PATH, method: 'GET' }).replyWithError(new Error('connection refused'));

    const failure = await client.get(`${ORIGIN}${FEED_PATH}`).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransientNetworkError);
    expect(failure).toMatchObject({
      kind: 'transient_network',
      url: `${ORIGIN}${FEED_PATH}`,
      message: 'GET failed: connection refused'
    });
  });

  it('leaves a supplied dispatcher open on close', async () => {
    const close = vi.spyOn(agent, 'close');

    await client.close();

    expect(close).not.toHaveBeenCalled();
  });
});
