/**
 * Pooled HTTP client for the help portal.
 *
 * One undici Agent per run, with as many connections per origin as the
 * worker pool is wide, so probes and body fetches reuse sockets.
 * Network-level failures (timeout, refused, reset, DNS) are all mapped to
 * TransientNetworkError; HTTP statuses are returned, never thrown.
 */

import { Agent, request, type Dispatcher } from 'undici';
import { TransientNetworkError, errorMessage } from './errors';
import { logger } from './logger';

export interface HttpResponse {
  status: number;
  body: string;
}

export interface ProbeResponse {
  status: number;
  method: 'HEAD' | 'GET';
}

/**
 * What the pipeline stages need from HTTP. Tests substitute an in-memory
 * implementation.
 */
export interface HttpClient {
  /** HEAD, falling back to a one-byte ranged GET when HEAD is not supported. */
  probe(url: string): Promise<ProbeResponse>;
  get(url: string): Promise<HttpResponse>;
  close(): Promise<void>;
}

export interface FetchClientOptions {
  connections: number;
  timeoutMs: number;
  userAgent: string;
  /** Supply a dispatcher (e.g. an undici MockAgent) instead of a pooled Agent. */
  dispatcher?: Dispatcher;
}

// Statuses meaning "this server does not do HEAD here"
const HEAD_UNSUPPORTED = new Set([405, 501]);

const log = logger.child('http');

export class FetchClient implements HttpClient {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(private readonly options: FetchClientOptions) {
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? new Agent({
      connections: options.connections,
      keepAliveTimeout: 10_000,
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs
    });
  }

  async probe(url: string): Promise<ProbeResponse> {
    const head = await this.send(url, 'HEAD', async body => {
      await body.dump();
      return '';
    });

    if (!HEAD_UNSUPPORTED.has(head.status)) {
      return { status: head.status, method: 'HEAD' };
    }

    log.debug(`HEAD not supported (${head.status}), retrying with ranged GET`, { url });
    const ranged = await this.send(url, 'GET', async body => {
      await body.dump();
      return '';
    }, { range: 'bytes=0-0' });
    return { status: ranged.status, method: 'GET' };
  }

  async get(url: string): Promise<HttpResponse> {
    return this.send(url, 'GET', body => body.text());
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async send(
    url: string,
    method: 'HEAD' | 'GET',
    readBody: (body: Dispatcher.ResponseData['body']) => Promise<string>,
    extraHeaders: Record<string, string> = {}
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    try {
      const response = await request(url, {
        method,
        dispatcher: this.dispatcher,
        signal: controller.signal,
        headers: {
          'user-agent': this.options.userAgent,
          accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.1',
          ...extraHeaders
        }
      });
      const body = await readBody(response.body);
      return { status: response.statusCode, body };
    } catch (error) {
      const message = timedOut
        ? `${method} timed out after ${this.options.timeoutMs}ms`
        : `${method} failed: ${errorMessage(error)}`;
      throw new TransientNetworkError(message, url, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
