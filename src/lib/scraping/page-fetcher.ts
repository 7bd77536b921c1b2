/**
 * Page Fetcher
 * Single HTTP GET with jitter, rotating identity headers, retry and rate-limit backoff.
 * Returns null once every attempt has failed; callers skip that unit of work.
 */

import { FetchConfig } from '../../config/crawler.config';
import { ConcurrencyLimiter } from '../concurrency';
import { createLogger } from '../logger';
import { classifyError, ScrapingErrorType } from './errors';
import { getRandomHeaders } from './headers';

const log = createLogger('Fetcher');

export interface HttpResult {
  status: number;
  /** Response body, read only for 200 responses */
  body: string | null;
}

export type HttpClient = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<HttpResult>;

export interface PageFetcherOptions {
  config: FetchConfig;
  limiter: ConcurrencyLimiter;
  httpClient?: HttpClient;
  sleep?: (ms: number) => Promise<void>;
  /** Returns a value in [0, 1) */
  random?: () => number;
}

export const defaultHttpClient: HttpClient = async (url, init) => {
  const response = await fetch(url, {
    method: 'GET',
    headers: init.headers,
    redirect: 'follow',
    signal: init.signal,
  });

  if (response.status !== 200) {
    // Free the connection without downloading the body
    await response.body?.cancel();
    return { status: response.status, body: null };
  }

  return { status: response.status, body: await response.text() };
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class PageFetcher {
  private readonly config: FetchConfig;
  private readonly limiter: ConcurrencyLimiter;
  private readonly httpClient: HttpClient;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: PageFetcherOptions) {
    this.config = options.config;
    this.limiter = options.limiter;
    this.httpClient = options.httpClient ?? defaultHttpClient;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Fetch page markup, or null when the page stays unavailable
   */
  async fetch(url: string): Promise<string | null> {
    const { retryAttempts, rateLimitBackoffMs } = this.config;

    for (let attempt = 1; attempt <= retryAttempts; attempt++) {
      await this.sleep(this.jitter());
      const headers = getRandomHeaders(this.random);

      try {
        const result = await this.limiter.run(() => this.requestOnce(url, headers));

        if (result.status === 200 && result.body !== null) {
          return result.body;
        }

        const fault = classifyError(undefined, result.status);

        if (fault.type === ScrapingErrorType.RATE_LIMITED) {
          const backoff = rateLimitBackoffMs * attempt;
          log.warn(`Rate limited on ${url} (attempt ${attempt}/${retryAttempts}), backing off ${backoff}ms`);
          await this.sleep(backoff);
          continue;
        }

        log.debug(`Attempt ${attempt}/${retryAttempts} for ${url} returned ${result.status} (${fault.type})`);
      } catch (error) {
        const fault = classifyError(error);
        log.error(`Attempt ${attempt}/${retryAttempts} failed for ${url}: ${fault.type} ${fault.message}`);
      }
    }

    log.warn(`Giving up on ${url} after ${retryAttempts} attempt(s)`);
    return null;
  }

  private async requestOnce(url: string, headers: Record<string, string>): Promise<HttpResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      return await this.httpClient(url, { headers, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private jitter(): number {
    const { jitterMinMs, jitterMaxMs } = this.config;
    return jitterMinMs + this.random() * (jitterMaxMs - jitterMinMs);
  }
}
