/**
 * Crawler Configuration
 * Immutable configuration value handed to every pipeline component
 */

import { env as defaultEnv } from './env';

type ConfigSource = Pick<
  typeof defaultEnv,
  | 'START_URL'
  | 'START_PAGE'
  | 'MAX_PAGES'
  | 'MAX_CONCURRENT_REQUESTS'
  | 'RETRY_ATTEMPTS'
  | 'REQUEST_TIMEOUT'
  | 'REQUEST_DELAY_MIN'
  | 'REQUEST_DELAY_MAX'
  | 'RATE_LIMIT_BACKOFF'
  | 'SAVE_TO_JSON'
  | 'SAVE_TO_DB'
  | 'JSON_INDENT'
  | 'DUMPS_DIR'
>;

export interface FetchConfig {
  readonly retryAttempts: number;
  readonly timeoutMs: number;
  readonly jitterMinMs: number;
  readonly jitterMaxMs: number;
  readonly rateLimitBackoffMs: number;
}

export interface CrawlerConfig {
  readonly startUrl: string;
  readonly startPage: number;
  readonly maxPages: number;
  /** Ceiling on simultaneously in-flight HTTP requests */
  readonly maxConcurrentRequests: number;
  readonly fetch: FetchConfig;
  readonly output: {
    readonly saveToJson: boolean;
    readonly saveToDb: boolean;
    readonly jsonIndent: number;
    readonly dumpsDir: string;
  };
}

export function buildCrawlerConfig(source: ConfigSource = defaultEnv): CrawlerConfig {
  if (source.MAX_CONCURRENT_REQUESTS < 1) {
    throw new Error('MAX_CONCURRENT_REQUESTS must be at least 1');
  }
  if (source.RETRY_ATTEMPTS < 1) {
    throw new Error('RETRY_ATTEMPTS must be at least 1');
  }

  const jitterMinMs = Math.max(0, source.REQUEST_DELAY_MIN);

  return Object.freeze({
    startUrl: source.START_URL,
    startPage: Math.max(1, source.START_PAGE),
    maxPages: Math.max(0, source.MAX_PAGES),
    maxConcurrentRequests: source.MAX_CONCURRENT_REQUESTS,
    fetch: Object.freeze({
      retryAttempts: source.RETRY_ATTEMPTS,
      timeoutMs: source.REQUEST_TIMEOUT,
      jitterMinMs,
      jitterMaxMs: Math.max(jitterMinMs, source.REQUEST_DELAY_MAX),
      rateLimitBackoffMs: Math.max(0, source.RATE_LIMIT_BACKOFF),
    }),
    output: Object.freeze({
      saveToJson: source.SAVE_TO_JSON,
      saveToDb: source.SAVE_TO_DB,
      jsonIndent: source.JSON_INDENT,
      dumpsDir: source.DUMPS_DIR,
    }),
  });
}
