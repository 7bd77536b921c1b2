/**
 * Scraping Utilities - Barrel Export
 *
 * - Identity header rotation
 * - Error classification
 * - Page fetching with retry and backoff
 */

export {
  BrowserFingerprint,
  BROWSER_FINGERPRINTS,
  getRandomFingerprint,
  buildHeaders,
  getRandomHeaders,
} from './headers';

export { ScrapingErrorType, ScrapingError, classifyError, parseError } from './errors';

export {
  HttpResult,
  HttpClient,
  PageFetcherOptions,
  PageFetcher,
  defaultHttpClient,
} from './page-fetcher';
