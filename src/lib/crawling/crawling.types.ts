/**
 * Crawling Types
 */

import { SkipReason } from '../extraction/extraction.types';

/**
 * Per-run crawl statistics
 */
export interface CrawlingStatistics {
  /**
   * Listing pages fetched and parsed
   */
  pagesVisited: number;

  /**
   * Listing pages that stayed unavailable after retries
   */
  pagesFailed: number;

  /**
   * Detail links found on listing pages
   */
  linksDiscovered: number;

  /**
   * Links the store already knew at filter time
   */
  alreadyStored: number;

  /**
   * Links seen on an earlier listing page of the same run
   */
  duplicatesDetected: number;

  /**
   * Detail extractions started
   */
  extractionsAttempted: number;

  /**
   * Records produced
   */
  carsExtracted: number;

  skipped: Record<SkipReason, number>;

  /**
   * Detail pages abandoned on a structural parse fault
   */
  parseFailures: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;
}
