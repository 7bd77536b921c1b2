/**
 * Crawl Types
 */

import { CrawlingStatistics } from '../../lib/crawling/crawling.types';

export interface CrawlRunSummary {
  startedAt: Date;
  finishedAt: Date;
  /** Records handed to the sinks */
  extracted: number;
  statistics: CrawlingStatistics | null;
  /** Set when the run itself failed */
  error: string | null;
}

export interface CrawlStatus {
  running: boolean;
  lastRun: CrawlRunSummary | null;
}
