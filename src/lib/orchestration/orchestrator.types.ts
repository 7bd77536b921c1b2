/**
 * Crawl Orchestration Types
 */

import { CrawlingStatistics } from '../crawling/crawling.types';
import { CarRecord } from '../../modules/cars/car.types';
import { SinkResult } from '../../modules/cars/sinks/sink.types';

export interface CrawlRunResult {
  /** Successfully extracted records, in discovery order */
  records: CarRecord[];
  statistics: CrawlingStatistics;
  /** One entry per configured sink, in persist order */
  sinks: SinkResult[];
}

/** Listing pages to visit in one run */
export interface PageRange {
  startUrl: string;
  startPage: number;
  maxPages: number;
}
