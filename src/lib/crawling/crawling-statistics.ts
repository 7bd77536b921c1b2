/**
 * Crawling Statistics Tracker
 * Counters for one crawl run
 */

import { SkipReason } from '../extraction/extraction.types';
import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesVisited = 0;
  private pagesFailed = 0;
  private linksDiscovered = 0;
  private alreadyStored = 0;
  private duplicatesDetected = 0;
  private extractionsAttempted = 0;
  private carsExtracted = 0;
  private parseFailures = 0;
  private skipped: Record<SkipReason, number> = emptySkipCounts();

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  recordPageVisit(linkCount: number): void {
    this.pagesVisited++;
    this.linksDiscovered += linkCount;
  }

  recordPageFailed(): void {
    this.pagesFailed++;
  }

  recordAlreadyStored(count: number): void {
    this.alreadyStored += count;
  }

  recordDuplicates(count: number): void {
    this.duplicatesDetected += count;
  }

  recordExtractionAttempt(): void {
    this.extractionsAttempted++;
  }

  recordExtracted(): void {
    this.carsExtracted++;
  }

  recordSkipped(reason: SkipReason): void {
    this.skipped[reason]++;
  }

  recordParseFailure(): void {
    this.parseFailures++;
  }

  getStatistics(): CrawlingStatistics {
    return {
      pagesVisited: this.pagesVisited,
      pagesFailed: this.pagesFailed,
      linksDiscovered: this.linksDiscovered,
      alreadyStored: this.alreadyStored,
      duplicatesDetected: this.duplicatesDetected,
      extractionsAttempted: this.extractionsAttempted,
      carsExtracted: this.carsExtracted,
      skipped: { ...this.skipped },
      parseFailures: this.parseFailures,
      totalTime: this.now() - this.startTime,
    };
  }
}

function emptySkipCounts(): Record<SkipReason, number> {
  return {
    out_of_category: 0,
    already_stored: 0,
    unavailable: 0,
  };
}
