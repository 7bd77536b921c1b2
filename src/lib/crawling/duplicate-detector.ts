/**
 * Duplicate Detector
 * Remembers every candidate URL claimed during one crawl run
 */

import { normalizeUrl } from './url-normalizer';

export interface DuplicatePartition {
  fresh: string[];
  duplicates: string[];
}

export class DuplicateDetector {
  private seen = new Set<string>();
  private duplicatesCount = 0;

  /**
   * Claim a URL; returns true if it was already claimed
   */
  claim(url: string): boolean {
    const key = normalizeUrl(url);
    if (this.seen.has(key)) {
      this.duplicatesCount++;
      return true;
    }
    this.seen.add(key);
    return false;
  }

  /**
   * Claim each URL in order, splitting first sightings from repeats
   */
  partition(urls: string[]): DuplicatePartition {
    const fresh: string[] = [];
    const duplicates: string[] = [];

    for (const url of urls) {
      if (this.claim(url)) {
        duplicates.push(url);
      } else {
        fresh.push(url);
      }
    }

    return { fresh, duplicates };
  }

  /**
   * Distinct URLs claimed and repeat claims so far
   */
  getStats(): { total: number; duplicates: number } {
    return {
      total: this.seen.size,
      duplicates: this.duplicatesCount,
    };
  }
}
