/**
 * Crawl Service
 * At most one crawl run at a time, with the outcome of the last one
 */

import { createLogger } from '../../lib/logger';
import { CrawlOrchestrator, CrawlRunResult } from '../../lib/orchestration';
import { CrawlRunSummary, CrawlStatus } from './crawl.types';

const log = createLogger('CrawlService');

export class CrawlInProgressError extends Error {
  constructor() {
    super('A crawl is already running');
    this.name = 'CrawlInProgressError';
  }
}

export class CrawlService {
  private running = false;
  private lastRun: CrawlRunSummary | null = null;

  constructor(
    private readonly orchestrator: Pick<CrawlOrchestrator, 'run'>,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async runOnce(): Promise<CrawlRunResult> {
    if (this.running) {
      throw new CrawlInProgressError();
    }

    this.running = true;
    const startedAt = this.clock();

    try {
      const result = await this.orchestrator.run();
      this.lastRun = {
        startedAt,
        finishedAt: this.clock(),
        extracted: result.records.length,
        statistics: result.statistics,
        error: null,
      };
      return result;
    } catch (error) {
      this.lastRun = {
        startedAt,
        finishedAt: this.clock(),
        extracted: 0,
        statistics: null,
        error: error instanceof Error ? error.message : String(error),
      };
      throw error;
    } finally {
      this.running = false;
    }
  }

  /**
   * Start a run in the background; false when one is already active
   */
  trigger(): boolean {
    if (this.running) return false;

    this.runOnce().catch((error) => {
      log.error('Crawl run failed:', error);
    });
    return true;
  }

  getStatus(): CrawlStatus {
    return {
      running: this.running,
      lastRun: this.lastRun,
    };
  }
}
