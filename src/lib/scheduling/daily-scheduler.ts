/**
 * Daily Scheduler
 * Runs a job once a day at a fixed wall-clock time in a given time zone
 */

import CronParser from 'cron-parser';
import { createLogger } from '../logger';

const log = createLogger('Scheduler');

export const DEFAULT_SCHEDULE_TIMEZONE = 'Europe/Kyiv';

export interface DailySchedulerOptions {
  /** IANA zone the hour and minute are read in */
  timezone?: string;
  clock?: () => Date;
}

/**
 * Cron expression firing every day at hour:minute
 */
export function dailyCronExpression(hour: number, minute: number): string {
  return `${minute} ${hour} * * *`;
}

/**
 * Milliseconds from `now` to the next hour:minute in `timezone`, strictly after `now`
 */
export function msUntilNext(now: Date, hour: number, minute: number, timezone: string): number {
  const interval = CronParser.parse(dailyCronExpression(hour, minute), {
    currentDate: now,
    tz: timezone,
  });

  let next = interval.next().toDate();
  while (next.getTime() <= now.getTime()) {
    next = interval.next().toDate();
  }
  return next.getTime() - now.getTime();
}

export class DailyScheduler {
  private timer: NodeJS.Timeout | null = null;
  private nextRunAt: Date | null = null;
  private readonly timezone: string;
  private readonly clock: () => Date;

  constructor(
    private readonly hour: number,
    private readonly minute: number,
    private readonly job: () => Promise<unknown>,
    options: DailySchedulerOptions = {}
  ) {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw new Error(`Invalid hour: ${hour}`);
    }
    if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
      throw new Error(`Invalid minute: ${minute}`);
    }
    this.timezone = options.timezone ?? DEFAULT_SCHEDULE_TIMEZONE;
    this.clock = options.clock ?? (() => new Date());
  }

  msUntilNextRun(now: Date): number {
    return msUntilNext(now, this.hour, this.minute, this.timezone);
  }

  start(): void {
    if (this.timer) return;
    this.arm();
    log.info(`Next crawl at ${this.nextRunAt?.toISOString()} (${this.timezone})`);
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getNextRunAt(): Date | null {
    return this.nextRunAt;
  }

  private arm(): void {
    const now = this.clock();
    const delay = this.msUntilNextRun(now);
    this.nextRunAt = new Date(now.getTime() + delay);
    this.timer = setTimeout(() => {
      void this.fire();
    }, delay);
  }

  private async fire(): Promise<void> {
    try {
      await this.job();
    } catch (error) {
      log.error('Scheduled job failed:', error);
    } finally {
      // stop() during the run leaves the timer cleared
      if (this.timer) this.arm();
    }
  }
}
