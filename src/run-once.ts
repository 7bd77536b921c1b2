/**
 * One-shot Crawl
 * Runs a single crawl and exits, for cron jobs and manual runs
 */

import { buildCrawlerConfig } from './config/crawler.config';
import { env } from './config/env';
import { createLogger } from './lib/logger';
import { connectDB, disconnectDB } from './lib/mongo';
import { createCrawlOrchestrator } from './lib/orchestration';
import { carRepository } from './modules/cars/car.repository';

const log = createLogger('Crawl');

const main = async (): Promise<void> => {
  const config = buildCrawlerConfig();

  // The existence checks go through the store even when only dumping JSON
  await connectDB(env.MONGODB_URI, { requireTransactions: config.output.saveToDb });

  try {
    const { records, statistics } = await createCrawlOrchestrator(config, carRepository).run();
    log.info(`Done: ${records.length} new car(s)`, statistics);
  } finally {
    await disconnectDB();
  }
};

main().catch((error) => {
  log.error('Crawl failed:', error);
  process.exit(1);
});
