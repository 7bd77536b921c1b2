/**
 * Server Entry Point
 * Initializes MongoDB, the daily crawl schedule and the Express API
 */

import { createServer } from 'http';
import { createApp } from './app';
import { buildCrawlerConfig } from './config/crawler.config';
import { env } from './config/env';
import { createLogger } from './lib/logger';
import { connectDB, disconnectDB } from './lib/mongo';
import { createCrawlOrchestrator } from './lib/orchestration';
import { DailyScheduler } from './lib/scheduling';
import { carRepository } from './modules/cars/car.repository';
import { CrawlInProgressError, CrawlService } from './modules/crawls/crawl.service';

const log = createLogger('Server');

const startServer = async (): Promise<void> => {
  try {
    const config = buildCrawlerConfig();

    await connectDB(env.MONGODB_URI, { requireTransactions: config.output.saveToDb });

    const crawlService = new CrawlService(createCrawlOrchestrator(config, carRepository));

    const scheduler = new DailyScheduler(
      env.SCRAPE_HOUR,
      env.SCRAPE_MINUTE,
      async () => {
        try {
          await crawlService.runOnce();
        } catch (error) {
          if (!(error instanceof CrawlInProgressError)) throw error;
          log.warn('Scheduled crawl skipped: previous run still active');
        }
      },
      { timezone: env.SCRAPE_TIMEZONE }
    );

    if (env.SCHEDULER_ENABLED) {
      scheduler.start();
    }

    const app = createApp({ crawlService, cars: carRepository });
    const httpServer = createServer(app);

    httpServer.listen(env.PORT, () => {
      log.info('');
      log.info('🚀 ═══════════════════════════════════════════════════════');
      log.info('🚀 Crawler server is running');
      log.info(`🚀 Environment: ${env.NODE_ENV}`);
      log.info(`🚀 Port: ${env.PORT}`);
      log.info(`🚀 Schedule: ${env.SCHEDULER_ENABLED ? `daily at ${env.SCRAPE_HOUR}:${String(env.SCRAPE_MINUTE).padStart(2, '0')} ${env.SCRAPE_TIMEZONE}` : 'disabled'}`);
      log.info(`🚀 API: http://localhost:${env.PORT}/health`);
      log.info('🚀 ═══════════════════════════════════════════════════════');
      log.info('');
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      log.info(`${signal} signal received: closing HTTP server`);
      scheduler.stop();
      httpServer.close(() => {
        log.info('HTTP server closed');
        disconnectDB()
          .then(() => process.exit(0))
          .catch((error) => {
            log.error('Failed to disconnect MongoDB:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    log.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
