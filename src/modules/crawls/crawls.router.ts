/**
 * Crawls Router
 */

import { Router } from 'express';
import { CrawlsController } from './crawls.controller';
import { CrawlService } from './crawl.service';

export function createCrawlsRouter(crawlService: CrawlService): Router {
  const router = Router();
  const controller = new CrawlsController(crawlService);

  /**
   * @route   GET /api/crawls/status
   * @desc    Whether a crawl is running and how the last one went
   */
  router.get('/status', controller.getStatus);

  /**
   * @route   POST /api/crawls
   * @desc    Start a crawl
   */
  router.post('/', controller.start);

  return router;
}
