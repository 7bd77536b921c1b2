/**
 * Crawls Controller
 * HTTP request/response handling for crawl runs
 */

import { Request, Response } from 'express';
import { ApiError } from '../../middleware/error-handler';
import { CrawlService } from './crawl.service';

export class CrawlsController {
  constructor(private readonly crawlService: CrawlService) {}

  /**
   * GET /api/crawls/status
   */
  getStatus = (req: Request, res: Response): void => {
    res.json({
      success: true,
      status: this.crawlService.getStatus(),
    });
  };

  /**
   * POST /api/crawls
   * Start a crawl in the background
   */
  start = (req: Request, res: Response): void => {
    if (!this.crawlService.trigger()) {
      throw new ApiError(409, 'A crawl is already running');
    }

    res.status(202).json({
      success: true,
      message: 'Crawl started',
    });
  };
}
