/**
 * Error Handling Middleware
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { env } from '../config/env';
import { createLogger } from '../lib/logger';

const log = createLogger('API');

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Forward rejections of an async handler to the error handler
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

function statusOf(err: unknown): number {
  if (err instanceof ApiError) return err.statusCode;

  // body-parser and friends attach an HTTP status to client errors
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const { status } = err;
    if (typeof status === 'number' && status >= 400 && status < 500) return status;
  }

  return 500;
}

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const statusCode = statusOf(err);
  const message = err instanceof Error ? err.message : 'Unknown error';

  if (statusCode >= 500) {
    log.error(`${req.method} ${req.path} failed:`, err);
  }

  res.status(statusCode).json({
    success: false,
    error: statusCode >= 500 && env.NODE_ENV === 'production' ? 'Internal server error' : message,
  });
};
