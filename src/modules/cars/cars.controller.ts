/**
 * Cars Controller
 * Read access to stored listings
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../../middleware/error-handler';
import { CarQuery, toCarJson } from './car.types';

export const MAX_PAGE_SIZE = 100;
const DEFAULT_PAGE_SIZE = 20;

function intParam(value: unknown, fallback: number): number {
  const parsed = typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Number.isNaN(parsed) ? fallback : parsed;
}

export class CarsController {
  constructor(private readonly cars: CarQuery) {}

  /**
   * GET /api/cars?page&limit
   * Most recently discovered first
   */
  list = asyncHandler(async (req: Request, res: Response) => {
    const page = Math.max(1, intParam(req.query.page, 1));
    const limit = Math.min(MAX_PAGE_SIZE, Math.max(1, intParam(req.query.limit, DEFAULT_PAGE_SIZE)));

    const { cars, total } = await this.cars.findRecent({ page, limit });

    res.json({
      success: true,
      cars: cars.map(toCarJson),
      total,
      page,
      limit,
    });
  });
}
