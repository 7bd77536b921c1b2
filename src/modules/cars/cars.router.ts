/**
 * Cars Router
 */

import { Router } from 'express';
import { CarsController } from './cars.controller';
import { CarQuery } from './car.types';

export function createCarsRouter(cars: CarQuery): Router {
  const router = Router();
  const controller = new CarsController(cars);

  /**
   * @route   GET /api/cars
   * @desc    Page through stored cars
   */
  router.get('/', controller.list);

  return router;
}
