/**
 * Car Repository
 * Data access layer for extracted listings
 */

import mongoose from 'mongoose';
import { CarModel } from './car.model';
import { CarListOptions, CarListResult, CarQuery, CarRecord, CarStore } from './car.types';

function toCarRecord(doc: CarRecord): CarRecord {
  return {
    url: doc.url,
    title: doc.title,
    priceUsd: doc.priceUsd,
    odometerKm: doc.odometerKm,
    sellerName: doc.sellerName,
    phoneNumber: doc.phoneNumber,
    imageUrl: doc.imageUrl,
    imagesCount: doc.imagesCount,
    vin: doc.vin,
    plateNumber: doc.plateNumber,
    discoveredAt: doc.discoveredAt,
  };
}

export class CarRepository implements CarStore, CarQuery {
  /**
   * Stored URLs among the given ones, in a single query
   */
  async findExistingUrls(urls: string[]): Promise<Set<string>> {
    if (urls.length === 0) return new Set();

    const docs = await CarModel.find({ url: { $in: urls } })
      .select({ url: 1, _id: 0 })
      .lean<Array<Pick<CarRecord, 'url'>>>();

    return new Set(docs.map((doc) => doc.url));
  }

  async exists(url: string): Promise<boolean> {
    return (await CarModel.exists({ url })) !== null;
  }

  /**
   * Insert the whole batch in one transaction; a duplicate URL aborts it.
   * Transactions need a replica set or a mongos.
   */
  async insertBatch(records: CarRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    const session = await mongoose.startSession();
    try {
      let inserted = 0;
      await session.withTransaction(async () => {
        const docs = await CarModel.insertMany(records, { session, ordered: true });
        inserted = docs.length;
      });
      return inserted;
    } finally {
      await session.endSession();
    }
  }

  /**
   * Most recently discovered listings first
   */
  async findRecent(options: CarListOptions = {}): Promise<CarListResult> {
    const { page = 1, limit = 20 } = options;
    const skip = (page - 1) * limit;

    const [cars, total] = await Promise.all([
      CarModel.find()
        .sort({ discoveredAt: -1 })
        .skip(skip)
        .limit(limit)
        .lean<CarRecord[]>(),
      CarModel.countDocuments(),
    ]);

    return { cars: cars.map(toCarRecord), total };
  }
}

export const carRepository = new CarRepository();
