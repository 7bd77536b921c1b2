/**
 * Car Types
 * Record shape, store contract and JSON dump shape
 */

export const UNKNOWN_SELLER = 'Unknown';

export interface CarRecord {
  url: string;
  title: string;
  priceUsd: number;
  odometerKm: number;
  sellerName: string;
  /** Canonical +380XXXXXXXXX or empty */
  phoneNumber: string;
  imageUrl: string | null;
  imagesCount: number;
  vin: string;
  plateNumber: string;
  discoveredAt: Date;
}

/**
 * What the crawl pipeline requires from persistence
 */
export interface CarStore {
  /** URLs from `urls` already stored, in one round trip */
  findExistingUrls(urls: string[]): Promise<Set<string>>;
  exists(url: string): Promise<boolean>;
  /** All-or-nothing insert; resolves with the number of inserted records */
  insertBatch(records: CarRecord[]): Promise<number>;
}

export interface CarListOptions {
  page?: number;
  limit?: number;
}

export interface CarListResult {
  cars: CarRecord[];
  total: number;
}

export interface CarQuery {
  findRecent(options?: CarListOptions): Promise<CarListResult>;
}

/**
 * One element of the JSON dump
 */
export interface CarJson {
  url: string;
  title: string;
  price_usd: number;
  odometer_km: number;
  username: string;
  phone_number: string;
  image_url: string | null;
  images_count: number;
  car_vin: string;
  car_number: string;
  datetime_found: string;
}

export function toCarJson(car: CarRecord): CarJson {
  return {
    url: car.url,
    title: car.title,
    price_usd: car.priceUsd,
    odometer_km: car.odometerKm,
    username: car.sellerName,
    phone_number: car.phoneNumber,
    image_url: car.imageUrl,
    images_count: car.imagesCount,
    car_vin: car.vin,
    car_number: car.plateNumber,
    datetime_found: car.discoveredAt.toISOString(),
  };
}
