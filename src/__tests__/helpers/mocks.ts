/**
 * Shared Mocks
 * In-process stand-ins for the HTTP layer and the car store
 */

import { HttpClient, HttpResult } from '../../lib/scraping';
import { CarListOptions, CarListResult, CarQuery, CarRecord, CarStore } from '../../modules/cars/car.types';

export type ScriptStep = HttpResult | Error;

export interface ScriptedHttpClient {
  client: jest.Mock<Promise<HttpResult>, Parameters<HttpClient>>;
  /** Highest number of requests in flight at the same time */
  peakInFlight: () => number;
  callsFor: (url: string) => number;
}

export const ok = (body: string): HttpResult => ({ status: 200, body });
export const status = (code: number): HttpResult => ({ status: code, body: null });

/**
 * HTTP client answering from a per-URL script. The last step of a script
 * repeats; unknown URLs answer 404. Every response resolves after `latencyMs`.
 */
export function createScriptedHttpClient(
  routes: Record<string, ScriptStep | ScriptStep[]>,
  latencyMs: number = 0
): ScriptedHttpClient {
  const cursors = new Map<string, number>();
  const calls = new Map<string, number>();
  let inFlight = 0;
  let peak = 0;

  const client = jest.fn<Promise<HttpResult>, Parameters<HttpClient>>(async (url) => {
    inFlight++;
    peak = Math.max(peak, inFlight);
    calls.set(url, (calls.get(url) ?? 0) + 1);

    try {
      await new Promise((resolve) => setTimeout(resolve, latencyMs));

      const route = routes[url];
      if (route === undefined) return status(404);

      const steps = Array.isArray(route) ? route : [route];
      const cursor = cursors.get(url) ?? 0;
      cursors.set(url, cursor + 1);
      const step = steps[Math.min(cursor, steps.length - 1)];

      if (step instanceof Error) throw step;
      return step;
    } finally {
      inFlight--;
    }
  });

  return {
    client,
    peakInFlight: () => peak,
    callsFor: (url) => calls.get(url) ?? 0,
  };
}

/**
 * Car store backed by a Map, with switchable failure modes
 */
export class InMemoryCarStore implements CarStore, CarQuery {
  readonly cars = new Map<string, CarRecord>();
  failLookups = false;
  failInserts = false;
  bulkLookups = 0;
  singleLookups = 0;

  constructor(knownUrls: string[] = []) {
    for (const url of knownUrls) {
      this.cars.set(url, {
        url,
        title: 'Stored earlier',
        priceUsd: 0,
        odometerKm: 0,
        sellerName: 'Unknown',
        phoneNumber: '',
        imageUrl: null,
        imagesCount: 0,
        vin: '',
        plateNumber: '',
        discoveredAt: new Date('2024-01-01T00:00:00.000Z'),
      });
    }
  }

  async findExistingUrls(urls: string[]): Promise<Set<string>> {
    this.bulkLookups++;
    if (this.failLookups) throw new Error('store unavailable');
    return new Set(urls.filter((url) => this.cars.has(url)));
  }

  async exists(url: string): Promise<boolean> {
    this.singleLookups++;
    if (this.failLookups) throw new Error('store unavailable');
    return this.cars.has(url);
  }

  async insertBatch(records: CarRecord[]): Promise<number> {
    if (this.failInserts) throw new Error('insert failed');

    const urls = new Set<string>();
    for (const record of records) {
      if (this.cars.has(record.url) || urls.has(record.url)) {
        throw new Error(`E11000 duplicate key error: url ${record.url}`);
      }
      urls.add(record.url);
    }

    for (const record of records) {
      this.cars.set(record.url, record);
    }
    return records.length;
  }

  async findRecent(options: CarListOptions = {}): Promise<CarListResult> {
    const { page = 1, limit = 20 } = options;
    const all = Array.from(this.cars.values()).sort(
      (a, b) => b.discoveredAt.getTime() - a.discoveredAt.getTime()
    );
    return {
      cars: all.slice((page - 1) * limit, page * limit),
      total: all.length,
    };
  }
}
