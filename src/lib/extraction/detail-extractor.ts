/**
 * Detail Extractor
 * Turns one detail URL into a car record, a skip, or a parse failure
 */

import * as cheerio from 'cheerio';
import { createLogger } from '../logger';
import { parseError } from '../scraping/errors';
import { CarRecord, CarStore } from '../../modules/cars/car.types';
import { CAR_FIELD_RULES, EXCLUDED_URL_PATTERNS } from './car-detail.rules';
import { CarDetailFields, CarFieldRules } from './field-rules.types';
import { applyRule, missingRequiredFields } from './field-rules.utils';
import { ExtractionOutcome, PageSource } from './extraction.types';

const log = createLogger('Extractor');

export interface DetailExtractorOptions {
  fetcher: PageSource;
  store: Pick<CarStore, 'exists'>;
  rules?: CarFieldRules;
  clock?: () => Date;
  excludedUrlPatterns?: readonly string[];
}

export class DetailExtractor {
  private readonly fetcher: PageSource;
  private readonly store: Pick<CarStore, 'exists'>;
  private readonly rules: CarFieldRules;
  private readonly clock: () => Date;
  private readonly excludedUrlPatterns: readonly string[];
  private lastStamp = 0;

  constructor(options: DetailExtractorOptions) {
    this.fetcher = options.fetcher;
    this.store = options.store;
    this.rules = options.rules ?? CAR_FIELD_RULES;
    this.clock = options.clock ?? (() => new Date());
    this.excludedUrlPatterns = options.excludedUrlPatterns ?? EXCLUDED_URL_PATTERNS;
  }

  async extract(url: string): Promise<ExtractionOutcome> {
    if (this.excludedUrlPatterns.some((pattern) => url.includes(pattern))) {
      log.debug(`Skipping ${url}: not a used-car listing`);
      return { status: 'skipped', url, reason: 'out_of_category' };
    }

    if (await this.isStored(url)) {
      return { status: 'skipped', url, reason: 'already_stored' };
    }

    const html = await this.fetcher.fetch(url);
    if (html === null) {
      return { status: 'skipped', url, reason: 'unavailable' };
    }

    return this.extractFromHtml(url, html);
  }

  /**
   * Parse detail markup. `now` defaults to the next run timestamp,
   * which never goes backwards within one extractor.
   */
  extractFromHtml(url: string, html: string, now: Date = this.nextTimestamp()): ExtractionOutcome {
    const $ = cheerio.load(html);

    const missing = missingRequiredFields($, this.rules);
    if (missing.length > 0) {
      const error = parseError(`Missing required field(s): ${missing.join(', ')}`);
      log.error(`Failed to parse ${url}: ${error.message}`);
      return { status: 'failed', url, error };
    }

    const pick = <K extends keyof CarDetailFields>(field: K): CarDetailFields[K] =>
      applyRule($, this.rules[field]);

    const record: CarRecord = {
      url,
      title: pick('title'),
      priceUsd: pick('priceUsd'),
      odometerKm: pick('odometerKm'),
      sellerName: pick('sellerName'),
      phoneNumber: pick('phoneNumber'),
      imageUrl: pick('imageUrl'),
      imagesCount: pick('imagesCount'),
      vin: pick('vin'),
      plateNumber: pick('plateNumber'),
      discoveredAt: now,
    };

    return { status: 'success', record };
  }

  private async isStored(url: string): Promise<boolean> {
    try {
      return await this.store.exists(url);
    } catch (error) {
      log.warn(`Existence lookup failed for ${url}, treating as new:`, error);
      return false;
    }
  }

  private nextTimestamp(): Date {
    this.lastStamp = Math.max(this.clock().getTime(), this.lastStamp);
    return new Date(this.lastStamp);
  }
}
