/**
 * Existence Filter
 * Drops candidate URLs the store already holds
 */

import { createLogger } from '../../lib/logger';
import { CarStore } from './car.types';

const log = createLogger('ExistenceFilter');

export class ExistenceFilter {
  constructor(private readonly store: Pick<CarStore, 'findExistingUrls'>) {}

  /**
   * URLs not yet stored, in input order without repeats. When the lookup
   * fails every URL counts as new; the unique index on insert still holds.
   */
  async filterNew(urls: string[]): Promise<string[]> {
    const unique = Array.from(new Set(urls));
    if (unique.length === 0) return [];

    try {
      const existing = await this.store.findExistingUrls(unique);
      return unique.filter((url) => !existing.has(url));
    } catch (error) {
      log.warn(`Existence check failed for ${unique.length} URL(s), treating all as new:`, error);
      return unique;
    }
  }
}
