/**
 * Extraction Types
 * Per-URL outcome of a detail extraction
 */

import { ScrapingError } from '../scraping/errors';
import { CarRecord } from '../../modules/cars/car.types';

export type SkipReason = 'out_of_category' | 'already_stored' | 'unavailable';

export type ExtractionOutcome =
  | { status: 'success'; record: CarRecord }
  | { status: 'skipped'; url: string; reason: SkipReason }
  | { status: 'failed'; url: string; error: ScrapingError };

/**
 * Anything that turns a URL into markup, or null when unavailable
 */
export interface PageSource {
  fetch(url: string): Promise<string | null>;
}
