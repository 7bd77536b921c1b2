/**
 * Field Rule Types
 * A field rule is a structural locator plus a normalization function
 */

import { CarRecord } from '../../modules/cars/car.types';

/**
 * How a matched element is read; every mode yields one value per match
 */
export type ReadMode =
  | { kind: 'text' }
  /** First direct text child, ignoring nested badges */
  | { kind: 'firstTextNode' }
  /** First attribute present on the element, '' if none */
  | { kind: 'attribute'; names: readonly string[] }
  /** '' per match; only the number of matches matters */
  | { kind: 'count' };

export interface FieldRule<T> {
  /** CSS selector */
  selector: string;
  read: ReadMode;
  /** Extraction aborts when a required selector matches nothing */
  required?: boolean;
  /** Values of all matches in document order */
  normalize: (values: string[]) => T;
}

/** Fields taken from detail markup; url and timestamp come from the extractor */
export type CarDetailFields = Omit<CarRecord, 'url' | 'discoveredAt'>;

export type FieldRules<F> = { readonly [K in keyof F]: FieldRule<F[K]> };

export type CarFieldRules = FieldRules<CarDetailFields>;
