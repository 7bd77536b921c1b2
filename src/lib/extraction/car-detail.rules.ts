/**
 * Car Detail Rules
 * Where each field lives on a detail page and how it is normalized
 */

import { parseOdometer, parsePhone, parsePrice } from '../normalization';
import { UNKNOWN_SELLER } from '../../modules/cars/car.types';
import { CarFieldRules } from './field-rules.types';

const GALLERY_SOURCES = 'div.photo-620x465 picture source';

export const CAR_FIELD_RULES: CarFieldRules = {
  title: {
    selector: 'h1.head',
    read: { kind: 'text' },
    required: true,
    normalize: ([title = '']) => title,
  },
  priceUsd: {
    selector: 'div.price_value strong',
    read: { kind: 'text' },
    normalize: ([price = '0']) => parsePrice(price),
  },
  odometerKm: {
    selector: 'div.base-information.bold',
    read: { kind: 'text' },
    normalize: ([odometer = '0']) => parseOdometer(odometer),
  },
  sellerName: {
    selector: 'div.seller_info_name.bold',
    read: { kind: 'text' },
    normalize: ([name]) => name || UNKNOWN_SELLER,
  },
  vin: {
    selector: 'span.label-vin',
    read: { kind: 'text' },
    normalize: ([vin = '']) => vin,
  },
  plateNumber: {
    selector: 'span.state-num.ua',
    read: { kind: 'firstTextNode' },
    normalize: ([plate = '']) => plate,
  },
  phoneNumber: {
    selector: 'div.phones_item span.phone.bold',
    read: { kind: 'text' },
    normalize: (phones) => phones.map(parsePhone).find((phone) => phone !== '') ?? '',
  },
  imageUrl: {
    selector: GALLERY_SOURCES,
    read: { kind: 'attribute', names: ['srcset', 'src', 'data-src'] },
    normalize: ([first]) => first || null,
  },
  imagesCount: {
    selector: GALLERY_SOURCES,
    read: { kind: 'count' },
    normalize: (sources) => sources.length,
  },
};

/** URL fragments of pages that are not used-car listings */
export const EXCLUDED_URL_PATTERNS: readonly string[] = ['newauto'];
