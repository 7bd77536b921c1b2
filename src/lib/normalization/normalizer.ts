/**
 * Listing Text Normalizer
 * Converts raw odometer, price and phone fragments into canonical values
 */

/** Fixed conversion rates into USD */
export const EUR_TO_USD = 1.1;
export const UAH_PER_USD = 41.22;

const ODOMETER_PATTERN = /(\d+(?:\s*\d+)*)\s*(тис\.?|тыс\.?|км|km)?/;
const THOUSAND_MARKERS = ['тис', 'тыс'];

/** Digit runs too long for an exact integer count as unparsable */
const wholeOrZero = (value: number): number => (Number.isSafeInteger(value) && value >= 0 ? value : 0);

/**
 * Parse odometer text into kilometres.
 * "95 тис. км" -> 95000, "1 200 км" -> 1200, no digits -> 0
 */
export function parseOdometer(text: string | null | undefined): number {
  if (!text) return 0;

  const match = text.toLowerCase().match(ODOMETER_PATTERN);
  if (!match) return 0;

  const value = wholeOrZero(parseInt(match[1].replace(/\s/g, ''), 10));

  const unit = match[2];
  if (unit && THOUSAND_MARKERS.some((marker) => unit.startsWith(marker))) {
    return wholeOrZero(value * 1000);
  }

  return value;
}

/**
 * Parse price text into whole US dollars.
 * Handles formats:
 * - "6 999 $" -> 6999
 * - "24 200 €" -> 26620 (EUR conversion)
 * - "300 000 грн" -> 7278 (UAH conversion)
 * Conversions truncate toward zero.
 */
export function parsePrice(text: string | null | undefined): number {
  if (!text || text === '0') return 0;

  const clean = text.replace(/\s/g, '');
  const numberMatch = clean.match(/\d+/);
  if (!numberMatch) return 0;

  const amount = wholeOrZero(parseInt(numberMatch[0], 10));

  if (clean.includes('€')) {
    return wholeOrZero(Math.trunc(amount * EUR_TO_USD));
  }
  if (clean.toLowerCase().includes('грн')) {
    return Math.trunc(amount / UAH_PER_USD);
  }
  return amount;
}

/**
 * Normalize a phone number to +380XXXXXXXXX.
 * Returns an empty string when the input has no digits.
 */
export function parsePhone(text: string | null | undefined): string {
  if (!text) return '';

  const digits = text.replace(/\D/g, '');
  if (!digits) return '';

  if (digits.startsWith('380') && digits.length === 11) {
    return `+${digits}`;
  }
  if (digits.startsWith('80') && digits.length === 10) {
    return `+3${digits}`;
  }
  if (digits.startsWith('0') && digits.length === 9) {
    return `+38${digits}`;
  }
  return `+380${digits.slice(-9)}`;
}
