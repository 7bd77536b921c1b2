/**
 * Extraction System
 * Rule-driven detail page extraction
 */

export * from './extraction.types';
export * from './field-rules.types';
export * from './field-rules.utils';
export * from './car-detail.rules';
export * from './detail-extractor';
