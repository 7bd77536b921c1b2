/**
 * Crawling System
 * Listing-page discovery and per-run bookkeeping
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './duplicate-detector';
export * from './link-discoverer';
export * from './crawling-statistics';
