/**
 * Crawl Orchestration
 */

export * from './orchestrator.types';
export * from './crawl-orchestrator';
