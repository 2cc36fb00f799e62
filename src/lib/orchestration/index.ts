/**
 * Crawl Orchestration
 * Main export file for the crawl orchestrator
 */

export * from './orchestrator.types';
export * from './crawl-orchestrator';
