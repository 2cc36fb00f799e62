/**
 * Crawling System
 * Main export file for the crawl frontier
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './restriction-policy';
export * from './frontier.store';
export * from './crawling-statistics';
