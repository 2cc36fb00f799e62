/**
 * Crawling Types
 * Type definitions for the crawl frontier
 */

/**
 * Crawl job configuration, fixed for the lifetime of a run
 */
export interface CrawlJobConfig {
  /**
   * URLs the crawl starts from (depth 0)
   */
  seedUrls: string[];

  /**
   * Only follow links whose host is one of the seed hosts
   */
  domainRestricted: boolean;

  /**
   * Only follow links whose first path segment matches a seed's first segment
   */
  pathRestricted: boolean;

  /**
   * Substrings that exclude a URL when present anywhere in it
   */
  exclusionPatterns: string[];

  /**
   * Budget on completed pages (unset means unlimited)
   */
  maxPages?: number;

  /**
   * Ceiling on discovery depth (unset means unlimited)
   */
  maxDepth?: number;

  /**
   * Feed links discovered on fetched pages back into the frontier
   */
  followLinks: boolean;
}

/**
 * A page known to the frontier, keyed by its canonical URL
 */
export interface FrontierPage {
  url: string;

  /**
   * Hops from the seed that first discovered this page. Fixed at insertion.
   */
  depth: number;

  done: boolean;
  filename?: string;
  contentHash?: string;

  /**
   * Failed fetch attempts so far
   */
  attempts: number;

  /**
   * Dead-lettered after too many failed attempts; no longer pending
   */
  failed: boolean;

  lastError?: string;
  discoveredFrom?: string;
  discoveredAt: Date;
  completedAt?: Date;
}

/**
 * Frontier snapshot, computed from the full page map on every call
 */
export interface FrontierStatistics {
  totalUniquePages: number;
  uniquePagesScraped: number;
  pagesPending: number;
  pagesFailed: number;
  maxDepthReached: number;
  maxPages: number | null;
}

/**
 * Why a candidate URL was refused by the restriction policy
 */
export type IneligibleReason = 'already-done' | 'domain' | 'path' | 'excluded' | 'malformed';

export type EligibilityDecision =
  | { eligible: true }
  | { eligible: false; reason: IneligibleReason };

/**
 * Tagged per-call result, used where a single URL may fail without
 * affecting the rest of a batch
 */
export type CrawlResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };
