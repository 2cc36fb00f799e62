/**
 * Orchestrator Types
 * Type definitions for the crawl worker pool
 */

import { CrawlingStatistics } from '../crawling/crawling-statistics';
import { FrontierPage, FrontierStatistics } from '../crawling/crawling.types';

export enum CrawlPhase {
  SEEDING = 'seeding',
  DRAINING = 'draining',
  DONE = 'done',
}

/**
 * Content extracted for one URL by the fetch collaborator
 */
export interface FetchedPage {
  content: string;
  links: string[];
  images: string[];
  title?: string;
}

/**
 * Fetch collaborator. Rejects on transport or parse failure.
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

export type CrawlProgressEvent =
  | {
      type: 'page-done';
      url: string;
      filename: string;
      depth: number;
      linksAccepted: number;
      statistics: FrontierStatistics;
    }
  | {
      type: 'page-failed';
      url: string;
      error: string;
      attempts: number;
      deadLettered: boolean;
      statistics: FrontierStatistics;
    }
  | {
      type: 'phase';
      phase: CrawlPhase;
      statistics: FrontierStatistics;
    };

export interface CrawlOrchestratorOptions {
  /**
   * Number of concurrent fetch workers
   */
  maxWorkers?: number;

  /**
   * Failed fetches after which a URL is given up on
   */
  maxAttempts?: number;

  /**
   * Longest filename (before `.md`) derived from a page title
   */
  filenameMaxLength?: number;

  onProgress?: (event: CrawlProgressEvent) => void;
}

export interface CrawlRunReport {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  cancelled: boolean;
  statistics: FrontierStatistics;
  run: CrawlingStatistics;
  pages: FrontierPage[];
}
