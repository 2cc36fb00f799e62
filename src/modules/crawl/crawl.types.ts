/**
 * Crawl Module Types
 * Interfaces for crawl jobs, API payloads and realtime events
 */

import { Document } from 'mongoose';
import { CrawlJobConfig, FrontierStatistics } from '../../lib/crawling/crawling.types';
import { CrawlingStatistics } from '../../lib/crawling/crawling-statistics';

// ============================================================================
// Enums
// ============================================================================

export enum CrawlStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

// ============================================================================
// Core Interfaces
// ============================================================================

/**
 * Summary of one page, stored with the job once the run ends
 */
export interface ICrawledPageSummary {
  url: string;
  depth: number;
  done: boolean;
  failed: boolean;
  attempts: number;
  filename?: string;
  contentHash?: string;
  lastError?: string;
}

export interface ICrawlJob extends Document {
  config: CrawlJobConfig;
  status: CrawlStatus;
  maxWorkers: number;
  outputDir: string;

  statistics?: FrontierStatistics;
  runStatistics?: CrawlingStatistics;
  pages: ICrawledPageSummary[];

  errorMessage?: string;
  durationMs?: number;
  startedAt?: Date;
  completedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

// ============================================================================
// API Request/Response Types
// ============================================================================

export interface ICreateCrawlJobRequest {
  seedUrls: string[];
  domainRestricted?: boolean;
  pathRestricted?: boolean;
  exclusionPatterns?: string[];
  maxPages?: number;
  maxDepth?: number;
  followLinks?: boolean;
  maxWorkers?: number;
}

export interface ICrawlJobResponse {
  success: boolean;
  job: ICrawlJob;
  live?: FrontierStatistics;
}

export interface ICrawlListResponse {
  success: boolean;
  jobs: ICrawlJob[];
  total: number;
}

// ============================================================================
// Socket.IO Event Types
// ============================================================================

export interface ICrawlProgressEvent {
  jobId: string;
  status: CrawlStatus;
  message: string;
  statistics?: FrontierStatistics;
  url?: string;
}
