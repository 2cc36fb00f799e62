/**
 * Crawl Job MongoDB Model
 * Mongoose schema for crawl job records. Only the job summary is stored;
 * the frontier itself lives in memory for the duration of a run.
 */

import mongoose, { Schema } from 'mongoose';
import { ICrawlJob, CrawlStatus } from './crawl.types';

const CrawlConfigSchema = new Schema({
  seedUrls: {
    type: [String],
    required: true,
  },
  domainRestricted: {
    type: Boolean,
    default: true,
  },
  pathRestricted: {
    type: Boolean,
    default: true,
  },
  exclusionPatterns: {
    type: [String],
    default: [],
  },
  maxPages: {
    type: Number,
    min: 1,
  },
  maxDepth: {
    type: Number,
    min: 0,
  },
  followLinks: {
    type: Boolean,
    default: true,
  },
}, { _id: false });

const FrontierStatisticsSchema = new Schema({
  totalUniquePages: Number,
  uniquePagesScraped: Number,
  pagesPending: Number,
  pagesFailed: Number,
  maxDepthReached: Number,
  maxPages: Number,
}, { _id: false });

const RunStatisticsSchema = new Schema({
  pagesFetched: Number,
  fetchFailures: Number,
  linksDiscovered: Number,
  linksAccepted: Number,
  totalTime: Number,
  averagePageTime: Number,
  successRate: Number,
}, { _id: false });

const CrawledPageSchema = new Schema({
  url: {
    type: String,
    required: true,
  },
  depth: {
    type: Number,
    required: true,
  },
  done: Boolean,
  failed: Boolean,
  attempts: Number,
  filename: String,
  contentHash: String,
  lastError: String,
}, { _id: false });

const CrawlJobSchema = new Schema<ICrawlJob>(
  {
    config: {
      type: CrawlConfigSchema,
      required: true,
    },
    status: {
      type: String,
      enum: Object.values(CrawlStatus),
      default: CrawlStatus.QUEUED,
      index: true,
    },
    maxWorkers: {
      type: Number,
      default: 3,
    },
    outputDir: {
      type: String,
      required: true,
    },
    statistics: FrontierStatisticsSchema,
    runStatistics: RunStatisticsSchema,
    pages: {
      type: [CrawledPageSchema],
      default: [],
    },
    errorMessage: String,
    durationMs: Number,
    startedAt: Date,
    completedAt: Date,
  },
  {
    timestamps: true,
    toJSON: {
      virtuals: true,
      versionKey: false,
    },
  }
);

CrawlJobSchema.index({ createdAt: -1 });
CrawlJobSchema.index({ status: 1, createdAt: -1 });

export const CrawlJobModel = mongoose.model<ICrawlJob>('CrawlJob', CrawlJobSchema);
