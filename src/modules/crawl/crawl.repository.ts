/**
 * Crawl Repository
 * Data access layer for crawl jobs
 */

import { CrawlJobModel } from './crawl.model';
import { ICrawlJob, CrawlStatus } from './crawl.types';

export type CrawlJobUpdate = Partial<
  Pick<
    ICrawlJob,
    | 'statistics'
    | 'runStatistics'
    | 'pages'
    | 'errorMessage'
    | 'durationMs'
    | 'outputDir'
  >
>;

export class CrawlRepository {
  /**
   * Create a new crawl job
   */
  async create(jobData: Partial<ICrawlJob>): Promise<ICrawlJob> {
    const job = new CrawlJobModel(jobData);
    return await job.save();
  }

  /**
   * Find job by ID
   */
  async findById(id: string): Promise<ICrawlJob | null> {
    return await CrawlJobModel.findById(id);
  }

  /**
   * Most recent jobs first
   */
  async findRecent(
    options: { page?: number; limit?: number; status?: CrawlStatus } = {}
  ): Promise<{ jobs: ICrawlJob[]; total: number }> {
    const { page = 1, limit = 20, status } = options;
    const skip = (page - 1) * limit;
    const query = status ? { status } : {};

    const [jobs, total] = await Promise.all([
      CrawlJobModel.find(query)
        .sort({ createdAt: -1 })
        .skip(skip)
        .limit(limit)
        .select('-pages'),
      CrawlJobModel.countDocuments(query),
    ]);

    return { jobs, total };
  }

  /**
   * Update job status, stamping start and completion times
   */
  async updateStatus(
    id: string,
    status: CrawlStatus,
    data?: CrawlJobUpdate
  ): Promise<ICrawlJob | null> {
    const update: CrawlJobUpdate & {
      status: CrawlStatus;
      startedAt?: Date;
      completedAt?: Date;
    } = { status, ...data };

    if (status === CrawlStatus.RUNNING) {
      update.startedAt = new Date();
    } else if (
      status === CrawlStatus.COMPLETED ||
      status === CrawlStatus.FAILED ||
      status === CrawlStatus.CANCELLED
    ) {
      update.completedAt = new Date();
    }

    return await CrawlJobModel.findByIdAndUpdate(id, { $set: update }, { new: true });
  }

  /**
   * Delete job
   */
  async delete(id: string): Promise<boolean> {
    const result = await CrawlJobModel.findByIdAndDelete(id);
    return !!result;
  }
}

export const crawlRepository = new CrawlRepository();
