/**
 * Crawl Service
 * Creates crawl jobs, runs them in the background and reports progress
 */

import * as path from 'path';
import { crawlRepository, CrawlRepository } from './crawl.repository';
import { emitToJob } from '../../lib/socket';
import { ApiError } from '../../middleware/error-handler';
import { env } from '../../config/env';
import {
  CrawlOrchestrator,
  CrawlPhase,
  CrawlProgressEvent,
  PageFetcher,
} from '../../lib/orchestration';
import { FilePageWriter, PageWriter } from '../../lib/storage/page-writer';
import { FrontierPage, FrontierStatistics } from '../../lib/crawling';
import { JinaFetcher } from './fetchers/jina.fetcher';
import { ValidatedCrawlRequest } from './crawl.validation';
import { ICrawlJob, ICrawlProgressEvent, ICrawledPageSummary, CrawlStatus } from './crawl.types';

export interface CrawlServiceDependencies {
  repository?: CrawlRepository;
  createFetcher?: () => PageFetcher;
  createWriter?: (outputDir: string) => PageWriter;
  outputRoot?: string;
}

interface ActiveCrawl {
  orchestrator: CrawlOrchestrator;
  done: Promise<void>;
}

/**
 * Summaries of the pages a run settled. Pending pages are left out so the job
 * document stays bounded on crawls without a page budget.
 */
export function toPageSummaries(pages: FrontierPage[]): ICrawledPageSummary[] {
  return pages
    .filter((page) => page.done || page.failed)
    .map((page) => ({
      url: page.url,
      depth: page.depth,
      done: page.done,
      failed: page.failed,
      attempts: page.attempts,
      filename: page.filename,
      contentHash: page.contentHash,
      lastError: page.lastError,
    }));
}

export class CrawlService {
  private readonly repository: CrawlRepository;
  private readonly createFetcher: () => PageFetcher;
  private readonly createWriter: (outputDir: string) => PageWriter;
  private readonly outputRoot: string;

  /** Crawls running in this process, by job ID */
  private active: Map<string, ActiveCrawl> = new Map();

  constructor(deps: CrawlServiceDependencies = {}) {
    this.repository = deps.repository ?? crawlRepository;
    this.createFetcher = deps.createFetcher ?? (() => new JinaFetcher());
    this.createWriter = deps.createWriter ?? ((outputDir) => new FilePageWriter(outputDir));
    this.outputRoot = deps.outputRoot ?? env.CRAWL_OUTPUT_DIR;
  }

  /**
   * Create a crawl job and start it in the background
   */
  async createJob(request: ValidatedCrawlRequest): Promise<ICrawlJob> {
    const maxWorkers = request.maxWorkers ?? env.CRAWL_MAX_WORKERS;

    const job = await this.repository.create({
      config: request.config,
      status: CrawlStatus.QUEUED,
      maxWorkers,
      outputDir: this.outputRoot,
    });
    const jobId = String(job.id);
    const outputDir = path.join(this.outputRoot, jobId);

    const orchestrator = new CrawlOrchestrator(
      request.config,
      this.createFetcher(),
      this.createWriter(outputDir),
      {
        maxWorkers,
        maxAttempts: env.CRAWL_MAX_ATTEMPTS,
        filenameMaxLength: env.CRAWL_FILENAME_MAX_LENGTH,
        onProgress: (event) => this.handleProgress(jobId, event),
      }
    );

    this.emitProgress(jobId, {
      jobId,
      status: CrawlStatus.QUEUED,
      message: `Crawl queued with ${request.config.seedUrls.length} seed URL(s)`,
    });

    const done = this.executeJob(jobId, orchestrator, outputDir)
      .catch((error) => {
        console.error(`[CrawlService] Error executing job ${jobId}:`, error);
      })
      .finally(() => {
        this.active.delete(jobId);
      });
    this.active.set(jobId, { orchestrator, done });

    return job;
  }

  private async executeJob(
    jobId: string,
    orchestrator: CrawlOrchestrator,
    outputDir: string
  ): Promise<void> {
    try {
      await this.repository.updateStatus(jobId, CrawlStatus.RUNNING, { outputDir });
      console.log(`[CrawlService] Job ${jobId}: crawl started, writing to ${outputDir}`);

      const report = await orchestrator.run();
      const status = report.cancelled ? CrawlStatus.CANCELLED : CrawlStatus.COMPLETED;

      await this.repository.updateStatus(jobId, status, {
        statistics: report.statistics,
        runStatistics: report.run,
        pages: toPageSummaries(report.pages),
        durationMs: report.durationMs,
      });

      const finished: ICrawlProgressEvent = {
        jobId,
        status,
        message:
          `Crawl ${status} in ${(report.durationMs / 1000).toFixed(2)}s: ` +
          `${report.statistics.uniquePagesScraped} page(s) scraped`,
        statistics: report.statistics,
      };
      this.emitProgress(jobId, finished);
      this.emitProgress(jobId, finished, 'crawl:completed');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[CrawlService] Job ${jobId} failed: ${message}`);

      await this.repository.updateStatus(jobId, CrawlStatus.FAILED, {
        errorMessage: message,
        statistics: orchestrator.getStatistics(),
      });

      const failed: ICrawlProgressEvent = {
        jobId,
        status: CrawlStatus.FAILED,
        message: `Crawl failed: ${message}`,
      };
      this.emitProgress(jobId, failed);
      this.emitProgress(jobId, failed, 'crawl:failed');
    }
  }

  /**
   * Resolve once the job's background run has settled (immediately when the
   * job is not running in this process)
   */
  async waitForJob(jobId: string): Promise<void> {
    await this.active.get(jobId)?.done;
  }

  async getJob(jobId: string): Promise<ICrawlJob | null> {
    return await this.repository.findById(jobId);
  }

  /**
   * Live frontier statistics of a job running in this process
   */
  getLiveStatistics(jobId: string): FrontierStatistics | undefined {
    return this.active.get(jobId)?.orchestrator.getStatistics();
  }

  async listJobs(
    options: { page?: number; limit?: number; status?: CrawlStatus } = {}
  ): Promise<{ jobs: ICrawlJob[]; total: number }> {
    return await this.repository.findRecent(options);
  }

  /**
   * Cancel a queued or running job. In-flight fetches finish, no new URL is
   * dispatched, and the job is stored as cancelled once the run settles.
   */
  async cancelJob(jobId: string): Promise<ICrawlJob | null> {
    const job = await this.repository.findById(jobId);
    if (!job) {
      throw new ApiError(404, 'Crawl job not found');
    }

    if (job.status !== CrawlStatus.QUEUED && job.status !== CrawlStatus.RUNNING) {
      return job;
    }

    const active = this.active.get(jobId);
    if (active) {
      active.orchestrator.cancel();
      await active.done;
      return await this.repository.findById(jobId);
    }

    // No run in this process (e.g. the server restarted mid-crawl)
    return await this.repository.updateStatus(jobId, CrawlStatus.CANCELLED);
  }

  async deleteJob(jobId: string): Promise<boolean> {
    if (this.active.has(jobId)) {
      throw new ApiError(409, 'Cannot delete a running crawl job; cancel it first');
    }
    return await this.repository.delete(jobId);
  }

  /**
   * Cancel every running crawl and wait for them to settle
   */
  async shutdown(): Promise<void> {
    const running = Array.from(this.active.values());
    for (const { orchestrator } of running) {
      orchestrator.cancel();
    }
    await Promise.all(running.map(({ done }) => done));
  }

  private handleProgress(jobId: string, event: CrawlProgressEvent): void {
    switch (event.type) {
      case 'page-done':
        this.emitProgress(jobId, {
          jobId,
          status: CrawlStatus.RUNNING,
          message: `Scraped ${event.url} (depth ${event.depth}), ${event.linksAccepted} new link(s)`,
          url: event.url,
          statistics: event.statistics,
        });
        break;
      case 'page-failed':
        this.emitProgress(jobId, {
          jobId,
          status: CrawlStatus.RUNNING,
          message: event.deadLettered
            ? `Gave up on ${event.url} after ${event.attempts} attempt(s): ${event.error}`
            : `Failed to scrape ${event.url} (attempt ${event.attempts}): ${event.error}`,
          url: event.url,
          statistics: event.statistics,
        });
        break;
      case 'phase':
        if (event.phase === CrawlPhase.DRAINING) {
          this.emitProgress(jobId, {
            jobId,
            status: CrawlStatus.RUNNING,
            message: `Crawling ${event.statistics.pagesPending} seed URL(s)`,
            statistics: event.statistics,
          });
        }
        break;
    }
  }

  private emitProgress(
    jobId: string,
    event: ICrawlProgressEvent,
    eventName: string = 'crawl:progress'
  ): void {
    try {
      emitToJob(jobId, eventName, event);
    } catch (error) {
      console.error('[CrawlService] Error emitting progress:', error);
    }
  }
}

export const crawlService = new CrawlService();
