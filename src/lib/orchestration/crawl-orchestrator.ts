/**
 * Crawl Orchestrator
 * Drives a fixed pool of workers that pull pending URLs from the frontier,
 * fetch and store them, and feed discovered links back in until the frontier
 * drains or the page budget is spent.
 */

import { createHash } from 'crypto';
import { CrawlJobConfig, CrawlResult, FrontierStatistics } from '../crawling/crawling.types';
import { CrawlingStatisticsTracker } from '../crawling/crawling-statistics';
import { FrontierStore, resolveLimit } from '../crawling/frontier.store';
import { resolveUrl } from '../crawling/url-normalizer';
import {
  DEFAULT_FILENAME_MAX_LENGTH,
  FilenameAllocator,
  PageWriter,
  deriveFilename,
} from '../storage/page-writer';
import {
  CrawlOrchestratorOptions,
  CrawlPhase,
  CrawlProgressEvent,
  CrawlRunReport,
  FetchedPage,
  PageFetcher,
} from './orchestrator.types';

export const DEFAULT_MAX_WORKERS = 3;

/**
 * Title of a fetched page: the fetcher's title, else the first markdown
 * heading, else the first non-empty line
 */
export function extractTitle(page: FetchedPage): string | undefined {
  if (page.title?.trim()) {
    return page.title.trim();
  }

  const heading = page.content.match(/^#{1,6}\s+(.+)$/m);
  if (heading) {
    return heading[1].trim();
  }

  const firstLine = page.content.split('\n').find((line) => line.trim());
  return firstLine ? firstLine.replace(/^[#\s]+|[#\s]+$/g, '') || undefined : undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class CrawlOrchestrator {
  private readonly config: CrawlJobConfig;
  private readonly fetcher: PageFetcher;
  private readonly writer: PageWriter;
  private readonly maxWorkers: number;
  private readonly filenameMaxLength: number;
  private readonly onProgress?: (event: CrawlProgressEvent) => void;

  private readonly frontier: FrontierStore;
  private readonly tracker = new CrawlingStatisticsTracker();
  private readonly filenames = new FilenameAllocator();

  /** Filename given to each URL on its first write attempt, kept for retries */
  private assignedFilenames: Map<string, string> = new Map();

  /** Bounded work queue refilled from the frontier's pending set */
  private workQueue: string[] = [];

  /** URLs handed to a worker and not yet settled */
  private inFlight: Set<string> = new Set();

  /** Workers parked until an in-flight URL settles */
  private waiters: Array<() => void> = [];

  private currentPhase: CrawlPhase = CrawlPhase.SEEDING;
  private cancelled = false;
  private started = false;

  constructor(
    config: CrawlJobConfig,
    fetcher: PageFetcher,
    writer: PageWriter,
    options: CrawlOrchestratorOptions = {}
  ) {
    this.config = config;
    this.fetcher = fetcher;
    this.writer = writer;
    this.maxWorkers = resolveLimit(options.maxWorkers, DEFAULT_MAX_WORKERS);
    this.filenameMaxLength = resolveLimit(options.filenameMaxLength, DEFAULT_FILENAME_MAX_LENGTH);
    this.onProgress = options.onProgress;
    this.frontier = new FrontierStore(config, { maxAttempts: options.maxAttempts });
  }

  get phase(): CrawlPhase {
    return this.currentPhase;
  }

  /**
   * Stop handing out new URLs. Fetches already in flight finish normally.
   */
  cancel(): void {
    if (!this.cancelled) {
      this.cancelled = true;
      this.workQueue = [];
      console.log('[CrawlOrchestrator] Cancellation requested');
      this.wakeWorkers();
    }
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  getStatistics(): FrontierStatistics {
    return this.frontier.getStatistics();
  }

  /**
   * Run the crawl to completion. May only be called once per orchestrator.
   */
  async run(): Promise<CrawlRunReport> {
    if (this.started) {
      throw new Error('Crawl orchestrator has already been run');
    }
    this.started = true;
    const startedAt = new Date();

    this.enterPhase(CrawlPhase.SEEDING);
    const seeded = this.frontier.seed(this.config.seedUrls);
    console.log(`[CrawlOrchestrator] Seeded ${seeded.length} URL(s), ${this.maxWorkers} worker(s)`);

    this.enterPhase(CrawlPhase.DRAINING);
    const workers = Array.from({ length: this.maxWorkers }, () => this.worker());
    await Promise.all(workers);

    this.enterPhase(CrawlPhase.DONE);
    const finishedAt = new Date();
    const statistics = this.frontier.getStatistics();
    const run = this.tracker.getStatistics();
    const durationMs = finishedAt.getTime() - startedAt.getTime();

    console.log(
      `[CrawlOrchestrator] Crawl ${this.cancelled ? 'cancelled' : 'completed'} in ${(durationMs / 1000).toFixed(2)}s - ` +
        `discovered: ${statistics.totalUniquePages}, scraped: ${statistics.uniquePagesScraped}, ` +
        `pending: ${statistics.pagesPending}, failed: ${statistics.pagesFailed}, ` +
        `max depth: ${statistics.maxDepthReached}`
    );

    return {
      startedAt,
      finishedAt,
      durationMs,
      cancelled: this.cancelled,
      statistics,
      run,
      pages: this.frontier.getPages(),
    };
  }

  private async worker(): Promise<void> {
    for (;;) {
      const url = this.takeNext();
      if (url) {
        await this.processUrl(url);
        this.wakeWorkers();
        continue;
      }

      if (this.inFlight.size === 0) {
        // Nothing queued and nothing that could add more: drained
        this.wakeWorkers();
        return;
      }

      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  /**
   * Next URL to fetch, or null when nothing may be dispatched right now.
   * In-flight URLs count against the remaining budget so the pool never
   * fetches pages the budget could not accept.
   */
  private takeNext(): string | null {
    if (this.cancelled) {
      return null;
    }
    if (this.inFlight.size >= this.frontier.remainingBudget()) {
      return null;
    }

    if (this.workQueue.length === 0) {
      this.refillQueue();
    }

    while (this.workQueue.length > 0) {
      const url = this.workQueue.shift();
      if (url && !this.inFlight.has(url) && this.frontier.isPending(url)) {
        this.inFlight.add(url);
        return url;
      }
    }

    return null;
  }

  private refillQueue(): void {
    for (const url of this.frontier.getPending()) {
      if (this.workQueue.length >= this.maxWorkers) {
        break;
      }
      if (!this.inFlight.has(url)) {
        this.workQueue.push(url);
      }
    }
  }

  private wakeWorkers(): void {
    const waiting = this.waiters.splice(0);
    for (const resolve of waiting) {
      resolve();
    }
  }

  private async processUrl(url: string): Promise<void> {
    const startTime = Date.now();

    try {
      const fetched = await this.fetchPage(url);
      if (!fetched.ok) {
        this.handleFailure(url, fetched.error);
        return;
      }

      const page = fetched.value;
      const filename = this.filenameFor(url, page);

      const written = await this.writePage(filename, page.content);
      if (!written.ok) {
        this.handleFailure(url, written.error);
        return;
      }

      const contentHash = createHash('sha256').update(page.content).digest('hex');
      if (!this.frontier.markDone(url, filename, contentHash)) {
        return;
      }
      this.tracker.recordPageFetched(Date.now() - startTime);

      let accepted: string[] = [];
      if (this.config.followLinks && page.links.length > 0) {
        const links = page.links.map((link) => resolveUrl(link, url));
        accepted = this.frontier.addUrls(links, url);
        this.tracker.recordLinks(page.links.length, accepted.length);
        console.log(
          `[CrawlOrchestrator] Discovered ${page.links.length} link(s) on ${url}, ${accepted.length} new`
        );
      }

      const statistics = this.frontier.getStatistics();
      const maxPages = statistics.maxPages ?? '∞';
      console.log(
        `[CrawlOrchestrator] Stored ${url} as ${filename} - progress ${statistics.uniquePagesScraped}/${maxPages}, ` +
          `${statistics.pagesPending} pending`
      );

      this.emit({
        type: 'page-done',
        url,
        filename,
        depth: this.frontier.getPage(url)?.depth ?? 0,
        linksAccepted: accepted.length,
        statistics,
      });
    } finally {
      this.inFlight.delete(url);
    }
  }

  private filenameFor(url: string, page: FetchedPage): string {
    const assigned = this.assignedFilenames.get(url);
    if (assigned) {
      return assigned;
    }

    const filename = this.filenames.allocate(
      deriveFilename(extractTitle(page), url, this.filenameMaxLength)
    );
    this.assignedFilenames.set(url, filename);
    return filename;
  }

  private async fetchPage(url: string): Promise<CrawlResult<FetchedPage>> {
    try {
      const page = await this.fetcher.fetch(url);
      if (!page.content) {
        return { ok: false, error: new Error(`No content returned for ${url}`) };
      }
      return { ok: true, value: page };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  private async writePage(filename: string, content: string): Promise<CrawlResult<void>> {
    try {
      await this.writer.write(filename, content);
      return { ok: true, value: undefined };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  private handleFailure(url: string, error: Error): void {
    console.error(`[CrawlOrchestrator] Error scraping ${url}: ${error.message}`);
    this.tracker.recordFailure();

    const page = this.frontier.markFailed(url, error.message);
    if (!page) {
      return;
    }

    this.emit({
      type: 'page-failed',
      url,
      error: error.message,
      attempts: page.attempts,
      deadLettered: page.failed,
      statistics: this.frontier.getStatistics(),
    });
  }

  private enterPhase(phase: CrawlPhase): void {
    this.currentPhase = phase;
    this.emit({ type: 'phase', phase, statistics: this.frontier.getStatistics() });
  }

  private emit(event: CrawlProgressEvent): void {
    if (!this.onProgress) {
      return;
    }
    try {
      this.onProgress(event);
    } catch (error) {
      console.error('[CrawlOrchestrator] Progress listener failed:', toError(error).message);
    }
  }
}
