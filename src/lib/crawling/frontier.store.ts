/**
 * Frontier Store
 * Authoritative map of every page known to a crawl run, with its depth and
 * completion state. Owns the dedup, depth and page budget invariants.
 *
 * Every public method is synchronous and never awaits, so each call runs to
 * completion on the event loop before any worker can observe or mutate state.
 * That gives the same serialization as one exclusive lock around all state.
 */

import { CrawlJobConfig, FrontierPage, FrontierStatistics } from './crawling.types';
import { checkEligibility } from './restriction-policy';
import { normalizeUrl, tryNormalizeUrl } from './url-normalizer';

export interface FrontierStoreOptions {
  /**
   * Failed fetches after which a page is dead-lettered
   */
  maxAttempts?: number;
}

export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * A count limit of at least 1, or the fallback when unset or not a finite number
 */
export function resolveLimit(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? Math.max(1, Math.floor(value)) : fallback;
}

export class FrontierStore {
  private readonly config: CrawlJobConfig;
  private readonly maxAttempts: number;

  /** Pages keyed by canonical URL */
  private pages: Map<string, FrontierPage> = new Map();

  /** Canonical URLs awaiting a fetch, in discovery order */
  private pending: Set<string> = new Set();

  constructor(config: CrawlJobConfig, options: FrontierStoreOptions = {}) {
    this.config = config;
    this.maxAttempts = resolveLimit(options.maxAttempts, DEFAULT_MAX_ATTEMPTS);
  }

  /**
   * Insert seed URLs at depth 0. Seeds bypass the restriction policy.
   */
  seed(urls: string[]): string[] {
    const accepted: string[] = [];

    for (const url of urls) {
      const normalized = tryNormalizeUrl(url);
      if (!normalized.ok) {
        console.warn(`[FrontierStore] Ignoring invalid seed URL ${url}: ${normalized.error.message}`);
        continue;
      }
      if (this.pages.has(normalized.value)) {
        continue;
      }
      this.insert(normalized.value, 0);
      accepted.push(normalized.value);
    }

    return accepted;
  }

  /**
   * Offer links discovered on `sourceUrl`. Returns the canonical URLs accepted
   * as new pending pages, in candidate order.
   */
  addUrls(candidateUrls: string[], sourceUrl: string): string[] {
    const sourceKey = normalizeUrl(sourceUrl);
    const newDepth = (this.pages.get(sourceKey)?.depth ?? 0) + 1;

    // Depth belongs to the source, so the whole batch shares one verdict
    if (this.config.maxDepth !== undefined && newDepth > this.config.maxDepth) {
      return [];
    }

    const doneCount = this.countDone();
    const maxPages = this.config.maxPages;
    if (maxPages !== undefined && doneCount >= maxPages) {
      return [];
    }

    const doneUrls = this.doneUrls();
    const accepted: string[] = [];

    for (const candidate of candidateUrls) {
      if (maxPages !== undefined && doneCount + accepted.length >= maxPages) {
        break;
      }

      const normalized = tryNormalizeUrl(candidate);
      if (!normalized.ok) {
        console.warn(`[FrontierStore] Skipping invalid URL ${candidate}: ${normalized.error.message}`);
        continue;
      }

      const url = normalized.value;
      if (this.pages.has(url)) {
        continue;
      }
      if (!checkEligibility(url, this.config, doneUrls).eligible) {
        continue;
      }

      this.insert(url, newDepth, sourceKey);
      accepted.push(url);
    }

    return accepted;
  }

  /**
   * Record a successful fetch. Unknown and already-done URLs are left alone,
   * and nothing is marked once the page budget is full. Returns whether the
   * page moved to done.
   */
  markDone(url: string, filename?: string, contentHash?: string): boolean {
    const page = this.pages.get(normalizeUrl(url));
    if (!page || page.done) {
      return false;
    }

    if (this.isBudgetExhausted()) {
      console.warn(`[FrontierStore] Page budget reached, not marking ${page.url} as done`);
      return false;
    }

    page.done = true;
    page.failed = false;
    page.filename = filename ?? page.filename;
    page.contentHash = contentHash ?? page.contentHash;
    page.completedAt = new Date();
    this.pending.delete(page.url);
    return true;
  }

  /**
   * Record a failed fetch attempt. After `maxAttempts` failures the page is
   * dead-lettered and stops being pending. Returns the page, or undefined for
   * unknown or already-done URLs.
   */
  markFailed(url: string, error: string): FrontierPage | undefined {
    const page = this.pages.get(normalizeUrl(url));
    if (!page || page.done || page.failed) {
      return undefined;
    }

    page.attempts++;
    page.lastError = error;

    if (page.attempts >= this.maxAttempts) {
      page.failed = true;
      this.pending.delete(page.url);
      console.warn(`[FrontierStore] Giving up on ${page.url} after ${page.attempts} failed attempt(s)`);
    }

    return { ...page };
  }

  /**
   * URLs still waiting to be fetched. Once the page budget is reached the
   * pending set is cleared and stays empty.
   */
  getPending(): string[] {
    if (this.isBudgetExhausted()) {
      this.pending.clear();
      return [];
    }
    return Array.from(this.pending);
  }

  /**
   * Whether `url` is currently pending
   */
  isPending(url: string): boolean {
    return this.pending.has(normalizeUrl(url)) && !this.isBudgetExhausted();
  }

  getStatistics(): FrontierStatistics {
    let uniquePagesScraped = 0;
    let pagesFailed = 0;
    let maxDepthReached = 0;

    for (const page of this.pages.values()) {
      if (page.done) uniquePagesScraped++;
      if (page.failed) pagesFailed++;
      maxDepthReached = Math.max(maxDepthReached, page.depth);
    }

    return {
      totalUniquePages: this.pages.size,
      uniquePagesScraped,
      pagesPending: this.isBudgetExhausted() ? 0 : this.pending.size,
      pagesFailed,
      maxDepthReached,
      maxPages: this.config.maxPages ?? null,
    };
  }

  /**
   * Whether the number of done pages reached `maxPages`
   */
  isBudgetExhausted(): boolean {
    return this.config.maxPages !== undefined && this.countDone() >= this.config.maxPages;
  }

  /**
   * Pages the budget still allows to complete (Infinity without a budget)
   */
  remainingBudget(): number {
    if (this.config.maxPages === undefined) {
      return Infinity;
    }
    return Math.max(0, this.config.maxPages - this.countDone());
  }

  has(url: string): boolean {
    return this.pages.has(normalizeUrl(url));
  }

  /**
   * Copy of the page stored under `url`'s canonical form
   */
  getPage(url: string): FrontierPage | undefined {
    const page = this.pages.get(normalizeUrl(url));
    return page ? { ...page } : undefined;
  }

  /**
   * Copies of all pages, in discovery order
   */
  getPages(): FrontierPage[] {
    return Array.from(this.pages.values(), (page) => ({ ...page }));
  }

  private insert(url: string, depth: number, discoveredFrom?: string): void {
    this.pages.set(url, {
      url,
      depth,
      done: false,
      attempts: 0,
      failed: false,
      discoveredFrom,
      discoveredAt: new Date(),
    });
    this.pending.add(url);
  }

  private countDone(): number {
    let count = 0;
    for (const page of this.pages.values()) {
      if (page.done) count++;
    }
    return count;
  }

  private doneUrls(): Set<string> {
    const urls = new Set<string>();
    for (const page of this.pages.values()) {
      if (page.done) urls.add(page.url);
    }
    return urls;
  }
}
