/**
 * Crawling Statistics Tracker
 * Run-level counters for fetch outcomes and link discovery
 */

export interface CrawlingStatistics {
  pagesFetched: number;
  fetchFailures: number;
  linksDiscovered: number;
  linksAccepted: number;
  totalTime: number;
  averagePageTime: number;

  /**
   * Share of fetch attempts that succeeded (0-1)
   */
  successRate: number;
}

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesFetched: number = 0;
  private fetchFailures: number = 0;
  private linksDiscovered: number = 0;
  private linksAccepted: number = 0;
  private pageTimes: number[] = [];

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Record a page fetched and stored
   */
  recordPageFetched(time: number): void {
    this.pagesFetched++;
    this.pageTimes.push(time);
  }

  /**
   * Record a failed fetch or write
   */
  recordFailure(): void {
    this.fetchFailures++;
  }

  /**
   * Record links found on a page and how many of them the frontier took
   */
  recordLinks(discovered: number, accepted: number): void {
    this.linksDiscovered += discovered;
    this.linksAccepted += accepted;
  }

  getStatistics(): CrawlingStatistics {
    const totalTime = Date.now() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const totalAttempts = this.pagesFetched + this.fetchFailures;
    const successRate = totalAttempts > 0 ? this.pagesFetched / totalAttempts : 0;

    return {
      pagesFetched: this.pagesFetched,
      fetchFailures: this.fetchFailures,
      linksDiscovered: this.linksDiscovered,
      linksAccepted: this.linksAccepted,
      totalTime,
      averagePageTime,
      successRate,
    };
  }
}
