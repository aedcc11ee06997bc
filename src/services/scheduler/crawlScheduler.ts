import type { Logger } from "pino";
import { SystemClock, type WallClock } from "../../platform/clock/wallClock";
import { addDays, formatApiDate } from "../../utils/dates";
import type { ResearchApiRequestClient } from "../research/requestClient";
import type { CrawlQueryConfig, CrawlSummary, VideoCrawler } from "../crawl/videoCrawler";
import {
  crawlDateWindowIsBehindToday,
  makeCrawlDateWindow,
  splitDateRange,
  type CrawlDateWindow,
} from "./dateWindow";

export type CrawlRunner = Pick<VideoCrawler, "fetchAndStoreAll">;
export type RequestBudget = Pick<
  ResearchApiRequestClient,
  "resetRequestBudget" | "maxApiRequestsReached" | "numApiRequestsSent"
>;

export type ScheduledQuery = Omit<CrawlQueryConfig, "startDate" | "endDate">;

export interface CrawlSchedulerOptions {
  maxDaysPerQuery: number;
  dailyApiRequestQuota: number;
  /** Caller's own ceiling; every repeated or catch-up execution stays under it. */
  maxApiRequestsPerExecution?: number;
  clock?: WallClock;
}

export interface RepeatedRunParams {
  crawlSpan: number;
  crawlLag: number;
  repeatIntervalDays: number;
  catchUpFromStartDate?: Date;
}

/**
 * Runs crawls over date windows: once, on a fixed repeat interval, or back
 * to back from a historical date until caught up. Crawl failures are not
 * caught here; they end the process for its supervisor to restart.
 */
export class CrawlScheduler {
  private running = false;
  private readonly clock: WallClock;

  constructor(
    private readonly crawler: CrawlRunner,
    private readonly budget: RequestBudget,
    private readonly logger: Logger,
    private readonly options: CrawlSchedulerOptions,
  ) {
    this.clock = options.clock ?? new SystemClock();
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Cooperative: takes effect between crawls, never mid-request. */
  stop(): void {
    this.running = false;
  }

  /**
   * Crawls [startDate, endDate) in pieces of at most `maxDaysPerQuery` days;
   * broad windows time out or 500 on the API far more often.
   */
  async runWindow(query: ScheduledQuery, startDate: Date, endDate: Date): Promise<CrawlSummary[]> {
    const summaries: CrawlSummary[] = [];
    for (const window of splitDateRange(startDate, endDate, this.options.maxDaysPerQuery)) {
      if (this.budget.maxApiRequestsReached()) {
        this.logger.warn(
          { startDate: formatApiDate(window.startDate), requestsSent: this.budget.numApiRequestsSent },
          "API request ceiling reached, skipping remaining date ranges",
        );
        break;
      }
      const summary = await this.crawler.fetchAndStoreAll({
        ...query,
        startDate: formatApiDate(window.startDate),
        endDate: formatApiDate(window.endDate),
      });
      if (summary) {
        summaries.push(summary);
      }
      this.logger.info(
        {
          startDate: formatApiDate(window.startDate),
          endDate: formatApiDate(window.endDate),
          crawlId: summary?.crawl.id,
          videos: summary?.videosReceived ?? 0,
          requestsSent: this.budget.numApiRequestsSent,
        },
        "Finished date range",
      );
    }
    return summaries;
  }

  async runRepeated(query: ScheduledQuery, params: RepeatedRunParams): Promise<void> {
    if (!Number.isInteger(params.repeatIntervalDays) || params.repeatIntervalDays <= 0) {
      throw new RangeError(`repeatIntervalDays must be a positive integer, got ${params.repeatIntervalDays}`);
    }
    this.running = true;

    if (params.catchUpFromStartDate) {
      await this.catchUp(query, params, params.catchUpFromStartDate);
    }

    while (this.running) {
      const executionStart = this.clock.now();
      const window = makeCrawlDateWindow(
        { crawlSpan: params.crawlSpan, crawlLag: params.crawlLag },
        executionStart,
      );
      this.budget.resetRequestBudget(
        this.executionBudget(this.options.dailyApiRequestQuota * params.repeatIntervalDays),
      );

      await this.runWindow(query, window.startDate, window.endDate);

      if (!this.running) break;
      await this.waitUntilRepeatIntervalElapsed(executionStart, params.repeatIntervalDays);
    }

    this.logger.info("Repeated crawl stopped");
  }

  private async catchUp(query: ScheduledQuery, params: RepeatedRunParams, from: Date): Promise<void> {
    let window: CrawlDateWindow = makeCrawlDateWindow(
      { crawlSpan: params.crawlSpan, crawlLag: params.crawlLag, startDate: from },
      this.clock.now(),
    );

    while (this.running && crawlDateWindowIsBehindToday(window, params.crawlLag, this.clock.now())) {
      this.logger.info(
        {
          catchUpFrom: formatApiDate(from),
          startDate: formatApiDate(window.startDate),
          endDate: formatApiDate(window.endDate),
          crawlLag: params.crawlLag,
        },
        "Still catching up, next run starts immediately",
      );
      // Catch-up runs are not limited to a daily quota
      this.budget.resetRequestBudget(this.executionBudget(undefined));
      await this.runWindow(query, window.startDate, window.endDate);

      window = makeCrawlDateWindow(
        { crawlSpan: params.crawlSpan, crawlLag: params.crawlLag, startDate: window.endDate },
        this.clock.now(),
      );
    }
    this.logger.info({ crawlLag: params.crawlLag }, "Caught up to today minus crawl lag");
  }

  private executionBudget(quotaBudget: number | undefined): number | undefined {
    const ceiling = this.options.maxApiRequestsPerExecution;
    if (ceiling === undefined) return quotaBudget;
    return quotaBudget === undefined ? ceiling : Math.min(quotaBudget, ceiling);
  }

  async waitUntilRepeatIntervalElapsed(executionStart: Date, repeatIntervalDays: number): Promise<void> {
    const nextExecution = addDays(executionStart, repeatIntervalDays);
    const now = this.clock.now();
    if (now.getTime() >= nextExecution.getTime()) {
      this.logger.warn(
        { executionStart: executionStart.toISOString(), repeatIntervalDays },
        "Previous crawl took longer than the repeat interval, starting now",
      );
      return;
    }

    this.logger.info({ nextExecution: nextExecution.toISOString() }, "Sleeping until next execution");
    await this.clock.sleep(nextExecution.getTime() - now.getTime());
  }
}
