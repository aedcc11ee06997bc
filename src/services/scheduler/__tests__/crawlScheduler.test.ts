/**
 * Crawl scheduler tests
 *
 * The fake clock never really sleeps; loops are ended by calling stop()
 * from a sleep hook or from inside a crawl.
 */

import pino, { type Logger } from "pino";
import { describe, it, expect, vi } from "vitest";
import { createCrawl } from "../../../domain/crawl";
import { parseApiDate } from "../../../utils/dates";
import { FakeClock, silentLogger } from "../../../test/fakes";
import type { CrawlQueryConfig, CrawlSummary } from "../../crawl/videoCrawler";
import { CrawlScheduler, type CrawlRunner, type RequestBudget } from "../crawlScheduler";

class FakeRunner implements CrawlRunner {
  readonly calls: Array<[string, string]> = [];

  constructor(private readonly onCall: (call: number) => void = () => undefined) {}

  async fetchAndStoreAll(config: CrawlQueryConfig): Promise<CrawlSummary | undefined> {
    this.calls.push([config.startDate, config.endDate]);
    this.onCall(this.calls.length);
    return {
      crawl: createCrawl(config.query, config.crawlTags ?? [], new Date(0)),
      pages: 1,
      videosReceived: 10,
    };
  }
}

class FakeBudget implements RequestBudget {
  readonly resets: Array<number | undefined> = [];
  numApiRequestsSent = 0;
  reached = false;

  resetRequestBudget(maxApiRequests?: number): void {
    this.resets.push(maxApiRequests);
  }

  maxApiRequestsReached(): boolean {
    return this.reached;
  }
}

const query = { query: '{"and":[]}', crawlTags: ["scheduled"] };
const DAY_MS = 24 * 60 * 60 * 1000;

function setup(
  options: { now?: string; onCall?: (call: number) => void; logger?: Logger; maxApiRequestsPerExecution?: number } = {},
) {
  const clock = new FakeClock(options.now ?? "2024-03-10T06:00:00Z");
  const runner = new FakeRunner(options.onCall);
  const budget = new FakeBudget();
  const scheduler = new CrawlScheduler(runner, budget, options.logger ?? silentLogger, {
    maxDaysPerQuery: 7,
    dailyApiRequestQuota: 1000,
    maxApiRequestsPerExecution: options.maxApiRequestsPerExecution,
    clock,
  });
  return { clock, runner, budget, scheduler };
}

describe("CrawlScheduler", () => {
  describe("runWindow", () => {
    it("crawls the range in pieces no longer than maxDaysPerQuery", async () => {
      const { runner, scheduler } = setup();

      const summaries = await scheduler.runWindow(query, parseApiDate("20240101"), parseApiDate("20240117"));

      expect(runner.calls).toEqual([
        ["20240101", "20240108"],
        ["20240108", "20240115"],
        ["20240115", "20240117"],
      ]);
      expect(summaries).toHaveLength(3);
    });

    it("skips the remaining pieces once the request ceiling is reached", async () => {
      const { runner, budget, scheduler } = setup({
        onCall: () => {
          budget.reached = true;
        },
      });

      await scheduler.runWindow(query, parseApiDate("20240101"), parseApiDate("20240117"));

      expect(runner.calls).toEqual([["20240101", "20240108"]]);
    });
  });

  describe("runRepeated", () => {
    it("crawls the trailing window each interval with a scaled request budget", async () => {
      const { clock, runner, budget, scheduler } = setup();
      clock.onSleep = () => {
        if (clock.sleeps.length === 2) scheduler.stop();
      };

      await scheduler.runRepeated(query, { crawlSpan: 2, crawlLag: 1, repeatIntervalDays: 2 });

      expect(runner.calls).toEqual([
        ["20240307", "20240309"],
        ["20240309", "20240311"],
      ]);
      expect(budget.resets).toEqual([2000, 2000]);
      expect(clock.sleeps).toEqual([2 * DAY_MS, 2 * DAY_MS]);
      expect(scheduler.isRunning).toBe(false);
    });

    it("catches up from a past date without a request ceiling", async () => {
      const { clock, runner, budget, scheduler } = setup();
      clock.onSleep = () => scheduler.stop();

      await scheduler.runRepeated(query, {
        crawlSpan: 2,
        crawlLag: 1,
        repeatIntervalDays: 1,
        catchUpFromStartDate: parseApiDate("20240301"),
      });

      expect(runner.calls).toEqual([
        ["20240301", "20240303"],
        ["20240303", "20240305"],
        ["20240305", "20240307"],
        ["20240307", "20240309"],
      ]);
      expect(budget.resets).toEqual([undefined, undefined, undefined, 1000]);
    });

    it("keeps every execution under the caller's request ceiling", async () => {
      const { clock, budget, scheduler } = setup({ maxApiRequestsPerExecution: 1500 });
      clock.onSleep = () => scheduler.stop();

      await scheduler.runRepeated(query, {
        crawlSpan: 2,
        crawlLag: 1,
        repeatIntervalDays: 2,
        catchUpFromStartDate: parseApiDate("20240305"),
      });

      // One catch-up run, then a steady run whose 2000 quota budget is capped
      expect(budget.resets).toEqual([1500, 1500]);
    });

    it("starts the next run at once when a crawl overruns the interval", async () => {
      const logger = pino({ level: "silent" });
      const warnSpy = vi.spyOn(logger, "warn");
      const { clock, runner, scheduler } = setup({
        logger,
        onCall: (call) => {
          clock.advance(2 * DAY_MS);
          if (call === 2) scheduler.stop();
        },
      });

      await scheduler.runRepeated(query, { crawlSpan: 1, crawlLag: 1, repeatIntervalDays: 1 });

      expect(runner.calls).toHaveLength(2);
      expect(clock.sleeps).toEqual([]);
      expect(warnSpy).toHaveBeenCalledWith(
        { executionStart: "2024-03-10T06:00:00.000Z", repeatIntervalDays: 1 },
        "Previous crawl took longer than the repeat interval, starting now",
      );
    });

    it("rejects a non-positive repeat interval", async () => {
      const { scheduler } = setup();

      await expect(
        scheduler.runRepeated(query, { crawlSpan: 1, crawlLag: 1, repeatIntervalDays: 0 }),
      ).rejects.toThrow(RangeError);
      expect(scheduler.isRunning).toBe(false);
    });
  });
});
