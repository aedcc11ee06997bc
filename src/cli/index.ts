#!/usr/bin/env node

import { Command, Option } from "commander";
import { RATE_LIMIT_WAIT_STRATEGIES, runtimeConfig, type RateLimitWaitStrategy } from "../config";
import { createContext, settingsFromConfig, type AppContext, type CrawlerSettings } from "../app/context";
import { serializeQuery } from "../domain/query";
import { MAX_VIDEOS_PER_REQUEST } from "../services/research/types";
import { makeCrawlDateWindow } from "../services/scheduler/dateWindow";
import type { ScheduledQuery } from "../services/scheduler/crawlScheduler";
import { formatApiDate } from "../utils/dates";
import { createLogger } from "../utils/logger";
import {
  collectValues,
  parseDateOption,
  parseIntegerOption,
  queryFromFlags,
  type QueryFlags,
} from "./queryOptions";

const logger = createLogger("cli");

interface SharedOptions extends QueryFlags {
  dbFile?: string;
  crawlTag?: string;
  rawResponsesOutputDir?: string;
  apiCredentialsFile?: string;
  rateLimitWaitStrategy?: RateLimitWaitStrategy;
  maxApiRateLimitRetries?: number;
  maxApiRequests?: number;
  stopAfterOneRequest?: boolean;
  fetchUserInfo?: boolean;
  fetchComments?: boolean;
  patchScalars?: boolean;
  debug?: boolean;
}

interface RunOptions extends SharedOptions {
  startDate: Date;
  endDate: Date;
}

interface RunRepeatedOptions extends SharedOptions {
  crawlSpan: number;
  crawlLag: number;
  repeatInterval: number;
  catchUpFromStartDate?: Date;
}

function addQueryOptions(command: Command): Command {
  return command
    .option("--query-file-json <path>", "JSON file holding the query; cannot be combined with query flags")
    .option("--region <codes>", "Region codes (repeatable, comma separated)", collectValues)
    .option("--include-any-hashtags <list>", "Videos with any of these hashtags (comma separated)")
    .option("--exclude-any-hashtags <list>", "Exclude videos with any of these hashtags")
    .option("--include-all-hashtags <list>", "Videos with all of these hashtags")
    .option("--exclude-all-hashtags <list>", "Exclude videos with all of these hashtags")
    .option("--include-any-keywords <list>", "Videos with any of these keywords (comma separated)")
    .option("--exclude-any-keywords <list>", "Exclude videos with any of these keywords")
    .option("--include-all-keywords <list>", "Videos with all of these keywords")
    .option("--exclude-all-keywords <list>", "Exclude videos with all of these keywords")
    .option("--only-from-usernames <list>", "Only videos from these usernames (comma separated)")
    .option("--exclude-from-usernames <list>", "Exclude videos from these usernames");
}

function addSharedOptions(command: Command): Command {
  return addQueryOptions(command)
    .option("--db-file <path>", "SQLite database file", runtimeConfig.dbPath)
    .option("--crawl-tag <tag>", "Label attached to the crawl and every video it finds")
    .option("--raw-responses-output-dir <dir>", "Store every raw API response under this directory")
    .option("--api-credentials-file <path>", "JSON file with client_id, client_secret and client_key")
    .addOption(
      new Option("--rate-limit-wait-strategy <strategy>", "How long to wait after a rate-limit response").choices(
        RATE_LIMIT_WAIT_STRATEGIES,
      ),
    )
    .option("--max-api-rate-limit-retries <n>", "Give up after this many attempts per request", parseIntegerOption(1))
    .option("--max-api-requests <n>", "Stop after sending this many API requests", parseIntegerOption(1))
    .option("--stop-after-one-request", "Send a single request; same as --max-api-requests 1")
    .option("--fetch-user-info", "Also fetch user info for every video's author", runtimeConfig.fetchUserInfo)
    .option("--fetch-comments", "Also fetch comments for every video (uses a lot of quota)", runtimeConfig.fetchComments)
    .option("--patch-scalars", "Only overwrite video fields present in the new response")
    .option("--debug", "Debug logging");
}

function settingsFor(options: SharedOptions): CrawlerSettings {
  return settingsFromConfig(runtimeConfig, {
    dbPath: options.dbFile,
    apiCredentialsFile: options.apiCredentialsFile,
    rawResponsesOutputDir: options.rawResponsesOutputDir,
    rateLimitWaitStrategy: options.rateLimitWaitStrategy,
    maxApiRateLimitRetries: options.maxApiRateLimitRetries,
    maxApiRequests: options.stopAfterOneRequest ? 1 : options.maxApiRequests,
    scalarMode: options.patchScalars ? "patch" : "replace",
  });
}

function scheduledQuery(options: SharedOptions): ScheduledQuery {
  return {
    query: serializeQuery(queryFromFlags(options)),
    crawlTags: options.crawlTag ? [options.crawlTag] : [],
    maxCount: runtimeConfig.videoPageSize,
    fetchUserInfo: options.fetchUserInfo,
    fetchComments: options.fetchComments,
  };
}

async function withContext(options: SharedOptions, fn: (context: AppContext) => Promise<void>): Promise<void> {
  if (options.debug) {
    logger.level = "debug";
  }
  const context = await createContext(settingsFor(options), logger);
  try {
    await fn(context);
  } finally {
    context.close();
  }
}

async function runCommand(options: RunOptions): Promise<void> {
  const query = scheduledQuery(options);
  await withContext(options, async ({ scheduler, requestClient }) => {
    const summaries = await scheduler.runWindow(query, options.startDate, options.endDate);
    logger.info(
      {
        crawls: summaries.map((summary) => summary.crawl.id),
        videos: summaries.reduce((total, summary) => total + summary.videosReceived, 0),
        requestsSent: requestClient.numApiRequestsSent,
      },
      "Run complete",
    );
  });
}

async function runRepeatedCommand(options: RunRepeatedOptions): Promise<void> {
  const query = scheduledQuery(options);
  await withContext(options, async ({ scheduler }) => {
    const shutdown = (signal: string) => {
      logger.info({ signal }, "Received shutdown signal, stopping after the current crawl");
      scheduler.stop();
    };
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));

    await scheduler.runRepeated(query, {
      crawlSpan: options.crawlSpan,
      crawlLag: options.crawlLag,
      repeatIntervalDays: options.repeatInterval,
      catchUpFromStartDate: options.catchUpFromStartDate,
    });
  });
}

async function testCommand(options: SharedOptions): Promise<void> {
  const query = scheduledQuery(options);
  const window = makeCrawlDateWindow({ crawlSpan: 1, crawlLag: 1 }, new Date());
  await withContext({ ...options, stopAfterOneRequest: true }, async ({ crawler }) => {
    const results = await crawler.fetchAll({
      ...query,
      startDate: formatApiDate(window.startDate),
      endDate: formatApiDate(window.endDate),
    });
    const output = {
      startDate: formatApiDate(window.startDate),
      endDate: formatApiDate(window.endDate),
      videos: results?.videos.length ?? 0,
      cursor: results?.crawl.cursor ?? null,
      hasMore: results?.crawl.hasMore ?? null,
      searchId: results?.crawl.searchId ?? null,
      sampleVideoIds: results?.videos.slice(0, 5).map((video) => video.id) ?? [],
    };
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
  });
}

function printQueryCommand(options: QueryFlags): void {
  const query = queryFromFlags(options);
  process.stdout.write(`${JSON.stringify(JSON.parse(serializeQuery(query)), null, 2)}\n`);
}

const program = new Command();

program
  .name("video-research-crawler")
  .description("Crawl the TikTok Research API video search into SQLite")
  .version("0.1.0");

addSharedOptions(
  program
    .command("run")
    .description("Crawl one date range, split into chunks of at most MAX_DAYS_PER_QUERY days")
    .requiredOption("--start-date <YYYYMMDD>", "First day to crawl", parseDateOption)
    .requiredOption("--end-date <YYYYMMDD>", "Day after the last day to crawl (exclusive)", parseDateOption),
).action(runCommand);

addSharedOptions(
  program
    .command("run-repeated")
    .description("Crawl a rolling date window on a fixed interval, optionally catching up from a past date first")
    .requiredOption("--crawl-span <days>", "Days between window start and end", parseIntegerOption(1))
    .option("--crawl-lag <days>", "Days the window ends before today", parseIntegerOption(0), 1)
    .option("--repeat-interval <days>", "Days between crawls", parseIntegerOption(1), 1)
    .option("--catch-up-from-start-date <YYYYMMDD>", "Crawl back to back from this date until caught up", parseDateOption),
).action(runRepeatedCommand);

addSharedOptions(
  program.command("test").description(`Send one request (up to ${MAX_VIDEOS_PER_REQUEST} videos) and print what came back`),
).action(testCommand);

addQueryOptions(program.command("print-query").description("Print the query JSON the flags produce")).action(
  printQueryCommand,
);

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.fatal({ err: error }, "Command failed");
  process.exitCode = 1;
});
