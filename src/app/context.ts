/**
 * Composition root: opens the store, builds the API client and wires the
 * crawler and scheduler. The CLI is a thin layer over what this returns.
 */

import axios, { type AxiosInstance } from "axios";
import type { Database } from "better-sqlite3";
import type { Logger } from "pino";

import type { RateLimitWaitStrategy, RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../db/migrate";
import { SystemClock, type WallClock } from "../platform/clock/wallClock";
import { CommentRepository } from "../repositories/commentRepository";
import { CrawlRepository } from "../repositories/crawlRepository";
import { UserInfoRepository } from "../repositories/userInfoRepository";
import { VideoRepository, type ScalarUpsertMode } from "../repositories/videoRepository";
import { VideoCrawler } from "../services/crawl/videoCrawler";
import { loadCredentials, type ApiCredentials } from "../services/research/credentials";
import { RawResponseArchive } from "../services/research/rawResponseArchive";
import { ResearchApiRequestClient } from "../services/research/requestClient";
import { CrawlScheduler } from "../services/scheduler/crawlScheduler";

export interface CrawlerSettings {
  dbPath: string;
  apiCredentialsFile: string;
  rawResponsesOutputDir?: string;
  rateLimitWaitStrategy: RateLimitWaitStrategy;
  maxApiRateLimitRetries?: number;
  maxApiRequests?: number;
  requestTimeoutMs: number;
  dailyApiRequestQuota: number;
  maxDaysPerQuery: number;
  scalarMode?: ScalarUpsertMode;
}

export interface AppContext {
  logger: Logger;
  db: Database;
  crawlRepo: CrawlRepository;
  videoRepo: VideoRepository;
  userInfoRepo: UserInfoRepository;
  commentRepo: CommentRepository;
  requestClient: ResearchApiRequestClient;
  crawler: VideoCrawler;
  scheduler: CrawlScheduler;
  close: () => void;
}

export interface ContextDependencies {
  http?: AxiosInstance;
  clock?: WallClock;
  credentials?: ApiCredentials;
}

/** Runtime config with CLI overrides; an undefined override keeps the config value. */
export function settingsFromConfig(config: RuntimeConfig, overrides: Partial<CrawlerSettings> = {}): CrawlerSettings {
  return {
    dbPath: overrides.dbPath ?? config.dbPath,
    apiCredentialsFile: overrides.apiCredentialsFile ?? config.apiCredentialsFile,
    rawResponsesOutputDir: overrides.rawResponsesOutputDir ?? config.rawResponsesOutputDir,
    rateLimitWaitStrategy: overrides.rateLimitWaitStrategy ?? config.rateLimitWaitStrategy,
    maxApiRateLimitRetries: overrides.maxApiRateLimitRetries ?? config.maxApiRateLimitRetries,
    maxApiRequests: overrides.maxApiRequests,
    requestTimeoutMs: overrides.requestTimeoutMs ?? config.apiRequestTimeoutMs,
    dailyApiRequestQuota: overrides.dailyApiRequestQuota ?? config.dailyApiRequestQuota,
    maxDaysPerQuery: overrides.maxDaysPerQuery ?? config.maxDaysPerQuery,
    scalarMode: overrides.scalarMode,
  };
}

export async function createContext(
  settings: CrawlerSettings,
  logger: Logger,
  deps: ContextDependencies = {},
): Promise<AppContext> {
  const clock = deps.clock ?? new SystemClock();
  const credentials = deps.credentials ?? loadCredentials(settings.apiCredentialsFile);
  const http = deps.http ?? axios.create({ timeout: settings.requestTimeoutMs });

  const requestClient = await ResearchApiRequestClient.create({
    credentials,
    http,
    logger: logger.child({ module: "research-api" }),
    rateLimitWaitStrategy: settings.rateLimitWaitStrategy,
    maxApiRateLimitRetries: settings.maxApiRateLimitRetries,
    maxApiRequests: settings.maxApiRequests,
    rawResponseArchive: settings.rawResponsesOutputDir
      ? new RawResponseArchive(settings.rawResponsesOutputDir, logger.child({ module: "raw-archive" }))
      : undefined,
    requestTimeoutMs: settings.requestTimeoutMs,
    clock,
  });

  const db = openDatabase(settings.dbPath);
  runMigrations(db, logger.child({ module: "migrate" }));

  const now = () => clock.now();
  const crawlRepo = new CrawlRepository(db);
  const videoRepo = new VideoRepository(db, logger.child({ module: "video-repo" }), now);
  const userInfoRepo = new UserInfoRepository(db, now);
  const commentRepo = new CommentRepository(db);

  const crawler = new VideoCrawler(requestClient, logger.child({ module: "crawler" }), {
    stores: { crawls: crawlRepo, videos: videoRepo, userInfo: userInfoRepo, comments: commentRepo },
    clock,
    scalarMode: settings.scalarMode,
  });

  const scheduler = new CrawlScheduler(crawler, requestClient, logger.child({ module: "scheduler" }), {
    maxDaysPerQuery: settings.maxDaysPerQuery,
    dailyApiRequestQuota: settings.dailyApiRequestQuota,
    maxApiRequestsPerExecution: settings.maxApiRequests,
    clock,
  });

  return {
    logger,
    db,
    crawlRepo,
    videoRepo,
    userInfoRepo,
    commentRepo,
    requestClient,
    crawler,
    scheduler,
    close: () => {
      if (db.open) db.close();
    },
  };
}
