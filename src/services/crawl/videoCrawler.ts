import type { Logger } from "pino";
import { createCrawl, possiblyDeletedCount, updateCrawlFromPage, type Crawl, type VideoPage } from "../../domain/crawl";
import type { RawVideoRecord } from "../../domain/video";
import { SystemClock, type WallClock } from "../../platform/clock/wallClock";
import type { CommentRepository } from "../../repositories/commentRepository";
import type { CrawlRepository } from "../../repositories/crawlRepository";
import type { UserInfoRepository } from "../../repositories/userInfoRepository";
import type { ScalarUpsertMode, VideoRepository } from "../../repositories/videoRepository";
import {
  InvalidUsernameError,
  MaxApiRequestsReachedError,
  RefusedUsernameError,
} from "../research/errors";
import type { ResearchApiRequestClient } from "../research/requestClient";
import {
  MAX_COMMENTS_CURSOR,
  MAX_VIDEOS_PER_REQUEST,
  responseIsOk,
  type RawComment,
  type UserInfoRecord,
} from "../research/types";

export type ResearchApi = Pick<ResearchApiRequestClient, "fetchVideos" | "fetchUserInfo" | "fetchComments">;

export interface CrawlQueryConfig {
  /** Serialized query JSON; stored on the crawl verbatim. */
  query: string;
  /** YYYYMMDD, inclusive. */
  startDate: string;
  /** YYYYMMDD, exclusive. */
  endDate: string;
  crawlTags?: string[];
  maxCount?: number;
  fetchUserInfo?: boolean;
  fetchComments?: boolean;
}

export interface CrawlPageResult {
  videos: RawVideoRecord[];
  crawl: Crawl;
  userInfo: UserInfoRecord[];
  comments: RawComment[];
}

export interface CrawlResults {
  crawl: Crawl;
  videos: RawVideoRecord[];
  userInfo: UserInfoRecord[];
  comments: RawComment[];
}

export interface CrawlSummary {
  crawl: Crawl;
  pages: number;
  videosReceived: number;
}

export interface CrawlStores {
  crawls: CrawlRepository;
  videos: VideoRepository;
  userInfo: UserInfoRepository;
  comments: CommentRepository;
}

export interface VideoCrawlerOptions {
  stores?: CrawlStores;
  clock?: WallClock;
  scalarMode?: ScalarUpsertMode;
}

/**
 * Drives one query through every page of results. Pages are fetched strictly
 * in cursor order; the crawl entity is mutated in place as each page arrives.
 */
export class VideoCrawler {
  private readonly clock: WallClock;
  private readonly userInfoCache = new Map<string, UserInfoRecord | null>();
  private readonly commentsCache = new Map<string, RawComment[]>();

  constructor(
    private readonly api: ResearchApi,
    private readonly logger: Logger,
    private readonly options: VideoCrawlerOptions = {},
  ) {
    this.clock = options.clock ?? new SystemClock();
  }

  async *apiResultsIter(config: CrawlQueryConfig): AsyncGenerator<CrawlPageResult, void, undefined> {
    const maxCount = config.maxCount ?? MAX_VIDEOS_PER_REQUEST;
    const crawl = createCrawl(config.query, config.crawlTags ?? [], this.clock.now());
    let pages = 0;

    this.logger.info(
      { startDate: config.startDate, endDate: config.endDate, crawlTags: crawl.crawlTags },
      "Starting crawl",
    );

    while (crawl.hasMore) {
      let page: VideoPage;
      try {
        page = await this.api.fetchVideos({
          query: config.query,
          startDate: config.startDate,
          endDate: config.endDate,
          maxCount,
          cursor: crawl.cursor,
          searchId: crawl.searchId,
        });
      } catch (error) {
        if (error instanceof MaxApiRequestsReachedError) {
          this.logger.info({ crawlId: crawl.id, pages, cursor: crawl.cursor }, "Stopping crawl, API request ceiling reached");
          return;
        }
        throw error;
      }

      updateCrawlFromPage(crawl, page, { requestedCount: maxCount, now: this.clock.now(), logger: this.logger });
      pages += 1;

      if (page.videos.length === 0 && page.hasMore) {
        this.logger.error(
          { crawlId: crawl.id, cursor: crawl.cursor, searchId: crawl.searchId },
          "Page returned no videos but has_more is still true",
        );
      }

      // Enrichment requests share the ceiling; hitting it still yields this page
      const ceiling = { reached: false };
      const userInfo: UserInfoRecord[] = [];
      const comments: RawComment[] = [];
      let enrichmentFailure: { error: unknown } | undefined;
      try {
        if (config.fetchUserInfo) {
          await this.collectUserInfo(page.videos, userInfo, ceiling);
        }
        if (config.fetchComments && !ceiling.reached) {
          await this.collectComments(page.videos, comments, ceiling);
        }
      } catch (error) {
        this.logger.error({ crawlId: crawl.id, err: error }, "Enrichment failed, yielding the page before rethrowing");
        enrichmentFailure = { error };
      }

      this.logger.debug(
        { crawlId: crawl.id, page: pages, videos: page.videos.length, cursor: crawl.cursor, hasMore: crawl.hasMore },
        "Received page",
      );
      yield { videos: page.videos, crawl, userInfo, comments };

      if (enrichmentFailure) {
        throw enrichmentFailure.error;
      }
      if (ceiling.reached) {
        this.logger.info({ crawlId: crawl.id, pages }, "Stopping crawl, API request ceiling reached");
        return;
      }
    }

    this.logger.info(
      { crawlId: crawl.id, pages, possiblyDeleted: possiblyDeletedCount(crawl) },
      "Crawl exhausted all pages",
    );
  }

  async fetchAll(config: CrawlQueryConfig): Promise<CrawlResults | undefined> {
    let results: CrawlResults | undefined;
    for await (const page of this.apiResultsIter(config)) {
      if (!results) {
        results = { crawl: page.crawl, videos: [], userInfo: [], comments: [] };
      }
      results.videos.push(...page.videos);
      results.userInfo.push(...page.userInfo);
      results.comments.push(...page.comments);
    }
    return results;
  }

  /** Crawls every page, saving the crawl and then its videos after each one. */
  async fetchAndStoreAll(config: CrawlQueryConfig): Promise<CrawlSummary | undefined> {
    const stores = this.options.stores;
    if (!stores) {
      throw new Error("fetchAndStoreAll requires stores");
    }

    let summary: CrawlSummary | undefined;
    for await (const page of this.apiResultsIter(config)) {
      const crawlId = stores.crawls.save(page.crawl);
      stores.videos.upsertVideos(page.videos, {
        crawlId,
        crawlTags: page.crawl.crawlTags,
        scalarMode: this.options.scalarMode,
      });
      stores.userInfo.upsertMany(page.userInfo);
      stores.comments.upsertMany(page.comments);

      summary = {
        crawl: page.crawl,
        pages: (summary?.pages ?? 0) + 1,
        videosReceived: (summary?.videosReceived ?? 0) + page.videos.length,
      };
    }
    return summary;
  }

  clearCache(): void {
    this.userInfoCache.clear();
    this.commentsCache.clear();
  }

  private async collectUserInfo(
    videos: RawVideoRecord[],
    results: UserInfoRecord[],
    ceiling: { reached: boolean },
  ): Promise<void> {
    const usernames = new Set(
      videos.map((video) => video.username).filter((username): username is string => Boolean(username)),
    );
    for (const username of usernames) {
      try {
        const userInfo = await this.fetchUserInfo(username);
        if (userInfo) results.push(userInfo);
      } catch (error) {
        if (error instanceof MaxApiRequestsReachedError) {
          ceiling.reached = true;
          break;
        }
        throw error;
      }
    }
  }

  /** Cached per username; unknown or refused usernames, and error responses, are cached as null. */
  async fetchUserInfo(username: string): Promise<UserInfoRecord | null> {
    const cached = this.userInfoCache.get(username);
    if (cached !== undefined) return cached;

    try {
      const response = await this.api.fetchUserInfo(username);
      const userInfo = responseIsOk(response.errorCode) ? response.userInfo : null;
      if (!userInfo) {
        this.logger.warn({ username, errorCode: response.errorCode }, "Error fetching user info");
      }
      this.userInfoCache.set(username, userInfo);
      return userInfo;
    } catch (error) {
      if (error instanceof InvalidUsernameError || error instanceof RefusedUsernameError) {
        this.logger.warn({ username, reason: error.message }, "User info unavailable");
        this.userInfoCache.set(username, null);
        return null;
      }
      throw error;
    }
  }

  private async collectComments(
    videos: RawVideoRecord[],
    results: RawComment[],
    ceiling: { reached: boolean },
  ): Promise<void> {
    for (const video of videos) {
      try {
        results.push(...(await this.fetchVideoComments(video.id)));
      } catch (error) {
        if (error instanceof MaxApiRequestsReachedError) {
          ceiling.reached = true;
          break;
        }
        throw error;
      }
    }
  }

  /** Pages through a video's comments up to the API's cursor limit. Cached per video id. */
  async fetchVideoComments(videoId: string): Promise<RawComment[]> {
    const cached = this.commentsCache.get(videoId);
    if (cached) return cached;

    const comments: RawComment[] = [];
    let cursor: number | null = null;
    let hasMore = true;
    while (hasMore) {
      const page = await this.api.fetchComments({ videoId, cursor });
      if (!responseIsOk(page.errorCode)) {
        this.logger.warn({ videoId, cursor, errorCode: page.errorCode }, "Error fetching comments");
        break;
      }
      comments.push(...page.comments);
      hasMore = page.hasMore;
      cursor = page.cursor;
      if (cursor === null) {
        hasMore = false;
      } else if (cursor > MAX_COMMENTS_CURSOR) {
        this.logger.debug({ videoId, cursor }, "Stopping comment fetch, cursor beyond what the API serves");
        hasMore = false;
      }
    }

    this.commentsCache.set(videoId, comments);
    return comments;
  }
}
