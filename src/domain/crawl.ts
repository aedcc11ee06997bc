import type { Logger } from "pino";
import type { RawVideoRecord } from "./video";

export type CrawlId = number;

export interface CrawlExtraData {
  /** Running total of (requested - received) videos across pages. */
  possibly_deleted?: number;
  [key: string]: unknown;
}

/**
 * One acquisition run of a query. `id` stays undefined until the first save;
 * the pagination engine owns cursor, hasMore, searchId and extraData.
 */
export interface Crawl {
  id?: CrawlId;
  crawlStartedAt: Date;
  updatedAt: Date | null;
  cursor: number | null;
  hasMore: boolean;
  searchId: string | null;
  query: string;
  extraData: CrawlExtraData | null;
  crawlTags: string[];
}

export interface VideoPage {
  videos: RawVideoRecord[];
  cursor: number;
  hasMore: boolean;
  searchId: string | null;
}

export function createCrawl(query: string, crawlTags: string[], now: Date): Crawl {
  return {
    crawlStartedAt: now,
    updatedAt: null,
    cursor: null,
    hasMore: true,
    searchId: null,
    query,
    extraData: null,
    crawlTags: [...new Set(crawlTags)],
  };
}

export function possiblyDeletedCount(crawl: Crawl): number {
  return crawl.extraData?.possibly_deleted ?? 0;
}

/** Applies one page's pagination state to the crawl in place. */
export function updateCrawlFromPage(
  crawl: Crawl,
  page: VideoPage,
  options: { requestedCount: number; now: Date; logger: Logger },
): void {
  crawl.cursor = page.cursor;
  crawl.hasMore = page.hasMore;

  if (page.searchId !== null && page.searchId !== crawl.searchId) {
    if (crawl.searchId !== null) {
      options.logger.error(
        { crawlId: crawl.id, previousSearchId: crawl.searchId, searchId: page.searchId },
        "search_id changed between pages",
      );
    }
    crawl.searchId = page.searchId;
  }

  crawl.updatedAt = options.now;
  crawl.extraData = {
    ...crawl.extraData,
    possibly_deleted: possiblyDeletedCount(crawl) + (options.requestedCount - page.videos.length),
  };
}
