import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { CrawlId } from "../domain/crawl";
import {
  VIDEO_SCALAR_COLUMNS,
  normalizeVideo,
  type NormalizedVideo,
  type RawVideoRecord,
  type VideoScalarColumn,
  type VideoScalars,
} from "../domain/video";
import {
  CRAWL_TAGS,
  EFFECTS,
  HASHTAGS,
  chunk,
  idsFor,
  placeholders,
  resolveNaturalKeys,
} from "./naturalKeys";

/**
 * "replace": every scalar column takes the new record's value, absent fields
 * become NULL. "patch": only fields present in the new record are written.
 * Relation sets are unioned in both modes.
 */
export type ScalarUpsertMode = "replace" | "patch";

export interface UpsertVideosOptions {
  crawlId: CrawlId;
  crawlTags?: string[];
  scalarMode?: ScalarUpsertMode;
}

export interface UpsertSummary {
  inserted: number;
  updated: number;
  hashtagsCreated: number;
  effectsCreated: number;
  crawlTagsCreated: number;
}

export interface StoredVideo extends VideoScalars {
  id: string;
  crawled_at: string;
  crawled_updated_at: string | null;
  extra_data: Record<string, unknown> | null;
  hashtagNames: string[];
  effectIds: string[];
  crawlTagNames: string[];
  crawlIds: number[];
}

interface DbRow extends VideoScalars {
  id: string;
  crawled_at: string;
  crawled_updated_at: string | null;
  extra_data: string | null;
}

export const COUNTABLE_TABLES = [
  "crawl",
  "video",
  "hashtag",
  "effect",
  "crawl_tag",
  "videos_to_hashtags",
  "videos_to_effect_ids",
  "videos_to_crawl_tags",
  "videos_to_crawls",
  "crawls_to_crawl_tags",
  "user_info",
  "comment",
] as const;
export type CountableTable = (typeof COUNTABLE_TABLES)[number];

const serialize = (value: unknown) => (value === null || value === undefined ? null : JSON.stringify(value));

const deserializeObject = (value: string | null): Record<string, unknown> | null => {
  if (!value) return null;
  const parsed: unknown = JSON.parse(value);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
};

const INSERT_COLUMNS = ["id", ...VIDEO_SCALAR_COLUMNS, "crawled_at", "extra_data"];

/**
 * Writes pages of API video records. One call is one IMMEDIATE transaction:
 * lookup entities are resolved, videos inserted or merged, and association
 * rows added, or nothing is written at all.
 */
export class VideoRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  upsertVideos(records: readonly RawVideoRecord[], options: UpsertVideosOptions): UpsertSummary {
    const videos = records.map(normalizeVideo);
    const crawlTags = [...new Set(options.crawlTags ?? [])];
    const scalarMode = options.scalarMode ?? "replace";

    const summary = this.db
      .transaction(() => this.upsertInTransaction(videos, options.crawlId, crawlTags, scalarMode))
      .immediate();

    this.logger.debug({ crawlId: options.crawlId, ...summary }, "Upserted videos");
    return summary;
  }

  private upsertInTransaction(
    videos: NormalizedVideo[],
    crawlId: CrawlId,
    crawlTags: string[],
    scalarMode: ScalarUpsertMode,
  ): UpsertSummary {
    const hashtags = resolveNaturalKeys(this.db, HASHTAGS, videos.flatMap((video) => video.hashtagNames));
    const effects = resolveNaturalKeys(this.db, EFFECTS, videos.flatMap((video) => video.effectIds));
    const tags = resolveNaturalKeys(this.db, CRAWL_TAGS, crawlTags);
    const crawlTagIds = idsFor(tags, crawlTags);

    const existing = this.findExistingIds(videos.map((video) => video.id));
    const timestamp = this.now().toISOString();

    const insertVideo = this.db.prepare<Record<string, unknown>>(
      `INSERT INTO video (${INSERT_COLUMNS.join(", ")})
       VALUES (${INSERT_COLUMNS.map((column) => `@${column}`).join(", ")})`,
    );
    const linkHashtag = this.db.prepare<[string, number]>(
      "INSERT OR IGNORE INTO videos_to_hashtags (video_id, hashtag_id) VALUES (?, ?)",
    );
    const linkEffect = this.db.prepare<[string, number]>(
      "INSERT OR IGNORE INTO videos_to_effect_ids (video_id, effect_id) VALUES (?, ?)",
    );
    const linkCrawlTag = this.db.prepare<[string, number]>(
      "INSERT OR IGNORE INTO videos_to_crawl_tags (video_id, crawl_tag_id) VALUES (?, ?)",
    );
    const linkCrawl = this.db.prepare<[string, number]>(
      "INSERT OR IGNORE INTO videos_to_crawls (video_id, crawl_id) VALUES (?, ?)",
    );

    let inserted = 0;
    let updated = 0;
    for (const video of videos) {
      if (existing.has(video.id)) {
        this.updateScalars(video, scalarMode, timestamp);
        updated += 1;
      } else {
        insertVideo.run({
          id: video.id,
          ...video.scalars,
          crawled_at: timestamp,
          extra_data: serialize(video.extraData),
        });
        existing.add(video.id);
        inserted += 1;
      }

      for (const hashtagId of idsFor(hashtags, video.hashtagNames)) linkHashtag.run(video.id, hashtagId);
      for (const effectId of idsFor(effects, video.effectIds)) linkEffect.run(video.id, effectId);
      for (const tagId of crawlTagIds) linkCrawlTag.run(video.id, tagId);
      linkCrawl.run(video.id, crawlId);
    }

    return {
      inserted,
      updated,
      hashtagsCreated: hashtags.created.length,
      effectsCreated: effects.created.length,
      crawlTagsCreated: tags.created.length,
    };
  }

  private updateScalars(video: NormalizedVideo, scalarMode: ScalarUpsertMode, timestamp: string): void {
    const columns: VideoScalarColumn[] =
      scalarMode === "replace"
        ? [...VIDEO_SCALAR_COLUMNS]
        : VIDEO_SCALAR_COLUMNS.filter((column) => video.presentColumns.has(column));

    const assignments = columns.map((column) => `${column} = @${column}`);
    assignments.push("crawled_updated_at = @crawled_updated_at");

    const params: Record<string, unknown> = { id: video.id, crawled_updated_at: timestamp };
    for (const column of columns) {
      params[column] = video.scalars[column];
    }
    if (scalarMode === "replace" || video.extraData !== null) {
      assignments.push("extra_data = @extra_data");
      params.extra_data = serialize(video.extraData);
    }

    this.db
      .prepare<Record<string, unknown>>(`UPDATE video SET ${assignments.join(", ")} WHERE id = @id`)
      .run(params);
  }

  private findExistingIds(ids: string[]): Set<string> {
    const existing = new Set<string>();
    for (const batch of chunk([...new Set(ids)])) {
      const rows = this.db
        .prepare<string[], { id: string }>(`SELECT id FROM video WHERE id IN (${placeholders(batch.length)})`)
        .all(...batch);
      for (const row of rows) existing.add(row.id);
    }
    return existing;
  }

  findById(id: string): StoredVideo | undefined {
    const row = this.db.prepare<[string], DbRow>("SELECT * FROM video WHERE id = ?").get(id);
    if (!row) return undefined;

    const names = (sql: string) =>
      this.db
        .prepare<[string], { value: string }>(sql)
        .all(id)
        .map((result) => result.value);

    return {
      ...row,
      extra_data: deserializeObject(row.extra_data),
      hashtagNames: names(
        `SELECT h.name AS value FROM hashtag h JOIN videos_to_hashtags vh ON vh.hashtag_id = h.id
         WHERE vh.video_id = ? ORDER BY h.name`,
      ),
      effectIds: names(
        `SELECT e.effect_id AS value FROM effect e JOIN videos_to_effect_ids ve ON ve.effect_id = e.id
         WHERE ve.video_id = ? ORDER BY e.effect_id`,
      ),
      crawlTagNames: names(
        `SELECT t.name AS value FROM crawl_tag t JOIN videos_to_crawl_tags vt ON vt.crawl_tag_id = t.id
         WHERE vt.video_id = ? ORDER BY t.name`,
      ),
      crawlIds: this.db
        .prepare<[string], { crawl_id: number }>(
          "SELECT crawl_id FROM videos_to_crawls WHERE video_id = ? ORDER BY crawl_id",
        )
        .all(id)
        .map((result) => result.crawl_id),
    };
  }

  countRows(table: CountableTable): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
    return row?.count ?? 0;
  }

  /** Natural key to surrogate id, for checking that ids stay stable across upserts. */
  hashtagIds(): Map<string, number> {
    const rows = this.db.prepare<[], { id: number; name: string }>("SELECT id, name FROM hashtag").all();
    return new Map(rows.map((row) => [row.name, row.id]));
  }
}
