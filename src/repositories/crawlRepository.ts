import type Database from "better-sqlite3";
import { z } from "zod";
import type { Crawl, CrawlExtraData, CrawlId } from "../domain/crawl";
import { CRAWL_TAGS, idsFor, resolveNaturalKeys } from "./naturalKeys";

interface DbRow {
  id: number;
  crawl_started_at: string;
  updated_at: string | null;
  cursor: number | null;
  has_more: number; // SQLite boolean (0/1)
  search_id: string | null;
  query: string;
  extra_data: string | null;
}

const serialize = (value: unknown) => (value === null || value === undefined ? null : JSON.stringify(value));
const extraDataSchema = z.object({ possibly_deleted: z.number().optional() }).catchall(z.unknown());

const deserializeExtraData = (value: string | null): CrawlExtraData | null => {
  if (!value) return null;
  const parsed = extraDataSchema.safeParse(JSON.parse(value));
  return parsed.success ? parsed.data : null;
};

export class CrawlRepository {
  constructor(private readonly db: Database.Database) {}

  /**
   * Inserts the crawl on first save (assigning `crawl.id`), updates its
   * pagination state afterwards, and links its crawl tags.
   */
  save(crawl: Crawl): CrawlId {
    const id = this.db.transaction(() => {
      const row = {
        crawl_started_at: crawl.crawlStartedAt.toISOString(),
        updated_at: crawl.updatedAt?.toISOString() ?? null,
        cursor: crawl.cursor,
        has_more: crawl.hasMore ? 1 : 0,
        search_id: crawl.searchId,
        query: crawl.query,
        extra_data: serialize(crawl.extraData),
      };

      let id = crawl.id;
      if (id === undefined) {
        const result = this.db
          .prepare<typeof row>(
            `INSERT INTO crawl (crawl_started_at, updated_at, cursor, has_more, search_id, query, extra_data)
             VALUES (@crawl_started_at, @updated_at, @cursor, @has_more, @search_id, @query, @extra_data)`,
          )
          .run(row);
        id = Number(result.lastInsertRowid);
      } else {
        this.db
          .prepare<typeof row & { id: number }>(
            `UPDATE crawl
             SET updated_at = @updated_at, cursor = @cursor, has_more = @has_more,
                 search_id = @search_id, query = @query, extra_data = @extra_data
             WHERE id = @id`,
          )
          .run({ ...row, id });
      }

      if (crawl.crawlTags.length > 0) {
        const resolved = resolveNaturalKeys(this.db, CRAWL_TAGS, crawl.crawlTags);
        const link = this.db.prepare<[number, number]>(
          "INSERT OR IGNORE INTO crawls_to_crawl_tags (crawl_id, crawl_tag_id) VALUES (?, ?)",
        );
        for (const tagId of idsFor(resolved, crawl.crawlTags)) {
          link.run(id, tagId);
        }
      }
      return id;
    }).immediate();
    // Only once committed; a rolled-back insert leaves the crawl unsaved
    crawl.id = id;
    return id;
  }

  findById(id: CrawlId): Crawl | undefined {
    const row = this.db.prepare<[number], DbRow>("SELECT * FROM crawl WHERE id = ?").get(id);
    if (!row) return undefined;

    const tags = this.db
      .prepare<[number], { name: string }>(
        `SELECT t.name FROM crawl_tag t
         JOIN crawls_to_crawl_tags ct ON ct.crawl_tag_id = t.id
         WHERE ct.crawl_id = ? ORDER BY t.name`,
      )
      .all(id);

    return {
      id: row.id,
      crawlStartedAt: new Date(row.crawl_started_at),
      updatedAt: row.updated_at ? new Date(row.updated_at) : null,
      cursor: row.cursor,
      hasMore: row.has_more === 1,
      searchId: row.search_id,
      query: row.query,
      extraData: deserializeExtraData(row.extra_data),
      crawlTags: tags.map((tag) => tag.name),
    };
  }
}
