import type Database from "better-sqlite3";
import { unixSecondsToIso } from "../domain/video";
import type { RawComment } from "../services/research/types";

export interface CommentRow {
  id: string;
  text: string | null;
  video_id: string;
  parent_comment_id: string | null;
  like_count: number | null;
  reply_count: number | null;
  create_time: string;
}

export class CommentRepository {
  constructor(private readonly db: Database.Database) {}

  /** Full-row upsert keyed by comment id. */
  upsertMany(comments: readonly RawComment[]): number {
    if (comments.length === 0) return 0;

    const upsert = this.db.prepare<CommentRow>(
      `INSERT INTO comment (id, text, video_id, parent_comment_id, like_count, reply_count, create_time)
       VALUES (@id, @text, @video_id, @parent_comment_id, @like_count, @reply_count, @create_time)
       ON CONFLICT(id) DO UPDATE SET
         text = excluded.text,
         video_id = excluded.video_id,
         parent_comment_id = excluded.parent_comment_id,
         like_count = excluded.like_count,
         reply_count = excluded.reply_count,
         create_time = excluded.create_time`,
    );

    this.db.transaction(() => {
      for (const comment of comments) {
        upsert.run({
          id: comment.id,
          text: comment.text ?? null,
          video_id: comment.video_id,
          parent_comment_id: comment.parent_comment_id ?? null,
          like_count: comment.like_count ?? null,
          reply_count: comment.reply_count ?? null,
          create_time: unixSecondsToIso(comment.create_time),
        });
      }
    })();
    return comments.length;
  }

  findByVideoId(videoId: string): CommentRow[] {
    return this.db
      .prepare<[string], CommentRow>("SELECT * FROM comment WHERE video_id = ? ORDER BY id")
      .all(videoId);
  }
}
