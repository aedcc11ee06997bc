import type Database from "better-sqlite3";
import type { UserInfoRecord } from "../services/research/types";

export interface UserInfoRow {
  username: string;
  display_name: string | null;
  bio_description: string | null;
  avatar_url: string | null;
  is_verified: number | null; // SQLite boolean (0/1)
  likes_count: number | null;
  video_count: number | null;
  follower_count: number | null;
  following_count: number | null;
  updated_at: string;
}

const toSqliteBoolean = (value: boolean | null | undefined): number | null =>
  value === undefined || value === null ? null : value ? 1 : 0;

export class UserInfoRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Full-row upsert keyed by username; the latest fetch wins. */
  upsertMany(users: readonly UserInfoRecord[]): number {
    if (users.length === 0) return 0;

    const upsert = this.db.prepare<UserInfoRow>(
      `INSERT INTO user_info (
         username, display_name, bio_description, avatar_url, is_verified,
         likes_count, video_count, follower_count, following_count, updated_at
       ) VALUES (
         @username, @display_name, @bio_description, @avatar_url, @is_verified,
         @likes_count, @video_count, @follower_count, @following_count, @updated_at
       )
       ON CONFLICT(username) DO UPDATE SET
         display_name = excluded.display_name,
         bio_description = excluded.bio_description,
         avatar_url = excluded.avatar_url,
         is_verified = excluded.is_verified,
         likes_count = excluded.likes_count,
         video_count = excluded.video_count,
         follower_count = excluded.follower_count,
         following_count = excluded.following_count,
         updated_at = excluded.updated_at`,
    );

    const updatedAt = this.now().toISOString();
    this.db.transaction(() => {
      for (const user of users) {
        upsert.run({
          username: user.username,
          display_name: user.display_name ?? null,
          bio_description: user.bio_description ?? null,
          avatar_url: user.avatar_url ?? null,
          is_verified: toSqliteBoolean(user.is_verified),
          likes_count: user.likes_count ?? null,
          video_count: user.video_count ?? null,
          follower_count: user.follower_count ?? null,
          following_count: user.following_count ?? null,
          updated_at: updatedAt,
        });
      }
    })();
    return users.length;
  }

  findByUsername(username: string): UserInfoRow | undefined {
    return this.db.prepare<[string], UserInfoRow>("SELECT * FROM user_info WHERE username = ?").get(username);
  }
}
