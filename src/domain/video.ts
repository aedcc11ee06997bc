import { z } from "zod";

/** 64-bit identifiers arrive as JSON numbers; they are kept as digit strings. */
export const identifierSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => String(value));

const optionalCount = z.number().int().nullish();
const optionalText = z.string().nullish();

export const rawVideoSchema = z
  .object({
    id: identifierSchema,
    create_time: z.number().int(),
    username: optionalText,
    region_code: optionalText,
    video_description: optionalText,
    music_id: identifierSchema.nullish(),
    like_count: optionalCount,
    comment_count: optionalCount,
    share_count: optionalCount,
    view_count: optionalCount,
    playlist_id: identifierSchema.nullish(),
    voice_to_text: optionalText,
    hashtag_names: z.array(z.string()).nullish(),
    effect_ids: z.array(z.union([z.string(), z.number()]).transform(String)).nullish(),
  })
  .catchall(z.unknown());

export type RawVideoRecord = z.infer<typeof rawVideoSchema>;

export const VIDEO_SCALAR_COLUMNS = [
  "create_time",
  "username",
  "region_code",
  "video_description",
  "music_id",
  "like_count",
  "comment_count",
  "share_count",
  "view_count",
  "playlist_id",
  "voice_to_text",
] as const;

export type VideoScalarColumn = (typeof VIDEO_SCALAR_COLUMNS)[number];

export interface VideoScalars {
  create_time: string;
  username: string | null;
  region_code: string | null;
  video_description: string | null;
  music_id: string | null;
  like_count: number | null;
  comment_count: number | null;
  share_count: number | null;
  view_count: number | null;
  playlist_id: string | null;
  voice_to_text: string | null;
}

/** A raw record with defaults applied and relation lists deduplicated. */
export interface NormalizedVideo {
  id: string;
  scalars: VideoScalars;
  /** Scalar columns the API actually sent; patch-mode upserts only touch these. */
  presentColumns: ReadonlySet<VideoScalarColumn>;
  hashtagNames: string[];
  effectIds: string[];
  extraData: Record<string, unknown> | null;
}

const KNOWN_KEYS = new Set<string>(["id", "hashtag_names", "effect_ids", ...VIDEO_SCALAR_COLUMNS]);

export function dedupe<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

export function unixSecondsToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function normalizeVideo(record: RawVideoRecord): NormalizedVideo {
  const presentColumns = new Set<VideoScalarColumn>(
    VIDEO_SCALAR_COLUMNS.filter((column) => record[column] !== undefined),
  );
  const extraEntries = Object.entries(record).filter(([key]) => !KNOWN_KEYS.has(key));

  return {
    id: record.id,
    scalars: {
      create_time: unixSecondsToIso(record.create_time),
      username: record.username ?? null,
      region_code: record.region_code ?? null,
      video_description: record.video_description ?? null,
      music_id: record.music_id ?? null,
      like_count: record.like_count ?? null,
      comment_count: record.comment_count ?? null,
      share_count: record.share_count ?? null,
      view_count: record.view_count ?? null,
      playlist_id: record.playlist_id ?? null,
      voice_to_text: record.voice_to_text ?? null,
    },
    presentColumns,
    hashtagNames: dedupe(record.hashtag_names ?? []),
    effectIds: dedupe(record.effect_ids ?? []),
    extraData: extraEntries.length > 0 ? Object.fromEntries(extraEntries) : null,
  };
}

/** Validates an untyped API record. Throws a ZodError naming the bad field. */
export function parseRawVideo(value: unknown): RawVideoRecord {
  return rawVideoSchema.parse(value);
}
