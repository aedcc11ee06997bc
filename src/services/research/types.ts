import { z } from "zod";
import { identifierSchema, rawVideoSchema } from "../../domain/video";
import type { VideoPage } from "../../domain/crawl";

export const API_BASE_URL = "https://open.tiktokapis.com";
export const OAUTH_TOKEN_PATH = "/v2/oauth/token/";
export const VIDEO_QUERY_PATH =
  "/v2/research/video/query/?fields=id,video_description,create_time,region_code,share_count,view_count,like_count,comment_count,music_id,hashtag_names,username,effect_ids,voice_to_text,playlist_id";
export const USER_INFO_PATH =
  "/v2/research/user/info/?fields=display_name,bio_description,avatar_url,is_verified,follower_count,following_count,likes_count,video_count";
export const COMMENT_LIST_PATH =
  "/v2/research/video/comment/list/?fields=id,like_count,create_time,text,video_id,parent_comment_id";

export const MAX_VIDEOS_PER_REQUEST = 100;
export const MAX_COMMENTS_PER_REQUEST = 100;
/** The API only serves the first 1000 comments of a video. */
export const MAX_COMMENTS_CURSOR = 999;

export interface VideoQueryRequest {
  /** Serialized query JSON, sent verbatim. */
  query: string;
  startDate: string;
  endDate: string;
  maxCount: number;
  cursor?: number | null;
  searchId?: string | null;
}

export interface CommentsRequest {
  videoId: string;
  cursor?: number | null;
}

export const apiErrorSchema = z
  .object({
    code: z.string().optional(),
    message: z.string().optional(),
    log_id: z.string().optional(),
  })
  .passthrough();

const searchIdSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullish();

export const videoPageSchema = z.object({
  data: z.object({
    videos: z.array(rawVideoSchema).nullish(),
    cursor: z.number().int(),
    has_more: z.boolean(),
    search_id: searchIdSchema,
  }),
  error: apiErrorSchema.optional(),
});

export const userInfoSchema = z.object({
  display_name: z.string().nullish(),
  bio_description: z.string().nullish(),
  avatar_url: z.string().nullish(),
  is_verified: z.boolean().nullish(),
  follower_count: z.number().int().nullish(),
  following_count: z.number().int().nullish(),
  likes_count: z.number().int().nullish(),
  video_count: z.number().int().nullish(),
});

export const userInfoResponseSchema = z.object({
  data: userInfoSchema,
  error: apiErrorSchema.optional(),
});

export const rawCommentSchema = z.object({
  id: identifierSchema,
  text: z.string().nullish(),
  video_id: identifierSchema,
  parent_comment_id: identifierSchema.nullish(),
  like_count: z.number().int().nullish(),
  reply_count: z.number().int().nullish(),
  create_time: z.number().int(),
});

export const commentsResponseSchema = z.object({
  data: z.object({
    comments: z.array(rawCommentSchema).nullish(),
    cursor: z.number().int().nullish(),
    has_more: z.boolean().nullish(),
  }),
  error: apiErrorSchema.optional(),
});

export type UserInfoData = z.infer<typeof userInfoSchema>;
export type RawComment = z.infer<typeof rawCommentSchema>;

/** User info as returned, with the username the request was made for. */
export interface UserInfoRecord extends UserInfoData {
  username: string;
}

/** `errorCode` is the body's `error.code`, null when the body has none. */
export interface UserInfoResponse {
  userInfo: UserInfoRecord;
  errorCode: string | null;
}

export interface CommentsPage {
  comments: RawComment[];
  cursor: number | null;
  hasMore: boolean;
  errorCode: string | null;
}

/** A 200 can still carry an error; only "ok" (or no error object) counts. */
export function responseIsOk(errorCode: string | null): boolean {
  return errorCode === null || errorCode === "ok";
}

export function toVideoPage(parsed: z.infer<typeof videoPageSchema>): VideoPage {
  return {
    videos: parsed.data.videos ?? [],
    cursor: parsed.data.cursor,
    hasMore: parsed.data.has_more,
    searchId: parsed.data.search_id ?? null,
  };
}

export function toCommentsPage(parsed: z.infer<typeof commentsResponseSchema>): CommentsPage {
  return {
    comments: parsed.data.comments ?? [],
    cursor: parsed.data.cursor ?? null,
    hasMore: parsed.data.has_more ?? false,
    errorCode: parsed.error?.code ?? null,
  };
}
