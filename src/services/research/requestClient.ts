import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";
import type { z } from "zod";
import type { RateLimitWaitStrategy } from "../../config";
import type { VideoPage } from "../../domain/crawl";
import { SystemClock, type WallClock } from "../../platform/clock/wallClock";
import { nextUtcMidnight } from "../../utils/dates";
import { CompositeRetryPolicy, RetryPolicy, type RetryRule } from "../../utils/retryPolicy";
import { fetchAccessToken, type ApiCredentials } from "./credentials";
import {
  ApiRateLimitError,
  ApiServerError,
  InvalidCountOrCursorError,
  InvalidRequestError,
  InvalidSearchIdError,
  MalformedResponseError,
  MaxApiRequestsReachedError,
  ResearchApiError,
  ResponseDecodeError,
  classifyInvalidRequest,
  type ApiErrorBody,
} from "./errors";
import { parseApiJson, stringifyApiJson } from "./json";
import type { RawResponseArchive } from "./rawResponseArchive";
import {
  API_BASE_URL,
  COMMENT_LIST_PATH,
  MAX_COMMENTS_PER_REQUEST,
  USER_INFO_PATH,
  VIDEO_QUERY_PATH,
  apiErrorSchema,
  commentsResponseSchema,
  toCommentsPage,
  toVideoPage,
  userInfoResponseSchema,
  videoPageSchema,
  type CommentsPage,
  type CommentsRequest,
  type UserInfoResponse,
  type VideoQueryRequest,
} from "./types";

export const TRANSPORT_RETRY_MAX_ATTEMPTS = 10;
export const TRANSPORT_RETRY_MULTIPLIER_MS = 1_000;
export const TRANSPORT_RETRY_MIN_DELAY_MS = 3_000;
export const TRANSPORT_RETRY_MAX_DELAY_MS = 300_000;

export const INVALID_SEARCH_ID_MAX_RETRIES = 5;
export const INVALID_SEARCH_ID_WAIT_SECONDS = 5;
export const FOUR_HOURS_IN_SECONDS = 4 * 60 * 60;

export interface RequestClientOptions {
  credentials: ApiCredentials;
  http: AxiosInstance;
  logger: Logger;
  rateLimitWaitStrategy?: RateLimitWaitStrategy;
  /** Total attempts allowed for one logical request. Unbounded when omitted. */
  maxApiRateLimitRetries?: number;
  maxApiRequests?: number;
  rawResponseArchive?: RawResponseArchive;
  requestTimeoutMs?: number;
  baseUrl?: string;
  clock?: WallClock;
}

interface RawResponse {
  status: number;
  body: string;
}

/** Transport failures are axios errors that never produced an HTTP response. */
export function isTransportError(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response === undefined;
}

export function rateLimitWaitSeconds(strategy: RateLimitWaitStrategy, now: Date): number {
  if (strategy === "wait_next_utc_midnight") {
    return Math.ceil((nextUtcMidnight(now).getTime() - now.getTime()) / 1000);
  }
  return FOUR_HOURS_IN_SECONDS;
}

export function buildSemanticRetryRules(strategy: RateLimitWaitStrategy, clock: WallClock): RetryRule[] {
  return [
    {
      name: "response-decode",
      matches: (error) => error instanceof ResponseDecodeError,
      maxAttempts: 1,
      waitSeconds: () => 0,
    },
    {
      name: "invalid-search-id",
      matches: (error) => error instanceof InvalidSearchIdError || error instanceof InvalidCountOrCursorError,
      maxAttempts: INVALID_SEARCH_ID_MAX_RETRIES,
      waitSeconds: () => INVALID_SEARCH_ID_WAIT_SECONDS,
    },
    {
      name: "rate-limit",
      matches: (error) => error instanceof ApiRateLimitError,
      waitSeconds: () => rateLimitWaitSeconds(strategy, clock.now()),
    },
  ];
}

/**
 * Authenticated client for the research API. Each fetch goes through two
 * retry layers: transport retry around the HTTP exchange, and semantic retry
 * around the exchange plus response parsing.
 */
export class ResearchApiRequestClient {
  private accessToken: string | null = null;
  private requestsSent = 0;
  private maxApiRequests?: number;
  private readonly baseUrl: string;
  private readonly clock: WallClock;
  private readonly transportRetry: RetryPolicy;
  private readonly semanticRetry: CompositeRetryPolicy;

  constructor(private readonly options: RequestClientOptions) {
    this.baseUrl = options.baseUrl ?? API_BASE_URL;
    this.clock = options.clock ?? new SystemClock();
    this.maxApiRequests = options.maxApiRequests;
    const sleep = (ms: number) => this.clock.sleep(ms);

    this.transportRetry = new RetryPolicy(options.logger, {
      maxAttempts: TRANSPORT_RETRY_MAX_ATTEMPTS,
      multiplierMs: TRANSPORT_RETRY_MULTIPLIER_MS,
      minDelayMs: TRANSPORT_RETRY_MIN_DELAY_MS,
      maxDelayMs: TRANSPORT_RETRY_MAX_DELAY_MS,
      retryCondition: isTransportError,
      sleep,
    });
    this.semanticRetry = new CompositeRetryPolicy(options.logger, {
      rules: buildSemanticRetryRules(options.rateLimitWaitStrategy ?? "wait_four_hours", this.clock),
      stopAfterAttempt: options.maxApiRateLimitRetries,
      sleep,
    });
  }

  /** Builds a client and obtains its first access token. */
  static async create(options: RequestClientOptions): Promise<ResearchApiRequestClient> {
    const client = new ResearchApiRequestClient(options);
    await client.refreshAccessToken();
    return client;
  }

  get numApiRequestsSent(): number {
    return this.requestsSent;
  }

  get maxApiRequestsLimit(): number | undefined {
    return this.maxApiRequests;
  }

  /** Zeroes the request counter and sets a new ceiling (none when omitted). */
  resetRequestBudget(maxApiRequests?: number): void {
    this.requestsSent = 0;
    this.maxApiRequests = maxApiRequests;
  }

  maxApiRequestsReached(): boolean {
    return this.maxApiRequests !== undefined && this.requestsSent >= this.maxApiRequests;
  }

  async refreshAccessToken(): Promise<void> {
    this.accessToken = await fetchAccessToken(this.options.http, this.options.credentials);
    this.options.logger.debug("Obtained API access token");
  }

  async fetchVideos(request: VideoQueryRequest): Promise<VideoPage> {
    const query: unknown = JSON.parse(request.query);
    const body: Record<string, unknown> = {
      query,
      max_count: request.maxCount,
      start_date: request.startDate,
      end_date: request.endDate,
      is_random: false,
    };
    if (request.cursor !== undefined && request.cursor !== null) body.cursor = request.cursor;
    if (request.searchId) body.search_id = request.searchId;

    const parsed = await this.fetchAndParse(VIDEO_QUERY_PATH, body, videoPageSchema, "fetchVideos");
    return toVideoPage(parsed);
  }

  async fetchUserInfo(username: string): Promise<UserInfoResponse> {
    const parsed = await this.fetchAndParse(USER_INFO_PATH, { username }, userInfoResponseSchema, "fetchUserInfo");
    // The API does not echo the username back
    return { userInfo: { ...parsed.data, username }, errorCode: parsed.error?.code ?? null };
  }

  async fetchComments(request: CommentsRequest): Promise<CommentsPage> {
    const body: Record<string, unknown> = {
      video_id: request.videoId,
      max_count: MAX_COMMENTS_PER_REQUEST,
    };
    if (request.cursor !== undefined && request.cursor !== null) body.cursor = request.cursor;

    const parsed = await this.fetchAndParse(COMMENT_LIST_PATH, body, commentsResponseSchema, "fetchComments");
    return toCommentsPage(parsed);
  }

  private fetchAndParse<S extends z.ZodTypeAny>(
    path: string,
    body: Record<string, unknown>,
    schema: S,
    context: string,
  ): Promise<z.output<S>> {
    return this.semanticRetry.execute(async () => {
      const response = await this.transportRetry.execute(() => this.post(path, body), context);
      return this.parseResponse(response, schema);
    }, context);
  }

  private parseResponse<S extends z.ZodTypeAny>(response: RawResponse, schema: S): z.output<S> {
    let json: unknown;
    try {
      json = parseApiJson(response.body);
    } catch (error) {
      this.options.logger.info(
        { status: response.status, body: response.body.slice(0, 2000) },
        "Unable to decode JSON response",
      );
      throw new ResponseDecodeError(
        error instanceof Error ? error.message : "Invalid JSON",
        response.status,
        response.body,
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Unexpected response shape: ${parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join("; ")}`,
        response.status,
      );
    }
    return parsed.data;
  }

  private async post(path: string, body: Record<string, unknown>): Promise<RawResponse> {
    if (this.maxApiRequestsReached()) {
      throw new MaxApiRequestsReachedError(this.maxApiRequests ?? 0);
    }

    const payload = stringifyApiJson(body);
    this.options.logger.debug({ path, payload }, "Sending API request");

    let response = await this.send(path, payload);
    this.requestsSent += 1;

    if (response.status === 401) {
      this.options.logger.info({ path }, "Access token rejected, fetching a new one and replaying request");
      await this.refreshAccessToken();
      response = await this.send(path, payload);
    }

    if (response.status === 200) {
      this.options.rawResponseArchive?.store(response.body, this.clock.now());
      return response;
    }

    const errorBody = extractErrorBody(response.body);

    if (response.status === 429) {
      throw new ApiRateLimitError(
        `Rate limit exceeded (requests sent by this client: ${this.requestsSent})`,
        response.status,
        errorBody,
      );
    }

    if (response.status === 400) {
      throw classifyInvalidRequest(response.status, errorBody);
    }

    if (response.status >= 400 && response.status < 500) {
      throw new InvalidRequestError(
        errorBody?.message ?? `Request rejected (HTTP ${response.status})`,
        response.status,
        errorBody,
      );
    }

    if (response.status >= 500) {
      this.options.logger.info({ status: response.status, path }, "API responded with a server error, this happens occasionally");
      throw new ApiServerError(errorBody?.message ?? `Server error (HTTP ${response.status})`, response.status, errorBody);
    }

    this.options.logger.warn({ status: response.status, path }, "Unexpected API response status");
    throw new ResearchApiError(`Unexpected response status ${response.status}`, response.status, errorBody);
  }

  private async send(path: string, payload: string): Promise<RawResponse> {
    const response = await this.options.http.post<unknown>(`${this.baseUrl}${path}`, payload, {
      headers: {
        Authorization: `Bearer ${this.accessToken ?? ""}`,
        "Content-Type": "application/json",
      },
      responseType: "text",
      transformResponse: (data: unknown) => data,
      timeout: this.options.requestTimeoutMs,
      validateStatus: () => true,
    });
    const body = typeof response.data === "string" ? response.data : JSON.stringify(response.data ?? null);
    return { status: response.status, body };
  }
}

function extractErrorBody(body: string): ApiErrorBody | undefined {
  try {
    const json = parseApiJson(body);
    const parsed = apiErrorSchema.safeParse(
      typeof json === "object" && json !== null && "error" in json ? json.error : undefined,
    );
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}
