import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import type Database from "better-sqlite3";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../db/migrate";
import type { WallClock } from "../platform/clock/wallClock";
import { createSilentLogger } from "../utils/logger";

export const silentLogger = createSilentLogger();

export function createTestDb(): Database.Database {
  const db = openDatabase(":memory:");
  runMigrations(db, silentLogger);
  return db;
}

/** Time only moves when something sleeps or the test advances it. */
export class FakeClock implements WallClock {
  readonly sleeps: number[] = [];
  /** Runs after each sleep, e.g. to stop a loop under test. */
  onSleep?: (ms: number) => void;
  private current: Date;

  constructor(start: Date | string) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.advance(ms);
    this.onSleep?.(ms);
  }
}

export interface StubRequest {
  url: string;
  body: string;
  authorization: string;
}

export type StubReply = { status: number; body: string } | Error;

export const json = (status: number, value: unknown): StubReply => ({ status, body: JSON.stringify(value) });

const TOKEN_URL_FRAGMENT = "/v2/oauth/token/";

/**
 * Axios instance whose adapter never touches the network. Token requests get
 * `test-token-<n>`; everything else is answered by `handler`.
 */
export function createStubHttp(handler: (request: StubRequest, index: number) => StubReply | Promise<StubReply>): {
  http: AxiosInstance;
  requests: StubRequest[];
  tokenRequests: StubRequest[];
} {
  const requests: StubRequest[] = [];
  const tokenRequests: StubRequest[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const request: StubRequest = {
        url: config.url ?? "",
        body: typeof config.data === "string" ? config.data : JSON.stringify(config.data ?? null),
        authorization: String(config.headers["Authorization"] ?? ""),
      };

      let reply: StubReply;
      if (request.url.includes(TOKEN_URL_FRAGMENT)) {
        tokenRequests.push(request);
        reply = json(200, { access_token: `test-token-${tokenRequests.length}`, expires_in: 7200 });
      } else {
        requests.push(request);
        reply = await handler(request, requests.length - 1);
      }

      if (reply instanceof Error) {
        throw reply;
      }
      return { data: reply.body, status: reply.status, statusText: String(reply.status), headers: {}, config };
    },
  });

  return { http, requests, tokenRequests };
}

export const testCredentials = {
  client_id: "test-client-id",
  client_secret: "test-secret",
  client_key: "test-client-key",
};

export function videoPageBody(options: {
  videos: Record<string, unknown>[];
  cursor: number;
  hasMore: boolean;
  searchId?: string;
}): StubReply {
  return json(200, {
    data: {
      videos: options.videos,
      cursor: options.cursor,
      has_more: options.hasMore,
      search_id: options.searchId ?? "7300000000000000001",
    },
    error: { code: "ok", message: "", log_id: "test-log-id" },
  });
}

export function rawVideo(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    create_time: 1700000000,
    username: "test_user",
    region_code: "US",
    ...overrides,
  };
}
