import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

const optionalPositiveInt = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.coerce.number().int().positive().optional(),
);

export const RATE_LIMIT_WAIT_STRATEGIES = ["wait_four_hours", "wait_next_utc_midnight"] as const;
export type RateLimitWaitStrategy = (typeof RATE_LIMIT_WAIT_STRATEGIES)[number];

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  DB_PATH: z.string().default("data/videos.db"),
  API_CREDENTIALS_FILE: z.string().default("secrets.json"),
  RAW_RESPONSES_OUTPUT_DIR: z.string().optional(),
  RATE_LIMIT_WAIT_STRATEGY: z.enum(RATE_LIMIT_WAIT_STRATEGIES).default("wait_four_hours"),
  MAX_API_RATE_LIMIT_RETRIES: optionalPositiveInt,
  DAILY_API_REQUEST_QUOTA: z.coerce.number().int().positive().default(1000),
  MAX_DAYS_PER_QUERY: z.coerce.number().int().positive().default(7),
  API_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  VIDEO_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  // Both multiply API quota usage; off unless asked for
  FETCH_USER_INFO: boolFromEnv(false),
  FETCH_COMMENTS: boolFromEnv(false),
});

export type RuntimeConfig = ReturnType<typeof loadRuntimeConfig>;

export const loadRuntimeConfig = (env: NodeJS.ProcessEnv) => {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    dbPath: parsed.DB_PATH,
    apiCredentialsFile: parsed.API_CREDENTIALS_FILE,
    rawResponsesOutputDir: parsed.RAW_RESPONSES_OUTPUT_DIR?.trim() || undefined,
    rateLimitWaitStrategy: parsed.RATE_LIMIT_WAIT_STRATEGY,
    maxApiRateLimitRetries: parsed.MAX_API_RATE_LIMIT_RETRIES,
    dailyApiRequestQuota: parsed.DAILY_API_REQUEST_QUOTA,
    maxDaysPerQuery: parsed.MAX_DAYS_PER_QUERY,
    apiRequestTimeoutMs: parsed.API_REQUEST_TIMEOUT_MS,
    videoPageSize: parsed.VIDEO_PAGE_SIZE,
    fetchUserInfo: parsed.FETCH_USER_INFO,
    fetchComments: parsed.FETCH_COMMENTS,
  };
};

// Load .env from the project root, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, "../.env");
loadEnv({ path: envPath });

export const runtimeConfig = loadRuntimeConfig(process.env);
