import pino from "pino";
import type { Logger } from "pino";
import { runtimeConfig } from "../config";

const isDevelopment = runtimeConfig.nodeEnv === "development";

export const logger: Logger = pino({
  level: runtimeConfig.logLevel,
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  base: {
    service: "video-research-crawler",
    env: runtimeConfig.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

/** Silent logger for tests and library callers that do not want output. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
