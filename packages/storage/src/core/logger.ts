import { pino, type Logger, type LoggerOptions } from "pino";
import { z } from "zod";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const levelFromEnv = z.enum(LOG_LEVELS).catch("info");

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "bucketfs",
    level: levelFromEnv.parse(process.env.LOG_LEVEL),
    ...options
  });
}
