import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import type { FilesystemConfig } from "@bucketfs/shared";
import { LOG_LEVELS } from "../core/logger.js";

const truthyTokens = new Set(["1", "true", "yes", "on"]);
const booleanLike = z
  .string()
  .optional()
  .transform((value) => truthyTokens.has((value ?? "").trim().toLowerCase()));

const optionalInt = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.coerce.number().int().positive().optional()
);

const schema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  FILESYSTEM_DISK: z.string().min(1).default("oss"),
  OSS_ACCESS_KEY_ID: z.string().optional(),
  OSS_ACCESS_KEY_SECRET: z.string().optional(),
  OSS_BUCKET: z.string().optional(),
  OSS_ENDPOINT: z.string().optional(),
  OSS_REGION: z.string().optional(),
  OSS_MAX_KEYS: optionalInt,
  OSS_ACCESS_TIMEOUT: optionalInt,
  OSS_REQUEST_TIMEOUT_MS: optionalInt,
  OSS_FORCE_PATH_STYLE: booleanLike
});

export type StorageEnv = z.infer<typeof schema>;

export function loadDotenv(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.resolve(cwd, ".env") });
}

export function parseEnv(source: NodeJS.ProcessEnv): StorageEnv {
  const parsed = schema.safeParse(source);

  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }

  return parsed.data;
}

export function filesystemConfigFromEnv(env: StorageEnv): FilesystemConfig {
  return {
    default: env.FILESYSTEM_DISK,
    disks: {
      oss: {
        driver: "oss",
        accessKeyId: env.OSS_ACCESS_KEY_ID,
        accessKeySecret: env.OSS_ACCESS_KEY_SECRET,
        bucket: env.OSS_BUCKET,
        endpoint: env.OSS_ENDPOINT,
        region: env.OSS_REGION,
        maxKeys: env.OSS_MAX_KEYS,
        accessTimeout: env.OSS_ACCESS_TIMEOUT,
        requestTimeout: env.OSS_REQUEST_TIMEOUT_MS,
        forcePathStyle: env.OSS_FORCE_PATH_STYLE
      }
    }
  };
}
