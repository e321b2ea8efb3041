import { filesystemConfigFromEnv, loadDotenv, parseEnv } from "./config/env.js";
import { createLogger } from "./core/logger.js";
import { FilesystemManager } from "./modules/storage/filesystem-manager.js";
import { registerObjectStorage } from "./modules/storage/storage-provider.js";

export type {
  DiskDefinition,
  FileContents,
  FilesystemConfig,
  ObjectMetadata,
  Visibility,
  VisibilityInput,
  WriteOptions
} from "@bucketfs/shared";
export { DEFAULT_ACCESS_TIMEOUT, DEFAULT_ENDPOINT, DEFAULT_MAX_KEYS, parseDiskConfig } from "./config/disk-config.js";
export type { DiskConfig, DiskConfigInput } from "./config/disk-config.js";
export { filesystemConfigFromEnv, loadDotenv, parseEnv } from "./config/env.js";
export type { StorageEnv } from "./config/env.js";
export { DeleteObjectsError, FileNotFoundError, InvalidArgumentError, MissingDependencyError } from "./core/errors.js";
export { createLogger } from "./core/logger.js";
export type { Logger } from "./core/logger.js";
export type { ListingPage, ListPage } from "./core/types.js";
export type {
  ObjectStorageAdapter,
  ObjectStorageAdapterConfig,
  ObjectStorageAdapterOptions
} from "./modules/storage/adapters/object-storage-adapter.js";
export { FilesystemManager } from "./modules/storage/filesystem-manager.js";
export type { DriverContext, DriverFactory } from "./modules/storage/filesystem-manager.js";
export { collect, listingCursor, listingPages, normalizeDirectory } from "./modules/storage/listing-cursor.js";
export { isCloudStorageAdapter } from "./modules/storage/storage-adapter.js";
export type { CloudStorageAdapter, StorageAdapter } from "./modules/storage/storage-adapter.js";
export {
  OBJECT_STORAGE_DRIVER,
  createObjectStorageAdapter,
  loadObjectStorageDriver,
  registerObjectStorage
} from "./modules/storage/storage-provider.js";
export type {
  CreateObjectStorageOptions,
  DriverLoader,
  ObjectStorageDriver
} from "./modules/storage/storage-provider.js";

export interface CreateFilesystemOptions {
  /** Variables to read instead of process.env; .env is only loaded when omitted. */
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function createFilesystemFromEnv(options: CreateFilesystemOptions = {}): FilesystemManager {
  if (!options.env) {
    loadDotenv(options.cwd);
  }

  const env = parseEnv(options.env ?? process.env);
  const logger = createLogger({ level: env.LOG_LEVEL });
  return registerObjectStorage(new FilesystemManager(filesystemConfigFromEnv(env), logger));
}
