import type { S3Client } from "@aws-sdk/client-s3";
import { parseDiskConfig } from "../../config/disk-config.js";
import { MissingDependencyError } from "../../core/errors.js";
import { createLogger, type Logger } from "../../core/logger.js";
import type { ObjectStorageAdapter } from "./adapters/object-storage-adapter.js";
import type { FilesystemManager } from "./filesystem-manager.js";

export const OBJECT_STORAGE_DRIVER = "oss";
const SDK_PACKAGE = "@aws-sdk/client-s3";

export interface ObjectStorageDriver {
  S3Client: typeof S3Client;
  ObjectStorageAdapter: typeof ObjectStorageAdapter;
}

export type DriverLoader = () => Promise<ObjectStorageDriver>;

// Loaded when a disk is built; a missing SDK install surfaces as MissingDependencyError.
export const loadObjectStorageDriver: DriverLoader = async () => {
  const [{ S3Client }, { ObjectStorageAdapter }] = await Promise.all([
    import("@aws-sdk/client-s3"),
    import("./adapters/object-storage-adapter.js")
  ]);
  return { S3Client, ObjectStorageAdapter };
};

export interface CreateObjectStorageOptions {
  logger?: Logger;
  loadDriver?: DriverLoader;
}

export async function createObjectStorageAdapter(
  input: unknown,
  options: CreateObjectStorageOptions = {}
): Promise<ObjectStorageAdapter> {
  const loadDriver = options.loadDriver ?? loadObjectStorageDriver;

  let driver: ObjectStorageDriver;
  try {
    driver = await loadDriver();
  } catch (error) {
    throw new MissingDependencyError(SDK_PACKAGE, { cause: error });
  }

  const config = parseDiskConfig(input);
  const client = new driver.S3Client({
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.accessKeySecret
    },
    endpoint: config.endpoint,
    region: config.region,
    forcePathStyle: config.forcePathStyle,
    ...(config.requestTimeout ? { requestHandler: { requestTimeout: config.requestTimeout } } : {})
  });

  return new driver.ObjectStorageAdapter(client, config.bucket, {
    maxKeys: config.maxKeys,
    accessTimeout: config.accessTimeout,
    logger: options.logger ?? createLogger()
  });
}

export function registerObjectStorage(manager: FilesystemManager): FilesystemManager {
  return manager.extend(OBJECT_STORAGE_DRIVER, (config, { logger }) =>
    createObjectStorageAdapter(config, { logger })
  );
}
