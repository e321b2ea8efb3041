import { S3Client, type S3ClientConfig } from "@aws-sdk/client-s3";
import { describe, expect, it } from "vitest";
import { InvalidArgumentError, MissingDependencyError } from "../../../core/errors.js";
import { createLogger } from "../../../core/logger.js";
import { ObjectStorageAdapter } from "../adapters/object-storage-adapter.js";
import { FilesystemManager } from "../filesystem-manager.js";
import { createObjectStorageAdapter, registerObjectStorage, type DriverLoader } from "../storage-provider.js";

const logger = createLogger({ level: "silent" });
const disk = { driver: "oss", accessKeyId: "test-key", accessKeySecret: "test-secret", bucket: "test-bucket" };

describe("createObjectStorageAdapter", () => {
  it("reports a missing SDK", async () => {
    const cause = new Error("Cannot find package '@aws-sdk/client-s3'");
    const error = await createObjectStorageAdapter(disk, {
      logger,
      loadDriver: () => Promise.reject(cause)
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MissingDependencyError);
    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error).toMatchObject({ packageName: "@aws-sdk/client-s3", cause });
  });

  it("rejects an incomplete configuration", async () => {
    await expect(createObjectStorageAdapter({ driver: "oss" }, { logger })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });

  it("builds a client for the configured endpoint", async () => {
    const adapter = await createObjectStorageAdapter({ ...disk, maxKeys: 25, forcePathStyle: true }, { logger });

    expect(adapter).toBeInstanceOf(ObjectStorageAdapter);
    expect(adapter.getBucket()).toBe("test-bucket");
    expect(adapter.getConfig()).toEqual({ maxKeys: 25, accessTimeout: 60 });

    const client = adapter.getClient();
    expect(await client.config.region()).toBe("oss-cn-shenzhen");
    expect(client.config.forcePathStyle).toBe(true);
    expect(await client.config.credentials()).toMatchObject({
      accessKeyId: "test-key",
      secretAccessKey: "test-secret"
    });
  });
});

function recordingDriver(): { configs: S3ClientConfig[]; loadDriver: DriverLoader } {
  const configs: S3ClientConfig[] = [];
  class RecordingClient extends S3Client {
    constructor(...args: ConstructorParameters<typeof S3Client>) {
      super(...args);
      configs.push(args[0] ?? {});
    }
  }
  return { configs, loadDriver: async () => ({ S3Client: RecordingClient, ObjectStorageAdapter }) };
}

describe("client options", () => {
  it("hands the request timeout to the HTTP handler", async () => {
    const { configs, loadDriver } = recordingDriver();

    await createObjectStorageAdapter({ ...disk, requestTimeout: 1234 }, { logger, loadDriver });

    expect(configs).toHaveLength(1);
    expect(configs[0]?.requestHandler).toEqual({ requestTimeout: 1234 });
  });

  it("leaves the default HTTP handler alone without a timeout", async () => {
    const { configs, loadDriver } = recordingDriver();

    await createObjectStorageAdapter(disk, { logger, loadDriver });

    expect(configs[0]).not.toHaveProperty("requestHandler");
  });
});

describe("registerObjectStorage", () => {
  it("serves object storage disks from the manager", async () => {
    const manager = registerObjectStorage(
      new FilesystemManager({ default: "oss", disks: { oss: disk } }, logger)
    );

    const adapter = await manager.cloud();
    expect(adapter).toBeInstanceOf(ObjectStorageAdapter);
    expect(await manager.disk("oss")).toBe(adapter);
  });
});
