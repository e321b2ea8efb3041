import type { DiskDefinition, FilesystemConfig } from "@bucketfs/shared";
import { InvalidArgumentError } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import { isCloudStorageAdapter, type CloudStorageAdapter, type StorageAdapter } from "./storage-adapter.js";

export interface DriverContext {
  name: string;
  logger: Logger;
}

export type DriverFactory = (
  config: DiskDefinition,
  context: DriverContext
) => StorageAdapter | Promise<StorageAdapter>;

/**
 * Resolves named disks through registered driver factories. Each disk is
 * built once and shared until it is forgotten.
 */
export class FilesystemManager {
  private readonly drivers = new Map<string, DriverFactory>();
  private readonly disks = new Map<string, Promise<StorageAdapter>>();

  constructor(
    private readonly config: FilesystemConfig,
    private readonly logger: Logger
  ) {}

  extend(driver: string, factory: DriverFactory): this {
    this.drivers.set(driver, factory);
    return this;
  }

  getDefaultDisk(): string {
    return this.config.default;
  }

  disk(name: string = this.config.default): Promise<StorageAdapter> {
    const cached = this.disks.get(name);
    if (cached) {
      return cached;
    }

    const pending: Promise<StorageAdapter> = this.resolve(name).catch((error: unknown) => {
      if (this.disks.get(name) === pending) {
        this.disks.delete(name);
      }
      throw error;
    });
    this.disks.set(name, pending);
    return pending;
  }

  async cloud(name: string = this.config.default): Promise<CloudStorageAdapter> {
    const adapter = await this.disk(name);
    if (!isCloudStorageAdapter(adapter)) {
      throw new InvalidArgumentError(`Disk [${name}] does not support URLs.`);
    }
    return adapter;
  }

  forgetDisk(name: string): this {
    this.disks.delete(name);
    return this;
  }

  private async resolve(name: string): Promise<StorageAdapter> {
    const definition = this.config.disks[name];
    if (!definition) {
      throw new InvalidArgumentError(`Disk [${name}] does not have a configured driver.`);
    }

    const factory = this.drivers.get(definition.driver);
    if (!factory) {
      throw new InvalidArgumentError(`Driver [${definition.driver}] is not supported.`);
    }

    const logger = this.logger.child({ disk: name });
    const adapter = await factory(definition, { name, logger });
    logger.debug({ driver: definition.driver }, "disk resolved");
    return adapter;
  }
}
