import { Readable } from "node:stream";
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectAclCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsCommand,
  PutObjectAclCommand,
  PutObjectCommand,
  S3ServiceException,
  type ListObjectsCommandOutput,
  type PutObjectCommandInput,
  type S3Client
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { FileContents, ObjectMetadata, Visibility, VisibilityInput, WriteOptions } from "@bucketfs/shared";
import { DEFAULT_ACCESS_TIMEOUT, DEFAULT_MAX_KEYS } from "../../../config/disk-config.js";
import { DeleteObjectsError, FileNotFoundError, InvalidArgumentError } from "../../../core/errors.js";
import { createLogger, type Logger } from "../../../core/logger.js";
import type { ListPage } from "../../../core/types.js";
import { collect, listingCursor, listingPages, normalizeDirectory } from "../listing-cursor.js";
import type { CloudStorageAdapter } from "../storage-adapter.js";
import { aclFromGrants, aclFromVisibility, visibilityFromAcl, type ObjectAcl } from "../visibility.js";

// DeleteObjects accepts at most this many keys per request.
const DELETE_BATCH_SIZE = 1000;
const DIRECTORY_DELIMITER = "/";

export interface ObjectStorageAdapterOptions {
  /** Listing page size. */
  maxKeys?: number;
  /** Lifetime of signed URLs, in seconds. */
  accessTimeout?: number;
  logger?: Logger;
}

export interface ObjectStorageAdapterConfig {
  maxKeys: number;
  accessTimeout: number;
}

type WriteParams = Pick<PutObjectCommandInput, "ACL" | "ContentType" | "CacheControl" | "Metadata">;

function writeParams(options: WriteOptions): WriteParams {
  return {
    ...(options.visibility ? { ACL: aclFromVisibility(options.visibility) } : {}),
    ...(options.contentType ? { ContentType: options.contentType } : {}),
    ...(options.cacheControl ? { CacheControl: options.cacheControl } : {}),
    ...(options.metadata ? { Metadata: options.metadata } : {})
  };
}

function toBuffer(data: string | Uint8Array): Buffer {
  return typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data);
}

function toCopySource(bucket: string, key: string): string {
  return `/${bucket}/${encodeURIComponent(key).replace(/%2F/g, "/")}`;
}

// A truncated page without NextMarker continues from its greatest entry.
function nextMarkerOf(response: ListObjectsCommandOutput, keys: string[], prefixes: string[]): string {
  if (!response.IsTruncated) return "";
  if (response.NextMarker) return response.NextMarker;
  const lastKey = keys[keys.length - 1] ?? "";
  const lastPrefix = prefixes[prefixes.length - 1] ?? "";
  return lastKey > lastPrefix ? lastKey : lastPrefix;
}

interface StoredObject {
  body: Buffer;
  options: WriteOptions;
}

function isNotFound(error: S3ServiceException): boolean {
  return error.name === "NotFound" || error.name === "NoSuchKey" || error.$metadata?.httpStatusCode === 404;
}

export class ObjectStorageAdapter implements CloudStorageAdapter {
  private client: S3Client;
  private bucket: string;
  private readonly config: ObjectStorageAdapterConfig;
  private readonly logger: Logger;
  private readonly failures: Error[] = [];

  constructor(client: S3Client, bucket: string, options: ObjectStorageAdapterOptions = {}) {
    this.client = client;
    this.bucket = bucket;
    this.config = {
      maxKeys: options.maxKeys || DEFAULT_MAX_KEYS,
      accessTimeout: options.accessTimeout || DEFAULT_ACCESS_TIMEOUT
    };
    this.logger = options.logger ?? createLogger();
  }

  getClient(): S3Client {
    return this.client;
  }

  setClient(client: S3Client): S3Client {
    this.client = client;
    return client;
  }

  getBucket(): string {
    return this.bucket;
  }

  setBucket(bucket: string): string {
    this.bucket = bucket;
    return bucket;
  }

  getConfig(): Readonly<ObjectStorageAdapterConfig> {
    return this.config;
  }

  /**
   * Sends any SDK command through the wrapped client. Other client members
   * are reached through {@link getClient}.
   */
  get send(): S3Client["send"] {
    return this.client.send.bind(this.client);
  }

  /** Releases the wrapped client's sockets. */
  destroy(): void {
    this.client.destroy();
  }

  async url(path: string): Promise<string | null> {
    try {
      return await getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: path }), {
        expiresIn: this.config.accessTimeout
      });
    } catch (error) {
      this.record("url", path, error);
      return null;
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: path }));
      return true;
    } catch (error) {
      if (error instanceof S3ServiceException && isNotFound(error)) {
        return false;
      }
      this.record("exists", path, error);
      return false;
    }
  }

  async get(path: string): Promise<Buffer> {
    return (await this.fetch(path)).body;
  }

  async readStream(path: string): Promise<Readable> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: path }));
      const body = response.Body;
      if (!body) return Readable.from([]);
      if (body instanceof Readable) return body;
      return Readable.from(Buffer.from(await body.transformToByteArray()));
    } catch (error) {
      throw this.notFound(path, error);
    }
  }

  async put(path: string, contents: FileContents, options: WriteOptions = {}): Promise<boolean> {
    if (contents instanceof Readable) {
      return this.writeStream(path, contents, options);
    }

    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: this.bucket, Key: path, Body: contents, ...writeParams(options) })
      );
      return true;
    } catch (error) {
      this.record("put", path, error);
      return false;
    }
  }

  async writeStream(path: string, stream: Readable, options: WriteOptions = {}): Promise<boolean> {
    if (!(stream instanceof Readable)) {
      throw new InvalidArgumentError("writeStream expects a readable stream");
    }

    try {
      const upload = new Upload({
        client: this.client,
        params: { Bucket: this.bucket, Key: path, Body: stream, ...writeParams(options) }
      });
      await upload.done();
      return true;
    } catch (error) {
      this.record("writeStream", path, error);
      return false;
    }
  }

  async getVisibility(path: string): Promise<Visibility> {
    try {
      const response = await this.client.send(new GetObjectAclCommand({ Bucket: this.bucket, Key: path }));
      return visibilityFromAcl(aclFromGrants(response.Grants));
    } catch (error) {
      this.record("getVisibility", path, error);
      return "default";
    }
  }

  async setVisibility(path: string, visibility: VisibilityInput): Promise<boolean> {
    try {
      await this.client.send(
        new PutObjectAclCommand({ Bucket: this.bucket, Key: path, ACL: aclFromVisibility(visibility) })
      );
      return true;
    } catch (error) {
      this.record("setVisibility", path, error);
      return false;
    }
  }

  async prepend(path: string, data: string | Uint8Array): Promise<boolean> {
    if (await this.exists(path)) {
      const current = await this.fetch(path);
      return this.put(path, Buffer.concat([toBuffer(data), current.body]), await this.keptOptions(path, current));
    }

    return this.put(path, data);
  }

  async append(path: string, data: string | Uint8Array): Promise<boolean> {
    if (await this.exists(path)) {
      const current = await this.fetch(path);
      return this.put(path, Buffer.concat([current.body, toBuffer(data)]), await this.keptOptions(path, current));
    }

    return this.put(path, data);
  }

  async delete(...paths: Array<string | readonly string[]>): Promise<boolean> {
    let success = true;

    for (const path of paths.flat()) {
      try {
        await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: path }));
      } catch (error) {
        this.record("delete", path, error);
        success = false;
      }
    }

    return success;
  }

  async copy(from: string, to: string): Promise<boolean> {
    try {
      await this.client.send(
        new CopyObjectCommand({ Bucket: this.bucket, Key: to, CopySource: toCopySource(this.bucket, from) })
      );
      return true;
    } catch (error) {
      this.record("copy", from, error);
      return false;
    }
  }

  async move(from: string, to: string): Promise<boolean> {
    if (!(await this.copy(from, to))) {
      return false;
    }

    return this.delete(from);
  }

  async size(path: string): Promise<number> {
    const meta = await this.getMetadata(path);
    return meta.contentLength ?? 0;
  }

  async lastModified(path: string): Promise<number> {
    const meta = await this.getMetadata(path);
    return meta.lastModified ? Math.floor(meta.lastModified.getTime() / 1000) : 0;
  }

  async files(directory?: string | null, recursive = false): Promise<string[]> {
    return collect(this.cursor(directory, recursive));
  }

  async allFiles(directory?: string | null): Promise<string[]> {
    return this.files(directory, true);
  }

  async directories(directory?: string | null, recursive = false): Promise<string[]> {
    const out: string[] = [];

    for await (const page of listingPages(this.listPage, normalizeDirectory(directory))) {
      for (const prefix of page.prefixes) {
        out.push(prefix);
        if (recursive) {
          out.push(...(await this.directories(prefix, true)));
        }
      }
    }

    return out;
  }

  async allDirectories(directory?: string | null): Promise<string[]> {
    return this.directories(directory, true);
  }

  async makeDirectory(path: string): Promise<boolean> {
    try {
      await this.client.send(new PutObjectCommand({ Bucket: this.bucket, Key: normalizeDirectory(path), Body: "" }));
      return true;
    } catch (error) {
      this.record("makeDirectory", path, error);
      return false;
    }
  }

  async deleteDirectory(directory: string): Promise<boolean> {
    try {
      const keys = await collect(this.cursor(directory, true));
      let success = true;

      for (let start = 0; start < keys.length; start += DELETE_BATCH_SIZE) {
        const batch = keys.slice(start, start + DELETE_BATCH_SIZE);
        const response = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: { Objects: batch.map((key) => ({ Key: key })), Quiet: true }
          })
        );

        const failedKeys = (response.Errors ?? []).map((item) => item.Key ?? "");
        if (failedKeys.length > 0) {
          this.capture("deleteDirectory", directory, new DeleteObjectsError(failedKeys));
          success = false;
        }
      }

      return success;
    } catch (error) {
      this.record("deleteDirectory", directory, error);
      return false;
    }
  }

  async getMetadata(path: string): Promise<ObjectMetadata> {
    try {
      const response = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: path }));
      return {
        contentLength: response.ContentLength,
        contentType: response.ContentType,
        lastModified: response.LastModified,
        etag: response.ETag,
        metadata: response.Metadata ?? {}
      };
    } catch (error) {
      this.record("getMetadata", path, error);
      return {};
    }
  }

  /** Lazy key sequence; every call starts a fresh listing. */
  cursor(directory?: string | null, recursive = false): AsyncGenerator<string> {
    return listingCursor(this.listPage, directory, recursive);
  }

  errors(): Error[] {
    return [...this.failures];
  }

  private readonly listPage: ListPage = async (prefix, marker) => {
    const response = await this.client.send(
      new ListObjectsCommand({
        Bucket: this.bucket,
        Prefix: prefix,
        Delimiter: DIRECTORY_DELIMITER,
        MaxKeys: this.config.maxKeys,
        ...(marker ? { Marker: marker } : {})
      })
    );

    const keys = (response.Contents ?? []).flatMap((item) => (item.Key ? [item.Key] : []));
    const prefixes = (response.CommonPrefixes ?? []).flatMap((item) => (item.Prefix ? [item.Prefix] : []));
    return { keys, prefixes, nextMarker: nextMarkerOf(response, keys, prefixes) };
  };

  private async fetch(path: string): Promise<StoredObject> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: path }));
      const bytes = await response.Body?.transformToByteArray();
      return {
        body: bytes ? Buffer.from(bytes) : Buffer.alloc(0),
        options: {
          ...(response.ContentType ? { contentType: response.ContentType } : {}),
          ...(response.CacheControl ? { cacheControl: response.CacheControl } : {}),
          ...(response.Metadata ? { metadata: response.Metadata } : {})
        }
      };
    } catch (error) {
      throw this.notFound(path, error);
    }
  }

  // ACL and headers carried over to the rewritten object.
  private async keptOptions(path: string, current: StoredObject): Promise<WriteOptions> {
    const acl = await this.readAcl(path);
    return acl ? { ...current.options, visibility: acl } : current.options;
  }

  private async readAcl(path: string): Promise<ObjectAcl | undefined> {
    try {
      const response = await this.client.send(new GetObjectAclCommand({ Bucket: this.bucket, Key: path }));
      return aclFromGrants(response.Grants);
    } catch (error) {
      this.record("readAcl", path, error);
      return undefined;
    }
  }

  private record(operation: string, path: string, error: unknown): void {
    if (!(error instanceof S3ServiceException)) {
      throw error;
    }
    this.capture(operation, path, error);
  }

  private capture(operation: string, path: string, error: Error): void {
    this.failures.push(error);
    this.logger.warn({ err: error, operation, path }, "object storage operation failed");
  }

  private notFound(path: string, error: unknown): unknown {
    if (!(error instanceof S3ServiceException)) {
      return error;
    }
    this.logger.debug({ err: error, path }, "object not readable");
    return new FileNotFoundError(error.message, path, { cause: error });
  }
}
