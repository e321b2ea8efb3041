import { Readable } from "node:stream";
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectAclCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsCommand,
  NoSuchKey,
  NotFound,
  PutObjectAclCommand,
  PutObjectCommand,
  S3Client,
  type Grant,
  type ObjectCannedACL
} from "@aws-sdk/client-s3";
import { sdkStreamMixin } from "@smithy/util-stream";
import { mockClient, type AwsClientStub } from "aws-sdk-client-mock";

const ALL_USERS_GROUP = "http://acs.amazonaws.com/groups/global/AllUsers";

export const FIXED_MODIFIED_AT = new Date("2024-05-01T12:00:00Z");

export interface StoredObject {
  body: Buffer;
  acl: ObjectCannedACL;
  contentType?: string;
  cacheControl?: string;
  metadata: Record<string, string>;
  lastModified: Date;
}

export function createTestClient(): S3Client {
  return new S3Client({
    region: "oss-cn-shenzhen",
    endpoint: "https://oss-cn-shenzhen.aliyuncs.com",
    credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" }
  });
}

async function bodyToBuffer(body: unknown): Promise<Buffer> {
  if (body === undefined) return Buffer.alloc(0);
  if (typeof body === "string") return Buffer.from(body, "utf8");
  if (body instanceof Uint8Array) return Buffer.from(body);
  if (body instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }
  throw new Error("in-memory bucket cannot read this body type");
}

function grantsFor(acl: ObjectCannedACL): Grant[] {
  const grants: Grant[] = [{ Grantee: { Type: "CanonicalUser", ID: "owner" }, Permission: "FULL_CONTROL" }];
  if (acl === "public-read" || acl === "public-read-write") {
    grants.push({ Grantee: { Type: "Group", URI: ALL_USERS_GROUP }, Permission: "READ" });
  }
  if (acl === "public-read-write") {
    grants.push({ Grantee: { Type: "Group", URI: ALL_USERS_GROUP }, Permission: "WRITE" });
  }
  return grants;
}

function noSuchKey(): NoSuchKey {
  return new NoSuchKey({ $metadata: { httpStatusCode: 404 }, message: "The specified key does not exist." });
}

/**
 * Serves the object commands the adapter sends from a Map, with S3 listing
 * semantics (prefix, "/" delimiter, marker, page size).
 */
export class InMemoryBucket {
  readonly objects = new Map<string, StoredObject>();
  readonly stub: AwsClientStub<S3Client>;
  readonly undeletable = new Set<string>();
  /** Truncated listings leave out NextMarker, as some services do. */
  omitNextMarker = false;

  constructor(readonly client: S3Client = createTestClient()) {
    this.stub = mockClient(client);
    this.install();
  }

  seed(key: string, body: string, extra: Partial<StoredObject> = {}): void {
    this.objects.set(key, {
      body: Buffer.from(body, "utf8"),
      acl: "private",
      metadata: {},
      lastModified: FIXED_MODIFIED_AT,
      ...extra
    });
  }

  text(key: string): string | undefined {
    return this.objects.get(key)?.body.toString("utf8");
  }

  private install(): void {
    this.stub.on(PutObjectCommand).callsFake(async (input) => {
      this.objects.set(input.Key ?? "", {
        body: await bodyToBuffer(input.Body),
        acl: input.ACL ?? "private",
        contentType: input.ContentType,
        cacheControl: input.CacheControl,
        metadata: input.Metadata ?? {},
        lastModified: FIXED_MODIFIED_AT
      });
      return { ETag: '"etag"' };
    });

    this.stub.on(GetObjectCommand).callsFake(async (input) => {
      const object = this.objects.get(input.Key ?? "");
      if (!object) throw noSuchKey();
      return {
        Body: sdkStreamMixin(Readable.from([object.body])),
        ContentLength: object.body.length,
        ContentType: object.contentType,
        CacheControl: object.cacheControl,
        Metadata: object.metadata
      };
    });

    this.stub.on(HeadObjectCommand).callsFake(async (input) => {
      const object = this.objects.get(input.Key ?? "");
      if (!object) {
        throw new NotFound({ $metadata: { httpStatusCode: 404 }, message: "NotFound" });
      }
      return {
        ContentLength: object.body.length,
        ContentType: object.contentType,
        LastModified: object.lastModified,
        ETag: '"etag"',
        Metadata: object.metadata
      };
    });

    this.stub.on(DeleteObjectCommand).callsFake(async (input) => {
      this.objects.delete(input.Key ?? "");
      return {};
    });

    this.stub.on(DeleteObjectsCommand).callsFake(async (input) => {
      const errors: Array<{ Key: string; Code: string; Message: string }> = [];
      for (const { Key } of input.Delete?.Objects ?? []) {
        const key = Key ?? "";
        if (this.undeletable.has(key)) {
          errors.push({ Key: key, Code: "AccessDenied", Message: "Access Denied" });
        } else {
          this.objects.delete(key);
        }
      }
      return errors.length > 0 ? { Errors: errors } : {};
    });

    this.stub.on(CopyObjectCommand).callsFake(async (input) => {
      const [, , ...rest] = (input.CopySource ?? "").split("/");
      const source = this.objects.get(decodeURIComponent(rest.join("/")));
      if (!source) throw noSuchKey();
      this.objects.set(input.Key ?? "", { ...source, body: Buffer.from(source.body) });
      return {};
    });

    this.stub.on(GetObjectAclCommand).callsFake(async (input) => {
      const object = this.objects.get(input.Key ?? "");
      if (!object) throw noSuchKey();
      return { Grants: grantsFor(object.acl) };
    });

    this.stub.on(PutObjectAclCommand).callsFake(async (input) => {
      const object = this.objects.get(input.Key ?? "");
      if (!object) throw noSuchKey();
      object.acl = input.ACL ?? "private";
      return {};
    });

    this.stub.on(ListObjectsCommand).callsFake(async (input) => {
      const prefix = input.Prefix ?? "";
      const delimiter = input.Delimiter ?? "";
      const marker = input.Marker ?? "";
      const maxKeys = input.MaxKeys ?? 1000;

      const entries: Array<{ kind: "key" | "prefix"; value: string }> = [];
      const seenPrefixes = new Set<string>();
      for (const key of [...this.objects.keys()].sort()) {
        if (!key.startsWith(prefix)) continue;
        const rest = key.slice(prefix.length);
        const cut = delimiter ? rest.indexOf(delimiter) : -1;
        if (cut >= 0) {
          const common = prefix + rest.slice(0, cut + delimiter.length);
          if (common <= marker || seenPrefixes.has(common)) continue;
          seenPrefixes.add(common);
          entries.push({ kind: "prefix", value: common });
        } else if (key > marker) {
          entries.push({ kind: "key", value: key });
        }
      }

      const page = entries.slice(0, maxKeys);
      const truncated = entries.length > maxKeys;
      return {
        Contents: page
          .filter((entry) => entry.kind === "key")
          .map((entry) => ({ Key: entry.value, Size: this.objects.get(entry.value)?.body.length ?? 0 })),
        CommonPrefixes: page.filter((entry) => entry.kind === "prefix").map((entry) => ({ Prefix: entry.value })),
        IsTruncated: truncated,
        ...(truncated && !this.omitNextMarker ? { NextMarker: page[page.length - 1]?.value } : {})
      };
    });
  }
}
