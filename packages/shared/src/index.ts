import type { Readable } from "node:stream";

export type Visibility = "public" | "public-read" | "private" | "default";

export type VisibilityInput = "public" | "private" | "public-read" | "public-read-write";

export type FileContents = string | Uint8Array | Readable;

export interface WriteOptions {
  visibility?: VisibilityInput;
  contentType?: string;
  cacheControl?: string;
  metadata?: Record<string, string>;
}

export interface ObjectMetadata {
  contentLength?: number;
  contentType?: string;
  lastModified?: Date;
  etag?: string;
  metadata?: Record<string, string>;
}

export interface DiskDefinition {
  driver: string;
  [option: string]: unknown;
}

export interface FilesystemConfig {
  default: string;
  disks: Record<string, DiskDefinition>;
}
