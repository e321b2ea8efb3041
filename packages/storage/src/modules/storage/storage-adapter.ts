import type { Readable } from "node:stream";
import type { FileContents, Visibility, VisibilityInput, WriteOptions } from "@bucketfs/shared";

export interface StorageAdapter {
  exists(path: string): Promise<boolean>;
  /** Throws FileNotFoundError when the object cannot be read. */
  get(path: string): Promise<Buffer>;
  /** Throws FileNotFoundError when the object cannot be read. */
  readStream(path: string): Promise<Readable>;
  put(path: string, contents: FileContents, options?: WriteOptions): Promise<boolean>;
  writeStream(path: string, stream: Readable, options?: WriteOptions): Promise<boolean>;
  getVisibility(path: string): Promise<Visibility>;
  setVisibility(path: string, visibility: VisibilityInput): Promise<boolean>;
  prepend(path: string, data: string | Uint8Array): Promise<boolean>;
  append(path: string, data: string | Uint8Array): Promise<boolean>;
  delete(...paths: Array<string | readonly string[]>): Promise<boolean>;
  copy(from: string, to: string): Promise<boolean>;
  move(from: string, to: string): Promise<boolean>;
  size(path: string): Promise<number>;
  /** Unix timestamp in seconds, 0 when unknown. */
  lastModified(path: string): Promise<number>;
  files(directory?: string | null, recursive?: boolean): Promise<string[]>;
  allFiles(directory?: string | null): Promise<string[]>;
  directories(directory?: string | null, recursive?: boolean): Promise<string[]>;
  allDirectories(directory?: string | null): Promise<string[]>;
  makeDirectory(path: string): Promise<boolean>;
  deleteDirectory(directory: string): Promise<boolean>;
}

export interface CloudStorageAdapter extends StorageAdapter {
  /** Temporary signed URL, or null when it cannot be produced. */
  url(path: string): Promise<string | null>;
}

export function isCloudStorageAdapter(adapter: StorageAdapter): adapter is CloudStorageAdapter {
  return "url" in adapter && typeof adapter.url === "function";
}
