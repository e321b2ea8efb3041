import type { ListingPage, ListPage } from "../../core/types.js";

export function normalizeDirectory(directory?: string | null): string {
  if (!directory) return "";
  return directory.endsWith("/") ? directory : `${directory}/`;
}

/**
 * Walks a marker-paged listing from the first page until the service stops
 * handing back a marker.
 */
export async function* listingPages(listPage: ListPage, prefix: string): AsyncGenerator<ListingPage> {
  let marker = "";
  while (true) {
    const page = await listPage(prefix, marker);
    yield page;

    marker = page.nextMarker;
    if (marker === "") break;
  }
}

/**
 * Lazily yields every object key under a directory. When recursive, each
 * common prefix of a page is walked depth-first before the next page is
 * requested.
 */
export async function* listingCursor(
  listPage: ListPage,
  directory?: string | null,
  recursive = false
): AsyncGenerator<string> {
  for await (const page of listingPages(listPage, normalizeDirectory(directory))) {
    yield* page.keys;

    if (recursive) {
      for (const prefix of page.prefixes) {
        yield* listingCursor(listPage, prefix, true);
      }
    }
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) {
    out.push(item);
  }
  return out;
}
