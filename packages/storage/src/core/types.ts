export interface ListingPage {
  keys: string[];
  prefixes: string[];
  nextMarker: string;
}

export type ListPage = (prefix: string, marker: string) => Promise<ListingPage>;
