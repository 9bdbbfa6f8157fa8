export const PLATFORMS = [
  'ebay',
  'artnet',
  'invaluable',
  'liveauctioneers',
  'craigslist',
] as const;

export type Platform = (typeof PLATFORMS)[number];

export interface Listing {
  title: string;
  description: string;
  platform: Platform;
  source_url: string;
  source_id: string | null;
  price: number | null;
  currency: string;
  seller_name: string | null;
  seller_id: string | null;
  location: string | null;
  image_urls: string[];
  date_listing: string | null;
  date_ending: string | null;
  raw_data: Record<string, unknown> | null;
}

export type ListingInput = Pick<Listing, 'title' | 'platform' | 'source_url'> &
  Partial<Omit<Listing, 'title' | 'platform' | 'source_url'>>;

/**
 * Fills the optional fields of a listing with their defaults.
 * Returns null when the source URL is empty, since the URL is the
 * run-wide natural key and a listing without one cannot be deduplicated.
 */
export function buildListing(input: ListingInput): Listing | null {
  const sourceUrl = input.source_url.trim();
  const title = input.title.trim();
  if (!sourceUrl || !title) return null;

  return {
    title,
    description: (input.description ?? '').trim(),
    platform: input.platform,
    source_url: sourceUrl,
    source_id: input.source_id || null,
    price: input.price ?? null,
    currency: input.currency || 'USD',
    seller_name: input.seller_name || null,
    seller_id: input.seller_id || null,
    location: input.location || null,
    image_urls: input.image_urls ?? [],
    date_listing: input.date_listing ?? null,
    date_ending: input.date_ending ?? null,
    raw_data: input.raw_data ?? null,
  };
}

export interface SearchPassSummary {
  platform: Platform;
  queries: number;
  failed_queries: number;
  blocked_queries: number;
  unique_listings: number;
}

export interface PlatformScraper {
  readonly platform: Platform;
  buildSearchQueries(): string[];
  search(query: string): Promise<Listing[]>;
  searchAll(): Promise<Listing[]>;
  getListingDetails(url: string): Promise<Listing | null>;
  close(): Promise<void>;
  lastPass(): SearchPassSummary | null;
}
