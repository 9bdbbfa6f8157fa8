import type { Listing, Platform, PlatformScraper, SearchPassSummary } from '../scrapers/types.js';

export function makeListing(overrides: Partial<Listing> = {}): Listing {
  return {
    title: 'Untitled still life',
    description: '',
    platform: 'ebay',
    source_url: 'https://www.ebay.com/itm/100',
    source_id: null,
    price: null,
    currency: 'USD',
    seller_name: null,
    seller_id: null,
    location: null,
    image_urls: [],
    date_listing: null,
    date_ending: null,
    raw_data: null,
    ...overrides,
  };
}

/** In-memory scraper whose searchAll returns canned listings or throws. */
export class FakeScraper implements PlatformScraper {
  closeCalls = 0;
  searchAllCalls = 0;
  details = new Map<string, Listing>();
  pass: SearchPassSummary | null = null;

  constructor(
    readonly platform: Platform,
    private readonly listings: Listing[] | Error = []
  ) {}

  buildSearchQueries(): string[] {
    return ['fake query'];
  }

  async search(): Promise<Listing[]> {
    if (this.listings instanceof Error) throw this.listings;
    return this.listings;
  }

  async searchAll(): Promise<Listing[]> {
    this.searchAllCalls++;
    if (this.listings instanceof Error) throw this.listings;
    this.pass = {
      platform: this.platform,
      queries: 1,
      failed_queries: 0,
      blocked_queries: 0,
      unique_listings: this.listings.length,
    };
    return this.listings;
  }

  async getListingDetails(url: string): Promise<Listing | null> {
    return this.details.get(url) ?? null;
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }

  lastPass(): SearchPassSummary | null {
    return this.pass;
  }
}
