import { createLogger, type Logger } from '../logger.js';
import { describeError } from '../errors.js';
import { sleep } from './http.js';
import type { Listing, Platform, PlatformScraper, SearchPassSummary } from './types.js';

export interface ScraperOptions {
  /** Pause between sub-requests and between queries, in milliseconds. */
  requestDelayMs: number;
}

/**
 * Shared plumbing for the platform scrapers: sequential multi-query passes,
 * per-pass dedup and failure accounting. Subclasses implement the
 * platform-specific search and detail fetching.
 */
export abstract class BaseScraper implements PlatformScraper {
  abstract readonly platform: Platform;

  protected readonly requestDelayMs: number;
  private failedQueries = 0;
  private blockedQueries = 0;
  private summary: SearchPassSummary | null = null;
  private scopedLogger: Logger | null = null;

  constructor(options: ScraperOptions) {
    this.requestDelayMs = options.requestDelayMs;
  }

  protected get log(): Logger {
    if (!this.scopedLogger) {
      this.scopedLogger = createLogger(`scraper:${this.platform}`);
    }
    return this.scopedLogger;
  }

  abstract buildSearchQueries(): string[];
  abstract search(query: string): Promise<Listing[]>;
  abstract getListingDetails(url: string): Promise<Listing | null>;

  async close(): Promise<void> {
    // nothing held by default
  }

  lastPass(): SearchPassSummary | null {
    return this.summary;
  }

  /**
   * Runs every query in order, never concurrently, and merges the results.
   * Listings are keyed by source_id when the platform provides one, else by
   * source_url; the first occurrence wins.
   */
  async searchAll(): Promise<Listing[]> {
    const queries = this.buildSearchQueries();
    const merged = new Map<string, Listing>();
    this.failedQueries = 0;
    this.blockedQueries = 0;

    for (let i = 0; i < queries.length; i++) {
      const query = queries[i];
      if (query === undefined) continue;

      const listings = await this.search(query);
      let added = 0;
      for (const listing of listings) {
        if (!listing.source_url) {
          this.log.warn('Dropping listing without source URL', { title: listing.title });
          continue;
        }
        const key = dedupKey(listing);
        if (!merged.has(key)) {
          merged.set(key, listing);
          added++;
        }
      }
      this.log.debug('Query folded in', { query, found: listings.length, added });

      if (i < queries.length - 1) {
        await sleep(this.requestDelayMs);
      }
    }

    this.summary = {
      platform: this.platform,
      queries: queries.length,
      failed_queries: this.failedQueries,
      blocked_queries: this.blockedQueries,
      unique_listings: merged.size,
    };
    this.log.info('All searches complete', { ...this.summary });

    return [...merged.values()];
  }

  /** Records a whole-query failure; the caller returns an empty result. */
  protected queryFailed(query: string, error: unknown, url?: string): void {
    this.failedQueries++;
    this.log.error('Search request failed', { query, url, error: describeError(error) });
  }

  /** Records a bot-challenge page served in place of results. */
  protected queryBlocked(query: string, url?: string): void {
    this.blockedQueries++;
    this.log.warn('Blocked by bot challenge, treating as no results', { query, url, blocked: true });
  }

  protected itemFailed(error: unknown, context: Record<string, unknown> = {}): void {
    this.log.warn('Failed to parse item, skipping', { ...context, error: describeError(error) });
  }
}

export function dedupKey(listing: Listing): string {
  return listing.source_id ? `id:${listing.source_id}` : `url:${listing.source_url}`;
}
