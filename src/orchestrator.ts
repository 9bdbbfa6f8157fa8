import type { AppConfig } from './config.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { ConfidenceScorer, type ScoringResult } from './scorer.js';
import { createScrapers, probeBrowser } from './scrapers/index.js';
import type { HttpClientOptions } from './scrapers/http.js';
import type { Listing, Platform, PlatformScraper, SearchPassSummary } from './scrapers/types.js';

const log = createLogger('orchestrator');

export type OrchestratorState = 'idle' | 'running' | 'scoring' | 'done';

/** ok: every query answered; degraded: some failed or were blocked; failed: nothing usable. */
export type PlatformOutcome = 'ok' | 'degraded' | 'failed';

export interface PlatformRunStats {
  platform: Platform;
  outcome: PlatformOutcome;
  found: number;
  added: number;
  error: string | null;
  pass: SearchPassSummary | null;
}

export interface RunStats {
  started_at: string;
  total_collected: number;
  passed_filter: number;
  elapsed_ms: number;
  platforms: PlatformRunStats[];
}

export function platformOutcome(pass: SearchPassSummary | null, error: unknown): PlatformOutcome {
  if (error !== undefined || !pass) return 'failed';
  const unanswered = pass.failed_queries + pass.blocked_queries;
  if (pass.queries > 0 && unanswered >= pass.queries) return 'failed';
  return unanswered > 0 ? 'degraded' : 'ok';
}

/**
 * Runs the selected scrapers one after another, merges their listings by
 * source URL (first seen wins) and ranks the survivors with the scorer.
 * A scraper that throws is logged and skipped; every scraper is closed
 * after its pass whether or not it succeeded.
 */
export class ScrapeOrchestrator {
  private currentState: OrchestratorState = 'idle';
  private stats: RunStats | null = null;

  constructor(
    readonly scrapers: PlatformScraper[],
    readonly scorer: ConfidenceScorer = new ConfidenceScorer()
  ) {}

  get state(): OrchestratorState {
    return this.currentState;
  }

  get lastRunStats(): RunStats | null {
    return this.stats;
  }

  private findScraper(platform: Platform): PlatformScraper | null {
    return this.scrapers.find((s) => s.platform === platform) ?? null;
  }

  private async closeQuietly(scraper: PlatformScraper): Promise<void> {
    try {
      await scraper.close();
    } catch (error) {
      log.warn('Scraper close failed', { platform: scraper.platform, error: describeError(error) });
    }
  }

  async runAll(): Promise<ScoringResult[]> {
    const startedAt = new Date();
    this.currentState = 'running';
    log.info('Starting scrape run', { scraper_count: this.scrapers.length });

    const merged = new Map<string, Listing>();
    const platforms: PlatformRunStats[] = [];

    for (const scraper of this.scrapers) {
      let found = 0;
      let added = 0;
      let failure: unknown = undefined;

      try {
        log.info('Running scraper', { platform: scraper.platform });
        const listings = await scraper.searchAll();
        found = listings.length;
        for (const listing of listings) {
          if (!merged.has(listing.source_url)) {
            merged.set(listing.source_url, listing);
            added++;
          }
        }
        log.info('Scraper complete', { platform: scraper.platform, found, new: added });
      } catch (error) {
        failure = error;
        log.error('Scraper failed', { platform: scraper.platform, error: describeError(error) });
      } finally {
        await this.closeQuietly(scraper);
      }

      const pass = failure === undefined ? scraper.lastPass() : null;
      platforms.push({
        platform: scraper.platform,
        outcome: platformOutcome(pass, failure),
        found,
        added,
        error: failure === undefined ? null : describeError(failure),
        pass,
      });
    }

    this.currentState = 'scoring';
    log.info('Filtering results', { total: merged.size });
    const results = this.scorer.filterListings([...merged.values()]);

    this.stats = {
      started_at: startedAt.toISOString(),
      total_collected: merged.size,
      passed_filter: results.length,
      elapsed_ms: Date.now() - startedAt.getTime(),
      platforms,
    };

    if (platforms.length > 0 && platforms.every((p) => p.outcome === 'failed')) {
      log.error('Every platform failed; no listings could be collected', {
        platforms: platforms.map((p) => p.platform),
      });
    } else if (results.length === 0) {
      log.info('Scrape run complete, no matches', { total_found: merged.size });
    }

    log.info('Scrape run complete', {
      total_found: this.stats.total_collected,
      passed_filter: this.stats.passed_filter,
      elapsed_ms: this.stats.elapsed_ms,
      outcomes: Object.fromEntries(platforms.map((p) => [p.platform, p.outcome])),
    });

    this.currentState = 'done';
    return results;
  }

  async runScraper(platform: Platform): Promise<ScoringResult[]> {
    const scraper = this.findScraper(platform);
    if (!scraper) {
      log.error('Scraper not found', { platform });
      return [];
    }

    this.currentState = 'running';
    try {
      const listings = await scraper.searchAll();
      this.currentState = 'scoring';
      return this.scorer.filterListings(listings);
    } catch (error) {
      log.error('Scraper failed', { platform, error: describeError(error) });
      return [];
    } finally {
      await this.closeQuietly(scraper);
      this.currentState = 'done';
    }
  }

  /** Scores one listing page. Rejected results are returned, not filtered. */
  async getListingDetails(url: string, platform: Platform): Promise<ScoringResult | null> {
    const scraper = this.findScraper(platform);
    if (!scraper) {
      log.warn('No scraper configured for platform', { platform, url });
      return null;
    }

    try {
      const listing = await scraper.getListingDetails(url);
      return listing ? this.scorer.score(listing) : null;
    } finally {
      await this.closeQuietly(scraper);
    }
  }

  async close(): Promise<void> {
    for (const scraper of this.scrapers) {
      await this.closeQuietly(scraper);
    }
  }
}

export interface OrchestratorDeps {
  http?: HttpClientOptions;
  /** Skips probing the filesystem for a browser. */
  browserPath?: string | null;
}

export async function createOrchestrator(
  config: AppConfig,
  deps: OrchestratorDeps = {}
): Promise<ScrapeOrchestrator> {
  let browserPath: string | null = null;
  if (config.INCLUDE_BROWSER_SCRAPERS) {
    browserPath = deps.browserPath !== undefined ? deps.browserPath : await probeBrowser(config.CHROME_PATH);
  }

  const scrapers = createScrapers(config, { browserPath, http: deps.http });
  const scorer = new ConfidenceScorer({
    rejectionThreshold: config.REJECTION_THRESHOLD,
    acceptanceThreshold: config.CONFIDENCE_THRESHOLD,
  });
  return new ScrapeOrchestrator(scrapers, scorer);
}
