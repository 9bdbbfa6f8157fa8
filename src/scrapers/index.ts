import { hasEbayApiCredentials, type AppConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { ArtnetScraper } from './artnet.js';
import { CraigslistScraper } from './craigslist.js';
import { EbayScraper } from './ebay.js';
import { EbayApiScraper } from './ebay-api.js';
import type { HttpClientOptions } from './http.js';
import { InvaluableScraper } from './invaluable.js';
import { LiveAuctioneersScraper } from './liveauctioneers.js';
import type { PlatformScraper } from './types.js';

export { probeBrowser } from './browser.js';
export type { Listing, Platform, PlatformScraper, SearchPassSummary } from './types.js';
export { PLATFORMS } from './types.js';

const log = createLogger('scrapers');

export interface ScraperDeps {
  /** Chromium found by probeBrowser(), or null. */
  browserPath: string | null;
  http?: HttpClientOptions;
}

/**
 * Picks the scraper set for a run, in run order. eBay goes through the
 * Browse API when credentials exist and falls back to HTML scraping;
 * the browser-backed auction sites are opt-in and need a Chromium.
 */
export function createScrapers(config: AppConfig, deps: ScraperDeps): PlatformScraper[] {
  const delays = config.REQUEST_DELAYS_MS;
  const http = deps.http;
  const scrapers: PlatformScraper[] = [];

  if (hasEbayApiCredentials(config)) {
    log.info('Using eBay Browse API (credentials configured)');
    scrapers.push(
      new EbayApiScraper({
        appId: config.EBAY_APP_ID,
        certId: config.EBAY_CERT_ID,
        requestDelayMs: delays.ebayApi,
        http,
      })
    );
  } else {
    log.warn('eBay API credentials not configured, using web scraper (may be blocked)');
    scrapers.push(new EbayScraper({ requestDelayMs: delays.ebay, http }));
  }

  scrapers.push(new ArtnetScraper({ requestDelayMs: delays.artnet, http }));

  if (config.CRAIGSLIST_ENABLED) {
    scrapers.push(
      new CraigslistScraper({
        requestDelayMs: delays.craigslist,
        area: {
          city: config.CRAIGSLIST_CITY,
          lat: config.CRAIGSLIST_LAT,
          lon: config.CRAIGSLIST_LON,
          distance: config.CRAIGSLIST_DISTANCE,
        },
        http,
      })
    );
  }

  if (config.INCLUDE_BROWSER_SCRAPERS) {
    if (deps.browserPath) {
      log.info('Adding browser scrapers', { executablePath: deps.browserPath });
      scrapers.push(
        new InvaluableScraper({ requestDelayMs: delays.invaluable, executablePath: deps.browserPath }),
        new LiveAuctioneersScraper({
          requestDelayMs: delays.liveauctioneers,
          executablePath: deps.browserPath,
        })
      );
    } else {
      log.warn('Browser scrapers requested but no Chrome/Chromium found; set CHROME_PATH', {
        skipped: ['invaluable', 'liveauctioneers'],
      });
    }
  }

  log.info('Scrapers selected', { platforms: scrapers.map((s) => s.platform) });
  return scrapers;
}
