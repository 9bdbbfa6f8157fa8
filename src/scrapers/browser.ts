import { access, constants } from 'node:fs/promises';
import puppeteer, { type Browser } from 'puppeteer-core';
import { BaseScraper, type ScraperOptions } from './base.js';
import { isBlockedPage, USER_AGENT } from './http.js';
import { describeError, MissingDependencyError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('browser');

const NAVIGATION_TIMEOUT_MS = 60_000;

const CANDIDATE_PATHS = [
  '/usr/bin/chromium',
  '/usr/bin/chromium-browser',
  '/usr/bin/google-chrome',
  '/usr/bin/google-chrome-stable',
];

/**
 * Finds a Chrome/Chromium executable, trying the configured path first.
 * Returns null when none is present, in which case the browser-backed
 * scrapers are left out of the run.
 */
export async function probeBrowser(configuredPath = ''): Promise<string | null> {
  const candidates = configuredPath ? [configuredPath, ...CANDIDATE_PATHS] : CANDIDATE_PATHS;
  for (const path of candidates) {
    try {
      await access(path, constants.X_OK);
      log.debug('Found Chrome/Chromium', { path });
      return path;
    } catch {
      log.debug('No browser at path', { path });
    }
  }
  return null;
}

/** Navigates to a URL and returns the rendered HTML. */
export type PageLoader = (url: string) => Promise<string>;

export interface BrowserScraperOptions extends ScraperOptions {
  executablePath: string | null;
  /** Replaces the headless browser; tests pass canned HTML through here. */
  loadPage?: PageLoader;
}

/**
 * Base for the auction sites that only render listings client-side. One
 * headless browser is launched lazily per scraper and torn down by close().
 */
export abstract class BrowserScraper extends BaseScraper {
  private readonly executablePath: string | null;
  private readonly loadPageOverride: PageLoader | null;
  private browser: Browser | null = null;

  constructor(options: BrowserScraperOptions) {
    super(options);
    if (!options.loadPage && !options.executablePath) {
      throw new MissingDependencyError(
        'chromium',
        'No Chrome/Chromium executable found; set CHROME_PATH to enable browser scrapers'
      );
    }
    this.executablePath = options.executablePath;
    this.loadPageOverride = options.loadPage ?? null;
  }

  private async getBrowser(): Promise<Browser> {
    if (this.browser) return this.browser;
    if (!this.executablePath) {
      throw new MissingDependencyError('chromium', 'No Chrome/Chromium executable configured');
    }

    this.log.info('Launching browser', { executablePath: this.executablePath });
    this.browser = await puppeteer.launch({
      executablePath: this.executablePath,
      headless: true,
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu',
        '--disable-blink-features=AutomationControlled',
        '--window-size=1920,1080',
      ],
      defaultViewport: { width: 1920, height: 1080 },
    });
    return this.browser;
  }

  /** Fetches a page's rendered HTML. Navigation errors propagate. */
  protected async loadPage(url: string): Promise<string> {
    if (this.loadPageOverride) {
      return this.loadPageOverride(url);
    }

    const browser = await this.getBrowser();
    const page = await browser.newPage();
    try {
      await page.setUserAgent(USER_AGENT);
      await page.goto(url, { waitUntil: 'networkidle2', timeout: NAVIGATION_TIMEOUT_MS });
      return await page.content();
    } finally {
      await page.close();
    }
  }

  /**
   * Runs one search page through the parser, turning navigation failures and
   * bot challenges into an empty result.
   */
  protected async searchPage<T>(query: string, url: string, parse: (html: string) => T[]): Promise<T[]> {
    this.log.info('Searching', { query, url });

    let html: string;
    try {
      html = await this.loadPage(url);
    } catch (error) {
      this.queryFailed(query, error, url);
      return [];
    }

    if (isBlockedPage(html)) {
      this.queryBlocked(query, url);
      return [];
    }

    const results = parse(html);
    this.log.info('Search complete', { query, results: results.length });
    return results;
  }

  /** Loads a detail page; null when it fails or is a bot challenge. */
  protected async detailPage(url: string): Promise<string | null> {
    try {
      const html = await this.loadPage(url);
      if (isBlockedPage(html)) {
        this.log.warn('Blocked by bot challenge on detail page', { url, blocked: true });
        return null;
      }
      return html;
    } catch (error) {
      this.log.error('Failed to load detail page', { url, error: describeError(error) });
      return null;
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser) {
      await browser.close();
      this.log.info('Browser closed');
    }
  }
}
