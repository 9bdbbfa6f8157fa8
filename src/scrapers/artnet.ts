import type { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { BaseScraper, type ScraperOptions } from './base.js';
import {
  absoluteUrl,
  cleanText,
  createHttpClient,
  isBlockedPage,
  parsePrice,
  sleep,
  toIsoDate,
  type HttpClientOptions,
} from './http.js';
import { responseStatus } from '../errors.js';
import { buildListing, type Listing } from './types.js';

const BASE_URL = 'https://www.artnet.com';
const MAX_ARTIST_PAGE_WORKS = 20;
const MAX_DETAIL_IMAGES = 5;

// Painters often get a numbered slug when the plain one is taken
const ARTIST_SLUGS = ['dan-brown-2', 'dan-brown'];

const AUTHOR_MARKERS = ['novelist', 'da vinci', 'author'];

export interface ArtnetScraperOptions extends ScraperOptions {
  http?: HttpClientOptions;
}

function lastSegment(url: string): string | null {
  const parts = url.replace(/\/+$/, '').split('/');
  return parts[parts.length - 1] || null;
}

/** True when the artist header describes the novelist rather than the painter. */
export function isAuthorProfile(html: string): boolean {
  const $ = cheerio.load(html);
  const header = $('div.artist-header').first().text().toLowerCase();
  return AUTHOR_MARKERS.some((marker) => header.includes(marker));
}

export function parseAuctionResults(
  html: string,
  artistSlug: string,
  onItemError?: (error: unknown) => void
): Listing[] {
  const $ = cheerio.load(html);
  const listings: Listing[] = [];

  let $results = $('div.auction-result');
  if ($results.length === 0) $results = $('div.lot-item');
  if ($results.length === 0) $results = $('article.artwork');

  $results.each((_, el) => {
    const $el = $(el);
    try {
      const $title = $el.find('h2, a.title, span.title').first();
      const title = cleanText($title.text());
      if (!title) return;

      const href = $el.find('a[href]').first().attr('href');
      const url = absoluteUrl(href, BASE_URL);
      // a result without its own page has no natural key
      if (!url) return;

      const priceText = $el.find('span.price, div.price').first().text() || $el.text();
      const priceMatch = priceText.match(/\$[\d,]+/);

      const $img = $el.find('img').first();
      const imageUrl = absoluteUrl($img.attr('src'), BASE_URL);

      const dateText = cleanText($el.find('span.date').first().text());

      const listing = buildListing({
        title,
        description: cleanText($el.find('p, div.details').first().text()),
        platform: 'artnet',
        source_url: url,
        source_id: lastSegment(url),
        price: priceMatch ? parsePrice(priceMatch[0]) : null,
        currency: 'USD',
        image_urls: imageUrl ? [imageUrl] : [],
        date_listing: toIsoDate(dateText),
        raw_data: { artist_slug: artistSlug },
      });
      if (listing) listings.push(listing);
    } catch (error) {
      onItemError?.(error);
    }
  });

  return listings;
}

export function parseArtistPage(
  html: string,
  artistSlug: string,
  onItemError?: (error: unknown) => void
): Listing[] {
  const $ = cheerio.load(html);
  const listings: Listing[] = [];

  let $works = $('div.artwork-item');
  if ($works.length === 0) $works = $('a.details-link');

  $works.slice(0, MAX_ARTIST_PAGE_WORKS).each((_, el) => {
    const $el = $(el);
    try {
      const isLink = $el.is('a');
      const href = isLink ? $el.attr('href') : $el.find('a[href]').first().attr('href');
      const url = absoluteUrl(href, BASE_URL);
      if (!url) return;
      if (!url.includes('/artists/') && !url.includes('/artwork/')) return;

      const title = isLink
        ? cleanText($el.text())
        : cleanText($el.find('h3, span.title').first().text()) || 'Unknown';

      const imageUrl = absoluteUrl($el.find('img').first().attr('src'), BASE_URL);

      const listing = buildListing({
        title,
        platform: 'artnet',
        source_url: url,
        source_id: lastSegment(url),
        image_urls: imageUrl ? [imageUrl] : [],
        raw_data: { artist_slug: artistSlug },
      });
      if (listing) listings.push(listing);
    } catch (error) {
      onItemError?.(error);
    }
  });

  return listings;
}

export function parseArtworkPage(html: string, url: string): Listing | null {
  const $ = cheerio.load(html);

  const title =
    cleanText($('h1').first().text()) || $('meta[property="og:title"]').attr('content') || 'Unknown';

  const description =
    cleanText($('div.description').first().text()) ||
    $('meta[property="og:description"]').attr('content') ||
    '';

  const priceMatch = $('span.price, div.price').first().text().match(/\$[\d,]+/);

  const images: string[] = [];
  const ogImage = $('meta[property="og:image"]').attr('content');
  if (ogImage) images.push(ogImage);
  $('img').each((_, el) => {
    const $img = $(el);
    if (!/artwork|gallery|main/.test($img.attr('class') ?? '')) return;
    const src = absoluteUrl($img.attr('src') || $img.attr('data-src'), BASE_URL);
    if (src && !images.includes(src)) images.push(src);
  });

  return buildListing({
    title,
    description,
    platform: 'artnet',
    source_url: url,
    source_id: lastSegment(url),
    price: priceMatch ? parsePrice(priceMatch[0]) : null,
    currency: 'USD',
    image_urls: images.slice(0, MAX_DETAIL_IMAGES),
  });
}

/**
 * Artnet has no search API; each "query" is an artist slug whose auction
 * results page and artist page are scraped in turn.
 */
export class ArtnetScraper extends BaseScraper {
  readonly platform = 'artnet' as const;

  private readonly httpOptions: HttpClientOptions;
  private client: AxiosInstance | null = null;

  constructor(options: ArtnetScraperOptions) {
    super(options);
    this.httpOptions = options.http ?? {};
  }

  private getClient(): AxiosInstance {
    if (!this.client) {
      this.client = createHttpClient(this.httpOptions);
    }
    return this.client;
  }

  async close(): Promise<void> {
    this.client = null;
  }

  buildSearchQueries(): string[] {
    return [...ARTIST_SLUGS];
  }

  async search(slug: string): Promise<Listing[]> {
    const listings: Listing[] = [];
    const onItemError = (error: unknown) => this.itemFailed(error, { slug });

    const auctionUrl = `${BASE_URL}/artists/${slug}/auction-results`;
    this.log.info('Fetching Artnet auction results', { url: auctionUrl });

    try {
      const { data: html } = await this.getClient().get<string>(auctionUrl, { responseType: 'text' });
      if (isBlockedPage(html)) {
        this.queryBlocked(slug, auctionUrl);
        return [];
      }
      if (isAuthorProfile(html)) {
        this.log.info('Skipping slug, appears to be the novelist', { slug });
        return [];
      }
      listings.push(...parseAuctionResults(html, slug, onItemError));
      this.log.info('Found auction results', { slug, count: listings.length });
    } catch (error) {
      if (responseStatus(error) === 404) {
        this.log.warn('Artist not found on Artnet', { slug });
      } else {
        this.queryFailed(slug, error, auctionUrl);
      }
      return listings;
    }

    await sleep(this.requestDelayMs);

    const artistUrl = `${BASE_URL}/artists/${slug}/`;
    try {
      const { data: html } = await this.getClient().get<string>(artistUrl, { responseType: 'text' });
      if (isBlockedPage(html)) {
        this.log.warn('Blocked by bot challenge on artist page', { slug, url: artistUrl, blocked: true });
        return listings;
      }
      const seen = new Set(listings.map((l) => l.source_url));
      for (const listing of parseArtistPage(html, slug, onItemError)) {
        if (!seen.has(listing.source_url)) {
          seen.add(listing.source_url);
          listings.push(listing);
        }
      }
    } catch (error) {
      // auction results already collected stay usable
      this.log.warn('Artist page request failed', { slug, url: artistUrl, status: responseStatus(error) });
    }

    return listings;
  }

  async getListingDetails(url: string): Promise<Listing | null> {
    try {
      const { data: html } = await this.getClient().get<string>(url, { responseType: 'text' });
      if (isBlockedPage(html)) {
        this.log.warn('Blocked by bot challenge on artwork page', { url, blocked: true });
        return null;
      }
      return parseArtworkPage(html, url);
    } catch (error) {
      if (responseStatus(error) !== 404) {
        this.log.error('Failed to get listing details', { url, status: responseStatus(error) });
      }
      return null;
    }
  }
}
