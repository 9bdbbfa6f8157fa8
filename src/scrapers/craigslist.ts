import type { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { BaseScraper, type ScraperOptions } from './base.js';
import {
  cleanText,
  createHttpClient,
  isBlockedPage,
  parsePrice,
  toIsoDate,
  type HttpClientOptions,
} from './http.js';
import { responseStatus } from '../errors.js';
import { buildListing, type Listing } from './types.js';

const SEARCH_API_URL = 'https://sapi.craigslist.org/web/v8/postings/search/full';
// "arts & crafts" for sale; postings live under /art/d/
const SEARCH_PATH = 'ara';
const POSTING_CATEGORY = 'art';
const MAX_ITEMS = 100;
const MAX_DETAIL_IMAGES = 5;

export interface CraigslistArea {
  city: string;
  lat: number;
  lon: number;
  distance: number;
}

export interface CraigslistScraperOptions extends ScraperOptions {
  area: CraigslistArea;
  http?: HttpClientOptions;
}

interface SearchDecode {
  minPostedDate?: number;
  minPostingId?: number;
  locations?: unknown[][];
  locationDescriptions?: string[];
  neighborhoods?: string[];
}

export interface SearchApiResponse {
  data?: {
    decode?: SearchDecode;
    items?: unknown;
  };
}

const isSearchResponse = (value: unknown): value is SearchApiResponse =>
  typeof value === 'object' && value !== null;

const num = (value: unknown): number => (typeof value === 'number' ? value : 0);
const str = (value: unknown): string | null => (typeof value === 'string' && value ? value : null);

/**
 * Decodes the compact search API payload. Each item is a positional array:
 * [postingIdOffset, postedOffset, ?, price, "area:neighborhood~...", ...tagged fields, title]
 * where tagged fields are arrays led by a type code (4 image, 6 slug, 10 price text).
 * Items without a slug have no reachable posting page and are dropped. An item that
 * fails to decode is reported through onItemError and skipped.
 */
export function decodeSearchResponse(
  payload: SearchApiResponse,
  fallbackCity: string,
  onItemError?: (error: unknown) => void
): Listing[] {
  const decode = payload.data?.decode ?? {};
  const rawItems = payload.data?.items;
  const items: unknown[] = Array.isArray(rawItems) ? rawItems : [];
  const minPostedDate = decode.minPostedDate ?? 0;
  const minPostingId = decode.minPostingId ?? 0;
  const locations = decode.locations ?? [];
  const locationDescriptions = decode.locationDescriptions ?? [];
  const neighborhoods = decode.neighborhoods ?? [];

  const listings: Listing[] = [];

  for (const item of items.slice(0, MAX_ITEMS)) {
    if (!Array.isArray(item)) {
      onItemError?.(new Error('Search item is not an array'));
      continue;
    }
    try {
      const postingId = minPostingId + num(item[0]);
      const postedTs = minPostedDate + num(item[1]);
      const title = str(item[item.length - 1]) ?? '';
      const priceNum = num(item[3]);

      const [areaPart = ''] = (str(item[4]) ?? '').split('~');
      const [areaIdxText = '0', neighIdxText = '0'] = areaPart.split(':');
      const areaIdx = parseInt(areaIdxText, 10) || 0;
      const neighIdx = parseInt(neighIdxText, 10) || 0;
      const area = locations[areaIdx];
      const areaName = str(area?.[1]) ?? fallbackCity;
      const subArea = str(area?.[2]);
      const neighborhood = neighIdx > 0 ? (neighborhoods[neighIdx] ?? null) : null;

      let slug: string | null = null;
      let imageUrl: string | null = null;
      let priceText: string | null = null;

      for (const field of item) {
        if (!Array.isArray(field) || field.length < 2) continue;
        const value: unknown = field[1];
        if (field[0] === 6) {
          slug = str(value);
        } else if (field[0] === 4 && typeof value === 'string') {
          const imageId = value.startsWith('3:') ? value.slice(2) : value;
          imageUrl = `https://images.craigslist.org/${imageId}_600x450.jpg`;
        } else if (field[0] === 10) {
          priceText = str(value);
        }
      }

      if (!slug) continue;

      const urlBase = subArea
        ? `https://${areaName}.craigslist.org/${subArea}/${POSTING_CATEGORY}/d`
        : `https://${areaName}.craigslist.org/${POSTING_CATEGORY}/d`;

      const listing = buildListing({
        title,
        platform: 'craigslist',
        source_url: `${urlBase}/${slug}/${postingId}.html`,
        source_id: String(postingId),
        price: priceNum > 0 ? priceNum : parsePrice(priceText),
        currency: 'USD',
        location: neighborhood || locationDescriptions[areaIdx] || areaName,
        image_urls: imageUrl ? [imageUrl] : [],
        date_listing: postedTs > 0 ? new Date(postedTs * 1000).toISOString() : null,
        raw_data: { posting_id: postingId, posted_ts: postedTs },
      });
      if (listing) listings.push(listing);
    } catch (error) {
      onItemError?.(error);
    }
  }

  return listings;
}

export function parsePostingPage(html: string, url: string): Listing | null {
  const $ = cheerio.load(html);

  const title = cleanText($('#titletextonly').first().text()) || cleanText($('title').first().text());

  const $body = $('#postingbody').first().clone();
  $body.find('.print-information, .print-qrcode-container').remove();

  const images: string[] = [];
  $('#thumbs a, .gallery img, .swipe img').each((_, el) => {
    const $el = $(el);
    const src = $el.attr('href') || $el.attr('src');
    if (src && src.startsWith('http') && !images.includes(src)) images.push(src);
  });

  const postingId = url.match(/\/(\d+)\.html/)?.[1] ?? null;

  return buildListing({
    title,
    description: cleanText($body.text()),
    platform: 'craigslist',
    source_url: url,
    source_id: postingId,
    price: parsePrice($('.price').first().text()),
    currency: 'USD',
    location: cleanText($('.postingtitletext small').first().text()).replace(/^\((.*)\)$/, '$1') || null,
    image_urls: images.slice(0, MAX_DETAIL_IMAGES),
    date_listing: toIsoDate($('time[datetime]').first().attr('datetime')),
  });
}

/**
 * Craigslist arts & crafts listings around one area, via the JSON search API
 * the site's own front end uses. Local estate sales turn up here.
 */
export class CraigslistScraper extends BaseScraper {
  readonly platform = 'craigslist' as const;

  private readonly area: CraigslistArea;
  private readonly httpOptions: HttpClientOptions;
  private client: AxiosInstance | null = null;

  constructor(options: CraigslistScraperOptions) {
    super(options);
    this.area = options.area;
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
    return ['dan brown painting', "dan brown trompe l'oeil", 'dan brown artist'];
  }

  async search(query: string): Promise<Listing[]> {
    const { city, lat, lon, distance } = this.area;
    this.log.info('Searching Craigslist', { query, city });

    let body: unknown;
    try {
      const response = await this.getClient().get<unknown>(SEARCH_API_URL, {
        params: {
          batch: '11-0-360-0-0',
          cc: 'US',
          lang: 'en',
          searchPath: SEARCH_PATH,
          query,
          lat: String(lat),
          lon: String(lon),
          search_distance: String(distance),
        },
        headers: { Accept: 'application/json' },
      });
      body = response.data;
    } catch (error) {
      this.queryFailed(query, error, SEARCH_API_URL);
      return [];
    }

    if (typeof body === 'string') {
      if (isBlockedPage(body)) {
        this.queryBlocked(query, SEARCH_API_URL);
      } else {
        this.queryFailed(query, new Error('Search returned a non-JSON body'), SEARCH_API_URL);
      }
      return [];
    }
    if (!isSearchResponse(body)) {
      this.queryFailed(query, new Error('Search returned no JSON object'), SEARCH_API_URL);
      return [];
    }

    const listings = decodeSearchResponse(body, city, (error) => this.itemFailed(error, { query }));
    this.log.info('Search complete', { query, results: listings.length });
    return listings;
  }

  async getListingDetails(url: string): Promise<Listing | null> {
    try {
      const { data: html } = await this.getClient().get<string>(url, { responseType: 'text' });
      if (isBlockedPage(html)) {
        this.log.warn('Blocked by bot challenge on posting page', { url, blocked: true });
        return null;
      }
      return parsePostingPage(html, url);
    } catch (error) {
      if (responseStatus(error) === 404) {
        this.log.info('Posting expired or removed', { url });
      } else {
        this.log.error('Error fetching posting', { url, status: responseStatus(error) });
      }
      return null;
    }
  }
}
