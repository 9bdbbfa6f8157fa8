import type { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { BaseScraper, type ScraperOptions } from './base.js';
import { cleanText, createHttpClient, toIsoDate, type HttpClientOptions } from './http.js';
import { responseStatus } from '../errors.js';
import { buildListing, type Listing } from './types.js';

const SANDBOX_BASE = 'https://api.sandbox.ebay.com';
const PRODUCTION_BASE = 'https://api.ebay.com';

// eBay category 550 is "Art"
const ART_CATEGORY_ID = '550';
const MAX_DESCRIPTION_LENGTH = 2000;
const MAX_ADDITIONAL_IMAGES = 5;

export interface EbayApiScraperOptions extends ScraperOptions {
  appId: string;
  certId: string;
  http?: HttpClientOptions;
}

interface PriceObject {
  value?: string;
  currency?: string;
}

interface ImageObject {
  imageUrl?: string;
}

interface ItemLocation {
  city?: string;
  stateOrProvince?: string;
  country?: string;
}

export interface EbayItem {
  itemId?: string;
  legacyItemId?: string;
  title?: string;
  itemWebUrl?: string;
  price?: PriceObject;
  image?: ImageObject;
  additionalImages?: ImageObject[];
  itemLocation?: ItemLocation;
  seller?: { username?: string };
  condition?: string;
  shortDescription?: string;
  description?: string;
  itemCreationDate?: string;
  itemEndDate?: string;
}

interface SearchResponse {
  itemSummaries?: unknown;
  total?: number;
}

interface TokenResponse {
  access_token: string;
  expires_in?: number;
}

const isEbayItem = (value: unknown): value is EbayItem => typeof value === 'object' && value !== null;

export function getBaseUrl(appId: string): string {
  const isSandbox = appId.includes('SBX');
  return isSandbox ? SANDBOX_BASE : PRODUCTION_BASE;
}

/**
 * Handles: ebay.com/itm/123456, ebay.com/itm/some-title/123456,
 * with or without a query string.
 */
export function parseEbayItemId(url: string): string | null {
  const match = url.match(/ebay\.[a-z.]+\/itm\/(?:[^/?#]+\/)?(\d+)/i);
  return match?.[1] ?? null;
}

export function parseEbayItem(item: EbayItem): Listing | null {
  const title = item.title ?? '';
  if (!title) return null;

  const itemId = item.itemId ?? '';
  const url = item.itemWebUrl || (itemId ? `https://www.ebay.com/itm/${item.legacyItemId ?? itemId}` : '');

  const priceValue = item.price?.value ? parseFloat(item.price.value) : NaN;

  const location = item.itemLocation
    ? [item.itemLocation.city, item.itemLocation.stateOrProvince, item.itemLocation.country]
        .filter(Boolean)
        .join(', ')
    : '';

  const imageUrls: string[] = [];
  if (item.image?.imageUrl) imageUrls.push(item.image.imageUrl);
  for (const extra of (item.additionalImages ?? []).slice(0, MAX_ADDITIONAL_IMAGES)) {
    if (extra.imageUrl && !imageUrls.includes(extra.imageUrl)) {
      imageUrls.push(extra.imageUrl);
    }
  }

  const shortDescription = item.shortDescription ?? '';
  const description = item.condition
    ? shortDescription
      ? `${item.condition}. ${shortDescription}`
      : item.condition
    : shortDescription;

  return buildListing({
    title,
    description,
    platform: 'ebay',
    source_url: url,
    source_id: itemId || null,
    price: Number.isFinite(priceValue) ? priceValue : null,
    currency: item.price?.currency || 'USD',
    seller_name: item.seller?.username ?? null,
    seller_id: item.seller?.username ?? null,
    location: location || null,
    image_urls: imageUrls,
    date_listing: toIsoDate(item.itemCreationDate),
    date_ending: toIsoDate(item.itemEndDate),
    raw_data: { ...item },
  });
}

/**
 * eBay via the official Browse API. Preferred over HTML scraping whenever
 * developer credentials are configured.
 */
export class EbayApiScraper extends BaseScraper {
  readonly platform = 'ebay' as const;

  private readonly appId: string;
  private readonly certId: string;
  private readonly baseUrl: string;
  private readonly httpOptions: HttpClientOptions;
  private client: AxiosInstance | null = null;
  private cachedToken: string | null = null;
  private tokenExpiresAt = 0;

  constructor(options: EbayApiScraperOptions) {
    super(options);
    this.appId = options.appId;
    this.certId = options.certId;
    this.baseUrl = getBaseUrl(options.appId);
    this.httpOptions = options.http ?? {};
  }

  private getClient(): AxiosInstance {
    if (!this.client) {
      this.client = createHttpClient({ ...this.httpOptions, baseURL: this.baseUrl });
    }
    return this.client;
  }

  async close(): Promise<void> {
    this.client = null;
    this.cachedToken = null;
    this.tokenExpiresAt = 0;
  }

  private async getOAuthToken(): Promise<string> {
    if (this.cachedToken && Date.now() < this.tokenExpiresAt) {
      return this.cachedToken;
    }

    const credentials = Buffer.from(`${this.appId}:${this.certId}`).toString('base64');

    const { data } = await this.getClient().post<TokenResponse>(
      '/identity/v1/oauth2/token',
      'grant_type=client_credentials&scope=https%3A%2F%2Fapi.ebay.com%2Foauth%2Fapi_scope',
      {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: `Basic ${credentials}`,
        },
      }
    );

    const expiresIn = data.expires_in ?? 7200;
    this.cachedToken = data.access_token;
    // Refresh five minutes early
    this.tokenExpiresAt = Date.now() + (expiresIn - 300) * 1000;
    this.log.info('eBay OAuth token obtained', { expires_in: expiresIn });
    return this.cachedToken;
  }

  buildSearchQueries(): string[] {
    return [
      "Dan Brown trompe l'oeil",
      'Dan Brown artist painting',
      'Dan Brown Connecticut artist',
      'Dan Brown Susan Powell',
      "Daniel Brown trompe l'oeil",
      'Dan Brown rack painting',
      'Dan Brown vintage postcards painting',
      'Dan Brown realist painting',
      // novelist exclusions are left to the scorer
      'Dan Brown original oil painting',
    ];
  }

  async search(query: string): Promise<Listing[]> {
    const listings: Listing[] = [];
    const path = '/buy/browse/v1/item_summary/search';

    let data: SearchResponse;
    try {
      const token = await this.getOAuthToken();
      const response = await this.getClient().get<SearchResponse>(path, {
        params: {
          q: query,
          category_ids: ART_CATEGORY_ID,
          limit: 50,
          sort: 'newlyListed',
          fieldgroups: 'MATCHING_ITEMS,EXTENDED',
        },
        headers: {
          Authorization: `Bearer ${token}`,
          'X-EBAY-C-MARKETPLACE-ID': 'EBAY_US',
        },
      });
      data = response.data;
    } catch (error) {
      this.queryFailed(query, error, `${this.baseUrl}${path}`);
      return [];
    }

    const summaries: unknown[] = Array.isArray(data.itemSummaries) ? data.itemSummaries : [];
    for (const item of summaries) {
      if (!isEbayItem(item)) {
        this.itemFailed(new Error('Item summary is not an object'), { query });
        continue;
      }
      try {
        const listing = parseEbayItem(item);
        if (listing) listings.push(listing);
      } catch (error) {
        this.itemFailed(error, { query, itemId: item.itemId });
      }
    }

    this.log.info('API search complete', {
      query,
      results: listings.length,
      total_available: data.total ?? 0,
    });
    return listings;
  }

  async getListingDetails(url: string): Promise<Listing | null> {
    const itemId = parseEbayItemId(url);
    if (!itemId) {
      this.log.warn('Could not extract item ID from URL', { url });
      return null;
    }

    // The Browse API expects the legacy item ID as v1|{id}|0, pipes encoded
    const encodedItemId = `v1%7C${itemId}%7C0`;

    try {
      const token = await this.getOAuthToken();
      const { data: item } = await this.getClient().get<EbayItem>(
        `/buy/browse/v1/item/${encodedItemId}`,
        {
          headers: {
            Authorization: `Bearer ${token}`,
            'X-EBAY-C-MARKETPLACE-ID': 'EBAY_US',
          },
        }
      );

      const listing = parseEbayItem(item);
      // Full descriptions come back as seller HTML
      if (listing && item.description) {
        const text = cleanText(cheerio.load(item.description).text());
        listing.description = text.slice(0, MAX_DESCRIPTION_LENGTH);
      }
      return listing;
    } catch (error) {
      const status = responseStatus(error);
      if (status === 404) {
        this.log.info('Listing no longer available', { url, itemId });
      } else {
        this.log.error('Error fetching item details', { url, itemId, status });
      }
      return null;
    }
  }
}
