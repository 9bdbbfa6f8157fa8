import type { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { BaseScraper, type ScraperOptions } from './base.js';
import {
  cleanText,
  createHttpClient,
  isBlockedPage,
  parsePrice,
  stripQuery,
  type HttpClientOptions,
} from './http.js';
import { responseStatus } from '../errors.js';
import { buildListing, type Listing } from './types.js';

const BASE_URL = 'https://www.ebay.com';
const ART_CATEGORY_ID = 550;
const MAX_DESCRIPTION_LENGTH = 2000;

export interface EbayScraperOptions extends ScraperOptions {
  http?: HttpClientOptions;
}

export function buildSearchUrl(query: string, categoryId = ART_CATEGORY_ID): string {
  const params = new URLSearchParams({
    _nkw: query,
    _sacat: String(categoryId),
    _sop: '10', // newly listed first
    LH_TitleDesc: '1', // match descriptions too
    _ipg: '60',
  });
  return `${BASE_URL}/sch/i.html?${params.toString()}`;
}

function itemIdFromUrl(url: string): string | null {
  return url.match(/\/itm\/(?:[^/?#]+\/)?(\d+)/)?.[1] ?? null;
}

function upsizeImage(src: string, size: number): string {
  return src.replace(/s-l\d+/, `s-l${size}`);
}

/**
 * Parses the `.s-item` cards of a search results page. The "Shop on eBay"
 * placeholder and cards without a link are skipped; a card that throws is
 * reported through onItemError and skipped.
 */
export function parseSearchPage(html: string, onItemError?: (error: unknown) => void): Listing[] {
  const $ = cheerio.load(html);
  const listings: Listing[] = [];

  $('.s-item').each((_, el) => {
    const $item = $(el);
    const pick = (selector: string) => cleanText($item.find(selector).first().text());

    try {
      const title = pick('.s-item__title');
      if (!title || title.toLowerCase() === 'shop on ebay') return;

      const href = $item.find('.s-item__link').first().attr('href');
      if (!href) return;
      const url = stripQuery(href);

      let location = pick('.s-item__location');
      if (location.toLowerCase().startsWith('from ')) {
        location = location.slice(5);
      }

      const imageUrls: string[] = [];
      const $img = $item.find('.s-item__image-img').first();
      const src = $img.attr('src') || $img.attr('data-src');
      if (src) {
        imageUrls.push(src.includes('s-l') ? upsizeImage(src, 500) : src);
      }

      const listing = buildListing({
        title,
        description: pick('.s-item__subtitle'),
        platform: 'ebay',
        source_url: url,
        source_id: itemIdFromUrl(url),
        price: parsePrice(pick('.s-item__price')),
        currency: 'USD',
        location: location || null,
        image_urls: imageUrls,
      });
      if (listing) listings.push(listing);
    } catch (error) {
      onItemError?.(error);
    }
  });

  return listings;
}

export function parseListingPage(html: string, url: string): Listing | null {
  const $ = cheerio.load(html);

  const title =
    cleanText($('h1.x-item-title__mainTitle').first().text()) ||
    cleanText($('[data-testid="x-item-title"]').first().text());
  if (!title) return null;

  const priceText =
    $('[data-testid="x-price-primary"]').first().text() || $('.x-price-primary').first().text();

  const $description = $('[data-testid="item-description"]').first().length
    ? $('[data-testid="item-description"]').first()
    : $('#viTabs_0_is').first();
  const description = cleanText($description.text()).slice(0, MAX_DESCRIPTION_LENGTH);

  let location: string | null = null;
  $('.ux-labels-values__labels').each((_, el) => {
    if (location) return;
    const $label = $(el);
    if ($label.text().toLowerCase().includes('location')) {
      const value = cleanText($label.nextAll('.ux-labels-values__values').first().text());
      if (value) location = value;
    }
  });

  const sellerName =
    cleanText($('[data-testid="str-title"]').first().text()) ||
    cleanText($('.x-sellercard-atf__info__about-seller a').first().text());

  const imageUrls: string[] = [];
  $('[data-testid="ux-image-carousel"] img').each((_, el) => {
    const src = $(el).attr('src') || $(el).attr('data-src');
    if (src && src.includes('s-l')) {
      const large = upsizeImage(src, 1600);
      if (!imageUrls.includes(large)) imageUrls.push(large);
    }
  });
  if (imageUrls.length === 0) {
    $('.ux-image-carousel-item img').each((_, el) => {
      const src = $(el).attr('src') || $(el).attr('data-zoom-src');
      if (src && !imageUrls.includes(src)) imageUrls.push(src);
    });
  }

  return buildListing({
    title,
    description,
    platform: 'ebay',
    source_url: stripQuery(url),
    source_id: itemIdFromUrl(url),
    price: parsePrice(priceText),
    currency: 'USD',
    seller_name: sellerName || null,
    location,
    image_urls: imageUrls,
  });
}

/**
 * eBay search-page scraper, used when no Browse API credentials are
 * configured. eBay serves bot challenges to scrapers fairly often.
 */
export class EbayScraper extends BaseScraper {
  readonly platform = 'ebay' as const;

  private readonly httpOptions: HttpClientOptions;
  private client: AxiosInstance | null = null;

  constructor(options: EbayScraperOptions) {
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
    return [
      `"Dan Brown" trompe l'oeil`,
      '"Dan Brown" artist painting',
      '"Dan Brown" Connecticut artist',
      '"Dan Brown" "Susan Powell"',
      `"Daniel Brown" trompe l'oeil`,
      '"Dan Brown" original painting -novel -book -author',
      '"Dan Brown" vintage postcards painting',
      '"Dan Brown" rack painting',
      '"Dan Brown" realist painting',
    ];
  }

  async search(query: string): Promise<Listing[]> {
    const url = buildSearchUrl(query);
    this.log.info('Searching eBay', { query, url });

    let html: string;
    try {
      const response = await this.getClient().get<string>(url, { responseType: 'text' });
      html = response.data;
    } catch (error) {
      this.queryFailed(query, error, url);
      return [];
    }

    if (isBlockedPage(html)) {
      this.queryBlocked(query, url);
      return [];
    }

    const listings = parseSearchPage(html, (error) => this.itemFailed(error, { query }));
    this.log.info('Search complete', { query, results: listings.length });
    return listings;
  }

  async getListingDetails(url: string): Promise<Listing | null> {
    this.log.info('Fetching listing details', { url });

    try {
      const { data: html } = await this.getClient().get<string>(url, { responseType: 'text' });
      if (isBlockedPage(html)) {
        this.log.warn('Blocked by bot challenge on listing page', { url, blocked: true });
        return null;
      }
      return parseListingPage(html, url);
    } catch (error) {
      if (responseStatus(error) === 404) {
        this.log.info('Listing no longer available', { url });
      } else {
        this.log.error('Error fetching listing', { url, status: responseStatus(error) });
      }
      return null;
    }
  }
}
