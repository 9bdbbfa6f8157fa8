import * as cheerio from 'cheerio';
import { BrowserScraper } from './browser.js';
import { absoluteUrl, cleanText, parsePrice, toIsoDate } from './http.js';
import { buildListing, type Listing } from './types.js';

const BASE_URL = 'https://www.liveauctioneers.com';
const MAX_CARDS = 20;
const MAX_LINKS = 30;
const MAX_TITLE_LENGTH = 200;
const MAX_DESCRIPTION_LENGTH = 1000;
const MAX_DETAIL_IMAGES = 5;

const LOT_CARD_SELECTORS = [
  "[data-testid='lot-card']",
  '.lot-card',
  '.search-result-item',
  'article.lot',
  '.item-card',
];

export function buildSearchUrl(query: string): string {
  return `${BASE_URL}/search/?${new URLSearchParams({ keyword: query }).toString()}`;
}

/** e.g. /item/12345_dan-brown-painting */
export function extractItemId(url: string): string | null {
  return url.match(/\/item\/(\d+)/)?.[1] ?? null;
}

function isPlaceholderImage(src: string): boolean {
  const lower = src.toLowerCase();
  return lower.includes('placeholder') || lower.includes('blank');
}

export function parseSearchResults(html: string, onItemError?: (error: unknown) => void): Listing[] {
  const $ = cheerio.load(html);
  const listings: Listing[] = [];

  const cardSelector = LOT_CARD_SELECTORS.find((selector) => $(selector).length > 0);

  if (!cardSelector) {
    const seen = new Set<string>();
    $("a[href*='/item/']")
      .slice(0, MAX_LINKS)
      .each((_, el) => {
        const $link = $(el);
        const href = $link.attr('href');
        if (!href || seen.has(href)) return;
        seen.add(href);

        const title = cleanText($link.text()).slice(0, MAX_TITLE_LENGTH);
        const url = absoluteUrl(href, BASE_URL);
        if (!title || !url) return;

        const listing = buildListing({
          title,
          platform: 'liveauctioneers',
          source_url: url,
          source_id: extractItemId(href),
        });
        if (listing) listings.push(listing);
      });
    return listings;
  }

  $(cardSelector)
    .slice(0, MAX_CARDS)
    .each((_, el) => {
      const $card = $(el);
      const pick = (...selectors: string[]): string => {
        for (const selector of selectors) {
          const text = cleanText($card.find(selector).first().text());
          if (text) return text;
        }
        return '';
      };

      try {
        const $link = $card.find("a[href*='/item/']").first().length
          ? $card.find("a[href*='/item/']").first()
          : $card.find('a[href]').first();
        const url = absoluteUrl($link.attr('href'), BASE_URL);
        if (!url) return;

        const title =
          pick('h2', 'h3', '.title', '.lot-title', "[data-testid='title']") ||
          cleanText($card.text().split('\n').find((line) => line.trim()));

        const $img = $card.find('img').first();
        const src = absoluteUrl($img.attr('src') || $img.attr('data-src'), BASE_URL);

        const listing = buildListing({
          title: title.slice(0, MAX_TITLE_LENGTH),
          platform: 'liveauctioneers',
          source_url: url,
          source_id: extractItemId(url),
          price: parsePrice(pick('.price', '.estimate', '.current-bid', "[data-testid='price']")),
          currency: 'USD',
          seller_name: pick('.house-name', '.auctioneer', '.seller') || null,
          location: pick('.location', '.auction-location') || null,
          image_urls: src && !isPlaceholderImage(src) ? [src] : [],
        });
        if (listing) listings.push(listing);
      } catch (error) {
        onItemError?.(error);
      }
    });

  return listings;
}

export function parseItemPage(html: string, url: string): Listing | null {
  const $ = cheerio.load(html);
  const pick = (...selectors: string[]): string => {
    for (const selector of selectors) {
      const text = cleanText($(selector).first().text());
      if (text) return text;
    }
    return '';
  };

  const images: string[] = [];
  $(".gallery img, .lot-image img, [data-testid='lot-image'] img").each((_, el) => {
    const $img = $(el);
    const src = absoluteUrl($img.attr('src') || $img.attr('data-src'), BASE_URL);
    if (src && !images.includes(src)) images.push(src);
  });

  return buildListing({
    title: pick('h1'),
    description: pick('.lot-description', '.description', '#description').slice(0, MAX_DESCRIPTION_LENGTH),
    platform: 'liveauctioneers',
    source_url: url,
    source_id: extractItemId(url),
    price: parsePrice(pick('.sold-price', '.current-bid', '.estimate', '.price')),
    currency: 'USD',
    seller_name: pick('.house-name', '.auctioneer-name') || null,
    location: pick('.location', '.auction-location') || null,
    image_urls: images.slice(0, MAX_DETAIL_IMAGES),
    date_listing: toIsoDate(pick('.auction-date', '.sale-date')),
  });
}

export class LiveAuctioneersScraper extends BrowserScraper {
  readonly platform = 'liveauctioneers' as const;

  buildSearchQueries(): string[] {
    return [
      "dan brown trompe l'oeil",
      'dan brown artist oil painting',
      'dan brown connecticut painter',
      'dan brown currency painting',
      'dan brown still life rack',
    ];
  }

  async search(query: string): Promise<Listing[]> {
    return this.searchPage(query, buildSearchUrl(query), (html) =>
      parseSearchResults(html, (error) => this.itemFailed(error, { query }))
    );
  }

  async getListingDetails(url: string): Promise<Listing | null> {
    this.log.info('Fetching lot details', { url });
    const html = await this.detailPage(url);
    return html === null ? null : parseItemPage(html, url);
  }
}
