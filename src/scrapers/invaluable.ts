import * as cheerio from 'cheerio';
import { BrowserScraper } from './browser.js';
import { absoluteUrl, cleanText, parsePrice } from './http.js';
import { buildListing, type Listing } from './types.js';

const BASE_URL = 'https://www.invaluable.com';
const MAX_RESULTS = 20;
const MAX_TITLE_LENGTH = 200;
const MAX_SNIPPET_LENGTH = 500;
const MAX_DETAIL_IMAGES = 5;

const LOT_CARD_SELECTORS = [
  '.search-result-item',
  '.lot-card',
  "[data-testid='lot-card']",
  '.auction-lot',
  'article.lot',
];

export function buildSearchUrl(query: string): string {
  return `${BASE_URL}/search?${new URLSearchParams({ query }).toString()}`;
}

/** e.g. /auction-lot/dan-brown-american-b-1949-six-fives-c-8a1b2c3d4e */
export function extractLotId(url: string): string | null {
  const match = url.match(/\/auction-lot\/[^/]+-([a-z0-9]+)\/?$/i);
  if (match?.[1]) return match[1];
  const parts = url.replace(/\/+$/, '').split('/');
  return parts[parts.length - 1] || null;
}

/** Pulls "W x H unit" out of free text, e.g. "24 x 36 in". */
export function extractDimensions(text: string): string | null {
  const match = text.match(/(\d+(?:\.\d+)?)\s*[xX×]\s*(\d+(?:\.\d+)?)\s*(inches|in|cm)/);
  return match ? `${match[1]} x ${match[2]} ${match[3]}` : null;
}

export function parseSearchResults(html: string, onItemError?: (error: unknown) => void): Listing[] {
  const $ = cheerio.load(html);
  const listings: Listing[] = [];

  const cardSelector = LOT_CARD_SELECTORS.find((selector) => $(selector).length > 0);

  if (!cardSelector) {
    // Layout changed or cards not rendered; fall back to bare lot links
    $("a[href*='/auction-lot/']")
      .slice(0, MAX_RESULTS)
      .each((_, el) => {
        const $link = $(el);
        const url = absoluteUrl($link.attr('href'), BASE_URL);
        const title = cleanText($link.text()).slice(0, MAX_TITLE_LENGTH);
        if (!url || !title) return;
        const listing = buildListing({
          title,
          platform: 'invaluable',
          source_url: url,
          source_id: extractLotId(url),
        });
        if (listing) listings.push(listing);
      });
    return listings;
  }

  $(cardSelector)
    .slice(0, MAX_RESULTS)
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
        const url = absoluteUrl($card.find("a[href*='/auction-lot/']").first().attr('href'), BASE_URL);
        if (!url) return;

        const title =
          pick('h2', 'h3', '.title', '.lot-title', "[data-testid='title']") ||
          cleanText($card.text().split('\n').find((line) => line.trim()));

        const $img = $card.find('img').first();
        const imageUrl = absoluteUrl($img.attr('src') || $img.attr('data-src'), BASE_URL);

        const listing = buildListing({
          title: title.slice(0, MAX_TITLE_LENGTH),
          description: pick('.description', '.lot-description', 'p').slice(0, MAX_SNIPPET_LENGTH),
          platform: 'invaluable',
          source_url: url,
          source_id: extractLotId(url),
          price: parsePrice(pick('.price', '.estimate', "[data-testid='price']")),
          currency: 'USD',
          seller_name: pick('.auction-house', '.seller', '.house-name') || null,
          image_urls: imageUrl ? [imageUrl] : [],
        });
        if (listing) listings.push(listing);
      } catch (error) {
        onItemError?.(error);
      }
    });

  return listings;
}

export function parseLotPage(html: string, url: string): Listing | null {
  const $ = cheerio.load(html);
  const pick = (...selectors: string[]): string => {
    for (const selector of selectors) {
      const text = cleanText($(selector).first().text());
      if (text) return text;
    }
    return '';
  };

  const description = pick('.lot-description', '.description', "[data-testid='description']");

  const images: string[] = [];
  $(".lot-image img, .gallery img, [data-testid='lot-image'] img").each((_, el) => {
    const $img = $(el);
    const src = absoluteUrl($img.attr('src') || $img.attr('data-src'), BASE_URL);
    if (src && !images.includes(src)) images.push(src);
  });

  const dimensions = extractDimensions(description);

  return buildListing({
    title: pick('h1', '.lot-title', "[data-testid='lot-title']"),
    description,
    platform: 'invaluable',
    source_url: url,
    source_id: extractLotId(url),
    price: parsePrice(pick('.price', '.estimate', '.sold-price', "[data-testid='price']")),
    currency: 'USD',
    seller_name: pick('.auction-house', '.house-name', "[data-testid='auction-house']") || null,
    image_urls: images.slice(0, MAX_DETAIL_IMAGES),
    raw_data: dimensions ? { dimensions } : null,
  });
}

/** Invaluable renders its search results client-side, hence the browser. */
export class InvaluableScraper extends BrowserScraper {
  readonly platform = 'invaluable' as const;

  buildSearchQueries(): string[] {
    return [
      "dan brown trompe l'oeil",
      'dan brown artist painting',
      'dan brown connecticut artist',
      'dan brown oil painting currency',
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
    return html === null ? null : parseLotPage(html, url);
  }
}
