import { describe, expect, it } from 'vitest';
import { EbayApiScraper, getBaseUrl, parseEbayItem, parseEbayItemId, type EbayItem } from '../ebay-api.js';
import { fakeHttp, type FakeHandler } from './fake-adapter.js';

const SANDBOX = 'https://api.sandbox.ebay.com';
const TOKEN_URL = `${SANDBOX}/identity/v1/oauth2/token`;
const SEARCH_URL = `${SANDBOX}/buy/browse/v1/item_summary/search`;

const item: EbayItem = {
  itemId: 'v1|1234|0',
  legacyItemId: '1234',
  title: "Dan Brown trompe l'oeil oil",
  itemWebUrl: 'https://www.ebay.com/itm/1234',
  price: { value: '450.00', currency: 'USD' },
  image: { imageUrl: 'https://i.ebayimg.com/a.jpg' },
  additionalImages: [{ imageUrl: 'https://i.ebayimg.com/a.jpg' }, { imageUrl: 'https://i.ebayimg.com/b.jpg' }],
  itemLocation: { city: 'Madison', stateOrProvince: 'CT', country: 'US' },
  seller: { username: 'estate_finds' },
  condition: 'Used',
  shortDescription: 'Oil on board',
  itemCreationDate: '2024-03-05T12:00:00.000Z',
};

function scraperWith(handler: FakeHandler) {
  const http = fakeHttp(handler);
  const scraper = new EbayApiScraper({
    appId: 'test-app-SBX-id',
    certId: 'test-secret',
    requestDelayMs: 0,
    http: { adapter: http.adapter },
  });
  return { scraper, http };
}

const tokenReply = { data: { access_token: 'test-token', expires_in: 7200 } };

describe('parseEbayItem', () => {
  it('maps a Browse API item summary', () => {
    expect(parseEbayItem(item)).toEqual({
      title: "Dan Brown trompe l'oeil oil",
      description: 'Used. Oil on board',
      platform: 'ebay',
      source_url: 'https://www.ebay.com/itm/1234',
      source_id: 'v1|1234|0',
      price: 450,
      currency: 'USD',
      seller_name: 'estate_finds',
      seller_id: 'estate_finds',
      location: 'Madison, CT, US',
      image_urls: ['https://i.ebayimg.com/a.jpg', 'https://i.ebayimg.com/b.jpg'],
      date_listing: '2024-03-05T12:00:00.000Z',
      date_ending: null,
      raw_data: { ...item },
    });
  });

  it('builds the item url from the legacy id when none is given', () => {
    const listing = parseEbayItem({ itemId: 'v1|555|0', legacyItemId: '555', title: 'Harbor' });
    expect(listing?.source_url).toBe('https://www.ebay.com/itm/555');
    expect(listing?.price).toBeNull();
    expect(listing?.description).toBe('');
  });

  it('skips items without a title', () => {
    expect(parseEbayItem({ itemId: 'v1|1|0' })).toBeNull();
  });
});

describe('parseEbayItemId', () => {
  it('handles plain, slugged and tracked item urls', () => {
    expect(parseEbayItemId('https://www.ebay.com/itm/123456')).toBe('123456');
    expect(parseEbayItemId('https://www.ebay.com/itm/dan-brown-painting/123456')).toBe('123456');
    expect(parseEbayItemId('https://www.ebay.co.uk/itm/123456?hash=item1')).toBe('123456');
  });

  it('returns null for other urls', () => {
    expect(parseEbayItemId('https://www.ebay.com/sch/i.html?_nkw=dan+brown')).toBeNull();
  });
});

describe('getBaseUrl', () => {
  it('uses the sandbox for sandbox app ids', () => {
    expect(getBaseUrl('test-app-SBX-id')).toBe(SANDBOX);
    expect(getBaseUrl('test-app-PRD-id')).toBe('https://api.ebay.com');
  });
});

describe('EbayApiScraper', () => {
  it('searches the art category with a cached bearer token', async () => {
    const { scraper, http } = scraperWith((url) => {
      if (url === TOKEN_URL) return tokenReply;
      if (url === SEARCH_URL) return { data: { itemSummaries: [item], total: 1 } };
      return { status: 404, data: {} };
    });

    const first = await scraper.search('Dan Brown rack painting');
    await scraper.search('Dan Brown realist painting');

    expect(first.map((l) => l.source_url)).toEqual(['https://www.ebay.com/itm/1234']);
    expect(http.urls).toEqual([TOKEN_URL, SEARCH_URL, SEARCH_URL]);
    expect(http.configs[1]?.params).toEqual({
      q: 'Dan Brown rack painting',
      category_ids: '550',
      limit: 50,
      sort: 'newlyListed',
      fieldgroups: 'MATCHING_ITEMS,EXTENDED',
    });
    expect(http.configs[1]?.headers.get('Authorization')).toBe('Bearer test-token');
  });

  it('skips item summaries that are not objects', async () => {
    const { scraper } = scraperWith((url) =>
      url === TOKEN_URL ? tokenReply : { data: { itemSummaries: [null, 'v1|9|0', item], total: 3 } }
    );

    const listings = await scraper.search('Dan Brown');

    expect(listings.map((l) => l.source_url)).toEqual(['https://www.ebay.com/itm/1234']);
  });

  it('turns a failing search into an empty result and counts it', async () => {
    const { scraper } = scraperWith((url) => (url === TOKEN_URL ? tokenReply : { status: 503, data: {} }));

    const results = await scraper.searchAll();

    expect(results).toEqual([]);
    expect(scraper.lastPass()).toMatchObject({ queries: 9, failed_queries: 9, unique_listings: 0 });
  });

  it('fetches item details and flattens the html description', async () => {
    const detailUrl = `${SANDBOX}/buy/browse/v1/item/v1%7C1234%7C0`;
    const { scraper, http } = scraperWith((url) => {
      if (url === TOKEN_URL) return tokenReply;
      if (url === detailUrl) return { data: { ...item, description: '<p>Signed <b>Dan Brown</b></p>' } };
      return { status: 404, data: {} };
    });

    const listing = await scraper.getListingDetails('https://www.ebay.com/itm/dan-brown-oil/1234?hash=x');

    expect(http.urls).toEqual([TOKEN_URL, detailUrl]);
    expect(listing?.description).toBe('Signed Dan Brown');
    expect(listing?.title).toBe("Dan Brown trompe l'oeil oil");
  });

  it('returns null for an ended listing', async () => {
    const { scraper } = scraperWith((url) => (url === TOKEN_URL ? tokenReply : { status: 404, data: {} }));
    expect(await scraper.getListingDetails('https://www.ebay.com/itm/999')).toBeNull();
  });

  it('returns null without a request when the url has no item id', async () => {
    const { scraper, http } = scraperWith(() => tokenReply);
    expect(await scraper.getListingDetails('https://www.ebay.com/usr/estate_finds')).toBeNull();
    expect(http.urls).toEqual([]);
  });

  it('forgets its token on close', async () => {
    const { scraper, http } = scraperWith((url) =>
      url === TOKEN_URL ? tokenReply : { data: { itemSummaries: [] } }
    );

    await scraper.search('Dan Brown');
    await scraper.close();
    await scraper.close();
    await scraper.search('Dan Brown');

    expect(http.urls.filter((u) => u === TOKEN_URL)).toHaveLength(2);
  });
});
