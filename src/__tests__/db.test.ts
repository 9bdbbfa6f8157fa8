import { describe, expect, it } from 'vitest';
import { createRepository, toArtworkRow, toImageRows } from '../db.js';
import { loadConfig } from '../config.js';
import { ConfidenceScorer } from '../scorer.js';
import { makeListing } from './helpers.js';

describe('toArtworkRow', () => {
  const result = new ConfidenceScorer().score(
    makeListing({
      title: "Dan Brown trompe l'oeil",
      platform: 'craigslist',
      source_url: 'https://newhaven.craigslist.org/art/d/dan-brown/7700000005.html',
      source_id: '7700000005',
      price: 450,
      location: 'Madison',
      image_urls: ['https://images.craigslist.org/a.jpg'],
      raw_data: { posting_id: 7700000005 },
    })
  );

  it('maps a scored listing onto a new artwork row', () => {
    expect(toArtworkRow(result, new Date('2024-01-02T03:04:05Z'))).toEqual({
      title: "Dan Brown trompe l'oeil",
      description: '',
      source_platform: 'craigslist',
      source_url: 'https://newhaven.craigslist.org/art/d/dan-brown/7700000005.html',
      source_id: '7700000005',
      price: 450,
      currency: 'USD',
      seller_name: null,
      seller_id: null,
      location: 'Madison',
      date_found: '2024-01-02T03:04:05.000Z',
      date_listing: null,
      date_ending: null,
      confidence_score: 3,
      positive_signals: { 'trompe-loeil': 3 },
      negative_signals: {},
      is_verified: false,
      is_false_positive: false,
      acquisition_status: 'new',
      raw_data: { posting_id: 7700000005 },
    });
  });

  it('copies the frozen signal maps', () => {
    const row = toArtworkRow(result);
    expect(Object.isFrozen(row.positive_signals)).toBe(false);
  });
});

describe('toImageRows', () => {
  it('marks the first image primary', () => {
    expect(toImageRows('42', ['https://example.test/1.jpg', 'https://example.test/2.jpg'])).toEqual([
      { artwork_id: '42', url: 'https://example.test/1.jpg', is_primary: true },
      { artwork_id: '42', url: 'https://example.test/2.jpg', is_primary: false },
    ]);
    expect(toImageRows('42', [])).toEqual([]);
  });
});

describe('createRepository', () => {
  it('requires the Supabase settings', () => {
    expect(() => createRepository(loadConfig({}, []))).toThrow(
      'Missing required environment variable: SUPABASE_URL'
    );
  });
});
