import { describe, expect, it } from 'vitest';
import { ConfidenceScorer } from '../scorer.js';
import type { PatternTables } from '../patterns.js';
import { makeListing } from './helpers.js';

describe('ConfidenceScorer.score', () => {
  const scorer = new ConfidenceScorer();

  it('scores a trompe l’oeil painting listing from its positive signals', () => {
    const result = scorer.score(
      makeListing({
        title: "Dan Brown Trompe L'oeil Painting",
        description: 'Beautiful vintage postcard painting by Connecticut artist',
      })
    );

    expect(result.is_rejected).toBe(false);
    expect(result.rejection_reason).toBeNull();
    expect(result.confidence_score).toBe(6);
    expect(result.positive_signals).toEqual({
      'trompe-loeil': 3,
      'vintage-postcards': 1.5,
      'connecticut-artist': 1.5,
    });
    expect(result.negative_signals).toEqual({});
  });

  it('rejects novel listings outright', () => {
    const result = scorer.score(
      makeListing({
        title: 'Dan Brown - The Da Vinci Code - First Edition',
        description: 'Bestselling thriller by the famous author',
      })
    );

    expect(result.is_rejected).toBe(true);
    expect(result.confidence_score).toBe(-10);
    expect(result.rejection_reason).toBe('Matched rejection pattern: da-vinci-code');
    expect(result.negative_signals).toEqual({ 'da-vinci-code': -10 });
  });

  it('skips positive patterns once a reject pattern matched', () => {
    const result = scorer.score(
      makeListing({
        title: "Dan Brown trompe l'oeil rack painting",
        description: 'From the author of Inferno',
      })
    );

    expect(result.is_rejected).toBe(true);
    expect(result.confidence_score).toBe(-10);
    expect(result.positive_signals).toEqual({});
    expect(result.rejection_reason).toBe('Matched rejection pattern: inferno');
  });

  it('gives a neutral zero to text with no signals', () => {
    const result = scorer.score(
      makeListing({ title: 'Vintage oak dresser', description: 'Solid wood, six drawers' })
    );

    expect(result.confidence_score).toBe(0);
    expect(result.is_rejected).toBe(false);
    expect(result.positive_signals).toEqual({});
    expect(result.negative_signals).toEqual({});
  });

  it('matches the curly-apostrophe and unspaced spellings of trompe l’oeil', () => {
    expect(scorer.score(makeListing({ title: 'Dan Brown trompe l’oeil' })).confidence_score).toBe(3);
    expect(scorer.score(makeListing({ title: 'Dan Brown trompe loeil' })).confidence_score).toBe(3);
  });

  it('counts the painter’s life dates', () => {
    const result = scorer.score(makeListing({ title: 'Dan Brown (1949-2022) oil' }));
    expect(result.positive_signals).toEqual({ 'life-dates': 2 });
  });

  it('matches place names with an optional comma', () => {
    const result = scorer.score(makeListing({ title: 'Harbor view', description: 'Estate of a Madison, CT collector' }));
    expect(result.positive_signals).toEqual({ 'madison-ct': 1.5 });
  });

  it('returns frozen results', () => {
    const result = scorer.score(makeListing({ title: 'Cape Cod dunes' }));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.positive_signals)).toBe(true);
  });
});

describe('rejection threshold', () => {
  const patterns: PatternTables = {
    reject: [],
    strong: [],
    medium: [{ label: 'water-damage', pattern: /water\s*damage/i, weight: -1 }],
    weak: [{ label: 'print', pattern: /\bprint\b/i, weight: -0.5 }],
  };
  const scorer = new ConfidenceScorer({ rejectionThreshold: -1, patterns });

  it('keeps a listing scoring exactly the threshold', () => {
    const result = scorer.score(makeListing({ title: 'Harbor scene, some water damage' }));
    expect(result.confidence_score).toBe(-1);
    expect(result.is_rejected).toBe(false);
    expect(result.rejection_reason).toBeNull();
  });

  it('rejects a listing scoring below the threshold', () => {
    const result = scorer.score(makeListing({ title: 'Harbor scene print, water damage' }));
    expect(result.confidence_score).toBe(-1.5);
    expect(result.is_rejected).toBe(true);
    expect(result.rejection_reason).toBe('Score -1.5 below threshold -1');
  });

  it('drops below-threshold listings from filterListings', () => {
    const kept = scorer.filterListings([
      makeListing({ title: 'Harbor scene print, water damage', source_url: 'https://example.test/1' }),
      makeListing({ title: 'Harbor scene', source_url: 'https://example.test/2' }),
    ]);
    expect(kept.map((r) => r.listing.source_url)).toEqual(['https://example.test/2']);
  });
});

describe('ConfidenceScorer.filterListings', () => {
  const scorer = new ConfidenceScorer();

  it('keeps only the painting from a mixed batch', () => {
    const results = scorer.filterListings([
      makeListing({ title: 'The Da Vinci Code hardcover', source_url: 'https://example.test/book-1' }),
      makeListing({ title: "Dan Brown trompe l'oeil oil on board", source_url: 'https://example.test/painting' }),
      makeListing({ title: 'Angels and Demons paperback by Dan Brown', source_url: 'https://example.test/book-2' }),
    ]);

    expect(results).toHaveLength(1);
    expect(results[0]?.listing.source_url).toBe('https://example.test/painting');
    expect(results[0]?.confidence_score).toBe(3);
  });

  it('ranks by score, highest first', () => {
    const results = scorer.filterListings([
      makeListing({ title: 'Still life with apples', source_url: 'https://example.test/x' }),
      makeListing({ title: 'Rack painting, Paier College graduate', source_url: 'https://example.test/y' }),
      makeListing({ title: 'Nantucket harbor at dusk', source_url: 'https://example.test/z' }),
    ]);

    expect(results.map((r) => r.confidence_score)).toEqual([5.5, 1.5, 0.5]);
    for (let i = 0; i + 1 < results.length; i++) {
      expect(results[i]?.confidence_score).toBeGreaterThanOrEqual(results[i + 1]?.confidence_score ?? 0);
    }
  });

  it('keeps input order between equal scores', () => {
    const results = scorer.filterListings([
      makeListing({ title: 'Cape Cod dunes', source_url: 'https://example.test/tie-1' }),
      makeListing({ title: 'Cape Cod dunes', source_url: 'https://example.test/tie-2' }),
      makeListing({ title: 'Ken Davies student', source_url: 'https://example.test/high' }),
    ]);

    expect(results.map((r) => r.listing.source_url)).toEqual([
      'https://example.test/high',
      'https://example.test/tie-1',
      'https://example.test/tie-2',
    ]);
  });

  it('returns an empty list for an empty batch', () => {
    expect(scorer.filterListings([])).toEqual([]);
  });
});

describe('ConfidenceScorer.isHighConfidence', () => {
  const scorer = new ConfidenceScorer({ acceptanceThreshold: 1 });

  it('accepts scores at or above the acceptance threshold', () => {
    expect(scorer.isHighConfidence(scorer.score(makeListing({ title: 'Cape Cod dunes' })))).toBe(true);
    expect(scorer.isHighConfidence(scorer.score(makeListing({ title: 'Still life with pears' })))).toBe(false);
  });

  it('never treats a rejected result as high confidence', () => {
    const rejected = scorer.score(makeListing({ title: 'Robert Langdon box set, trompe l’oeil cover' }));
    expect(scorer.isHighConfidence(rejected)).toBe(false);
  });
});
