import { createLogger } from './logger.js';
import { defaultPatternTables, REJECT_WEIGHT, type PatternTables } from './patterns.js';
import type { Listing } from './scrapers/types.js';

const log = createLogger('scorer');

export interface ScoringResult {
  readonly listing: Listing;
  readonly confidence_score: number;
  readonly positive_signals: Readonly<Record<string, number>>;
  readonly negative_signals: Readonly<Record<string, number>>;
  readonly is_rejected: boolean;
  /** Set exactly when is_rejected is true. */
  readonly rejection_reason: string | null;
}

export interface ScorerOptions {
  rejectionThreshold?: number;
  acceptanceThreshold?: number;
  patterns?: PatternTables;
}

function freezeResult(result: ScoringResult): ScoringResult {
  Object.freeze(result.positive_signals);
  Object.freeze(result.negative_signals);
  return Object.freeze(result);
}

/**
 * Rule-based scoring of how likely a listing is the painter's work rather
 * than something about the novelist of the same name. Pure: no I/O and no
 * state between calls.
 */
export class ConfidenceScorer {
  readonly rejectionThreshold: number;
  readonly acceptanceThreshold: number;
  private readonly patterns: PatternTables;

  constructor(options: ScorerOptions = {}) {
    this.rejectionThreshold = options.rejectionThreshold ?? -1.0;
    this.acceptanceThreshold = options.acceptanceThreshold ?? 1.0;
    this.patterns = options.patterns ?? defaultPatternTables();
  }

  score(listing: Listing): ScoringResult {
    const text = `${listing.title} ${listing.description}`.toLowerCase();

    // Any novelist marker wins outright; positive signals are not consulted
    for (const { label, pattern } of this.patterns.reject) {
      if (pattern.test(text)) {
        log.debug('Listing rejected', { url: listing.source_url, pattern: label });
        return freezeResult({
          listing,
          confidence_score: REJECT_WEIGHT,
          positive_signals: {},
          negative_signals: { [label]: REJECT_WEIGHT },
          is_rejected: true,
          rejection_reason: `Matched rejection pattern: ${label}`,
        });
      }
    }

    const positive: Record<string, number> = {};
    let score = 0;
    for (const tier of [this.patterns.strong, this.patterns.medium, this.patterns.weak]) {
      for (const { label, pattern, weight } of tier) {
        if (pattern.test(text)) {
          positive[label] = weight;
          score += weight;
        }
      }
    }

    const isRejected = score < this.rejectionThreshold;

    log.debug('Listing scored', {
      url: listing.source_url,
      score,
      positive_signals: Object.keys(positive),
    });

    return freezeResult({
      listing,
      confidence_score: score,
      positive_signals: positive,
      negative_signals: {},
      is_rejected: isRejected,
      rejection_reason: isRejected ? `Score ${score} below threshold ${this.rejectionThreshold}` : null,
    });
  }

  /** Scores every listing, drops the rejected ones, highest score first (ties keep input order). */
  filterListings(listings: Listing[]): ScoringResult[] {
    const accepted = listings.map((listing) => this.score(listing)).filter((r) => !r.is_rejected);
    accepted.sort((a, b) => b.confidence_score - a.confidence_score);

    log.info('Batch filtering complete', {
      total: listings.length,
      accepted: accepted.length,
      rejected: listings.length - accepted.length,
    });

    return accepted;
  }

  isHighConfidence(result: ScoringResult): boolean {
    return !result.is_rejected && result.confidence_score >= this.acceptanceThreshold;
  }
}
