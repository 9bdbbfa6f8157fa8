import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { requireSetting, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import type { ScoringResult } from './scorer.js';
import type { Platform } from './scrapers/types.js';

const log = createLogger('db');

// ---------- Types ----------

export type AcquisitionStatus = 'new' | 'watching' | 'contacted' | 'acquired' | 'passed' | 'unavailable';

export type ArtworkRow = {
  title: string;
  description: string;
  source_platform: Platform;
  source_url: string;
  source_id: string | null;
  price: number | null;
  currency: string;
  seller_name: string | null;
  seller_id: string | null;
  location: string | null;
  date_found: string;
  date_listing: string | null;
  date_ending: string | null;
  confidence_score: number;
  positive_signals: Record<string, number>;
  negative_signals: Record<string, number>;
  is_verified: boolean;
  is_false_positive: boolean;
  acquisition_status: AcquisitionStatus;
  raw_data: Record<string, unknown> | null;
};

export type ArtworkImageRow = {
  artwork_id: string;
  url: string;
  is_primary: boolean;
};

export interface SavedArtwork {
  id: string;
  result: ScoringResult;
}

export type RunStatus = 'running' | 'completed' | 'failed';

export type RunUpdate = {
  status?: RunStatus;
  finished_at?: string;
  total_collected?: number;
  passed_filter?: number;
  saved?: number;
  elapsed_ms?: number;
  platform_outcomes?: Record<string, string>;
  error_message?: string;
};

export interface ArtworkStats {
  total: number;
  verified: number;
  new: number;
  acquired: number;
}

/** Storage seam for the pipeline and server; the Supabase implementation is below. */
export interface ArtworkRepository {
  createRun(triggeredBy: string | null, platform: Platform | null): Promise<string>;
  updateRun(runId: string, updates: RunUpdate): Promise<void>;
  saveResult(result: ScoringResult): Promise<SavedArtwork | null>;
  saveBatch(results: ScoringResult[]): Promise<SavedArtwork[]>;
  getArtworkStats(): Promise<ArtworkStats>;
}

// ---------- Row mapping ----------

export function toArtworkRow(result: ScoringResult, foundAt: Date = new Date()): ArtworkRow {
  const { listing } = result;
  return {
    title: listing.title,
    description: listing.description,
    source_platform: listing.platform,
    source_url: listing.source_url,
    source_id: listing.source_id,
    price: listing.price,
    currency: listing.currency,
    seller_name: listing.seller_name,
    seller_id: listing.seller_id,
    location: listing.location,
    date_found: foundAt.toISOString(),
    date_listing: listing.date_listing,
    date_ending: listing.date_ending,
    confidence_score: result.confidence_score,
    positive_signals: { ...result.positive_signals },
    negative_signals: { ...result.negative_signals },
    is_verified: false,
    is_false_positive: false,
    acquisition_status: 'new',
    raw_data: listing.raw_data,
  };
}

export function toImageRows(artworkId: string, imageUrls: string[]): ArtworkImageRow[] {
  return imageUrls.map((url, i) => ({ artwork_id: artworkId, url, is_primary: i === 0 }));
}

function readId(row: unknown): string | null {
  if (typeof row !== 'object' || row === null || !('id' in row)) return null;
  const { id } = row;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
}

// ---------- Supabase ----------

export class SupabaseArtworkRepository implements ArtworkRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  // ---------- Run management ----------

  async createRun(triggeredBy: string | null, platform: Platform | null): Promise<string> {
    const { data, error } = await this.supabase
      .from('scrape_runs')
      .insert({
        status: 'running',
        started_at: new Date().toISOString(),
        triggered_by: triggeredBy,
        platform,
      })
      .select('id')
      .single();

    if (error) throw new Error(`Failed to create run: ${error.message}`);
    const id = readId(data);
    if (!id) throw new Error('Failed to create run: no id returned');
    return id;
  }

  async updateRun(runId: string, updates: RunUpdate): Promise<void> {
    const { error } = await this.supabase.from('scrape_runs').update(updates).eq('id', runId);
    if (error) throw new Error(`Failed to update run ${runId}: ${error.message}`);
  }

  // ---------- Artworks ----------

  /**
   * Inserts the artwork unless its source URL is already stored, then its
   * images (first one primary). Returns null for a duplicate.
   */
  async saveResult(result: ScoringResult): Promise<SavedArtwork | null> {
    const row = toArtworkRow(result);

    const { data, error } = await this.supabase
      .from('artworks')
      .upsert(row, { onConflict: 'source_url', ignoreDuplicates: true })
      .select('id');

    if (error) throw new Error(`Failed to save artwork ${row.source_url}: ${error.message}`);

    const id = readId(data?.[0]);
    if (!id) {
      log.debug('Duplicate listing, skipping', { url: row.source_url });
      return null;
    }

    const images = toImageRows(id, result.listing.image_urls);
    if (images.length > 0) {
      const { error: imageError } = await this.supabase.from('artwork_images').insert(images);
      if (imageError) {
        throw new Error(`Failed to save images for artwork ${id}: ${imageError.message}`);
      }
    }

    log.info('Saved new artwork', {
      id,
      title: row.title.slice(0, 50),
      confidence: row.confidence_score,
    });
    return { id, result };
  }

  async saveBatch(results: ScoringResult[]): Promise<SavedArtwork[]> {
    const saved: SavedArtwork[] = [];
    for (const result of results) {
      const artwork = await this.saveResult(result);
      if (artwork) saved.push(artwork);
    }
    log.info('Batch save complete', { attempted: results.length, saved: saved.length });
    return saved;
  }

  // ---------- Stats ----------

  async getArtworkStats(): Promise<ArtworkStats> {
    const count = () => this.supabase.from('artworks').select('id', { count: 'exact', head: true });

    const [totalRes, verifiedRes, newRes, acquiredRes] = await Promise.all([
      count(),
      count().eq('is_verified', true),
      count().eq('acquisition_status', 'new'),
      count().eq('acquisition_status', 'acquired'),
    ]);

    for (const res of [totalRes, verifiedRes, newRes, acquiredRes]) {
      if (res.error) throw new Error(`Failed to count artworks: ${res.error.message}`);
    }

    return {
      total: totalRes.count ?? 0,
      verified: verifiedRes.count ?? 0,
      new: newRes.count ?? 0,
      acquired: acquiredRes.count ?? 0,
    };
  }
}

export function createRepository(config: AppConfig): ArtworkRepository {
  const supabase = createClient(
    requireSetting(config, 'SUPABASE_URL'),
    requireSetting(config, 'SUPABASE_SERVICE_ROLE_KEY'),
    { auth: { persistSession: false } }
  );
  return new SupabaseArtworkRepository(supabase);
}
