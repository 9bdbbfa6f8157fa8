import type { AppConfig } from './config.js';
import { createRepository, type ArtworkRepository, type SavedArtwork } from './db.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { SlackNotifier } from './notify.js';
import { createOrchestrator, type ScrapeOrchestrator } from './orchestrator.js';
import type { ScoringResult } from './scorer.js';
import type { Platform } from './scrapers/types.js';

const log = createLogger('pipeline');

const PREVIEW_COUNT = 10;

export interface PipelineDeps {
  orchestrator: ScrapeOrchestrator;
  /** Null for dry runs, which never touch storage. */
  repository: ArtworkRepository | null;
  notifier: SlackNotifier;
}

export interface PipelineOptions {
  dryRun: boolean;
  platform: Platform | null;
  triggeredBy?: string | null;
}

export interface PipelineResult {
  runId: string | null;
  results: ScoringResult[];
  saved: SavedArtwork[];
  notified: number;
}

export async function buildPipelineDeps(config: AppConfig): Promise<PipelineDeps> {
  return {
    orchestrator: await createOrchestrator(config),
    repository: config.DRY_RUN ? null : createRepository(config),
    notifier: new SlackNotifier(config.SLACK_WEBHOOK_URL),
  };
}

function logPreview(results: ScoringResult[]): void {
  for (const result of results.slice(0, PREVIEW_COUNT)) {
    log.info('Match', {
      score: result.confidence_score,
      platform: result.listing.platform,
      title: result.listing.title.slice(0, 80),
      url: result.listing.source_url,
    });
  }
}

/**
 * One discovery run: scrape, score, persist new finds and notify about the
 * high-confidence ones. Scrapers are always closed; storage errors are
 * recorded against the run and rethrown.
 */
export async function runPipeline(deps: PipelineDeps, opts: PipelineOptions): Promise<PipelineResult> {
  const { orchestrator, repository, notifier } = deps;
  const startedAt = Date.now();

  log.info('Artwork discovery starting', {
    dry_run: opts.dryRun,
    platform: opts.platform ?? 'all',
    scrapers: orchestrator.scrapers.map((s) => s.platform),
  });

  const store = opts.dryRun ? null : repository;
  if (!opts.dryRun && !store) {
    throw new Error('A repository is required unless running dry');
  }

  const runId = store ? await store.createRun(opts.triggeredBy ?? null, opts.platform) : null;
  if (runId) log.info('Created run', { runId });

  try {
    const results = opts.platform
      ? await orchestrator.runScraper(opts.platform)
      : await orchestrator.runAll();

    log.info('Scoring complete', { passed_filter: results.length });
    logPreview(results);

    if (!store || !runId) {
      log.info('Dry run, nothing saved', { results: results.length });
      return { runId: null, results, saved: [], notified: 0 };
    }

    const saved = await store.saveBatch(results);
    const highConfidence = saved.filter((s) => orchestrator.scorer.isHighConfidence(s.result));
    const notification = await notifier.notifyNewArtworks(highConfidence);

    const stats = orchestrator.lastRunStats;
    await store.updateRun(runId, {
      status: 'completed',
      finished_at: new Date().toISOString(),
      total_collected: opts.platform ? undefined : stats?.total_collected,
      passed_filter: results.length,
      saved: saved.length,
      elapsed_ms: Date.now() - startedAt,
      platform_outcomes:
        !opts.platform && stats
          ? Object.fromEntries(stats.platforms.map((p) => [p.platform, p.outcome]))
          : undefined,
    });

    log.info('Run completed successfully', {
      runId,
      saved: saved.length,
      high_confidence: highConfidence.length,
      notified: notification.sent,
    });
    return { runId, results, saved, notified: notification.sent ? highConfidence.length : 0 };
  } catch (error) {
    const errMessage = describeError(error);
    log.error('Run failed', { runId, error: errMessage });

    if (runId && store) {
      try {
        await store.updateRun(runId, {
          status: 'failed',
          finished_at: new Date().toISOString(),
          error_message: errMessage,
        });
      } catch (logError) {
        log.error('Failed to record run failure', { runId, error: describeError(logError) });
      }
    }

    throw error;
  } finally {
    await orchestrator.close();
  }
}
