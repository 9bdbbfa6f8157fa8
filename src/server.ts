import http from 'node:http';
import type { AppConfig } from './config.js';
import { createRepository } from './db.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { createOrchestrator } from './orchestrator.js';
import { buildPipelineDeps, runPipeline } from './pipeline.js';
import { PLATFORMS, type Platform } from './scrapers/types.js';

const log = createLogger('server');

const PLATFORM_HOSTS: [RegExp, Platform][] = [
  [/(^|\.)ebay\.[a-z.]+$/i, 'ebay'],
  [/(^|\.)artnet\.com$/i, 'artnet'],
  [/(^|\.)invaluable\.com$/i, 'invaluable'],
  [/(^|\.)liveauctioneers\.com$/i, 'liveauctioneers'],
  [/(^|\.)craigslist\.org$/i, 'craigslist'],
];

/** Maps a listing URL to the platform that serves it, or null. */
export function detectPlatform(listingUrl: string): Platform | null {
  let host: string;
  try {
    host = new URL(listingUrl).hostname;
  } catch {
    return null;
  }
  return PLATFORM_HOSTS.find(([pattern]) => pattern.test(host))?.[1] ?? null;
}

export function parsePlatform(value: string | null | undefined): Platform | null {
  if (!value) return null;
  return PLATFORMS.find((p) => p === value.toLowerCase()) ?? null;
}

export function isAuthorized(authorization: string | undefined, token: string): boolean {
  if (!token) return true; // no token configured = open (dev mode)
  return authorization === `Bearer ${token}`;
}

function json(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString()));
    req.on('error', reject);
  });
}

/** Reads a string field from a JSON request body; empty or invalid bodies yield null. */
export function bodyField(body: string, field: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !(field in parsed)) return null;
  const value: unknown = Reflect.get(parsed, field);
  return typeof value === 'string' && value ? value : null;
}

export function createAgentServer(config: AppConfig): http.Server {
  let isRunning = false;
  let currentRunId: string | null = null;

  async function triggerRun(dryRun: boolean, platform: Platform | null, triggeredBy: string | null) {
    isRunning = true;
    currentRunId = null;
    try {
      const deps = await buildPipelineDeps({ ...config, DRY_RUN: dryRun });
      const result = await runPipeline(deps, { dryRun, platform, triggeredBy });
      currentRunId = result.runId;
    } finally {
      isRunning = false;
    }
  }

  return http.createServer((req, res) => {
    const url = new URL(req.url || '/', `http://localhost:${config.PORT ?? 3000}`);

    // CORS headers for the dashboard
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    // GET / or /health
    if (req.method === 'GET' && (url.pathname === '/' || url.pathname === '/health')) {
      json(res, 200, { status: 'ok', isRunning, currentRunId });
      return;
    }

    if (!isAuthorized(req.headers.authorization, config.AGENT_API_TOKEN)) {
      json(res, 401, { error: 'Unauthorized' });
      return;
    }

    // POST /trigger
    if (req.method === 'POST' && url.pathname === '/trigger') {
      if (isRunning) {
        json(res, 409, { error: 'A run is already in progress', currentRunId });
        return;
      }

      const dryRun = url.searchParams.get('dry_run') === 'true';
      const platformParam = url.searchParams.get('platform');
      const platform = parsePlatform(platformParam);
      if (platformParam && platformParam !== 'all' && !platform) {
        json(res, 400, { error: `Unknown platform "${platformParam}"` });
        return;
      }

      // Claim the slot before reading the body so a second trigger gets 409
      isRunning = true;
      readBody(req)
        .then((body) => {
          const triggeredBy = bodyField(body, 'triggered_by');
          json(res, 202, { message: 'Run started', dryRun, platform: platform ?? 'all' });
          return triggerRun(dryRun, platform, triggeredBy);
        })
        .catch((err: unknown) => {
          isRunning = false;
          log.error('Pipeline error', { error: describeError(err) });
          if (!res.headersSent) json(res, 500, { error: describeError(err) });
        });
      return;
    }

    // POST /details
    if (req.method === 'POST' && url.pathname === '/details') {
      readBody(req)
        .then(async (body) => {
          const listingUrl = bodyField(body, 'url');
          if (!listingUrl) {
            json(res, 400, { error: 'Missing or invalid "url" field' });
            return;
          }

          const platform = parsePlatform(bodyField(body, 'platform')) ?? detectPlatform(listingUrl);
          if (!platform) {
            json(res, 400, { error: `URL must be from one of: ${PLATFORMS.join(', ')}` });
            return;
          }

          const orchestrator = await createOrchestrator(config);
          const result = await orchestrator.getListingDetails(listingUrl, platform);
          if (!result) {
            json(res, 404, { error: 'Listing not found or not available', platform });
            return;
          }
          json(res, 200, result);
        })
        .catch((err: unknown) => {
          const msg = describeError(err);
          log.error('Details request failed', { error: msg });
          json(res, 500, { error: msg });
        });
      return;
    }

    // GET /stats
    if (req.method === 'GET' && url.pathname === '/stats') {
      Promise.resolve()
        .then(() => createRepository(config).getArtworkStats())
        .then((stats) => json(res, 200, stats))
        .catch((err: unknown) => json(res, 500, { error: describeError(err) }));
      return;
    }

    json(res, 404, { error: 'Not found' });
  });
}

export function startServer(config: AppConfig): http.Server {
  const port = config.PORT ?? 3000;
  const server = createAgentServer(config);
  server.listen(port, '0.0.0.0', () => {
    log.info('Agent HTTP server listening', { port });
    log.info('Runs are manual-only, use POST /trigger to start');
  });
  return server;
}
