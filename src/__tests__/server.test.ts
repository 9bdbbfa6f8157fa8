import type { Server } from 'node:http';
import axios from 'axios';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';
import { bodyField, createAgentServer, detectPlatform, isAuthorized, parsePlatform } from '../server.js';

describe('detectPlatform', () => {
  it('maps listing hosts to platforms', () => {
    expect(detectPlatform('https://www.ebay.com/itm/123')).toBe('ebay');
    expect(detectPlatform('https://www.ebay.co.uk/itm/123')).toBe('ebay');
    expect(detectPlatform('https://www.artnet.com/artwork/six-fives')).toBe('artnet');
    expect(detectPlatform('https://www.invaluable.com/auction-lot/x-c-1')).toBe('invaluable');
    expect(detectPlatform('https://www.liveauctioneers.com/item/1_x')).toBe('liveauctioneers');
    expect(detectPlatform('https://newhaven.craigslist.org/art/d/x/1.html')).toBe('craigslist');
  });

  it('returns null for other hosts and malformed urls', () => {
    expect(detectPlatform('https://notebay.com/itm/1')).toBeNull();
    expect(detectPlatform('not a url')).toBeNull();
  });
});

describe('parsePlatform', () => {
  it('accepts known platforms case-insensitively', () => {
    expect(parsePlatform('Artnet')).toBe('artnet');
    expect(parsePlatform('etsy')).toBeNull();
    expect(parsePlatform(null)).toBeNull();
  });
});

describe('isAuthorized', () => {
  it('is open without a token and checks the bearer otherwise', () => {
    expect(isAuthorized(undefined, '')).toBe(true);
    expect(isAuthorized('Bearer test-token', 'test-token')).toBe(true);
    expect(isAuthorized('Bearer wrong', 'test-token')).toBe(false);
    expect(isAuthorized(undefined, 'test-token')).toBe(false);
  });
});

describe('bodyField', () => {
  it('reads non-empty string fields from JSON', () => {
    expect(bodyField('{"url":"https://www.ebay.com/itm/1"}', 'url')).toBe('https://www.ebay.com/itm/1');
    expect(bodyField('{"url":5}', 'url')).toBeNull();
    expect(bodyField('{"url":""}', 'url')).toBeNull();
    expect(bodyField('', 'url')).toBeNull();
    expect(bodyField('null', 'url')).toBeNull();
  });
});

describe('createAgentServer', () => {
  let server: Server;
  let baseURL = '';

  beforeAll(async () => {
    server = createAgentServer(loadConfig({ AGENT_API_TOKEN: 'test-token' }, []));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (typeof address !== 'object' || address === null) throw new Error('server has no port');
    baseURL = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  const request = (method: 'GET' | 'POST', path: string, data?: unknown, token?: string) =>
    axios.request({
      baseURL,
      url: path,
      method,
      data,
      headers: token ? { Authorization: `Bearer ${token}` } : {},
      validateStatus: () => true,
    });

  it('answers health checks without a token', async () => {
    const res = await request('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: 'ok', isRunning: false, currentRunId: null });
  });

  it('requires the bearer token elsewhere', async () => {
    const res = await request('GET', '/stats');
    expect(res.status).toBe(401);
  });

  it('rejects an unknown platform on trigger', async () => {
    const res = await request('POST', '/trigger?platform=etsy', undefined, 'test-token');
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'Unknown platform "etsy"' });
  });

  it('validates detail requests before scraping', async () => {
    const missing = await request('POST', '/details', {}, 'test-token');
    expect(missing.status).toBe(400);

    const foreign = await request('POST', '/details', { url: 'https://example.test/lot/1' }, 'test-token');
    expect(foreign.status).toBe(400);
    expect(foreign.data).toEqual({
      error: 'URL must be from one of: ebay, artnet, invaluable, liveauctioneers, craigslist',
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request('GET', '/nope', undefined, 'test-token');
    expect(res.status).toBe(404);
  });
});
