import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const REQUEST_TIMEOUT_MS = 30_000;

export interface HttpClientOptions {
  baseURL?: string;
  headers?: Record<string, string>;
  /** Replaces the network transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: REQUEST_TIMEOUT_MS,
    maxRedirects: 5,
    adapter: options.adapter,
    headers: {
      'User-Agent': USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
      ...options.headers,
    },
  });
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Lower-cased markers of challenge/interstitial pages served instead of content
const BLOCK_MARKERS = [
  'captcha',
  'access denied',
  'pardon our interruption',
  'are you a robot',
  'verify you are human',
];

export function isBlockedPage(html: string): boolean {
  const lower = html.toLowerCase();
  return BLOCK_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Pulls the first amount out of text like "$1,250.00", "US $45" or
 * "Estimate: $300 - $500". Ranges resolve to their lower bound. An amount
 * with a currency sign wins over bare numbers such as lot numbers.
 */
export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = text.match(/[$£€]\s*(\d[\d,]*(?:\.\d+)?)/) ?? text.match(/(\d[\d,]*(?:\.\d+)?)/);
  if (!match?.[1]) return null;
  const value = parseFloat(match[1].replace(/,/g, ''));
  return Number.isFinite(value) ? value : null;
}

export function cleanText(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

export function absoluteUrl(href: string | null | undefined, base: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

export function stripQuery(url: string): string {
  const idx = url.indexOf('?');
  return idx === -1 ? url : url.slice(0, idx);
}

export function toIsoDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}
