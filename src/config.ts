import { parseLogLevel, type LogLevel } from './logger.js';
import { PLATFORMS, type Platform } from './scrapers/types.js';

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function parsePlatformFlag(argv: string[]): Platform | null {
  const flag = argv.find((arg) => arg.startsWith('--platform='));
  if (!flag) return null;
  const value = flag.slice('--platform='.length).toLowerCase();
  if (value === 'all') return null;
  const platform = PLATFORMS.find((p) => p === value);
  if (!platform) {
    throw new Error(`Unknown platform "${value}" (expected one of: ${PLATFORMS.join(', ')}, all)`);
  }
  return platform;
}

export interface RequestDelays {
  ebayApi: number;
  ebay: number;
  artnet: number;
  invaluable: number;
  liveauctioneers: number;
  craigslist: number;
}

export interface AppConfig {
  EBAY_APP_ID: string;
  EBAY_CERT_ID: string;

  SUPABASE_URL: string;
  SUPABASE_SERVICE_ROLE_KEY: string;
  SLACK_WEBHOOK_URL: string;

  CONFIDENCE_THRESHOLD: number;
  REJECTION_THRESHOLD: number;

  INCLUDE_BROWSER_SCRAPERS: boolean;
  CHROME_PATH: string;

  CRAIGSLIST_ENABLED: boolean;
  CRAIGSLIST_CITY: string;
  CRAIGSLIST_LAT: number;
  CRAIGSLIST_LON: number;
  CRAIGSLIST_DISTANCE: number;

  REQUEST_DELAYS_MS: RequestDelays;

  LOG_LEVEL: LogLevel;
  PORT: number | null;
  AGENT_API_TOKEN: string;

  // CLI flags
  DRY_RUN: boolean;
  PLATFORM: Platform | null;
}

export function loadConfig(env: Env = process.env, argv: string[] = process.argv): AppConfig {
  return {
    EBAY_APP_ID: env.EBAY_APP_ID || '',
    EBAY_CERT_ID: env.EBAY_CERT_ID || '',

    SUPABASE_URL: env.SUPABASE_URL || '',
    SUPABASE_SERVICE_ROLE_KEY: env.SUPABASE_SERVICE_ROLE_KEY || '',
    SLACK_WEBHOOK_URL: env.SLACK_WEBHOOK_URL || '',

    CONFIDENCE_THRESHOLD: parseNumber(env.CONFIDENCE_THRESHOLD, 1.0),
    REJECTION_THRESHOLD: parseNumber(env.REJECTION_THRESHOLD, -1.0),

    INCLUDE_BROWSER_SCRAPERS: parseBoolean(env.INCLUDE_BROWSER_SCRAPERS, false),
    CHROME_PATH: env.CHROME_PATH || '',

    // New Haven covers the shoreline towns the painter worked from
    CRAIGSLIST_ENABLED: parseBoolean(env.CRAIGSLIST_ENABLED, false),
    CRAIGSLIST_CITY: env.CRAIGSLIST_CITY || 'newhaven',
    CRAIGSLIST_LAT: parseNumber(env.CRAIGSLIST_LAT, 41.2795),
    CRAIGSLIST_LON: parseNumber(env.CRAIGSLIST_LON, -72.5984),
    CRAIGSLIST_DISTANCE: parseNumber(env.CRAIGSLIST_DISTANCE, 250),

    REQUEST_DELAYS_MS: {
      ebayApi: parseNumber(env.EBAY_API_DELAY_MS, 500),
      ebay: parseNumber(env.EBAY_DELAY_MS, 2000),
      artnet: parseNumber(env.ARTNET_DELAY_MS, 2000),
      invaluable: parseNumber(env.INVALUABLE_DELAY_MS, 3000),
      liveauctioneers: parseNumber(env.LIVEAUCTIONEERS_DELAY_MS, 2500),
      craigslist: parseNumber(env.CRAIGSLIST_DELAY_MS, 2000),
    },

    LOG_LEVEL: parseLogLevel(env.LOG_LEVEL),
    PORT: env.PORT ? parseNumber(env.PORT, 3000) : null,
    AGENT_API_TOKEN: env.AGENT_API_TOKEN || '',

    DRY_RUN: argv.includes('--dry-run'),
    PLATFORM: parsePlatformFlag(argv),
  };
}

type StringSetting = {
  [K in keyof AppConfig]: AppConfig[K] extends string ? K : never;
}[keyof AppConfig];

/** Returns a string setting that must be present for the caller to work. */
export function requireSetting(config: AppConfig, name: StringSetting): string {
  const value = config[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function hasEbayApiCredentials(config: AppConfig): boolean {
  return Boolean(config.EBAY_APP_ID && config.EBAY_CERT_ID);
}
