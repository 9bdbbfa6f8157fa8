import { isAxiosError } from 'axios';

/**
 * Raised when a scraper variant needs something the host does not have,
 * e.g. a Chromium executable for the browser-backed auction scrapers.
 */
export class MissingDependencyError extends Error {
  constructor(
    readonly dependency: string,
    message: string
  ) {
    super(message);
    this.name = 'MissingDependencyError';
  }
}

export function describeError(error: unknown): string {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status) return `HTTP ${status}: ${error.message}`;
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return `timeout: ${error.message}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export function responseStatus(error: unknown): number | null {
  if (isAxiosError(error)) return error.response?.status ?? null;
  return null;
}
