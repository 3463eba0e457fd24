/**
 * Results API Client
 *
 * Read-only JSON client for the election results API:
 *   /{year}/st                                   nation
 *   /{year}/st/{county}                          county
 *   /{year}/st/{county}/{municipality}           municipality
 *   /{year}/st/{county}/{municipality}/{district} district
 */

import {
  ArchiveError,
  silentLogger,
  type ElectionDocument,
  type Entity,
  type Logger,
} from '@results-archive/core';
import { withRetries, type RetryConfig } from './retry.js';

export interface ResultsClientConfig {
  /** API base URL (e.g. https://valgresultat.no/api) */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  retry?: RetryConfig;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  logger?: Logger;
}

/** Non-2xx response */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
  }
}

class RequestTimeoutError extends Error {
  constructor(readonly url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Network failures, timeouts, rate limiting and server errors are retried;
 * other client errors and malformed bodies are not.
 */
export function isRetryableFetchError(err: unknown): boolean {
  if (err instanceof HttpStatusError) {
    return err.status === 429 || err.status >= 500;
  }
  if (err instanceof RequestTimeoutError) return true;
  // fetch() rejects with TypeError on network failures
  return err instanceof TypeError;
}

function isRecord(value: unknown): value is ElectionDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ResultsApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly config: ResultsClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * API path of an entity's results document for one election year.
   */
  pathFor(year: string, entity: Entity): string {
    const segments = [year, 'st'];
    if (entity.path.county) segments.push(entity.path.county);
    if (entity.path.municipality) segments.push(entity.path.municipality);
    if (entity.path.district) segments.push(entity.path.district);
    return `/${segments.map(encodeURIComponent).join('/')}`;
  }

  async fetchEntity(year: string, entity: Entity): Promise<ElectionDocument> {
    return this.fetchPath(this.pathFor(year, entity));
  }

  /**
   * GET a path relative to the base URL (as found in `_links.*.href`).
   *
   * @throws ArchiveError FETCH_FAILED once retries are exhausted
   */
  async fetchPath(apiPath: string): Promise<ElectionDocument> {
    const url = `${this.baseUrl}${apiPath.startsWith('/') ? '' : '/'}${apiPath}`;

    try {
      return await withRetries(
        () => this.request(url),
        this.config.retry,
        isRetryableFetchError,
        {
          onRetry: (err, next) =>
            this.logger.warn('Fetch failed, retrying', {
              url,
              attempt: next.attempt,
              delayMs: next.delayMs,
              error: err,
            }),
        }
      );
    } catch (err) {
      throw new ArchiveError({
        code: 'FETCH_FAILED',
        message: `Failed to fetch ${url}: ${err instanceof Error ? err.message : String(err)}`,
        cause: err instanceof Error ? err : undefined,
        context: {
          url,
          status: err instanceof HttpStatusError ? err.status : undefined,
        },
      });
    }
  }

  private async request(url: string): Promise<ElectionDocument> {
    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new RequestTimeoutError(url, timeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new HttpStatusError(response.status, url);
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new Error(`Expected a JSON object from ${url}`);
    }
    return body;
  }
}
