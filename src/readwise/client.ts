/**
 * Readwise HTTP client.
 *
 * Thin wrapper over fetch with bounded retry: rate limits (429), server
 * errors (5xx) and network failures/timeouts are retried with exponential
 * backoff (honouring Retry-After), everything else fails immediately.
 */

import type { Highlight, Page, ReaderDocument } from '../types.js';
import { decodeDocumentPage, decodeExportPage, decodeHighlightListPage } from './decode.js';

export const READWISE_BASE_URL = 'https://readwise.io/api';

export type ApiVersion = 'v2' | 'v3';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 5_000,
  maxDelayMs: 60_000,
  backoffMultiplier: 2, // 5s, 10s, 20s
  timeoutMs: 30_000,
};

export interface ListDocumentsParams {
  category?: string;
  updatedAfter?: string | null;
  pageCursor?: string | null;
  limit?: number;
}

export interface ExportHighlightsParams {
  updatedAfter?: string | null;
  pageCursor?: string | null;
  bookIds?: string[];
  pageSize?: number;
}

export interface ListHighlightsParams {
  pageSize?: number;
  bookId?: string;
}

/** The upstream operations the importer depends on. */
export interface ReadwiseApi {
  listDocuments(params: ListDocumentsParams): Promise<Page<ReaderDocument>>;
  exportHighlights(params: ExportHighlightsParams): Promise<Page<Highlight>>;
  listHighlights(params: ListHighlightsParams): Promise<Page<Highlight>>;
}

export interface ReadwiseClientOptions {
  baseUrl?: string;
  retry?: Partial<RetryPolicy>;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

/** Error response from the Readwise API. */
export class ReadwiseApiError extends Error {
  readonly status: number;
  readonly endpoint: string;

  constructor(status: number, endpoint: string, body: string) {
    super(`Readwise API error (${status}) on ${endpoint}: ${body}`);
    this.name = 'ReadwiseApiError';
    this.status = status;
    this.endpoint = endpoint;
  }
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** Retry-After in seconds, or null when absent or in HTTP-date form. */
function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

type QueryValue = string | number | null | undefined;

export class ReadwiseClient implements ReadwiseApi {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(token: string, options: ReadwiseClientOptions = {}) {
    this.token = token;
    this.baseUrl = options.baseUrl ?? READWISE_BASE_URL;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  async listDocuments(params: ListDocumentsParams): Promise<Page<ReaderDocument>> {
    const data = await this.request('v3', '/list/', {
      category: params.category,
      updatedAfter: params.updatedAfter,
      pageCursor: params.pageCursor,
      limit: params.limit,
    });
    return decodeDocumentPage(data);
  }

  async exportHighlights(params: ExportHighlightsParams): Promise<Page<Highlight>> {
    const data = await this.request('v2', '/export/', {
      updatedAfter: params.updatedAfter,
      pageCursor: params.pageCursor,
      ids: params.bookIds && params.bookIds.length > 0 ? params.bookIds.join(',') : undefined,
      page_size: params.pageSize,
    });
    return decodeExportPage(data);
  }

  async listHighlights(params: ListHighlightsParams): Promise<Page<Highlight>> {
    const data = await this.request('v2', '/highlights/', {
      page_size: params.pageSize,
      book_id: params.bookId,
    });
    return decodeHighlightListPage(data);
  }

  /** Backoff delay for a retry attempt (0-based), capped at maxDelayMs. */
  backoffDelay(attempt: number, retryAfter: string | null): number {
    const retryAfterSeconds = parseRetryAfter(retryAfter);
    const delay = retryAfterSeconds !== null
      ? retryAfterSeconds * 1000
      : this.retry.baseDelayMs * this.retry.backoffMultiplier ** attempt;
    return Math.min(delay, this.retry.maxDelayMs);
  }

  /**
   * Authenticated GET returning parsed JSON.
   * Throws ReadwiseApiError for non-retryable statuses or when retries run out.
   */
  async request(version: ApiVersion, endpoint: string, params: Record<string, QueryValue> = {}): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${version}${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null && value !== '') {
        url.searchParams.set(key, String(value));
      }
    }

    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < this.retry.maxRetries;

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: { Authorization: `Token ${this.token}` },
          signal: AbortSignal.timeout(this.retry.timeoutMs),
        });
      } catch (error) {
        if (!canRetry) {
          console.error(`Request error for ${endpoint}: ${error instanceof Error ? error.message : String(error)}`);
          throw error;
        }
        const delay = this.backoffDelay(attempt, null);
        console.error(
          `Request error on ${endpoint} (${error instanceof Error ? error.message : String(error)}), ` +
          `retrying in ${delay / 1000}s (attempt ${attempt + 1}/${this.retry.maxRetries})`,
        );
        await this.sleep(delay);
        continue;
      }

      if (response.ok) {
        return response.json();
      }

      const body = await response.text();
      if (isRetryableStatus(response.status) && canRetry) {
        const delay = this.backoffDelay(attempt, response.headers.get('Retry-After'));
        const label = response.status === 429 ? 'Rate limit hit (429)' : `Server error (${response.status})`;
        console.error(
          `${label} on ${endpoint}, retrying in ${delay / 1000}s (attempt ${attempt + 1}/${this.retry.maxRetries})`,
        );
        await this.sleep(delay);
        continue;
      }

      if (isRetryableStatus(response.status)) {
        console.error(`Retries exhausted for ${endpoint}`);
      }
      throw new ReadwiseApiError(response.status, endpoint, body);
    }
  }
}
