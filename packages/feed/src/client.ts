import type { Transaction } from '@whale-signal/core';
import { FeedError } from './errors.js';
import { FeedResponseSchema, parseFeedItem } from './schema.js';

const USER_AGENT = 'whale-signal/0.1.0';

/**
 * Feed client configuration
 */
export interface FeedClientConfig {
  /** Transactions endpoint */
  url: string;

  apiKey: string;

  /** Minimum USD value of a reported transaction */
  minValue: number;

  /** Page size requested from the feed */
  limit: number;

  /** Per-request timeout in milliseconds (default: 15000) */
  timeoutMs?: number;

  /** Override global fetch (for testing). */
  fetchFn?: typeof globalThis.fetch;
}

/**
 * Closed time window in unix seconds; the feed treats `end` as inclusive
 */
export interface TimeWindow {
  start: number;
  end: number;
}

export interface FetchOptions {
  /** Allow one fresh request per failing page (default: true) */
  retry?: boolean;
}

/**
 * Result of fetching a window. Transactions from pages that succeeded are kept
 * even when a later page fails.
 */
export interface FetchResult {
  /** Last URL requested, with the API key redacted */
  requestUrl: string;

  transactions: Transaction[];

  /** HTTP requests issued, retries included */
  requests: number;

  /** Pages successfully read */
  pages: number;

  /** One line per feed item that failed validation and was left out */
  skipped: string[];

  error?: FeedError;
}

interface Page {
  transactions: Transaction[];
  skipped: string[];
  count: number;
  cursor?: string;
}

type PageOutcome = { ok: true; page: Page } | { ok: false; error: FeedError };

/**
 * Replace the api_key query parameter so URLs can be logged
 */
export function redactApiKey(url: URL): string {
  const copy = new URL(url);
  if (copy.searchParams.has('api_key')) {
    copy.searchParams.set('api_key', '***');
  }
  return copy.toString();
}

/**
 * FeedClient - pages through the transaction feed for a time window
 */
export class FeedClient {
  private readonly config: Required<Omit<FeedClientConfig, 'fetchFn'>>;
  private readonly doFetch: typeof globalThis.fetch;

  constructor(config: FeedClientConfig) {
    this.config = {
      url: config.url,
      apiKey: config.apiKey,
      minValue: config.minValue,
      limit: config.limit,
      timeoutMs: config.timeoutMs ?? 15000,
    };
    this.doFetch = config.fetchFn ?? ((input, init) => globalThis.fetch(input, init));

    if (!Number.isInteger(this.config.limit) || this.config.limit < 1) {
      throw new Error('Feed page limit must be a positive integer');
    }
  }

  /**
   * Build the request URL for one page
   */
  buildUrl(window: TimeWindow, cursor?: string): URL {
    const url = new URL(this.config.url);
    url.searchParams.set('api_key', this.config.apiKey);
    url.searchParams.set('min_value', String(this.config.minValue));
    url.searchParams.set('start', String(window.start));
    url.searchParams.set('end', String(window.end));
    url.searchParams.set('limit', String(this.config.limit));
    if (cursor) {
      url.searchParams.set('cursor', cursor);
    }
    return url;
  }

  /**
   * Fetch every page of the window.
   *
   * Keeps requesting with the returned cursor while a page reports at least
   * `limit` items. Never rejects: failures come back in `error` next to the
   * transactions gathered so far. Items that fail validation are left out and
   * listed in `skipped`; the rest of their page is kept.
   */
  async fetchWindow(window: TimeWindow, options: FetchOptions = {}): Promise<FetchResult> {
    const retry = options.retry ?? true;
    const transactions: Transaction[] = [];
    const skipped: string[] = [];
    let requests = 0;
    let pages = 0;
    let cursor: string | undefined;
    let requestUrl = '';

    for (;;) {
      const url = this.buildUrl(window, cursor);
      requestUrl = redactApiKey(url);

      let outcome = await this.requestPage(url);
      requests++;

      if (!outcome.ok && retry && outcome.error.retryable) {
        outcome = await this.requestPage(url);
        requests++;
      }

      if (!outcome.ok) {
        return { requestUrl, transactions, requests, pages, skipped, error: outcome.error };
      }

      pages++;
      transactions.push(...outcome.page.transactions);
      skipped.push(...outcome.page.skipped.map((line) => `page ${pages} ${line}`));

      // A short page is the last one; a full page without a cursor cannot be continued
      if (outcome.page.count < this.config.limit || !outcome.page.cursor) {
        break;
      }
      cursor = outcome.page.cursor;
    }

    return { requestUrl, transactions, requests, pages, skipped };
  }

  private async send(
    url: URL
  ): Promise<{ ok: true; status: number; body: string } | { ok: false; error: FeedError }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.doFetch(url.toString(), {
        signal: controller.signal,
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      });
      return { ok: true, status: response.status, body: await response.text() };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          ok: false,
          error: new FeedError('network', `Feed request timed out after ${this.config.timeoutMs}ms`),
        };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: new FeedError('network', `Feed request failed: ${message}`) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async requestPage(url: URL): Promise<PageOutcome> {
    const sent = await this.send(url);
    if (!sent.ok) {
      return sent;
    }
    const { status, body } = sent;

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return {
        ok: false,
        error: new FeedError('decode', `Feed response is not valid JSON (HTTP ${status})`, status),
      };
    }

    const result = FeedResponseSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      return {
        ok: false,
        error: new FeedError('decode', `Feed response has an unexpected shape: ${issues}`, status),
      };
    }

    const response = result.data;
    if (response.result !== 'success') {
      const message = response.message || `Feed reported result "${response.result}"`;
      return { ok: false, error: new FeedError('upstream', message, status) };
    }

    const transactions: Transaction[] = [];
    const skipped: string[] = [];
    response.transactions.forEach((raw, index) => {
      const item = parseFeedItem(raw);
      if (item.ok) {
        transactions.push(item.transaction);
      } else {
        skipped.push(`item ${index}: ${item.reason}`);
      }
    });

    return {
      ok: true,
      page: {
        transactions,
        skipped,
        count: response.count ?? response.transactions.length,
        cursor: response.cursor,
      },
    };
  }
}

/**
 * Create a feed client from configuration
 */
export function createFeedClient(config: FeedClientConfig): FeedClient {
  return new FeedClient(config);
}

/**
 * Fetch a whole window with a one-off client
 */
export function fetchTransactions(
  window: TimeWindow,
  config: FeedClientConfig,
  options?: FetchOptions
): Promise<FetchResult> {
  return createFeedClient(config).fetchWindow(window, options);
}
