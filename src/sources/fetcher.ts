/**
 * AdFeed — Page Fetcher
 *
 * Retrieves the raw search page for a target. The poll cycle only depends on
 * the PageFetcher interface; HttpPageFetcher is the plain-HTTP implementation.
 *
 * Transient failures (network errors, timeouts, 429 and 5xx) are retried with
 * exponential backoff until the attempt or elapsed-time budget runs out.
 * Soft blocks and other HTTP errors fail at once.
 */

import { setTimeout as wait } from 'timers/promises';
import type { Target } from '../types';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'fetcher' });

// ============================================================
// TYPES
// ============================================================

export interface FetchOptions {
  /** Aborted when the scheduler shuts down */
  signal?: AbortSignal;
}

export interface PageFetcher {
  fetch(target: Target, options?: FetchOptions): Promise<string>;
}

export class FetchError extends Error {
  readonly retryable: boolean;

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown; retryable?: boolean }
  ) {
    super(message, options);
    this.name = 'FetchError';
    this.retryable = options?.retryable ?? false;
  }
}

export interface RetryPolicy {
  /** Attempts per page, the first included */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** No further attempt once this much time has passed since the first */
  maxElapsedMs: number;
  retryableStatusCodes: number[];
}

export type RetrySleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface HttpPageFetcherConfig {
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  userAgents?: readonly string[];
  fetchImpl?: typeof fetch;
  retry?: Partial<RetryPolicy>;
  sleep?: RetrySleep;
  now?: () => number;
}

// ============================================================
// CONSTANTS
// ============================================================

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 500,
  maxDelayMs: 15_000,
  backoffMultiplier: 1.5,
  maxElapsedMs: 60_000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

export const USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:130.0) Gecko/20100101 Firefox/130.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:130.0) Gecko/20100101 Firefox/130.0',
];

const SOFT_BLOCK_MARKERS = ['login', 'checkpoint'];

/**
 * True when the final URL after redirects is a login or checkpoint wall.
 * Only the path is checked; a search query may contain either word.
 */
export function isSoftBlocked(finalUrl: string): boolean {
  let path: string;
  try {
    path = new URL(finalUrl).pathname.toLowerCase();
  } catch {
    return false;
  }
  return SOFT_BLOCK_MARKERS.some((marker) => path.includes(marker));
}

// ============================================================
// HTTP FETCHER
// ============================================================

export class HttpPageFetcher implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly userAgents: readonly string[];
  private readonly fetchImpl: typeof fetch;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: RetrySleep;
  private readonly now: () => number;
  private nextAgent = 0;

  constructor(config: HttpPageFetcherConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.userAgents = config.userAgents?.length ? config.userAgents : USER_AGENTS;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...config.retry };
    this.sleep = config.sleep ?? ((ms, signal) => wait(ms, undefined, { signal }));
    this.now = config.now ?? Date.now;
  }

  /**
   * Rotate through the configured user agents, one per request.
   */
  private userAgent(): string {
    const agent = this.userAgents[this.nextAgent % this.userAgents.length];
    this.nextAgent++;
    return agent;
  }

  private failureReason(error: unknown, timeout: AbortSignal): string {
    if (timeout.aborted) return `Timeout after ${this.timeoutMs}ms`;
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Backoff before the next attempt, or null when the failure is final.
   */
  private retryDelay(
    error: unknown,
    attempt: number,
    startedAt: number,
    signal?: AbortSignal
  ): number | null {
    const policy = this.retryPolicy;
    if (signal?.aborted) return null;
    if (!(error instanceof FetchError) || !error.retryable) return null;
    if (attempt >= policy.maxAttempts) return null;

    const delayMs = Math.min(
      policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
      policy.maxDelayMs
    );
    if (this.now() - startedAt + delayMs > policy.maxElapsedMs) return null;
    return delayMs;
  }

  async fetch(target: Target, options: FetchOptions = {}): Promise<string> {
    const startedAt = this.now();

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.fetchOnce(target, options);
      } catch (error) {
        const delayMs = this.retryDelay(error, attempt, startedAt, options.signal);
        if (delayMs === null) throw error;

        log.warn('Fetch failed, retrying', {
          url: target.url,
          attempt,
          delayMs,
          error: errorMessage(error),
        });
        await this.sleep(delayMs, options.signal);
      }
    }
  }

  /**
   * Single request, no retries.
   */
  private async fetchOnce(target: Target, options: FetchOptions): Promise<string> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await this.fetchImpl(target.url, {
        signal,
        redirect: 'follow',
        headers: {
          'User-Agent': this.userAgent(),
          Accept: 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
      });
    } catch (error) {
      const reason = this.failureReason(error, timeout);
      throw new FetchError(`Request to ${target.url} failed: ${reason}`, target.url, undefined, {
        cause: error,
        retryable: true,
      });
    }

    if (response.url && isSoftBlocked(response.url)) {
      throw new FetchError(
        `Potential soft block detected: redirected to ${response.url}`,
        target.url,
        response.status
      );
    }

    if (!response.ok) {
      throw new FetchError(
        `Request to ${target.url} returned HTTP ${response.status}`,
        target.url,
        response.status,
        { retryable: this.retryPolicy.retryableStatusCodes.includes(response.status) }
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      const reason = this.failureReason(error, timeout);
      throw new FetchError(`Reading ${target.url} failed: ${reason}`, target.url, response.status, {
        cause: error,
        retryable: true,
      });
    }
    log.debug('Page fetched', { url: target.url, bytes: body.length });
    return body;
  }
}
