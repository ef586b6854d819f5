import { FetchError } from '@shelfscan/scraper-sdk';
import { sleep } from './sleep.js';
import type { FetchRequestOptions, Fetcher } from './types.js';

export const DEFAULT_USER_AGENT = 'shelfscan/0.1 (+catalog indexer)';

class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly retryable: boolean,
    readonly retryAfterMs?: number,
  ) {
    super(`GET ${url} returned ${status}`);
    this.name = 'HttpStatusError';
  }
}

export interface HttpFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Minimum spacing between request starts, shared by every caller of this fetcher. */
  minIntervalMs?: number;
  retryBaseMs?: number;
  fetchImpl?: typeof fetch;
  /** Must settle early once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class HttpFetcher implements Fetcher {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly minIntervalMs: number;
  private readonly retryBaseMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private nextSlotAt = 0;

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.retryBaseMs = options.retryBaseMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
  }

  async fetch(url: string, options: FetchRequestOptions = {}): Promise<string> {
    const { signal } = options;
    let attempt = 0;
    while (true) {
      this.assertNotAborted(url, signal);
      await this.waitForRateWindow(signal);
      this.assertNotAborted(url, signal);

      try {
        return await this.requestOnce(url, signal);
      } catch (error) {
        const fetchError = this.toFetchError(url, error, signal);
        if (attempt >= this.maxRetries || fetchError.kind === 'permanent' || signal?.aborted) {
          throw fetchError;
        }

        await this.sleep(this.getRetryDelayMs(error, attempt), signal);
        attempt += 1;
      }
    }
  }

  private async requestOnce(url: string, signal: AbortSignal | undefined): Promise<string> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const response = await this.fetchImpl(url, {
      method: 'GET',
      redirect: 'follow',
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      headers: {
        Accept: 'text/html,application/xhtml+xml',
        'User-Agent': this.userAgent,
      },
    });

    if (!response.ok) {
      const retryable = response.status === 429 || response.status >= 500;
      throw new HttpStatusError(
        url,
        response.status,
        retryable,
        this.parseRetryAfter(response.headers.get('retry-after')),
      );
    }

    return response.text();
  }

  private toFetchError(url: string, error: unknown, signal: AbortSignal | undefined): FetchError {
    if (error instanceof HttpStatusError) {
      return new FetchError(
        error.retryable ? 'transient' : 'permanent',
        url,
        `GET ${url} returned ${error.status}`,
        error.status,
      );
    }

    if (error instanceof FetchError) {
      return error;
    }

    if (signal?.aborted) {
      return new FetchError('transient', url, `GET ${url} aborted`, undefined, { cause: error });
    }

    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new FetchError('transient', url, `GET ${url} timed out after ${this.timeoutMs}ms`, undefined, {
        cause: error,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new FetchError('transient', url, `GET ${url} failed: ${message}`, undefined, { cause: error });
  }

  private assertNotAborted(url: string, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new FetchError('transient', url, `GET ${url} aborted`);
    }
  }

  private parseRetryAfter(value: string | null): number | undefined {
    if (!value) return undefined;

    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds < 0) {
      return undefined;
    }

    return Math.round(seconds * 1000);
  }

  private getRetryDelayMs(error: unknown, attempt: number): number {
    if (error instanceof HttpStatusError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }

    const maxJitter = Math.floor(this.retryBaseMs / 2);
    const jitter = Math.floor(Math.random() * (maxJitter + 1));
    return this.retryBaseMs * 2 ** attempt + jitter;
  }

  /**
   * Reserve the next start slot. Concurrent callers get consecutive slots
   * `minIntervalMs` apart instead of queuing behind each other's responses.
   */
  private async waitForRateWindow(signal: AbortSignal | undefined): Promise<void> {
    if (this.minIntervalMs <= 0) return;

    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    if (slot > now) {
      await this.sleep(slot - now, signal);
    }
  }
}
