import { PermanentFetchError, TransientFetchError, type FetchResult, type Fetcher } from '@statejobs/source-sdk';

const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const DEFAULT_ACCEPT_LANGUAGE = 'nb-NO,nb;q=0.9,no;q=0.8,en;q=0.7';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface HttpFetcherOptions {
  userAgent: string;
  minDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  circuitFailureThreshold?: number;
  circuitOpenMs?: number;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

export class FetchCircuitOpenError extends PermanentFetchError {
  readonly reopenInMs: number;

  constructor(url: string, reopenInMs: number) {
    super(`Fetch circuit breaker is open for ${reopenInMs}ms`, url);
    this.name = 'FetchCircuitOpenError';
    this.reopenInMs = reopenInMs;
  }
}

/**
 * Polite HTML fetcher: one request at a time, a randomized delay between
 * requests, retries for transient failures and a circuit breaker that trips
 * after repeated 403/429 responses.
 */
export class HttpFetcher implements Fetcher {
  private readonly userAgent: string;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly circuitFailureThreshold: number;
  private readonly circuitOpenMs: number;
  private readonly extraHeaders: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  private sequence: Promise<void> = Promise.resolve();
  private lastRequestAt = 0;
  private consecutiveLimitFailures = 0;
  private circuitOpenedUntil = 0;

  constructor(options: HttpFetcherOptions) {
    this.userAgent = options.userAgent;
    this.minDelayMs = options.minDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 2500;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.circuitFailureThreshold = options.circuitFailureThreshold ?? 5;
    this.circuitOpenMs = options.circuitOpenMs ?? 5 * 60 * 1000;
    this.extraHeaders = options.headers ?? {};
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(url: string): Promise<FetchResult> {
    return this.enqueue(async () => {
      this.assertCircuitClosed(url);
      await this.waitForRateWindow();

      let attempt = 0;
      while (true) {
        try {
          const result = await this.requestOnce(url);
          this.recordSuccess();
          return result;
        } catch (error) {
          this.recordFailure(error);

          if (!(error instanceof TransientFetchError)) {
            throw error;
          }

          if (attempt >= this.maxRetries) {
            throw new PermanentFetchError(
              `Giving up on ${url} after ${attempt + 1} attempts: ${error.message}`,
              url,
              error.status,
              { cause: error },
            );
          }

          await sleep(this.getRetryDelayMs(error, attempt));
          attempt += 1;
        }
      }
    });
  }

  private async requestOnce(url: string): Promise<FetchResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        signal: controller.signal,
        headers: this.buildHeaders(),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientFetchError(`Request to ${url} failed: ${message}`, url, undefined, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      if (this.isRetryableStatus(response.status)) {
        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
        throw new TransientFetchError(`Request to ${url} returned ${response.status}`, url, response.status, retryAfter);
      }

      throw new PermanentFetchError(`Request to ${url} returned ${response.status}`, url, response.status);
    }

    return {
      url,
      status: response.status,
      body: await response.text(),
    };
  }

  private buildHeaders(): Record<string, string> {
    return {
      Accept: DEFAULT_ACCEPT,
      'Accept-Language': DEFAULT_ACCEPT_LANGUAGE,
      'User-Agent': this.userAgent,
      ...this.extraHeaders,
    };
  }

  private isRetryableStatus(status: number): boolean {
    return status === 429 || status >= 500;
  }

  private parseRetryAfter(value: string | null): number | undefined {
    if (!value) return undefined;

    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds < 0) {
      return undefined;
    }

    return Math.round(seconds * 1000);
  }

  private getRetryDelayMs(error: TransientFetchError, attempt: number): number {
    if (error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }

    const base = 500;
    const maxJitter = 250;
    const jitter = Math.floor(Math.random() * maxJitter);
    return base * 2 ** attempt + jitter;
  }

  private assertCircuitClosed(url: string): void {
    const now = Date.now();
    if (this.circuitOpenedUntil > now) {
      throw new FetchCircuitOpenError(url, this.circuitOpenedUntil - now);
    }
  }

  private recordSuccess(): void {
    this.consecutiveLimitFailures = 0;
  }

  private recordFailure(error: unknown): void {
    const status = error instanceof TransientFetchError || error instanceof PermanentFetchError ? error.status : undefined;
    if (status === 429 || status === 403) {
      this.consecutiveLimitFailures += 1;

      if (this.consecutiveLimitFailures >= this.circuitFailureThreshold) {
        this.circuitOpenedUntil = Date.now() + this.circuitOpenMs;
        this.consecutiveLimitFailures = 0;
      }

      return;
    }

    this.consecutiveLimitFailures = 0;
  }

  private randomDelayMs(): number {
    if (this.maxDelayMs <= this.minDelayMs) {
      return this.minDelayMs;
    }

    const spread = this.maxDelayMs - this.minDelayMs;
    return this.minDelayMs + Math.floor(Math.random() * (spread + 1));
  }

  private async waitForRateWindow(): Promise<void> {
    const now = Date.now();
    if (this.lastRequestAt === 0) {
      this.lastRequestAt = now;
      return;
    }

    const target = this.lastRequestAt + this.randomDelayMs();
    if (target > now) {
      await sleep(target - now);
    }

    this.lastRequestAt = Date.now();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.sequence.then(task, task);
    this.sequence = next.then(
      () => undefined,
      () => undefined,
    );

    return next;
  }
}
