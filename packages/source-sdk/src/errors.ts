export type FetchErrorKind = 'transient' | 'permanent';

export abstract class FetchError extends Error {
  abstract readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.url = url;
    this.status = status;
  }
}

/**
 * Retryable failure (network error, 429, 5xx). Only the fetcher sees these.
 */
export class TransientFetchError extends FetchError {
  readonly kind = 'transient' as const;
  readonly retryAfterMs?: number;

  constructor(message: string, url: string, status?: number, retryAfterMs?: number, options?: { cause?: unknown }) {
    super(message, url, status, options);
    this.name = 'TransientFetchError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class PermanentFetchError extends FetchError {
  readonly kind = 'permanent' as const;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(message, url, status, options);
    this.name = 'PermanentFetchError';
  }
}

export function isPermanentFetchError(error: unknown): error is PermanentFetchError {
  return error instanceof PermanentFetchError;
}
