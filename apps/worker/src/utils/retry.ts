import { NetworkError, errorMessage } from '../scrapers/errors';
import type { HttpGet, HttpResponse } from './http';

export type Sleep = (ms: number) => Promise<void>;

export type RetryOptions = {
  maxRetries?: number;
  baseDelay?: number;
  jitter?: number;
  shouldRetry?: (err: Error) => boolean;
  sleep?: Sleep;
  label?: string;
};

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    jitter = 1000,
    shouldRetry = () => true,
    sleep = delay,
    label = 'Retry',
  } = options;
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (!shouldRetry(lastError)) throw lastError;
      if (attempt < maxRetries) {
        const wait = backoffDelay(attempt, baseDelay, jitter);
        console.log(`[${label}] Retry ${attempt + 1}/${maxRetries} after ${Math.round(wait)}ms: ${lastError.message}`);
        await sleep(wait);
      }
    }
  }

  throw lastError ?? new Error('withRetry ran no attempts');
}

export function backoffDelay(attempt: number, baseDelay: number, jitter: number): number {
  return baseDelay * Math.pow(2, attempt) + Math.random() * jitter;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryPolicyOptions = {
  maxRetries: number;
  baseDelayMs: number;
  jitterMs?: number;
  sleep?: Sleep;
};

/**
 * Retries HTTP GETs that fail with a 5xx status or never get a response.
 * A 4xx is final and surfaces as a NetworkError straight away; running out of
 * attempts raises a NetworkError with the last status seen.
 */
export class RetryPolicy {
  constructor(private readonly options: RetryPolicyOptions) {}

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  async get(http: HttpGet, url: string): Promise<HttpResponse> {
    let lastStatus: number | null = null;

    try {
      return await withRetry(
        async () => {
          let response: HttpResponse;
          try {
            response = await http(url);
          } catch (err) {
            throw new NetworkError(url, null, `Request to ${url} failed: ${errorMessage(err)}`, { cause: err });
          }
          lastStatus = response.status;
          if (response.status >= 400) throw new NetworkError(url, response.status);
          return response;
        },
        {
          maxRetries: this.options.maxRetries,
          baseDelay: this.options.baseDelayMs,
          jitter: this.options.jitterMs ?? 0,
          sleep: this.options.sleep,
          shouldRetry: (err) => !(err instanceof NetworkError) || err.retryable,
          label: 'Retry',
        },
      );
    } catch (err) {
      if (err instanceof NetworkError && !err.retryable) throw err;
      const attempts = this.options.maxRetries + 1;
      throw new NetworkError(url, lastStatus, `Gave up on ${url} after ${attempts} attempts: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
