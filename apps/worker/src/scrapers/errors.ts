import type { StrategyName } from './types';

export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NavigationError extends ScraperError {
  constructor(
    readonly url: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(`Failed to load ${url} within ${timeoutMs}ms`, options);
  }
}

/** No candidate selector in a chain matched. Informational: callers log it and move on. */
export class SelectorNotFoundError extends ScraperError {
  constructor(
    readonly chain: string,
    readonly selectors: readonly string[],
  ) {
    super(`No ${chain} selector matched (${selectors.length} candidates tried)`);
  }
}

export class ParseError extends ScraperError {
  constructor(
    readonly field: string,
    readonly input: string,
  ) {
    super(`Could not parse ${field} from "${input}"`);
  }
}

export class NetworkError extends ScraperError {
  constructor(
    readonly url: string,
    readonly status: number | null,
    message?: string,
    options?: { cause?: unknown },
  ) {
    super(message ?? `Request to ${url} failed${status === null ? '' : ` with status ${status}`}`, options);
  }

  /** Server errors and transport failures (no status) are worth another attempt; 4xx are not. */
  get retryable(): boolean {
    return this.status === null || this.status >= 500;
  }
}

export type StrategyAttempt = {
  url: string;
  strategy: StrategyName | 'navigate';
  outcome: 'found' | 'no-listings' | 'unavailable' | 'error';
  detail?: string;
};

export class PipelineExhaustedError extends ScraperError {
  constructor(readonly attempts: readonly StrategyAttempt[]) {
    super(`No search strategy surfaced listings (${attempts.length} attempts)`);
  }
}

export class ConfigError extends ScraperError {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
