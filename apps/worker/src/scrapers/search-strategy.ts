import type { BrowserSession } from './browser-session';
import { NavigationError, errorMessage, type StrategyAttempt } from './errors';
import type { ListingExtractor } from './listing-extractor';
import type { SelectorSet } from './selectors';
import type { SearchCriteria, StrategyName } from './types';
import type { RateLimiter } from '../utils/rate-limiter';

export type StrategySelection =
  | { kind: 'found'; url: string; strategy: StrategyName }
  | { kind: 'exhausted'; attempts: StrategyAttempt[] };

export type SearchStrategyOptions = {
  candidateUrls: readonly string[];
  strategies: readonly StrategyName[];
  selectors: SelectorSet;
};

export function buildParamUrl(baseUrl: string, criteria: SearchCriteria): string {
  const url = new URL(baseUrl);
  url.searchParams.set('make', criteria.make);
  url.searchParams.set('model', criteria.model);
  url.searchParams.set('year', String(criteria.year));
  return url.toString();
}

/**
 * Finds a way to get the storefront to show listings: for each candidate
 * index URL, try each strategy in order until one leaves listing cards on
 * the page. The session is left on the page that succeeded.
 */
export class SearchStrategySelector {
  constructor(
    private readonly session: BrowserSession,
    private readonly extractor: ListingExtractor,
    private readonly rateLimiter: RateLimiter,
    private readonly options: SearchStrategyOptions,
  ) {}

  async select(criteria: SearchCriteria, signal?: AbortSignal): Promise<StrategySelection> {
    const attempts: StrategyAttempt[] = [];

    for (const candidate of this.options.candidateUrls) {
      signal?.throwIfAborted();
      console.log(`[Strategy] Trying ${candidate}`);

      try {
        await this.load(candidate);
      } catch (err) {
        if (!(err instanceof NavigationError)) throw err;
        console.warn(`[Strategy] ${err.message}, moving to next candidate`);
        attempts.push({ url: candidate, strategy: 'navigate', outcome: 'unavailable', detail: err.message });
        continue;
      }

      for (const strategy of this.options.strategies) {
        signal?.throwIfAborted();
        const attempt = await this.attempt(strategy, candidate, criteria);
        attempts.push(attempt);

        if (attempt.outcome === 'found') {
          const url = this.session.currentUrl();
          console.log(`[Strategy] Listings found via ${strategy} at ${url}`);
          return { kind: 'found', url, strategy };
        }
        if (attempt.outcome === 'error') {
          console.warn(`[Strategy] ${strategy} on ${candidate} failed: ${attempt.detail ?? 'unknown error'}`);
        } else {
          console.log(`[Strategy] ${strategy} on ${candidate}: ${attempt.detail ?? attempt.outcome}`);
        }
      }
    }

    console.warn(`[Strategy] Exhausted ${attempts.length} attempts across ${this.options.candidateUrls.length} URLs`);
    return { kind: 'exhausted', attempts };
  }

  async hasListings(): Promise<boolean> {
    return (await this.extractor.countCards(await this.session.root())) > 0;
  }

  private async attempt(strategy: StrategyName, candidate: string, criteria: SearchCriteria): Promise<StrategyAttempt> {
    const base = { url: candidate, strategy };
    try {
      switch (strategy) {
        case 'form':
          return { ...base, ...(await this.submitForm(criteria)) };
        case 'url-params':
          await this.load(buildParamUrl(candidate, criteria));
          return { ...base, ...(await this.check()) };
        case 'direct':
          await this.load(candidate);
          return { ...base, ...(await this.check()) };
      }
    } catch (err) {
      return { ...base, outcome: 'error', detail: errorMessage(err) };
    }
  }

  private async submitForm(criteria: SearchCriteria): Promise<Pick<StrategyAttempt, 'outcome' | 'detail'>> {
    const { selectors } = this.options;
    const fields: Array<[readonly string[], string]> = [
      [selectors.formMake, criteria.make],
      [selectors.formModel, criteria.model],
      [selectors.formYear, String(criteria.year)],
    ];

    let filled = 0;
    for (const [chain, value] of fields) {
      const control = await this.session.query(chain);
      if (!control) continue;
      if ((await control.tagName()) === 'select') {
        if (await this.session.selectOption(control, value)) filled++;
      } else {
        await this.session.fill(control, value);
        filled++;
      }
    }
    if (filled === 0) return { outcome: 'unavailable', detail: 'no search form controls' };

    const submit = await this.session.query(selectors.formSubmit);
    if (!submit) return { outcome: 'unavailable', detail: 'no submit control' };

    await this.rateLimiter.wait();
    await this.session.click(submit);
    await this.session.waitForStable();
    return this.check();
  }

  private async check(): Promise<Pick<StrategyAttempt, 'outcome' | 'detail'>> {
    return (await this.hasListings()) ? { outcome: 'found' } : { outcome: 'no-listings', detail: 'no listing cards' };
  }

  private async load(url: string): Promise<void> {
    await this.rateLimiter.wait();
    await this.session.navigate(url);
    await this.session.waitForStable();
  }
}
