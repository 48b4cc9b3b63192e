import { PlaywrightBrowserSession, withBrowserSession, type BrowserSession } from './browser-session';
import { PipelineExhaustedError, errorMessage } from './errors';
import { FallbackFetcher } from './fallback-fetcher';
import { ListingExtractor } from './listing-extractor';
import { PaginationTraverser } from './paginator';
import { SearchStrategySelector } from './search-strategy';
import { dedupeListings, type ScrapeOutcome, type SearchCriteria } from './types';
import { getMarket, listingIndexUrls } from '../config/markets';
import type { RunConfig } from '../config/run-config';
import { createHttpGet, type HttpGet } from '../utils/http';
import { parseProxyUrl } from '../utils/proxy';
import { RateLimiter, systemClock, type Clock } from '../utils/rate-limiter';
import { RetryPolicy } from '../utils/retry';

export type ScrapeDependencies = {
  openSession?: () => BrowserSession;
  http?: HttpGet;
  clock?: Clock;
};

/**
 * Scrapes autochek.africa for one make/model/year. Browser first; any failure
 * of the browser path (including no strategy surfacing listings) hands over to
 * the static fallback, so this only rejects when the run is cancelled.
 */
export async function scrapeAutochek(
  criteria: SearchCriteria,
  config: RunConfig,
  deps: ScrapeDependencies = {},
  signal?: AbortSignal,
): Promise<ScrapeOutcome> {
  const market = getMarket(config.market);
  const clock = deps.clock ?? systemClock;
  const rateLimiter = new RateLimiter(config.rateLimitSeconds * 1000, clock);
  const extractor = new ListingExtractor(market, config.selectors);
  const finish = (listings: ScrapeOutcome['listings']) => (config.dedupe ? dedupeListings(listings) : listings);

  const openSession =
    deps.openSession ??
    (() =>
      new PlaywrightBrowserSession({
        headless: config.headless,
        navigationTimeoutMs: config.navigationTimeoutMs,
        stableTimeoutMs: config.stableTimeoutMs,
        proxy: parseProxyUrl(config.proxyUrl),
      }));

  console.log(`[Autochek] Searching ${market.name} for ${criteria.make} ${criteria.model} ${criteria.year}`);

  try {
    // Opening the session loads the base URL, the first rate-limited fetch
    await rateLimiter.wait();
    return await withBrowserSession(
      openSession(),
      market.baseUrl,
      async (session): Promise<ScrapeOutcome> => {
        const selector = new SearchStrategySelector(session, extractor, rateLimiter, {
          candidateUrls: listingIndexUrls(market),
          strategies: config.strategies,
          selectors: config.selectors,
        });
        const selection = await selector.select(criteria, signal);
        if (selection.kind === 'exhausted') throw new PipelineExhaustedError(selection.attempts);

        const paginator = new PaginationTraverser(session, extractor, rateLimiter, {
          maxPages: config.maxPages,
          pageParam: market.pageParam,
          nextPageSelectors: config.selectors.nextPage,
        });
        const { listings, pagesVisited, stopReason } = await paginator.traverse(signal);

        console.log(
          `[Autochek] ${listings.length} listings over ${pagesVisited} pages via ${selection.strategy} (${stopReason})`,
        );
        return {
          kind: 'success',
          criteria,
          listings: finish(listings),
          entryUrl: selection.url,
          strategy: selection.strategy,
          pagesVisited,
          stopReason,
        };
      },
      signal,
    );
  } catch (err) {
    if (signal?.aborted) throw err;

    const reason = errorMessage(err);
    console.error(`[Autochek] Browser pipeline failed: ${reason}, switching to static fallback`);

    const fetcher = new FallbackFetcher({
      market,
      http: deps.http ?? createHttpGet(config.httpTimeoutMs),
      rateLimiter,
      retryPolicy: new RetryPolicy({
        maxRetries: config.maxRetries,
        baseDelayMs: config.retryBaseDelayMs,
        jitterMs: config.retryJitterMs,
        sleep: clock.sleep,
      }),
      extractor: new ListingExtractor(market, config.selectors),
    });
    const listings = await fetcher.fetch(criteria, signal);
    signal?.throwIfAborted();

    console.log(`[Autochek] Fallback returned ${listings.length} listings`);
    return { kind: 'fallback', criteria, listings: finish(listings), reason };
  }
}
