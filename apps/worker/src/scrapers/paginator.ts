import type { BrowserSession } from './browser-session';
import { errorMessage } from './errors';
import type { ListingExtractor } from './listing-extractor';
import type { PaginationStopReason, VehicleListing } from './types';
import type { RateLimiter } from '../utils/rate-limiter';

export type PaginationOptions = {
  maxPages: number;
  pageParam: string;
  nextPageSelectors: readonly string[];
};

export type PaginationResult = {
  listings: VehicleListing[];
  pagesVisited: number;
  stopReason: PaginationStopReason;
};

export function buildPageUrl(currentUrl: string, pageParam: string, pageNumber: number): string {
  const url = new URL(currentUrl);
  url.searchParams.set(pageParam, String(pageNumber));
  return url.toString();
}

export class PaginationTraverser {
  constructor(
    private readonly session: BrowserSession,
    private readonly extractor: ListingExtractor,
    private readonly rateLimiter: RateLimiter,
    private readonly options: PaginationOptions,
  ) {}

  /** Reads the page the session is on, then keeps advancing until a stop condition. */
  async traverse(signal?: AbortSignal): Promise<PaginationResult> {
    const listings: VehicleListing[] = [];
    let previousIds: string | null = null;
    let pagesVisited = 0;

    while (true) {
      signal?.throwIfAborted();
      const pageNumber = pagesVisited + 1;

      let page: readonly VehicleListing[];
      try {
        page = await this.extractor.extractPage(await this.session.root(), this.session.currentUrl());
      } catch (err) {
        if (listings.length === 0 || signal?.aborted) throw err;
        console.warn(`[Paginator] Page ${pageNumber} failed: ${errorMessage(err)}, keeping ${listings.length} listings`);
        return { listings, pagesVisited, stopReason: 'page-error' };
      }

      if (page.length === 0) {
        console.log(`[Paginator] No listings on page ${pageNumber}, stopping`);
        return { listings, pagesVisited, stopReason: 'empty-page' };
      }

      const ids = page.map((l) => l.listing_id).join('\n');
      if (ids === previousIds) {
        console.log(`[Paginator] Page ${pageNumber} repeats the previous page, stopping`);
        return { listings, pagesVisited, stopReason: 'repeated-page' };
      }
      previousIds = ids;

      listings.push(...page);
      pagesVisited = pageNumber;
      console.log(`[Paginator] Page ${pageNumber}: ${page.length} listings (${listings.length} total)`);

      if (pagesVisited >= this.options.maxPages) {
        console.log(`[Paginator] Reached page limit (${this.options.maxPages}), stopping`);
        return { listings, pagesVisited, stopReason: 'max-pages' };
      }

      try {
        if (!(await this.advance(pageNumber + 1))) {
          return { listings, pagesVisited, stopReason: 'no-next-page' };
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        console.warn(`[Paginator] Could not reach page ${pageNumber + 1}: ${errorMessage(err)}, keeping ${listings.length} listings`);
        return { listings, pagesVisited, stopReason: 'page-error' };
      }
    }
  }

  private async advance(nextPage: number): Promise<boolean> {
    await this.rateLimiter.wait();

    const next = await this.session.query(this.options.nextPageSelectors);
    if (next) {
      if (await isDisabled(next)) {
        console.log('[Paginator] Next control is disabled, last page reached');
        return false;
      }
      await this.session.click(next);
      await this.session.waitForStable();
      return true;
    }

    // No pagination control rendered: ask for the page by number
    await this.session.navigate(buildPageUrl(this.session.currentUrl(), this.options.pageParam, nextPage));
    await this.session.waitForStable();
    return true;
  }
}

async function isDisabled(node: { attr(name: string): Promise<string | null> }): Promise<boolean> {
  if ((await node.attr('disabled')) !== null) return true;
  return (await node.attr('aria-disabled')) === 'true';
}
