/**
 * Static fallback tests
 * HTTP is faked per URL; no request leaves the process
 */

import { getMarket } from '../config/markets';
import { FallbackFetcher, flattenJsonLd } from '../scrapers/fallback-fetcher';
import type { SearchCriteria } from '../scrapers/types';
import type { HttpGet } from '../utils/http';
import { RateLimiter } from '../utils/rate-limiter';
import { RetryPolicy } from '../utils/retry';
import { BASE_URL, FakeClock, LISTING_URL, resultsPage, routedHttp, silenceConsole } from './test-helpers';

const market = getMarket('ng');
const criteria: SearchCriteria = { make: 'Toyota', model: 'Corolla', year: 2015 };
const PARAM_URL = `${LISTING_URL}?make=Toyota&model=Corolla&year=2015`;

function fetcherFor(http: HttpGet, maxRetries = 1, clock = new FakeClock()) {
  const retryPolicy = new RetryPolicy({ maxRetries, baseDelayMs: 1000, jitterMs: 0, sleep: clock.sleep });
  return new FallbackFetcher({ market, http, retryPolicy, rateLimiter: new RateLimiter(1000, clock) });
}

function jsonLdPage(...blocks: string[]): string {
  const scripts = blocks.map((block) => `<script type="application/ld+json">${block}</script>`).join('');
  return `<html><head>${scripts}</head><body><div id="__next">Loading</div></body></html>`;
}

const ITEM_LIST = JSON.stringify({
  '@context': 'https://schema.org',
  '@type': 'ItemList',
  itemListElement: [
    {
      '@type': 'ListItem',
      position: 1,
      item: {
        '@type': 'Car',
        name: 'Toyota Corolla 2015 LE',
        url: 'https://autochek.africa/car/toyota-corolla-2015-ld1',
        brand: { '@type': 'Brand', name: 'Toyota' },
        model: 'Corolla',
        vehicleModelDate: '2015',
        mileageFromOdometer: { '@type': 'QuantitativeValue', value: 62000, unitCode: 'KMT' },
        image: ['https://images.example.com/ld1.jpg'],
        offers: { '@type': 'Offer', price: '5200000', priceCurrency: 'NGN' },
      },
    },
  ],
});

const GRAPH = JSON.stringify({
  '@context': 'https://schema.org',
  '@graph': [
    { '@type': 'WebPage', name: 'Used cars in Nigeria' },
    {
      '@type': 'Product',
      name: 'Honda Accord 2018',
      sku: 'AC-77',
      url: '/car/honda-accord-2018',
      offers: [{ '@type': 'Offer', price: 12000, priceCurrency: 'USD' }],
    },
  ],
});

describe('FallbackFetcher', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  it('should try the filtered listing URL, the bare listing URL, then the site root', () => {
    const fetcher = fetcherFor(routedHttp({}));
    expect(fetcher.entryUrls(criteria)).toEqual([PARAM_URL, LISTING_URL, `${BASE_URL}/`]);
  });

  it('should move past a failing URL and return the first listings found', async () => {
    const http = routedHttp({
      [PARAM_URL]: 503,
      [LISTING_URL]: resultsPage([{ id: 'a', title: 'Toyota Corolla 2015' }, { id: 'b' }]),
    });

    const listings = await fetcherFor(http).fetch(criteria);

    expect(listings.map((l) => l.listing_id)).toEqual(['a', 'b']);
    expect(listings[0]).toMatchObject({ make: 'Toyota', model: 'Corolla', year: 2015 });
    expect(http.calls).toEqual([PARAM_URL, PARAM_URL, LISTING_URL]);
  });

  it('should wait the rate limit between entry URL requests', async () => {
    const clock = new FakeClock();
    const requestedAt: number[] = [];
    const http: HttpGet = async (url) => {
      requestedAt.push(clock.now());
      return { status: 200, url, body: '<html><body></body></html>' };
    };

    await expect(fetcherFor(http, 1, clock).fetch(criteria)).resolves.toEqual([]);
    expect(requestedAt).toEqual([0, 1000, 2000]);
  });

  it('should read schema.org vehicles from an ItemList when no cards are rendered', async () => {
    const http = routedHttp({ [PARAM_URL]: jsonLdPage(ITEM_LIST) });

    const listings = await fetcherFor(http).fetch(criteria);

    expect(listings).toEqual([
      {
        listing_id: 'toyota-corolla-2015-ld1',
        make: 'Toyota',
        model: 'Corolla',
        year: 2015,
        variant: 'LE',
        price: 5200000,
        currency: 'NGN',
        mileage: 62000,
        location: null,
        listing_url: 'https://autochek.africa/car/toyota-corolla-2015-ld1',
        thumbnail_url: 'https://images.example.com/ld1.jpg',
        created_at: null,
      },
    ]);
  });

  it('should read @graph products and skip malformed blocks', async () => {
    const http = routedHttp({ [PARAM_URL]: jsonLdPage('{not json', GRAPH) });

    const listings = await fetcherFor(http).fetch(criteria);

    expect(listings).toHaveLength(1);
    expect(listings[0]).toMatchObject({
      listing_id: 'AC-77',
      make: 'Honda',
      model: 'Accord',
      year: 2018,
      price: 12000,
      currency: 'USD',
      listing_url: 'https://autochek.africa/car/honda-accord-2018',
    });
  });

  it('should resolve to an empty list when every URL fails', async () => {
    const http = jest.fn<ReturnType<HttpGet>, Parameters<HttpGet>>().mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

    await expect(fetcherFor(http, 0).fetch(criteria)).resolves.toEqual([]);
    expect(http).toHaveBeenCalledTimes(3);
    expect(console.error).toHaveBeenCalledTimes(3);
  });

  it('should make no requests once the run is cancelled', async () => {
    const http = routedHttp({});
    const controller = new AbortController();
    controller.abort();

    await expect(fetcherFor(http).fetch(criteria, controller.signal)).resolves.toEqual([]);
    expect(http.calls).toEqual([]);
  });
});

describe('flattenJsonLd', () => {
  it('should unwrap arrays, graphs and list items', () => {
    const flat = flattenJsonLd([
      { '@graph': [{ '@type': 'Car', name: 'A' }] },
      { '@type': 'ItemList', itemListElement: [{ item: { '@type': 'Car', name: 'B' } }, { '@type': 'Car', name: 'C' }] },
      'ignored',
    ]);

    expect(flat.map((entry) => entry['name'])).toEqual(['A', 'B', 'C']);
  });
});
