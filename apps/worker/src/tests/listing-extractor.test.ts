/**
 * Listing extractor tests
 * Runs the selector chains over static (cheerio) documents built from fixtures
 */

import { getMarket } from '../config/markets';
import { loadStaticDocument } from '../scrapers/dom';
import { ListingExtractor, listingIdFromUrl } from '../scrapers/listing-extractor';
import { DEFAULT_SELECTORS } from '../scrapers/selectors';
import { LISTING_FIELDS } from '../scrapers/types';
import { LISTING_URL, resultsPage, silenceConsole } from './test-helpers';

const market = getMarket('ng');

function extract(html: string, extractor = new ListingExtractor(market)) {
  return extractor.extractPage(loadStaticDocument(html).root, LISTING_URL);
}

describe('ListingExtractor', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  it('should extract every field from a complete card', async () => {
    const listings = await extract(
      resultsPage([
        {
          id: 'toyota-corolla-2015-abc123',
          title: 'Toyota Corolla 2015 LE',
          price: '₦5,500,000',
          mileage: '45,000 km',
          location: 'Ikeja, Lagos',
          image: 'https://images.example.com/abc123.jpg',
          date: '2024-05-01',
        },
      ]),
    );

    expect(listings).toEqual([
      {
        listing_id: 'toyota-corolla-2015-abc123',
        make: 'Toyota',
        model: 'Corolla',
        year: 2015,
        variant: 'LE',
        price: 5500000,
        currency: 'NGN',
        mileage: 45000,
        location: 'Ikeja',
        listing_url: 'https://autochek.africa/car/toyota-corolla-2015-abc123',
        thumbnail_url: 'https://images.example.com/abc123.jpg',
        created_at: '2024-05-01',
      },
    ]);
    expect(Object.keys(listings[0])).toEqual([...LISTING_FIELDS]);
    expect(Object.isFrozen(listings[0])).toBe(true);
  });

  it('should fill absent fields with null', async () => {
    const [listing] = await extract(resultsPage([{ id: 'x1', title: 'Honda Civic' }]));

    expect(listing).toEqual({
      listing_id: 'x1',
      make: 'Honda',
      model: 'Civic',
      year: null,
      variant: null,
      price: null,
      currency: null,
      mileage: null,
      location: null,
      listing_url: 'https://autochek.africa/car/x1',
      thumbnail_url: null,
      created_at: null,
    });
  });

  it('should prefer a data-listing-id attribute over the URL', async () => {
    const [listing] = await extract(resultsPage([{ id: 'kia-rio', dataId: 'AC-991', title: 'Kia Rio 2019' }]));
    expect(listing.listing_id).toBe('AC-991');
  });

  it('should drop cards without a usable link and keep the rest', async () => {
    const listings = await extract(
      resultsPage([
        { id: 'broken', href: '#', title: 'Ghost Car 2010' },
        { id: 'good', title: 'Kia Rio 2019' },
      ]),
    );

    expect(listings.map((l) => l.listing_id)).toEqual(['good']);
    expect(console.warn).toHaveBeenCalledWith('[Extractor] Dropped card 1: no listing URL');
  });

  it('should fall back through the card chain and read generic markup', async () => {
    const html = `<html><body>
      <article>
        <a href="/car/a1"><h3>Kia Rio 2019</h3></a>
        <p>₦3,000,000</p>
        <div style="background-image: url('/img/a1.jpg')"></div>
      </article>
    </body></html>`;
    const extractor = new ListingExtractor(market);
    const [listing] = await extract(html, extractor);

    expect(extractor.lockedCardSelector).toBe('article');
    expect(listing).toMatchObject({
      listing_id: 'a1',
      make: 'Kia',
      model: 'Rio',
      year: 2019,
      price: 3000000,
      currency: 'NGN',
      thumbnail_url: 'https://autochek.africa/img/a1.jpg',
    });
  });

  it('should take the title from image alt text and skip data URIs', async () => {
    const html = `<html><body>
      <div data-testid="car-card">
        <a href="/car/z9"><img src="data:image/gif;base64,R0lGODlh" data-src="https://images.example.com/z9.jpg" alt="Nissan Altima 2014"></a>
      </div>
    </body></html>`;
    const [listing] = await extract(html);

    expect(listing).toMatchObject({
      make: 'Nissan',
      model: 'Altima',
      year: 2014,
      thumbnail_url: 'https://images.example.com/z9.jpg',
    });
  });

  it('should lock the first matching card selector but not when only counting', async () => {
    const root = loadStaticDocument(resultsPage([{ id: 'a' }, { id: 'b' }])).root;

    const counter = new ListingExtractor(market);
    expect(await counter.countCards(root)).toBe(2);
    expect(counter.lockedCardSelector).toBeNull();

    const extractor = new ListingExtractor(market);
    await extractor.extractPage(root, LISTING_URL);
    expect(extractor.lockedCardSelector).toBe('[data-testid="car-card"]');
  });

  it('should treat a selector the engine rejects as no match', async () => {
    const extractor = new ListingExtractor(market, {
      ...DEFAULT_SELECTORS,
      cards: ['div[[', '[data-testid="car-card"]'],
    });
    const listings = await extract(resultsPage([{ id: 'ok', title: 'Kia Rio 2019' }]), extractor);

    expect(listings).toHaveLength(1);
    expect(extractor.lockedCardSelector).toBe('[data-testid="car-card"]');
  });

  it('should return an empty page when no card selector matches', async () => {
    expect(await extract('<html><body><p>Nothing here</p></body></html>')).toEqual([]);
  });
});

describe('listingIdFromUrl', () => {
  it('should use the last path segment', () => {
    expect(listingIdFromUrl('https://autochek.africa/car/toyota-camry-2018-xyz/')).toBe('toyota-camry-2018-xyz');
    expect(listingIdFromUrl('https://autochek.africa/car/abc?ref=search')).toBe('abc');
  });

  it('should fall back to the whole URL when there is no path', () => {
    expect(listingIdFromUrl('https://autochek.africa/')).toBe('https://autochek.africa/');
  });
});
