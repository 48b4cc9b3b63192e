import type { CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { loadStaticDocument } from './dom';
import { errorMessage } from './errors';
import { parseCreatedAt, parseMileage, parsePrice, parseTitle } from './field-parser';
import { ListingExtractor, listingIdFromUrl, resolveUrl } from './listing-extractor';
import { buildParamUrl } from './search-strategy';
import { createListing, type SearchCriteria, type VehicleListing } from './types';
import type { Market } from '../config/markets';
import type { HttpGet } from '../utils/http';
import type { RateLimiter } from '../utils/rate-limiter';
import type { RetryPolicy } from '../utils/retry';

const VEHICLE_TYPES = new Set(['Car', 'Vehicle', 'Product', 'MotorVehicle']);

const named = z.union([z.string(), z.object({ name: z.string() }).passthrough()]);
const numeric = z.union([z.number(), z.string()]);

const offerSchema = z
  .object({
    price: numeric.optional(),
    priceCurrency: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const jsonLdVehicleSchema = z
  .object({
    '@type': z.union([z.string(), z.array(z.string())]),
    name: z.string().optional(),
    url: z.string().optional(),
    sku: z.string().optional(),
    productID: z.string().optional(),
    brand: named.optional(),
    manufacturer: named.optional(),
    model: named.optional(),
    vehicleModelDate: numeric.optional(),
    modelDate: numeric.optional(),
    productionDate: numeric.optional(),
    mileageFromOdometer: z
      .union([numeric, z.object({ value: numeric, unitCode: z.string().optional() }).passthrough()])
      .optional(),
    image: z.union([z.string(), z.array(z.string()), z.object({ url: z.string() }).passthrough()]).optional(),
    offers: z.union([offerSchema, z.array(offerSchema)]).optional(),
    datePosted: z.string().optional(),
    dateCreated: z.string().optional(),
  })
  .passthrough();

type JsonLdVehicle = z.infer<typeof jsonLdVehicleSchema>;

export type FallbackFetcherOptions = {
  market: Market;
  http: HttpGet;
  retryPolicy: RetryPolicy;
  rateLimiter: RateLimiter;
  extractor?: ListingExtractor;
};

/**
 * Static-HTML path used when the browser pipeline fails. Pages are fetched
 * without running scripts, so only server-rendered cards and embedded
 * JSON-LD are visible. Never throws: every failure is logged and the next
 * entry URL is tried.
 */
export class FallbackFetcher {
  private readonly extractor: ListingExtractor;

  constructor(private readonly options: FallbackFetcherOptions) {
    this.extractor = options.extractor ?? new ListingExtractor(options.market);
  }

  entryUrls(criteria: SearchCriteria): string[] {
    const { market } = this.options;
    const [firstPath] = market.listingPaths;
    const listingUrl = new URL(firstPath ?? '/', market.baseUrl).toString();
    const urls = [buildParamUrl(listingUrl, criteria), listingUrl, new URL('/', market.baseUrl).toString()];
    return [...new Set(urls)];
  }

  async fetch(criteria: SearchCriteria, signal?: AbortSignal): Promise<VehicleListing[]> {
    for (const url of this.entryUrls(criteria)) {
      if (signal?.aborted) {
        console.warn('[Fallback] Run cancelled, stopping');
        return [];
      }

      try {
        await this.options.rateLimiter.wait();
        const response = await this.options.retryPolicy.get(this.options.http, url);
        const listings = await this.extractFromHtml(response.body, response.url);
        if (listings.length > 0) {
          console.log(`[Fallback] ${listings.length} listings from ${response.url}`);
          return listings;
        }
        console.log(`[Fallback] No listings in ${url}`);
      } catch (err) {
        console.error(`[Fallback] ${url} failed: ${errorMessage(err)}`);
      }
    }

    console.warn('[Fallback] No entry URL produced listings');
    return [];
  }

  async extractFromHtml(html: string, pageUrl: string): Promise<VehicleListing[]> {
    const { $, root } = loadStaticDocument(html);
    const fromCards = await this.extractor.extractPage(root, pageUrl);
    if (fromCards.length > 0) return [...fromCards];
    return this.extractFromJsonLd($, pageUrl);
  }

  extractFromJsonLd($: CheerioAPI, pageUrl: string): VehicleListing[] {
    const listings: VehicleListing[] = [];

    $('script[type="application/ld+json"]').each((_, el) => {
      let data: unknown;
      try {
        data = JSON.parse($(el).text());
      } catch (err) {
        console.warn(`[Fallback] Skipping malformed JSON-LD block: ${errorMessage(err)}`);
        return;
      }

      for (const candidate of flattenJsonLd(data)) {
        if (!hasVehicleType(candidate)) continue;
        const parsed = jsonLdVehicleSchema.safeParse(candidate);
        if (!parsed.success) continue;
        const listing = this.toListing(parsed.data, pageUrl);
        if (listing) listings.push(listing);
      }
    });

    if (listings.length > 0) console.log(`[Fallback] ${listings.length} listings from JSON-LD on ${pageUrl}`);
    return listings;
  }

  private toListing(item: JsonLdVehicle, pageUrl: string): VehicleListing | null {
    const offer = Array.isArray(item.offers) ? item.offers[0] : item.offers;
    const href = item.url ?? offer?.url;
    const listingUrl = href ? resolveUrl(href, pageUrl) : null;
    if (!listingUrl) return null;

    const title = parseTitle(item.name);
    const make = nameOf(item.brand) ?? nameOf(item.manufacturer) ?? title.make;
    const model = nameOf(item.model) ?? title.model;
    const year = yearOf(item.vehicleModelDate ?? item.modelDate ?? item.productionDate) ?? title.year;

    const { price, currency } =
      offer?.price === undefined
        ? { price: null, currency: null }
        : parsePrice(String(offer.price), offer.priceCurrency ?? this.options.market.defaultCurrency);

    const odometer = item.mileageFromOdometer;
    const mileage =
      odometer === undefined ? null : parseMileage(String(typeof odometer === 'object' ? odometer.value : odometer));

    return createListing({
      listing_id: item.sku ?? item.productID ?? listingIdFromUrl(listingUrl),
      make,
      model,
      year,
      variant: title.variant,
      price,
      currency,
      mileage,
      location: null,
      listing_url: listingUrl,
      thumbnail_url: imageOf(item.image, pageUrl),
      created_at: parseCreatedAt(item.datePosted ?? item.dateCreated),
    });
  }
}

/** Unwraps arrays, `@graph` containers and ItemList entries into candidate objects. */
export function flattenJsonLd(data: unknown): Record<string, unknown>[] {
  if (Array.isArray(data)) return data.flatMap(flattenJsonLd);
  if (!isRecord(data)) return [];

  const graph = data['@graph'];
  if (Array.isArray(graph)) return graph.flatMap(flattenJsonLd);

  const elements = data['itemListElement'];
  if (Array.isArray(elements)) {
    return elements.flatMap((element) =>
      isRecord(element) && 'item' in element ? flattenJsonLd(element['item']) : flattenJsonLd(element),
    );
  }

  return [data];
}

function hasVehicleType(candidate: Record<string, unknown>): boolean {
  const type = candidate['@type'];
  const types = Array.isArray(type) ? type : [type];
  return types.some((t) => typeof t === 'string' && VEHICLE_TYPES.has(t));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nameOf(value: z.infer<typeof named> | undefined): string | null {
  if (value === undefined) return null;
  const name = (typeof value === 'string' ? value : value.name).trim();
  return name || null;
}

function yearOf(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  const match = /\b(19|20)\d{2}\b/.exec(String(value));
  return match ? Number(match[0]) : null;
}

function imageOf(value: JsonLdVehicle['image'], pageUrl: string): string | null {
  if (value === undefined) return null;
  const raw = typeof value === 'string' ? value : Array.isArray(value) ? value[0] : value.url;
  if (!raw || raw.startsWith('data:')) return null;
  const url = resolveUrl(raw, pageUrl);
  return url && /^https?:/.test(url) ? url : null;
}
