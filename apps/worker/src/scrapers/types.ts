export type SearchCriteria = Readonly<{
  make: string;
  model: string;
  year: number;
}>;

export type VehicleListing = Readonly<{
  listing_id: string;
  make: string | null;
  model: string | null;
  year: number | null;
  variant: string | null;
  price: number | null;
  currency: string | null;
  mileage: number | null;
  location: string | null;
  listing_url: string;
  thumbnail_url: string | null;
  created_at: string | null;
}>;

// Column order for every serialized form of a listing
export const LISTING_FIELDS = [
  'listing_id',
  'make',
  'model',
  'year',
  'variant',
  'price',
  'currency',
  'mileage',
  'location',
  'listing_url',
  'thumbnail_url',
  'created_at',
] as const satisfies readonly (keyof VehicleListing)[];

export type PageResult = readonly VehicleListing[];

export type StrategyName = 'form' | 'url-params' | 'direct';

export type PaginationStopReason = 'empty-page' | 'max-pages' | 'no-next-page' | 'repeated-page' | 'page-error';

export type ScrapeOutcome =
  | {
      kind: 'success';
      criteria: SearchCriteria;
      listings: VehicleListing[];
      entryUrl: string;
      strategy: StrategyName;
      pagesVisited: number;
      stopReason: PaginationStopReason;
    }
  | {
      kind: 'fallback';
      criteria: SearchCriteria;
      listings: VehicleListing[];
      reason: string;
    };

export function createListing(
  fields: Pick<VehicleListing, 'listing_id' | 'listing_url'> & Partial<VehicleListing>,
): VehicleListing {
  return Object.freeze({
    listing_id: fields.listing_id,
    make: fields.make ?? null,
    model: fields.model ?? null,
    year: fields.year ?? null,
    variant: fields.variant ?? null,
    price: fields.price ?? null,
    currency: fields.currency ?? null,
    mileage: fields.mileage ?? null,
    location: fields.location ?? null,
    listing_url: fields.listing_url,
    thumbnail_url: fields.thumbnail_url ?? null,
    created_at: fields.created_at ?? null,
  });
}

export function dedupeListings(listings: readonly VehicleListing[]): VehicleListing[] {
  const seen = new Set<string>();
  const unique: VehicleListing[] = [];
  for (const listing of listings) {
    if (seen.has(listing.listing_id)) continue;
    seen.add(listing.listing_id);
    unique.push(listing);
  }
  return unique;
}
