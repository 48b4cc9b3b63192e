import { z } from 'zod';
import marketData from '../../data/markets.json';

export const MARKET_CODES = ['ng', 'gh', 'ke'] as const;
export type MarketCode = (typeof MARKET_CODES)[number];

const marketSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url(),
  defaultCurrency: z.string().length(3),
  listingPaths: z.array(z.string().startsWith('/')).min(1),
  pageParam: z.string().min(1),
  cities: z.array(z.string().min(1)),
});

export type Market = z.infer<typeof marketSchema> & { code: MarketCode };

const marketsSchema = z.object({
  ng: marketSchema,
  gh: marketSchema,
  ke: marketSchema,
});

const markets = marketsSchema.parse(marketData);

export function getMarket(code: MarketCode): Market {
  return { ...markets[code], code };
}

export function listingIndexUrls(market: Market): string[] {
  return market.listingPaths.map((path) => new URL(path, market.baseUrl).toString());
}
