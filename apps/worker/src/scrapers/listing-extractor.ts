import type { DomNode } from './dom';
import { normalizeText } from './dom';
import { SelectorNotFoundError, errorMessage } from './errors';
import {
  looksLikeDate,
  looksLikeMileage,
  looksLikePrice,
  parseCreatedAt,
  parseLocation,
  parseMileage,
  parsePrice,
  parseTitle,
} from './field-parser';
import { DEFAULT_SELECTORS, firstMatch, type SelectorSet } from './selectors';
import { createListing, type PageResult, type VehicleListing } from './types';
import type { Market } from '../config/markets';

const BACKGROUND_URL = /url\(\s*["']?([^"')]+)["']?\s*\)/i;

/**
 * Turns a rendered (or static) results page into listings. The card selector
 * that first matches is kept for the rest of the run so every page is read
 * the same way.
 */
export class ListingExtractor {
  private cardSelector: string | null = null;

  constructor(
    private readonly market: Market,
    private readonly selectors: SelectorSet = DEFAULT_SELECTORS,
  ) {}

  get lockedCardSelector(): string | null {
    return this.cardSelector;
  }

  async countCards(root: DomNode): Promise<number> {
    const match = await firstMatch(this.selectors.cards, (selector) => nonEmpty(safeQueryAll(root, selector)));
    return match ? match.value.length : 0;
  }

  async extractPage(root: DomNode, pageUrl: string): Promise<PageResult> {
    const cards = await this.findCards(root);
    const listings: VehicleListing[] = [];
    let dropped = 0;

    for (const [index, card] of cards.entries()) {
      try {
        const listing = await this.extractCard(card, pageUrl);
        if (listing) {
          listings.push(listing);
        } else {
          dropped++;
          console.warn(`[Extractor] Dropped card ${index + 1}: no listing URL`);
        }
      } catch (err) {
        dropped++;
        console.warn(`[Extractor] Dropped card ${index + 1}: ${errorMessage(err)}`);
      }
    }

    console.log(`[Extractor] ${listings.length} listings from ${cards.length} cards (${dropped} dropped) on ${pageUrl}`);
    return listings;
  }

  async extractCard(card: DomNode, pageUrl: string): Promise<VehicleListing | null> {
    const listingUrl = await this.findListingUrl(card, pageUrl);
    if (!listingUrl) return null;

    const title = parseTitle(await this.findTitle(card));
    const { price, currency } = parsePrice(
      await this.findText(card, this.selectors.price, looksLikePrice),
      this.market.defaultCurrency,
    );
    const mileage = parseMileage(await this.findText(card, this.selectors.mileage, looksLikeMileage));
    const location = parseLocation(
      await this.findText(card, this.selectors.location, (text) => this.looksLikeLocation(text)),
      this.market.cities,
    );

    return createListing({
      listing_id: (await this.findListingId(card)) ?? listingIdFromUrl(listingUrl),
      ...title,
      price,
      currency,
      mileage,
      location,
      listing_url: listingUrl,
      thumbnail_url: await this.findThumbnail(card, pageUrl),
      created_at: await this.findCreatedAt(card),
    });
  }

  private async findCards(root: DomNode): Promise<DomNode[]> {
    if (this.cardSelector) return safeQueryAll(root, this.cardSelector);

    const match = await firstMatch(this.selectors.cards, (selector) => nonEmpty(safeQueryAll(root, selector)));
    if (!match) {
      console.warn(`[Extractor] ${new SelectorNotFoundError('listing card', this.selectors.cards).message}`);
      return [];
    }

    this.cardSelector = match.candidate;
    console.log(`[Extractor] Using card selector: ${match.candidate}`);
    return match.value;
  }

  private async findListingUrl(card: DomNode, pageUrl: string): Promise<string | null> {
    let href: string | null = null;
    if ((await card.tagName()) === 'a') href = usableHref(await card.attr('href'));

    if (!href) {
      const link = await firstMatch(this.selectors.link, async (selector) => {
        for (const anchor of await safeQueryAll(card, selector)) {
          const candidate = usableHref(await anchor.attr('href'));
          if (candidate) return candidate;
        }
        return null;
      });
      href = link ? link.value : null;
    }

    return href ? resolveUrl(href, pageUrl) : null;
  }

  private async findListingId(card: DomNode): Promise<string | null> {
    for (const name of ['data-listing-id', 'data-id']) {
      const value = normalizeText(await card.attr(name));
      if (value) return value;
    }
    return null;
  }

  private async findTitle(card: DomNode): Promise<string | null> {
    const heading = await this.findText(card, this.selectors.title, (text) => text.length > 0);
    if (heading) return heading;

    // Generic fallback: accessible labels on the card, then the image description
    for (const name of ['title', 'aria-label']) {
      const value = normalizeText(await card.attr(name));
      if (value) return value;
    }
    const image = await card.query('img[alt]');
    const alt = image ? normalizeText(await image.attr('alt')) : '';
    return alt || null;
  }

  private async findText(
    card: DomNode,
    selectors: readonly string[],
    accept: (text: string) => boolean,
  ): Promise<string | null> {
    const match = await firstMatch(selectors, async (selector) => {
      for (const node of await safeQueryAll(card, selector)) {
        const text = normalizeText(await node.text());
        if (text && accept(text)) return text;
      }
      return null;
    });
    return match ? match.value : null;
  }

  private looksLikeLocation(text: string): boolean {
    const lower = text.toLowerCase();
    if (this.market.cities.some((city) => lower.includes(city.toLowerCase()))) return true;
    return text.split(' ').length <= 4 && !/\d/.test(text);
  }

  private async findThumbnail(card: DomNode, pageUrl: string): Promise<string | null> {
    const match = await firstMatch(this.selectors.image, async (selector) => {
      for (const node of await safeQueryAll(card, selector)) {
        const candidates = [await node.attr('src'), await node.attr('data-src')];
        const style = await node.attr('style');
        const background = style ? BACKGROUND_URL.exec(style) : null;
        if (background) candidates.push(background[1]);

        for (const candidate of candidates) {
          const raw = normalizeText(candidate);
          if (!raw || raw.startsWith('data:')) continue;
          const url = resolveUrl(raw, pageUrl);
          if (url && /^https?:/.test(url)) return url;
        }
      }
      return null;
    });
    return match ? match.value : null;
  }

  private async findCreatedAt(card: DomNode): Promise<string | null> {
    const match = await firstMatch(this.selectors.date, async (selector) => {
      for (const node of await safeQueryAll(card, selector)) {
        const datetime = normalizeText(await node.attr('datetime'));
        if (datetime) return datetime;

        const title = await node.attr('title');
        if (looksLikeDate(title)) return normalizeText(title);

        const fromText = parseCreatedAt(await node.text());
        if (fromText) return fromText;
      }
      return null;
    });
    return match ? match.value : null;
  }
}

export function listingIdFromUrl(listingUrl: string): string {
  const segments = new URL(listingUrl).pathname.split('/').filter(Boolean);
  return segments[segments.length - 1] ?? listingUrl;
}

export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function usableHref(href: string | null): string | null {
  const value = normalizeText(href);
  if (!value || value.startsWith('#') || /^javascript:/i.test(value)) return null;
  return value;
}

async function nonEmpty(pending: Promise<DomNode[]>): Promise<DomNode[] | null> {
  const nodes = await pending;
  return nodes.length > 0 ? nodes : null;
}

// A selector the engine rejects counts as "no match" so the chain can move on
async function safeQueryAll(root: DomNode, selector: string): Promise<DomNode[]> {
  try {
    return await root.queryAll(selector);
  } catch (err) {
    console.warn(`[Extractor] Selector "${selector}" failed: ${errorMessage(err)}`);
    return [];
  }
}
