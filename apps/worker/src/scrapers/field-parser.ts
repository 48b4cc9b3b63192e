import { ParseError } from './errors';

export type ParsedTitle = {
  make: string | null;
  model: string | null;
  year: number | null;
  variant: string | null;
};

export type ParsedPrice = {
  price: number | null;
  currency: string | null;
};

const MIN_YEAR = 1900;
const MAX_YEAR = 2099;

// Explicit codes first, then multi-character symbols, then bare symbols.
const CURRENCY_MARKERS: ReadonlyArray<{ pattern: RegExp; code: string }> = [
  { pattern: /\bNGN\b/i, code: 'NGN' },
  { pattern: /\bGHS\b/i, code: 'GHS' },
  { pattern: /\bKES\b/i, code: 'KES' },
  { pattern: /\bZAR\b/i, code: 'ZAR' },
  { pattern: /\b(?:XOF|CFA)\b/i, code: 'XOF' },
  { pattern: /\bEGP\b/i, code: 'EGP' },
  { pattern: /\bMAD\b/i, code: 'MAD' },
  { pattern: /\bUGX\b/i, code: 'UGX' },
  { pattern: /\bUSD\b/i, code: 'USD' },
  { pattern: /\bEUR\b/i, code: 'EUR' },
  { pattern: /\bGBP\b/i, code: 'GBP' },
  { pattern: /GH₵|GH¢/i, code: 'GHS' },
  { pattern: /KSh/i, code: 'KES' },
  { pattern: /US\$/i, code: 'USD' },
  { pattern: /₦/, code: 'NGN' },
  { pattern: /\bN(?=\s?\d)/, code: 'NGN' },
  { pattern: /₵/, code: 'GHS' },
  { pattern: /\bR(?=\s?\d)/, code: 'ZAR' },
  { pattern: /€/, code: 'EUR' },
  { pattern: /£/, code: 'GBP' },
  { pattern: /\$/, code: 'USD' },
];

// A grouped run keeps one separator throughout, so "5,500,000 100" stops before the space
const NUMBER_RUN = /\d{1,3}([,.\u00a0 ])\d{3}(?:\1\d{3})*|\d+/;
const MILEAGE_RUN = /(\d{1,3}([,.\u00a0 ])\d{3}(?:\2\d{3})*|\d+)\s*(k\b)?/i;

const MONTHS = /\b(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\b/i;
const ISO_DATE = /\b\d{4}-\d{2}-\d{2}/;
const SLASH_DATE = /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/;
const RELATIVE_DATE = /\b(?:ago|today|yesterday|just now)\b/i;

export function parseTitle(text: string | null | undefined): ParsedTitle {
  const tokens = (text ?? '').trim().split(/\s+/).filter(Boolean);
  const empty: ParsedTitle = { make: null, model: null, year: null, variant: null };
  if (tokens.length === 0) return empty;

  const yearIndex = tokens.findIndex(isYearToken);
  if (yearIndex === -1) {
    return {
      make: tokens[0] ?? null,
      model: tokens[1] ?? null,
      year: null,
      variant: joinVariant(tokens.slice(2)),
    };
  }

  const year = parseInt(tokens[yearIndex], 10);
  const before = tokens.slice(0, yearIndex);
  const after = tokens.slice(yearIndex + 1);

  if (before.length >= 2) {
    return {
      make: before[0],
      model: before[1],
      year,
      variant: joinVariant([...before.slice(2), ...after]),
    };
  }

  if (before.length === 1) {
    return {
      make: before[0],
      model: after[0] ?? null,
      year,
      variant: joinVariant(after.slice(1)),
    };
  }

  return {
    make: after[0] ?? null,
    model: after[1] ?? null,
    year,
    variant: joinVariant(after.slice(2)),
  };
}

export function parsePrice(text: string | null | undefined, defaultCurrency: string): ParsedPrice {
  const raw = (text ?? '').trim();
  const match = raw.match(NUMBER_RUN);
  if (!match) return { price: null, currency: null };

  let price: number;
  try {
    price = toInteger(match[0], 'price');
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    console.warn(`[Parser] ${err.message}`);
    return { price: null, currency: null };
  }

  return { price, currency: detectCurrency(raw) ?? defaultCurrency };
}

export function detectCurrency(text: string): string | null {
  const marker = CURRENCY_MARKERS.find(({ pattern }) => pattern.test(text));
  return marker ? marker.code : null;
}

export function parseMileage(text: string | null | undefined): number | null {
  const raw = (text ?? '').trim();
  const match = raw.match(MILEAGE_RUN);
  if (!match) return null;

  try {
    const value = toInteger(match[1], 'mileage');
    return match[3] ? value * 1000 : value;
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    console.warn(`[Parser] ${err.message}`);
    return null;
  }
}

export function parseLocation(text: string | null | undefined, cities: readonly string[]): string | null {
  const raw = (text ?? '').replace(/\s+/g, ' ').trim();
  if (!raw) return null;

  let best: { city: string; index: number } | null = null;
  for (const city of cities) {
    const index = raw.search(new RegExp(`(?<![\\p{L}])${escapeRegExp(city)}(?![\\p{L}])`, 'iu'));
    if (index === -1) continue;
    if (!best || index < best.index || (index === best.index && city.length > best.city.length)) {
      best = { city, index };
    }
  }

  return best ? best.city : raw;
}

export function looksLikeDate(text: string | null | undefined): boolean {
  const raw = (text ?? '').trim();
  if (!raw) return false;
  return ISO_DATE.test(raw) || SLASH_DATE.test(raw) || MONTHS.test(raw) || RELATIVE_DATE.test(raw);
}

export function parseCreatedAt(text: string | null | undefined): string | null {
  const raw = (text ?? '').replace(/\s+/g, ' ').trim();
  return looksLikeDate(raw) ? raw : null;
}

export function looksLikePrice(text: string): boolean {
  const raw = text.trim();
  if (!NUMBER_RUN.test(raw)) return false;
  return detectCurrency(raw) !== null || /^[\d,.\s]+$/.test(raw);
}

export function looksLikeMileage(text: string): boolean {
  return /\d/.test(text) && /\b(?:km|kms|kilometers?|kilometres?|mi|miles?)\b/i.test(text);
}

function isYearToken(token: string): boolean {
  if (!/^\d{4}$/.test(token)) return false;
  const year = parseInt(token, 10);
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

function joinVariant(tokens: string[]): string | null {
  return tokens.length > 0 ? tokens.join(' ') : null;
}

function toInteger(run: string, field: string): number {
  const digits = run.replace(/[^\d]/g, '');
  const value = Number(digits);
  if (!digits || !Number.isSafeInteger(value)) throw new ParseError(field, run);
  return value;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
