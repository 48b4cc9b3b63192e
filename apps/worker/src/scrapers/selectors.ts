import { z } from 'zod';

/**
 * Ordered selector-candidate chains. Each chain is tried front to back and the
 * first candidate that matches wins; the strings follow the storefront's live
 * markup and can be overridden per run (see loadSelectorOverrides).
 */
export type SelectorSet = {
  cards: readonly string[];
  link: readonly string[];
  title: readonly string[];
  price: readonly string[];
  mileage: readonly string[];
  location: readonly string[];
  image: readonly string[];
  date: readonly string[];
  nextPage: readonly string[];
  formMake: readonly string[];
  formModel: readonly string[];
  formYear: readonly string[];
  formSubmit: readonly string[];
};

export const DEFAULT_SELECTORS: SelectorSet = {
  cards: [
    '[data-testid="car-card"]',
    '.vehicle-card',
    '.car-card',
    '.listing-card',
    '.vehicle-item',
    'article',
    'div[role="article"]',
    '.MuiCard-root',
    'a[href*="/car/"]',
  ],
  link: ['a[href*="/car/"]', 'a[href]'],
  title: [
    'h6.MuiTypography-h6',
    'h6',
    'h2',
    'h3',
    'h4',
    '[class*="title"]',
    '[class*="name"]',
  ],
  price: ['[class*="price"]', '[data-testid*="price"]', 'p.MuiTypography-body1', 'p'],
  mileage: ['[class*="mileage"]', '[data-testid*="mileage"]', 'span.MuiChip-label', '[class*="chip"]', 'span'],
  location: [
    '[class*="location"]',
    '[data-testid*="location"]',
    'span.MuiTypography-caption',
    '[class*="caption"]',
  ],
  image: ['img[src]', 'img[data-src]', '[style*="background-image"]'],
  date: ['time', '[datetime]', '[class*="date"]', '[class*="posted"]', '[title]'],
  nextPage: [
    'a[rel="next"]',
    'button[aria-label="Go to next page"]',
    'a[aria-label="Go to next page"]',
    'button[aria-label="Next"]',
    'a[aria-label="Next"]',
    '[data-testid="next-page"]',
    '.pagination-next a',
  ],
  formMake: ['select[name="make"]', '#make', '.make-select', 'input[name="make"]'],
  formModel: ['select[name="model"]', '#model', '.model-select', 'input[name="model"]'],
  formYear: ['select[name="year"]', '#year', '.year-select', 'input[name="year"]'],
  formSubmit: ['button[type="submit"]', '.search-btn', '#search', 'input[type="submit"]'],
};

const chain = z.array(z.string().min(1)).min(1);

const selectorOverridesSchema = z
  .object({
    cards: chain,
    link: chain,
    title: chain,
    price: chain,
    mileage: chain,
    location: chain,
    image: chain,
    date: chain,
    nextPage: chain,
    formMake: chain,
    formModel: chain,
    formYear: chain,
    formSubmit: chain,
  })
  .partial()
  .strict();

export type SelectorOverrides = z.infer<typeof selectorOverridesSchema>;

export function parseSelectorOverrides(raw: unknown): SelectorOverrides {
  return selectorOverridesSchema.parse(raw);
}

export function mergeSelectors(overrides: SelectorOverrides, base: SelectorSet = DEFAULT_SELECTORS): SelectorSet {
  return { ...base, ...overrides };
}

/**
 * Walks `candidates` in order and returns the first non-null result of
 * `attempt`, together with the candidate that produced it.
 */
export async function firstMatch<C, T>(
  candidates: readonly C[],
  attempt: (candidate: C) => Promise<T | null>,
): Promise<{ candidate: C; value: T } | null> {
  for (const candidate of candidates) {
    const value = await attempt(candidate);
    if (value !== null) return { candidate, value };
  }
  return null;
}
