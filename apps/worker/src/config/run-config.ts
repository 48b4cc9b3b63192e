import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { MARKET_CODES } from './markets';
import { ConfigError, errorMessage } from '../scrapers/errors';
import { DEFAULT_SELECTORS, mergeSelectors, parseSelectorOverrides, type SelectorSet } from '../scrapers/selectors';
import type { SearchCriteria, StrategyName } from '../scrapers/types';

export const STRATEGY_NAMES = ['form', 'url-params', 'direct'] as const satisfies readonly StrategyName[];

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

const booleanish = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'boolean') return value;
  const lower = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(lower)) return true;
  if (FALSE_VALUES.includes(lower)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
  return z.NEVER;
});

const strategyList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => {
    const names = typeof value === 'string' ? value.split(',') : value;
    return [...new Set(names.map((name) => name.trim()).filter(Boolean))];
  })
  .pipe(z.array(z.enum(STRATEGY_NAMES)).min(1));

const milliseconds = z.coerce.number().int().positive();

const runConfigSchema = z.object({
  market: z.enum(MARKET_CODES).default('ng'),
  rateLimitSeconds: z.coerce.number().min(0).max(60).default(1),
  maxRetries: z.coerce.number().int().min(0).max(10).default(3),
  maxPages: z.coerce.number().int().min(1).max(500).default(6),
  headless: booleanish.default(true),
  navigationTimeoutMs: milliseconds.default(30_000),
  stableTimeoutMs: milliseconds.default(15_000),
  httpTimeoutMs: milliseconds.default(30_000),
  retryBaseDelayMs: z.coerce.number().int().min(0).default(1000),
  retryJitterMs: z.coerce.number().int().min(0).default(250),
  strategies: strategyList.default([...STRATEGY_NAMES]),
  dedupe: booleanish.default(false),
  proxyUrl: z.string().min(1).optional(),
  selectorsFile: z.string().min(1).optional(),
});

export type ConfigKey = keyof typeof runConfigSchema.shape;

export type RunConfig = Readonly<z.output<typeof runConfigSchema> & { selectors: SelectorSet }>;

/** Raw values from flags; anything left undefined falls through to the environment. */
export type RunConfigInput = Partial<Record<ConfigKey, unknown>>;

export const CONFIG_ENV_VARS: Readonly<Record<ConfigKey, string>> = {
  market: 'SCRAPER_MARKET',
  rateLimitSeconds: 'SCRAPER_RATE_LIMIT',
  maxRetries: 'SCRAPER_MAX_RETRIES',
  maxPages: 'SCRAPER_MAX_PAGES',
  headless: 'SCRAPER_HEADLESS',
  navigationTimeoutMs: 'SCRAPER_NAV_TIMEOUT_MS',
  stableTimeoutMs: 'SCRAPER_STABLE_TIMEOUT_MS',
  httpTimeoutMs: 'SCRAPER_HTTP_TIMEOUT_MS',
  retryBaseDelayMs: 'SCRAPER_RETRY_BASE_DELAY_MS',
  retryJitterMs: 'SCRAPER_RETRY_JITTER_MS',
  strategies: 'SCRAPER_STRATEGIES',
  dedupe: 'SCRAPER_DEDUPE',
  proxyUrl: 'PROXY_URL',
  selectorsFile: 'SCRAPER_SELECTORS_FILE',
};

/**
 * Builds the run configuration: flags over environment over defaults.
 * Every invalid field is reported in one ConfigError.
 */
export function loadRunConfig(overrides: RunConfigInput = {}, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const merged: RunConfigInput = {};
  for (const key of runConfigSchema.keyof().options) {
    const fromEnv = env[CONFIG_ENV_VARS[key]]?.trim();
    merged[key] = overrides[key] ?? (fromEnv ? fromEnv : undefined);
  }

  const parsed = runConfigSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));

  const selectors = parsed.data.selectorsFile ? loadSelectorsFile(parsed.data.selectorsFile) : DEFAULT_SELECTORS;
  return Object.freeze({ ...parsed.data, selectors });
}

export function loadSelectorsFile(path: string): SelectorSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError([`selectorsFile: could not read ${path}: ${errorMessage(err)}`]);
  }

  const overrides = z.record(z.unknown()).safeParse(raw);
  if (!overrides.success) throw new ConfigError([`selectorsFile: ${path} must contain a JSON object`]);

  try {
    return mergeSelectors(parseSelectorOverrides(overrides.data));
  } catch (err) {
    if (err instanceof z.ZodError) throw new ConfigError(formatIssues(err, 'selectors'));
    throw err;
  }
}

const criteriaSchema = z.object({
  make: z.string().trim().min(1, 'make is required'),
  model: z.string().trim().min(1, 'model is required'),
  year: z.coerce.number().int().min(1900).max(2099),
});

export function parseCriteria(raw: { make?: unknown; model?: unknown; year?: unknown }): SearchCriteria {
  const parsed = criteriaSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  return Object.freeze(parsed.data);
}

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path].filter((part) => part !== undefined && part !== '').join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
