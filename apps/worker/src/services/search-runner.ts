import { writeOutputs, type ExportResult, type ExportTargets } from './exporter';
import type { RunConfig } from '../config/run-config';
import { scrapeAutochek, type ScrapeDependencies } from '../scrapers/autochek';
import { LISTING_FIELDS, type ScrapeOutcome, type SearchCriteria } from '../scrapers/types';

export type SearchRun = {
  criteria: SearchCriteria;
  config: RunConfig;
  targets: ExportTargets;
  deps?: ScrapeDependencies;
  signal?: AbortSignal;
};

export type SearchRunResult = {
  outcome: ScrapeOutcome;
  export: ExportResult;
  durationMs: number;
};

const SUMMARY_FIELDS = LISTING_FIELDS.slice(0, 5);

export async function runSearchScrape(run: SearchRun): Promise<SearchRunResult> {
  const { criteria, config } = run;
  console.log(`\n[SearchRunner] Starting scrape for: ${criteria.make} ${criteria.model} ${criteria.year} (${config.market})`);

  const start = Date.now();
  const outcome = await scrapeAutochek(criteria, config, run.deps, run.signal);
  const result = await writeOutputs(outcome.listings, run.targets);
  const durationMs = Date.now() - start;

  for (const line of formatSummary(outcome, result, durationMs)) console.log(line);
  return { outcome, export: result, durationMs };
}

export function formatSummary(outcome: ScrapeOutcome, result: ExportResult, durationMs: number): string[] {
  const lines = [
    `[SearchRunner] ${outcome.listings.length} listings (${describeOutcome(outcome)}) in ${(durationMs / 1000).toFixed(1)}s`,
    `[SearchRunner] Files: ${result.files.join(', ')}`,
  ];

  const [first] = outcome.listings;
  if (first) {
    const preview = SUMMARY_FIELDS.map((field) => `${field}=${first[field] ?? ''}`).join(', ');
    lines.push(`[SearchRunner] First: ${preview}`);
  } else {
    lines.push('[SearchRunner] No listings found');
  }
  return lines;
}

function describeOutcome(outcome: ScrapeOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return `${outcome.strategy} strategy, ${outcome.pagesVisited} pages, stopped on ${outcome.stopReason}`;
    case 'fallback':
      return `static fallback after: ${outcome.reason}`;
  }
}
