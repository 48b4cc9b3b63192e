/**
 * Search runner tests: scrape, export, summary
 */

jest.mock('../scrapers/autochek', () => ({ scrapeAutochek: jest.fn() }));

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadRunConfig } from '../config/run-config';
import { scrapeAutochek } from '../scrapers/autochek';
import { createListing, type ScrapeOutcome } from '../scrapers/types';
import { formatSummary, runSearchScrape } from '../services/search-runner';
import { silenceConsole } from './test-helpers';

const scrapeMock = jest.mocked(scrapeAutochek);
const criteria = { make: 'Toyota', model: 'Corolla', year: 2015 };

const listing = createListing({
  listing_id: 'a1',
  make: 'Toyota',
  model: 'Corolla',
  year: 2015,
  variant: 'LE',
  listing_url: 'https://autochek.africa/car/a1',
});

const success: ScrapeOutcome = {
  kind: 'success',
  criteria,
  listings: [listing],
  entryUrl: 'https://autochek.africa/ng/cars-for-sale',
  strategy: 'direct',
  pagesVisited: 2,
  stopReason: 'empty-page',
};

describe('formatSummary', () => {
  it('should describe a browser run and preview the first record', () => {
    expect(formatSummary(success, { kind: 'written', count: 1, files: ['out.json'] }, 1500)).toEqual([
      '[SearchRunner] 1 listings (direct strategy, 2 pages, stopped on empty-page) in 1.5s',
      '[SearchRunner] Files: out.json',
      '[SearchRunner] First: listing_id=a1, make=Toyota, model=Corolla, year=2015, variant=LE',
    ]);
  });

  it('should describe an empty fallback run', () => {
    const fallback: ScrapeOutcome = { kind: 'fallback', criteria, listings: [], reason: 'browser crashed' };
    expect(formatSummary(fallback, { kind: 'empty', files: ['out.csv'] }, 200)).toEqual([
      '[SearchRunner] 0 listings (static fallback after: browser crashed) in 0.2s',
      '[SearchRunner] Files: out.csv',
      '[SearchRunner] No listings found',
    ]);
  });
});

describe('runSearchScrape', () => {
  let dir: string;

  beforeEach(async () => {
    silenceConsole();
    dir = await mkdtemp(join(tmpdir(), 'vehicle-run-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    scrapeMock.mockReset();
    await rm(dir, { recursive: true, force: true });
  });

  it('should scrape, export and return both results', async () => {
    scrapeMock.mockResolvedValue(success);
    const config = loadRunConfig({}, {});
    const out = join(dir, 'results.json');

    const result = await runSearchScrape({ criteria, config, targets: { out } });

    expect(scrapeMock).toHaveBeenCalledWith(criteria, config, undefined, undefined);
    expect(result.outcome).toBe(success);
    expect(result.export).toEqual({ kind: 'written', count: 1, files: [out] });
    expect(JSON.parse(await readFile(out, 'utf8'))).toEqual([{ ...listing }]);
  });
});
