import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import Papa from 'papaparse';
import { LISTING_FIELDS, type VehicleListing } from '../scrapers/types';

export type ExportTargets = {
  out: string;
  csv?: string;
};

export type ExportResult =
  | { kind: 'written'; count: number; files: string[] }
  | { kind: 'empty'; files: string[] };

export function toJson(listings: readonly VehicleListing[]): string {
  // Rebuild each record so key order is the column order regardless of how it was constructed
  const ordered = listings.map((listing) => Object.fromEntries(LISTING_FIELDS.map((field) => [field, listing[field]])));
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

export function toCsv(listings: readonly VehicleListing[]): string {
  const csv = Papa.unparse({
    fields: [...LISTING_FIELDS],
    data: listings.map((listing) => LISTING_FIELDS.map((field) => listing[field] ?? '')),
  });
  // Newer papaparse releases already end a header-only table with a line break
  return csv.endsWith('\r\n') ? csv : `${csv}\r\n`;
}

export function isCsvPath(path: string): boolean {
  return extname(path).toLowerCase() === '.csv';
}

/** Writes `out` (CSV or JSON by extension) and the optional extra CSV. Empty results still produce files. */
export async function writeOutputs(listings: readonly VehicleListing[], targets: ExportTargets): Promise<ExportResult> {
  const files: string[] = [];

  await writeText(targets.out, isCsvPath(targets.out) ? toCsv(listings) : toJson(listings));
  files.push(targets.out);

  if (targets.csv && targets.csv !== targets.out) {
    await writeText(targets.csv, toCsv(listings));
    files.push(targets.csv);
  }

  console.log(`[Exporter] Wrote ${listings.length} listings to ${files.join(', ')}`);
  return listings.length === 0 ? { kind: 'empty', files } : { kind: 'written', count: listings.length, files };
}

async function writeText(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf8');
}
