import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { EXPLODED_COLUMNS, LISTING_COLUMNS, type ExplodedRow, type ListingRow } from '@statejobs/ingestion';

export type CsvCell = string | number | boolean | null;

export const EXPLODED_FILE_NAME = 'jobs_exploded.csv';
export const LISTINGS_FILE_NAME = 'listings.csv';

export function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: CsvCell): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : '';
  }
  return escapeCsv(String(value));
}

/**
 * Render rows with a header line in the given column order. Nulls become
 * empty cells.
 */
export function toCsv<TColumn extends string>(
  columns: readonly TColumn[],
  rows: readonly Record<TColumn, CsvCell>[],
): string {
  const lines = [columns.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column])).join(','));
  }

  return `${lines.join('\n')}\n`;
}

export interface CsvOutput {
  explodedPath: string;
  listingsPath: string;
}

export function writeRunCsv(outputDir: string, rows: readonly ExplodedRow[], listings: readonly ListingRow[]): CsvOutput {
  const dir = resolve(outputDir);
  mkdirSync(dir, { recursive: true });

  const explodedPath = resolve(dir, EXPLODED_FILE_NAME);
  const listingsPath = resolve(dir, LISTINGS_FILE_NAME);
  writeFileSync(explodedPath, toCsv(EXPLODED_COLUMNS, rows), 'utf-8');
  writeFileSync(listingsPath, toCsv(LISTING_COLUMNS, listings), 'utf-8');

  return { explodedPath, listingsPath };
}
