import type { DetailRecord, ExplodedRow, JobCodeEntry, ListingRow, OrgMatch } from './types.js';

export const EXPLODED_COLUMNS = [
  'listing_id',
  'job_code',
  'job_title',
  'employer_normalized',
  'salary_min',
  'salary_max',
  'salary_text',
  'is_shared_salary',
  'published_at',
  'updated_at',
  'apply_deadline',
  'source_url',
  'scraped_at',
  'matched_org_tag',
  'match_confidence',
  'match_strategy',
] as const satisfies ReadonlyArray<keyof ExplodedRow>;

export const LISTING_COLUMNS = [
  'listing_id',
  'title',
  'job_title',
  'employer_raw',
  'employer_normalized',
  'locations',
  'employment_type',
  'extent',
  'published_at',
  'updated_at',
  'apply_deadline',
  'source_url',
  'matched_org_tag',
  'match_confidence',
  'match_strategy',
  'job_code_count',
  'scraped_at',
] as const satisfies ReadonlyArray<keyof ListingRow>;

function hasBounds(entry: { salaryMin: number | null; salaryMax: number | null }): boolean {
  return entry.salaryMin !== null || entry.salaryMax !== null;
}

/**
 * One entry per code, in first-seen order. A later duplicate replaces the
 * kept one only when it has salary bounds and the kept one does not.
 */
export function mergeJobCodes(entries: readonly JobCodeEntry[]): JobCodeEntry[] {
  const byCode = new Map<string, JobCodeEntry>();
  for (const entry of entries) {
    const kept = byCode.get(entry.code);
    if (!kept || (!hasBounds(kept) && hasBounds(entry))) {
      byCode.set(entry.code, entry);
    }
  }

  return [...byCode.values()];
}

/**
 * Expand a listing into one row per job code. A listing without codes
 * yields a single row with a null code and the listing-level salary.
 */
export function explode(detail: DetailRecord, match: OrgMatch | null, scrapedAt: string): ExplodedRow[] {
  const base = {
    listing_id: detail.listingId,
    employer_normalized: detail.employerNormalized,
    published_at: detail.publishedAt,
    updated_at: detail.updatedAt,
    apply_deadline: detail.applyDeadline,
    source_url: detail.sourceUrl,
    scraped_at: scrapedAt,
    matched_org_tag: match?.tag ?? null,
    match_confidence: match?.confidence ?? null,
    match_strategy: match?.strategy ?? null,
  };
  const listingTitle = detail.jobTitle ?? detail.title;

  const codes = mergeJobCodes(detail.jobCodes);
  if (codes.length === 0) {
    return [
      {
        ...base,
        job_code: null,
        job_title: listingTitle,
        salary_min: detail.listingSalary.min,
        salary_max: detail.listingSalary.max,
        salary_text: detail.listingSalary.text,
        is_shared_salary: false,
      },
    ];
  }

  return codes.map((entry) => ({
    ...base,
    job_code: entry.code,
    job_title: entry.title ?? listingTitle,
    salary_min: entry.salaryMin,
    salary_max: entry.salaryMax,
    salary_text: entry.salaryText,
    is_shared_salary: entry.isSharedSalary,
  }));
}

export interface DedupeResult {
  rows: ExplodedRow[];
  merged: number;
}

/**
 * Keep one row per (listing_id, job_code) across a run, with the same
 * preference as {@link mergeJobCodes}.
 */
export function dedupeRows(rows: readonly ExplodedRow[]): DedupeResult {
  const byKey = new Map<string, ExplodedRow>();
  for (const row of rows) {
    const key = `${row.listing_id}\u0000${row.job_code ?? ''}`;
    const kept = byKey.get(key);
    const rowHasBounds = row.salary_min !== null || row.salary_max !== null;
    const keptHasBounds = kept !== undefined && (kept.salary_min !== null || kept.salary_max !== null);

    if (!kept || (!keptHasBounds && rowHasBounds)) {
      byKey.set(key, row);
    }
  }

  return { rows: [...byKey.values()], merged: rows.length - byKey.size };
}

export function toListingRow(detail: DetailRecord, match: OrgMatch | null, scrapedAt: string): ListingRow {
  return {
    listing_id: detail.listingId,
    title: detail.title,
    job_title: detail.jobTitle,
    employer_raw: detail.employerRaw,
    employer_normalized: detail.employerNormalized,
    locations: detail.locations.length > 0 ? detail.locations.join('; ') : null,
    employment_type: detail.employmentType,
    extent: detail.extent,
    published_at: detail.publishedAt,
    updated_at: detail.updatedAt,
    apply_deadline: detail.applyDeadline,
    source_url: detail.sourceUrl,
    matched_org_tag: match?.tag ?? null,
    match_confidence: match?.confidence ?? null,
    match_strategy: match?.strategy ?? null,
    job_code_count: mergeJobCodes(detail.jobCodes).length,
    scraped_at: scrapedAt,
  };
}

export interface RowMetrics {
  totalRows: number;
  codesPresent: number;
  codesRatio: number;
  salaryPresent: number;
  salaryRatio: number;
}

/**
 * Parsing success over a set of rows: how many carry a job code and how many carry a salary bound.
 */
export function summarizeRows(rows: readonly ExplodedRow[]): RowMetrics {
  const totalRows = rows.length;
  const codesPresent = rows.filter((row) => row.job_code !== null).length;
  const salaryPresent = rows.filter((row) => row.salary_min !== null || row.salary_max !== null).length;

  return {
    totalRows,
    codesPresent,
    codesRatio: totalRows > 0 ? codesPresent / totalRows : 0,
    salaryPresent,
    salaryRatio: totalRows > 0 ? salaryPresent / totalRows : 0,
  };
}
