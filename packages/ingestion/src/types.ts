import type { Extractor, Fetcher } from '@statejobs/source-sdk';
import type { StateStore } from './state-store.js';
import type { IngestionConfig } from './config.js';

export type IdProvenance = 'candidate' | 'url_uuid' | 'url_numeric' | 'url_query' | 'url_hash';

export interface ResolvedId {
  listingId: string;
  provenance: IdProvenance;
}

/**
 * A listing as seen on a search/list page, with its stable ID assigned.
 */
export interface ListingSummary {
  listingId: string;
  sourceUrl: string;
  publishedAt?: string;
  updatedAt?: string;
  provenance?: IdProvenance;
}

export interface StateRecord {
  listingId: string;
  /** ISO-8601 UTC */
  lastSeenAt: string;
  updatedAt: string | null;
  detailFingerprint: string | null;
  /** The `updatedAt` in force when the detail was last recorded. */
  detailUpdatedAt: string | null;
}

export type ListingState = 'unseen' | 'summary_seen' | 'detail_fetched' | 'stale';

export type CandidateReason = 'full' | 'no_fingerprint' | 'updated_at_changed' | 'fingerprint_changed';

export interface DetailCandidate {
  listingId: string;
  reason: CandidateReason;
}

export interface JobCodeEntry {
  code: string;
  title: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  salaryText: string | null;
  isSharedSalary: boolean;
}

export interface DetailRecord {
  listingId: string;
  sourceUrl: string;
  title: string | null;
  jobTitle: string | null;
  employerRaw: string | null;
  employerNormalized: string | null;
  locations: string[];
  employmentType: string | null;
  extent: string | null;
  publishedAt: string | null;
  updatedAt: string | null;
  applyDeadline: string | null;
  /** Salary read from the listing's salary field alone; used when no job codes are found. */
  listingSalary: ListingSalary;
  jobCodes: JobCodeEntry[];
}

export interface ListingSalary {
  min: number | null;
  max: number | null;
  text: string | null;
}

export type MatchStrategy = 'exact' | 'synonym' | 'prefix' | 'title_prefix' | 'fuzzy';

export interface OrgMatch {
  tag: string;
  confidence: number;
  strategy: MatchStrategy;
}

export interface ExplodedRow {
  listing_id: string;
  job_code: string | null;
  job_title: string | null;
  employer_normalized: string | null;
  salary_min: number | null;
  salary_max: number | null;
  salary_text: string | null;
  is_shared_salary: boolean;
  published_at: string | null;
  updated_at: string | null;
  apply_deadline: string | null;
  source_url: string;
  scraped_at: string;
  matched_org_tag: string | null;
  match_confidence: number | null;
  match_strategy: MatchStrategy | null;
}

export interface ListingRow {
  listing_id: string;
  title: string | null;
  job_title: string | null;
  employer_raw: string | null;
  employer_normalized: string | null;
  locations: string | null;
  employment_type: string | null;
  extent: string | null;
  published_at: string | null;
  updated_at: string | null;
  apply_deadline: string | null;
  source_url: string;
  matched_org_tag: string | null;
  match_confidence: number | null;
  match_strategy: MatchStrategy | null;
  job_code_count: number;
  scraped_at: string;
}

/**
 * Per-stage counts for observability.
 */
export interface RunStats {
  pagesFetched: number;
  listItems: number;
  identityErrors: number;
  summariesUpserted: number;
  candidates: number;
  detailsFetched: number;
  /** Listings whose detail fetch or processing failed; their state is unchanged. */
  detailFailures: number;
  orgMatched: number;
  orgUnmatched: number;
  rowsEmitted: number;
  duplicateRowsMerged: number;
}

export interface RunResult {
  rows: ExplodedRow[];
  listings: ListingRow[];
  stats: RunStats;
  errors: string[];
  cancelled: boolean;
  startedAt: string;
  durationMs: number;
}

export interface RunOptions {
  fullRefresh?: boolean;
  /** Whether the search itself is restricted to the target sector; enables the title fallback. */
  sectorFilterApplied?: boolean;
  fuzzyThreshold?: number;
  maxPages?: number;
  /**
   * Detail fingerprints known without a fetch, keyed by listing ID. A hint
   * that differs from the stored fingerprint makes the listing a candidate.
   */
  fingerprintHints?: ReadonlyMap<string, string>;
  signal?: AbortSignal;
}

export interface RunDeps {
  store: StateStore;
  fetcher: Fetcher;
  extractor: Extractor;
  /** URL of the 1-based search result page. */
  searchPageUrl: (page: number) => string;
  config?: IngestionConfig;
  logger?: IngestionLogger;
  now?: () => Date;
}

/**
 * Minimal logger interface. Defaults to console.
 */
export interface IngestionLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
