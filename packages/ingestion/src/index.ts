// Pipeline
export { runIncremental } from './pipeline.js';

// Stages
export { createIdentityResolver, canonicalizeUrl, hashUrl } from './identity.js';
export type { IdentityResolver } from './identity.js';
export { createDrizzleStateStore, collapseSummaries, describeListingState } from './state-store.js';
export type { StateStore, ListRecordsOptions } from './state-store.js';
export { createMemoryStateStore } from './memory-state-store.js';
export { selectDetailCandidates } from './candidates.js';
export type { CandidateOptions } from './candidates.js';
export { createOrgMatcher, normalizeOrgText, tokenSetSimilarity } from './org-match.js';
export type { OrgMatcher, MatchOptions } from './org-match.js';
export { parseSalaryText, isSalaryPhrase } from './salary.js';
export type { SalaryParseResult, SalaryKind } from './salary.js';
export { extractJobCodes } from './job-codes.js';
export type { ExtractedJobCode } from './job-codes.js';
export { createDetailParser, buildDetailRecord, detailText } from './detail.js';
export type { DetailParser } from './detail.js';
export {
  explode,
  mergeJobCodes,
  dedupeRows,
  toListingRow,
  summarizeRows,
  EXPLODED_COLUMNS,
  LISTING_COLUMNS,
} from './explode.js';
export type { DedupeResult, RowMetrics } from './explode.js';
export { computeFingerprint, fingerprintDetailFields } from './fingerprint.js';
export { normalizeWhitespace, emptyToNull, normalizeTimestamp } from './normalize.js';

// Configuration and errors
export {
  createIngestionConfig,
  DEFAULT_INGESTION_CONFIG,
  DEFAULT_ORG_CONFIG,
  DEFAULT_IDENTITY_CONFIG,
  DEFAULT_JOB_CODE_CONFIG,
  DEFAULT_SALARY_CONFIG,
} from './config.js';
export type {
  IngestionConfig,
  IngestionConfigOverrides,
  OrgMatcherConfig,
  OrgTagConfig,
  IdentityConfig,
  JobCodeConfig,
  SalaryConfig,
} from './config.js';
export { IdentityError, errorMessage } from './errors.js';

// Types
export type {
  IdProvenance,
  ResolvedId,
  ListingSummary,
  StateRecord,
  ListingState,
  CandidateReason,
  DetailCandidate,
  JobCodeEntry,
  DetailRecord,
  ListingSalary,
  MatchStrategy,
  OrgMatch,
  ExplodedRow,
  ListingRow,
  RunStats,
  RunResult,
  RunOptions,
  RunDeps,
  IngestionLogger,
} from './types.js';
