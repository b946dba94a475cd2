import { isPermanentFetchError, rawDetailFieldsSchema, validateListItems } from '@statejobs/source-sdk';
import type { RawDetailFields, ValidatedListItem } from '@statejobs/source-sdk';
import { selectDetailCandidates } from './candidates.js';
import { DEFAULT_INGESTION_CONFIG } from './config.js';
import { buildDetailRecord, createDetailParser, type DetailParser } from './detail.js';
import { IdentityError, errorMessage } from './errors.js';
import { dedupeRows, explode, toListingRow } from './explode.js';
import { fingerprintDetailFields } from './fingerprint.js';
import { createIdentityResolver, type IdentityResolver } from './identity.js';
import { normalizeTimestamp } from './normalize.js';
import { createOrgMatcher, type OrgMatcher } from './org-match.js';
import type {
  CandidateReason,
  ExplodedRow,
  IngestionLogger,
  ListingRow,
  ListingSummary,
  RunDeps,
  RunOptions,
  RunResult,
  RunStats,
} from './types.js';

const defaultLogger: IngestionLogger = {
  debug: (msg) => console.debug(msg),
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

const DEFAULT_MAX_PAGES = 1;

function emptyStats(): RunStats {
  return {
    pagesFetched: 0,
    listItems: 0,
    identityErrors: 0,
    summariesUpserted: 0,
    candidates: 0,
    detailsFetched: 0,
    detailFailures: 0,
    orgMatched: 0,
    orgUnmatched: 0,
    rowsEmitted: 0,
    duplicateRowsMerged: 0,
  };
}

interface RunContext {
  deps: RunDeps;
  options: RunOptions;
  logger: IngestionLogger;
  stats: RunStats;
  errors: string[];
}

/**
 * Walk search result pages until the page limit, an empty page or the last page.
 * A failed page ends discovery; what was found so far is kept.
 */
async function discover(ctx: RunContext): Promise<ValidatedListItem[]> {
  const { deps, options, logger, stats, errors } = ctx;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const found: ValidatedListItem[] = [];

  for (let page = 1; page <= maxPages; page++) {
    if (options.signal?.aborted) break;

    const pageUrl = deps.searchPageUrl(page);
    let body: string;
    let resolvedUrl: string;
    try {
      const result = await deps.fetcher.fetch(pageUrl);
      body = result.body;
      resolvedUrl = result.url;
    } catch (err) {
      const message = errorMessage(err);
      errors.push(`page ${page}: ${message}`);
      logger.error(`[discover] Page ${page} failed, stopping discovery: ${message}`);
      break;
    }
    stats.pagesFetched++;

    const items = validateListItems(deps.extractor.extractListItems(body, resolvedUrl), {
      onInvalid: (issues) => {
        logger.warn(`[discover] Dropped invalid list item on page ${page}: ${issues.map((i) => i.message).join(', ')}`);
      },
    });
    stats.listItems += items.length;
    logger.info(`[discover] Page ${page}: ${items.length} listings`);

    if (items.length === 0) break;
    found.push(...items);

    if (!deps.extractor.hasNextPage(body)) break;
  }

  return found;
}

function resolveSummaries(ctx: RunContext, items: readonly ValidatedListItem[], resolver: IdentityResolver): ListingSummary[] {
  const summaries: ListingSummary[] = [];

  for (const item of items) {
    try {
      const { listingId, provenance } = resolver.resolveId(item.idCandidates, item.sourceUrl);
      summaries.push({
        listingId,
        sourceUrl: item.sourceUrl,
        publishedAt: normalizeTimestamp(item.publishedAt) ?? undefined,
        updatedAt: normalizeTimestamp(item.updatedAt) ?? undefined,
        provenance,
      });
    } catch (err) {
      if (!(err instanceof IdentityError)) throw err;
      ctx.stats.identityErrors++;
      ctx.logger.warn(`[identity] Skipping listing: ${err.message}`);
    }
  }

  return summaries;
}

function logSelectorMisses(logger: IngestionLogger, listingId: string, fields: RawDetailFields): void {
  for (const [field, value] of Object.entries(fields)) {
    if (value === null) {
      logger.debug(`[detail:${listingId}] No value for ${field}`);
    }
  }
}

interface ListingOutput {
  rows: ExplodedRow[];
  listing: ListingRow | null;
}

async function processListing(
  ctx: RunContext,
  summary: ListingSummary,
  parser: DetailParser,
  matcher: OrgMatcher,
): Promise<ListingOutput> {
  const { deps, options, logger, stats } = ctx;
  const id = summary.listingId;

  const response = await deps.fetcher.fetch(summary.sourceUrl);
  stats.detailsFetched++;

  const parsed = rawDetailFieldsSchema.safeParse(deps.extractor.extractDetailFields(response.body));
  if (!parsed.success) {
    throw new Error(`Extracted detail fields are invalid: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
  }
  const fields = parsed.data;
  logSelectorMisses(logger, id, fields);

  const fingerprint = fingerprintDetailFields(fields);
  const detail = buildDetailRecord(summary, fields, parser);
  const scrapedAt = (deps.now?.() ?? new Date()).toISOString();

  const titleText = [detail.title, detail.jobTitle].filter((part): part is string => part !== null).join(' ');
  const match = matcher.matchOrg(detail.employerRaw, titleText, {
    sectorFilterApplied: options.sectorFilterApplied ?? false,
    fuzzyThreshold: options.fuzzyThreshold,
  });

  await deps.store.recordDetailResult(id, fingerprint, summary.updatedAt ?? detail.updatedAt);

  if (!match) {
    stats.orgUnmatched++;
    logger.debug(`[detail:${id}] No organization match for employer "${detail.employerRaw ?? ''}"`);
    return { rows: [], listing: null };
  }

  stats.orgMatched++;
  return { rows: explode(detail, match, scrapedAt), listing: toListingRow(detail, match, scrapedAt) };
}

function countReasons(reasons: readonly CandidateReason[]): string {
  const counts = new Map<CandidateReason, number>();
  for (const reason of reasons) {
    counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return [...counts.entries()].map(([reason, count]) => `${reason}=${count}`).join(', ') || 'none';
}

/**
 * One incremental run.
 * Stages: discover → identify → upsert summaries → select candidates →
 * per listing: fetch → extract → fingerprint → parse → match → explode → record.
 *
 * Listings are processed one at a time. A failing listing is logged and
 * counted; its state is left as it was. Aborting the signal stops the run
 * between listings.
 */
export async function runIncremental(deps: RunDeps, options: RunOptions = {}): Promise<RunResult> {
  const logger = deps.logger ?? defaultLogger;
  const config = deps.config ?? DEFAULT_INGESTION_CONFIG;
  const startedAt = deps.now?.() ?? new Date();
  const start = performance.now();

  if (options.fuzzyThreshold !== undefined && (options.fuzzyThreshold < 0 || options.fuzzyThreshold > 1)) {
    throw new RangeError(`fuzzyThreshold must be between 0 and 1, got ${options.fuzzyThreshold}`);
  }

  const ctx: RunContext = { deps, options, logger, stats: emptyStats(), errors: [] };
  const { stats, errors } = ctx;

  const resolver = createIdentityResolver(config.identity);
  const parser = createDetailParser(config);
  const matcher = createOrgMatcher(config.orgs);

  logger.info(`[run] Starting ${options.fullRefresh ? 'full' : 'incremental'} run`);

  const items = await discover(ctx);
  const summaries = resolveSummaries(ctx, items, resolver);
  stats.summariesUpserted = await deps.store.upsertSummaries(summaries, startedAt);
  logger.info(`[run] ${stats.summariesUpserted} listings seen on ${stats.pagesFetched} page(s)`);

  const order = new Map<string, number>();
  const byId = new Map<string, ListingSummary>();
  summaries.forEach((summary, index) => {
    if (!order.has(summary.listingId)) order.set(summary.listingId, index);
    byId.set(summary.listingId, summary);
  });

  const candidates = (
    await selectDetailCandidates(deps.store, {
      fullRefresh: options.fullRefresh ?? false,
      seenSince: startedAt,
      fingerprintHints: options.fingerprintHints,
    })
  )
    .filter((candidate) => byId.has(candidate.listingId))
    .sort((a, b) => (order.get(a.listingId) ?? 0) - (order.get(b.listingId) ?? 0));
  stats.candidates = candidates.length;
  logger.info(`[run] ${candidates.length} detail candidate(s) (${countReasons(candidates.map((c) => c.reason))})`);

  const rows: ExplodedRow[] = [];
  const listings: ListingRow[] = [];
  let cancelled = options.signal?.aborted === true;

  for (const [index, candidate] of candidates.entries()) {
    if (options.signal?.aborted) {
      cancelled = true;
      logger.warn(`[run] Cancelled with ${candidates.length - index} listing(s) left`);
      break;
    }

    const summary = byId.get(candidate.listingId);
    if (!summary) continue;

    try {
      const output = await processListing(ctx, summary, parser, matcher);
      rows.push(...output.rows);
      if (output.listing) listings.push(output.listing);
    } catch (err) {
      stats.detailFailures++;
      const message = errorMessage(err);
      errors.push(`${candidate.listingId}: ${message}`);
      if (isPermanentFetchError(err)) {
        logger.warn(`[detail:${candidate.listingId}] Skipped: ${message}`);
      } else {
        logger.error(`[detail:${candidate.listingId}] Error: ${message}`);
      }
    }
  }

  const deduped = dedupeRows(rows);
  stats.rowsEmitted = deduped.rows.length;
  stats.duplicateRowsMerged = deduped.merged;

  logger.info(
    `[run] Done. ${stats.detailsFetched} detail(s) fetched, ${stats.orgMatched} matched, ${stats.rowsEmitted} row(s), ${stats.detailFailures} failure(s)`,
  );

  return {
    rows: deduped.rows,
    listings,
    stats,
    errors,
    cancelled,
    startedAt: startedAt.toISOString(),
    durationMs: performance.now() - start,
  };
}
