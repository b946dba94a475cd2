import type { Database, ListingStateRow } from '@statejobs/db';
import { listings } from '@statejobs/db';
import { asc, eq, gte, sql } from 'drizzle-orm';
import type { ListingState, ListingSummary, StateRecord } from './types.js';

export interface ListRecordsOptions {
  /** Only records whose `lastSeenAt` is at or after this instant. */
  seenSince?: Date;
}

/**
 * Durable per-listing state shared across runs. Writes are keyed upserts,
 * so replaying any call leaves the same state.
 */
export interface StateStore {
  upsertSummary(summary: ListingSummary, seenAt: Date): Promise<void>;
  /** Returns the number of distinct listings written. */
  upsertSummaries(summaries: readonly ListingSummary[], seenAt: Date): Promise<number>;
  recordDetailResult(listingId: string, fingerprint: string, updatedAt?: string | null): Promise<void>;
  getRecord(listingId: string): Promise<StateRecord | null>;
  listRecords(options?: ListRecordsOptions): Promise<StateRecord[]>;
}

/**
 * Collapse duplicate IDs inside one batch. The last occurrence wins;
 * position follows the first occurrence.
 */
export function collapseSummaries(summaries: readonly ListingSummary[]): ListingSummary[] {
  const byId = new Map<string, ListingSummary>();
  for (const summary of summaries) {
    byId.set(summary.listingId, summary);
  }

  return [...byId.values()];
}

export function describeListingState(record: StateRecord | null | undefined): ListingState {
  if (!record) return 'unseen';
  if (record.detailFingerprint === null) return 'summary_seen';
  if (record.updatedAt !== record.detailUpdatedAt) return 'stale';
  return 'detail_fetched';
}

function toStateRecord(row: ListingStateRow): StateRecord {
  return {
    listingId: row.listingId,
    lastSeenAt: row.lastSeenAt.toISOString(),
    updatedAt: row.updatedAt,
    detailFingerprint: row.detailFingerprint,
    detailUpdatedAt: row.detailUpdatedAt,
  };
}

/**
 * Postgres-backed store. Summaries go through INSERT ... ON CONFLICT DO UPDATE:
 * `last_seen_at` only moves forward, `updated_at` is replaced only by a
 * non-null value and the fingerprint columns are left alone.
 */
export function createDrizzleStateStore(db: Database): StateStore {
  async function upsertSummaries(summaries: readonly ListingSummary[], seenAt: Date): Promise<number> {
    const unique = collapseSummaries(summaries);
    if (unique.length === 0) {
      return 0;
    }

    const rows = unique.map((summary) => ({
      listingId: summary.listingId,
      lastSeenAt: seenAt,
      updatedAt: summary.updatedAt ?? null,
      detailFingerprint: null,
      detailUpdatedAt: null,
    }));

    await db
      .insert(listings)
      .values(rows)
      .onConflictDoUpdate({
        target: listings.listingId,
        set: {
          lastSeenAt: sql`greatest(${listings.lastSeenAt}, excluded.last_seen_at)`,
          updatedAt: sql`coalesce(excluded.updated_at, ${listings.updatedAt})`,
        },
      });

    return unique.length;
  }

  return {
    async upsertSummary(summary, seenAt) {
      await upsertSummaries([summary], seenAt);
    },

    upsertSummaries,

    async recordDetailResult(listingId, fingerprint, updatedAt) {
      const set = updatedAt
        ? { detailFingerprint: fingerprint, updatedAt, detailUpdatedAt: updatedAt }
        : { detailFingerprint: fingerprint, detailUpdatedAt: sql`${listings.updatedAt}` };

      await db.update(listings).set(set).where(eq(listings.listingId, listingId));
    },

    async getRecord(listingId) {
      const [row] = await db.select().from(listings).where(eq(listings.listingId, listingId)).limit(1);
      return row ? toStateRecord(row) : null;
    },

    async listRecords(options = {}) {
      const rows = await db
        .select()
        .from(listings)
        .where(options.seenSince ? gte(listings.lastSeenAt, options.seenSince) : undefined)
        .orderBy(asc(listings.listingId));

      return rows.map(toStateRecord);
    },
  };
}
