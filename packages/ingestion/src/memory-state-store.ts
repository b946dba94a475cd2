import { collapseSummaries, type ListRecordsOptions, type StateStore } from './state-store.js';
import type { ListingSummary, StateRecord } from './types.js';

/**
 * In-process store with the same upsert semantics as the Postgres one.
 * Used by `--dry-run` and tests.
 */
export function createMemoryStateStore(initial: readonly StateRecord[] = []): StateStore {
  const records = new Map<string, StateRecord>();
  for (const record of initial) {
    records.set(record.listingId, { ...record });
  }

  function upsert(summary: ListingSummary, seenAt: Date): void {
    const seenIso = seenAt.toISOString();
    const existing = records.get(summary.listingId);

    if (!existing) {
      records.set(summary.listingId, {
        listingId: summary.listingId,
        lastSeenAt: seenIso,
        updatedAt: summary.updatedAt ?? null,
        detailFingerprint: null,
        detailUpdatedAt: null,
      });
      return;
    }

    records.set(summary.listingId, {
      ...existing,
      lastSeenAt: Date.parse(seenIso) > Date.parse(existing.lastSeenAt) ? seenIso : existing.lastSeenAt,
      updatedAt: summary.updatedAt ?? existing.updatedAt,
    });
  }

  return {
    async upsertSummary(summary, seenAt) {
      upsert(summary, seenAt);
    },

    async upsertSummaries(summaries, seenAt) {
      const unique = collapseSummaries(summaries);
      for (const summary of unique) {
        upsert(summary, seenAt);
      }
      return unique.length;
    },

    async recordDetailResult(listingId, fingerprint, updatedAt) {
      const existing = records.get(listingId);
      if (!existing) return;

      records.set(listingId, {
        ...existing,
        detailFingerprint: fingerprint,
        updatedAt: updatedAt || existing.updatedAt,
        detailUpdatedAt: updatedAt || existing.updatedAt,
      });
    },

    async getRecord(listingId) {
      const record = records.get(listingId);
      return record ? { ...record } : null;
    },

    async listRecords(options: ListRecordsOptions = {}) {
      const since = options.seenSince?.getTime();
      return [...records.values()]
        .filter((record) => since === undefined || Date.parse(record.lastSeenAt) >= since)
        .sort((a, b) => (a.listingId < b.listingId ? -1 : a.listingId > b.listingId ? 1 : 0))
        .map((record) => ({ ...record }));
    },
  };
}
