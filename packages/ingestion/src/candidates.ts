import type { StateStore } from './state-store.js';
import type { CandidateReason, DetailCandidate, StateRecord } from './types.js';

export interface CandidateOptions {
  fullRefresh: boolean;
  /** Restrict selection to listings seen at or after this instant (normally the run start). */
  seenSince?: Date;
  /** Fingerprints obtainable without a detail fetch, keyed by listing ID. */
  fingerprintHints?: ReadonlyMap<string, string>;
}

function candidateReason(record: StateRecord, hints: ReadonlyMap<string, string> | undefined): CandidateReason | null {
  if (record.detailFingerprint === null) {
    return 'no_fingerprint';
  }

  if (record.updatedAt !== record.detailUpdatedAt) {
    return 'updated_at_changed';
  }

  const hint = hints?.get(record.listingId);
  if (hint !== undefined && hint !== record.detailFingerprint) {
    return 'fingerprint_changed';
  }

  return null;
}

/**
 * Decide which listings need a detail fetch this run.
 * Listings with an unchanged `updatedAt` and fingerprint are never selected
 * unless `fullRefresh` is set.
 */
export async function selectDetailCandidates(store: StateStore, options: CandidateOptions): Promise<DetailCandidate[]> {
  const records = await store.listRecords({ seenSince: options.seenSince });

  if (options.fullRefresh) {
    return records.map((record) => ({ listingId: record.listingId, reason: 'full' }));
  }

  const candidates: DetailCandidate[] = [];
  for (const record of records) {
    const reason = candidateReason(record, options.fingerprintHints);
    if (reason) {
      candidates.push({ listingId: record.listingId, reason });
    }
  }

  return candidates;
}
