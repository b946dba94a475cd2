import { describe, it, expect, vi } from 'vitest';
import { SQL } from 'drizzle-orm';
import type { Database } from '@statejobs/db';
import { listings } from '@statejobs/db';
import { collapseSummaries, createDrizzleStateStore, describeListingState } from '../src/state-store.js';
import type { StateRecord } from '../src/types.js';

function mockDb(selectRows: unknown[] = []) {
  const onConflictDoUpdate = vi.fn().mockResolvedValue([]);
  const values = vi.fn().mockReturnValue({ onConflictDoUpdate });
  const insert = vi.fn().mockReturnValue({ values });

  const updateWhere = vi.fn().mockResolvedValue([]);
  const set = vi.fn().mockReturnValue({ where: updateWhere });
  const update = vi.fn().mockReturnValue({ set });

  const limit = vi.fn().mockResolvedValue(selectRows);
  const orderBy = vi.fn().mockResolvedValue(selectRows);
  const where = vi.fn().mockReturnValue({ limit, orderBy });
  const from = vi.fn().mockReturnValue({ where });
  const select = vi.fn().mockReturnValue({ from });

  return {
    db: { insert, update, select } as unknown as Database,
    insert,
    values,
    onConflictDoUpdate,
    set,
    where,
    limit,
    orderBy,
  };
}

const seenAt = new Date('2025-03-01T08:00:00.000Z');

describe('createDrizzleStateStore', () => {
  it('does not touch the database for an empty batch', async () => {
    const { db, insert } = mockDb();
    const count = await createDrizzleStateStore(db).upsertSummaries([], seenAt);

    expect(count).toBe(0);
    expect(insert).not.toHaveBeenCalled();
  });

  it('upserts one row per listing, last occurrence winning', async () => {
    const { db, values } = mockDb();
    const count = await createDrizzleStateStore(db).upsertSummaries(
      [
        { listingId: 'a', sourceUrl: 'https://jobs.example.org/a', updatedAt: '2025-02-01T00:00:00.000Z' },
        { listingId: 'b', sourceUrl: 'https://jobs.example.org/b' },
        { listingId: 'a', sourceUrl: 'https://jobs.example.org/a', updatedAt: '2025-02-03T00:00:00.000Z' },
      ],
      seenAt,
    );

    expect(count).toBe(2);
    expect(values).toHaveBeenCalledWith([
      {
        listingId: 'a',
        lastSeenAt: seenAt,
        updatedAt: '2025-02-03T00:00:00.000Z',
        detailFingerprint: null,
        detailUpdatedAt: null,
      },
      { listingId: 'b', lastSeenAt: seenAt, updatedAt: null, detailFingerprint: null, detailUpdatedAt: null },
    ]);
  });

  it('leaves the fingerprint columns out of the conflict update', async () => {
    const { db, onConflictDoUpdate } = mockDb();
    await createDrizzleStateStore(db).upsertSummary({ listingId: 'a', sourceUrl: 'https://jobs.example.org/a' }, seenAt);

    const [conflict] = onConflictDoUpdate.mock.calls[0] ?? [];
    expect(conflict.target).toBe(listings.listingId);
    expect(Object.keys(conflict.set)).toEqual(['lastSeenAt', 'updatedAt']);
    expect(conflict.set.lastSeenAt).toBeInstanceOf(SQL);
  });

  it('records a detail result with an explicit updatedAt', async () => {
    const { db, set } = mockDb();
    await createDrizzleStateStore(db).recordDetailResult('a', 'fp-1', '2025-02-03T00:00:00.000Z');

    expect(set).toHaveBeenCalledWith({
      detailFingerprint: 'fp-1',
      updatedAt: '2025-02-03T00:00:00.000Z',
      detailUpdatedAt: '2025-02-03T00:00:00.000Z',
    });
  });

  it('copies the stored updatedAt when none is given', async () => {
    const { db, set } = mockDb();
    await createDrizzleStateStore(db).recordDetailResult('a', 'fp-1');

    const [values] = set.mock.calls[0] ?? [];
    expect(values.detailFingerprint).toBe('fp-1');
    expect(values.detailUpdatedAt).toBeInstanceOf(SQL);
    expect('updatedAt' in values).toBe(false);
  });

  it('maps rows to state records', async () => {
    const row = {
      listingId: 'a',
      lastSeenAt: seenAt,
      updatedAt: null,
      detailFingerprint: 'fp-1',
      detailUpdatedAt: null,
      firstSeenAt: seenAt,
    };
    const { db, limit } = mockDb([row]);

    const record = await createDrizzleStateStore(db).getRecord('a');

    expect(limit).toHaveBeenCalledWith(1);
    expect(record).toEqual({
      listingId: 'a',
      lastSeenAt: '2025-03-01T08:00:00.000Z',
      updatedAt: null,
      detailFingerprint: 'fp-1',
      detailUpdatedAt: null,
    });
  });

  it('returns null for an unknown listing', async () => {
    const { db } = mockDb([]);
    expect(await createDrizzleStateStore(db).getRecord('missing')).toBeNull();
  });

  it('lists records ordered by listing ID', async () => {
    const { db, orderBy } = mockDb([
      { listingId: 'a', lastSeenAt: seenAt, updatedAt: null, detailFingerprint: null, detailUpdatedAt: null, firstSeenAt: seenAt },
    ]);

    const records = await createDrizzleStateStore(db).listRecords({ seenSince: seenAt });

    expect(orderBy).toHaveBeenCalledTimes(1);
    expect(records.map((r) => r.listingId)).toEqual(['a']);
  });
});

describe('collapseSummaries', () => {
  it('keeps first position and last value', () => {
    const collapsed = collapseSummaries([
      { listingId: 'a', sourceUrl: 'https://jobs.example.org/1' },
      { listingId: 'b', sourceUrl: 'https://jobs.example.org/2' },
      { listingId: 'a', sourceUrl: 'https://jobs.example.org/3' },
    ]);

    expect(collapsed.map((s) => s.sourceUrl)).toEqual(['https://jobs.example.org/3', 'https://jobs.example.org/2']);
  });
});

describe('describeListingState', () => {
  const base: StateRecord = {
    listingId: 'a',
    lastSeenAt: '2025-03-01T08:00:00.000Z',
    updatedAt: '2025-02-01T00:00:00.000Z',
    detailFingerprint: null,
    detailUpdatedAt: null,
  };

  it('walks the listing lifecycle', () => {
    expect(describeListingState(null)).toBe('unseen');
    expect(describeListingState(base)).toBe('summary_seen');
    expect(describeListingState({ ...base, detailFingerprint: 'fp', detailUpdatedAt: base.updatedAt })).toBe('detail_fetched');
    expect(
      describeListingState({ ...base, detailFingerprint: 'fp', detailUpdatedAt: '2025-01-01T00:00:00.000Z' }),
    ).toBe('stale');
  });
});
