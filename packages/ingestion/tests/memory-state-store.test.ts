import { describe, it, expect } from 'vitest';
import { createMemoryStateStore } from '../src/memory-state-store.js';

const earlier = new Date('2025-03-01T08:00:00.000Z');
const later = new Date('2025-03-02T08:00:00.000Z');

describe('createMemoryStateStore', () => {
  it('inserts new listings without a fingerprint', async () => {
    const store = createMemoryStateStore();
    await store.upsertSummary({ listingId: 'a', sourceUrl: 'https://jobs.example.org/a' }, earlier);

    expect(await store.getRecord('a')).toEqual({
      listingId: 'a',
      lastSeenAt: '2025-03-01T08:00:00.000Z',
      updatedAt: null,
      detailFingerprint: null,
      detailUpdatedAt: null,
    });
  });

  it('never moves lastSeenAt backwards', async () => {
    const store = createMemoryStateStore();
    await store.upsertSummary({ listingId: 'a', sourceUrl: 'https://jobs.example.org/a' }, later);
    await store.upsertSummary({ listingId: 'a', sourceUrl: 'https://jobs.example.org/a' }, earlier);

    expect((await store.getRecord('a'))?.lastSeenAt).toBe('2025-03-02T08:00:00.000Z');
  });

  it('keeps the stored updatedAt when a summary has none', async () => {
    const store = createMemoryStateStore();
    await store.upsertSummary(
      { listingId: 'a', sourceUrl: 'https://jobs.example.org/a', updatedAt: '2025-02-01T00:00:00.000Z' },
      earlier,
    );
    await store.upsertSummary({ listingId: 'a', sourceUrl: 'https://jobs.example.org/a' }, later);

    expect((await store.getRecord('a'))?.updatedAt).toBe('2025-02-01T00:00:00.000Z');
  });

  it('does not touch the fingerprint on summary upserts', async () => {
    const store = createMemoryStateStore();
    await store.upsertSummary({ listingId: 'a', sourceUrl: 'https://jobs.example.org/a' }, earlier);
    await store.recordDetailResult('a', 'fp-1');
    await store.upsertSummary(
      { listingId: 'a', sourceUrl: 'https://jobs.example.org/a', updatedAt: '2025-02-05T00:00:00.000Z' },
      later,
    );

    const record = await store.getRecord('a');
    expect(record?.detailFingerprint).toBe('fp-1');
    expect(record?.updatedAt).toBe('2025-02-05T00:00:00.000Z');
    expect(record?.detailUpdatedAt).toBeNull();
  });

  it('is idempotent for repeated batches', async () => {
    const store = createMemoryStateStore();
    const batch = [
      { listingId: 'a', sourceUrl: 'https://jobs.example.org/a' },
      { listingId: 'a', sourceUrl: 'https://jobs.example.org/a', updatedAt: '2025-02-01T00:00:00.000Z' },
    ];

    expect(await store.upsertSummaries(batch, earlier)).toBe(1);
    const first = await store.listRecords();
    await store.upsertSummaries(batch, earlier);

    expect(await store.listRecords()).toEqual(first);
    expect(first[0]?.updatedAt).toBe('2025-02-01T00:00:00.000Z');
  });

  it('records detail results against the given or stored updatedAt', async () => {
    const store = createMemoryStateStore();
    await store.upsertSummary(
      { listingId: 'a', sourceUrl: 'https://jobs.example.org/a', updatedAt: '2025-02-01T00:00:00.000Z' },
      earlier,
    );
    await store.upsertSummary({ listingId: 'b', sourceUrl: 'https://jobs.example.org/b' }, earlier);

    await store.recordDetailResult('a', 'fp-a');
    await store.recordDetailResult('b', 'fp-b', '2025-02-09T00:00:00.000Z');

    expect(await store.getRecord('a')).toMatchObject({
      detailFingerprint: 'fp-a',
      updatedAt: '2025-02-01T00:00:00.000Z',
      detailUpdatedAt: '2025-02-01T00:00:00.000Z',
    });
    expect(await store.getRecord('b')).toMatchObject({
      detailFingerprint: 'fp-b',
      updatedAt: '2025-02-09T00:00:00.000Z',
      detailUpdatedAt: '2025-02-09T00:00:00.000Z',
    });
  });

  it('filters listings by seenSince', async () => {
    const store = createMemoryStateStore();
    await store.upsertSummary({ listingId: 'old', sourceUrl: 'https://jobs.example.org/old' }, earlier);
    await store.upsertSummary({ listingId: 'new', sourceUrl: 'https://jobs.example.org/new' }, later);

    const records = await store.listRecords({ seenSince: later });
    expect(records.map((r) => r.listingId)).toEqual(['new']);
  });

  it('ignores detail results for unknown listings', async () => {
    const store = createMemoryStateStore();
    await store.recordDetailResult('missing', 'fp');
    expect(await store.getRecord('missing')).toBeNull();
  });
});
