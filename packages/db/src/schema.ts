import { pgTable, varchar, text, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Per-listing tracking state for incremental runs.
 *
 * `updated_at` is the latest site-reported update time seen on a list page.
 * `detail_updated_at` is the value that was current when the detail page was
 * last recorded; the two differing marks the listing as stale.
 */
export const listings = pgTable(
  'listings',
  {
    listingId: varchar('listing_id', { length: 255 }).primaryKey(),
    lastSeenAt: timestamp('last_seen_at', { withTimezone: true }).notNull(),
    updatedAt: text('updated_at'),
    detailFingerprint: varchar('detail_fingerprint', { length: 64 }),
    detailUpdatedAt: text('detail_updated_at'),
    firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [index('idx_listings_updated_at').on(t.updatedAt), index('idx_listings_last_seen_at').on(t.lastSeenAt)],
);

export type ListingStateRow = typeof listings.$inferSelect;
