import { createHash } from 'node:crypto';
import type { RawDetailFields } from '@statejobs/source-sdk';
import { normalizeWhitespace } from './normalize.js';

/**
 * SHA-256 over whitespace-normalized detail content.
 * Used to detect changes the site does not announce through `updated_at`.
 */
export function computeFingerprint(normalizedDetailContent: string): string {
  return createHash('sha256').update(normalizeWhitespace(normalizedDetailContent)).digest('hex');
}

/**
 * Fingerprint of the extracted fields. Markup outside the configured
 * selectors does not affect it.
 */
export function fingerprintDetailFields(fields: RawDetailFields): string {
  const parts = [
    fields.title,
    fields.jobTitle,
    fields.employer,
    fields.locations?.join(', ') ?? null,
    fields.employmentType,
    fields.extent,
    fields.salaryText,
    fields.jobCodeText,
    fields.description,
    fields.publishedAt,
    fields.updatedAt,
    fields.applyDeadline,
  ];

  return computeFingerprint(parts.map((part) => part ?? '').join('|'));
}
