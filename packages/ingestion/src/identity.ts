import { createHash } from 'node:crypto';
import { DEFAULT_IDENTITY_CONFIG, type IdentityConfig } from './config.js';
import { IdentityError } from './errors.js';
import type { ResolvedId } from './types.js';

const UUID_PATTERN = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i;
const NUMERIC_ID_PATTERN = /(?<!\d)\d{6,}(?!\d)/;
const MAX_ID_LENGTH = 255;

function parseUrl(sourceUrl: string | null | undefined): URL | null {
  const trimmed = sourceUrl?.trim();
  if (!trimmed) return null;

  try {
    return new URL(trimmed);
  } catch {
    return null;
  }
}

function usableCandidate(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed || trimmed.length > MAX_ID_LENGTH || /\s/.test(trimmed)) {
    return null;
  }

  return trimmed;
}

function isTrackingKey(key: string, config: IdentityConfig): boolean {
  return key.toLowerCase().startsWith('utm_') || config.trackingQueryKeys.includes(key);
}

/**
 * Canonical form of a listing URL used for hashing.
 *
 * Scheme and host are lowercased and default ports dropped (WHATWG URL does
 * both), the fragment and tracking parameters are removed, the remaining
 * query is sorted and repeated or trailing slashes in the path are collapsed.
 */
export function canonicalizeUrl(sourceUrl: string, config: IdentityConfig = DEFAULT_IDENTITY_CONFIG): string {
  const url = parseUrl(sourceUrl);
  if (!url) {
    throw new IdentityError(`Cannot canonicalize URL: ${sourceUrl}`, sourceUrl);
  }

  url.hash = '';

  const kept = [...url.searchParams.entries()].filter(([key]) => !isTrackingKey(key, config));
  kept.sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  url.search = new URLSearchParams(kept).toString();

  let path = url.pathname.replace(/\/{2,}/g, '/');
  if (path.length > 1) {
    path = path.replace(/\/+$/, '');
  }
  url.pathname = path || '/';

  return url.toString();
}

export function hashUrl(canonicalUrl: string): string {
  return createHash('sha256').update(canonicalUrl).digest('hex');
}

/**
 * Reads the canonical URL, so tracking parameters never contribute an ID.
 */
function idFromUrl(url: URL, config: IdentityConfig): ResolvedId | null {
  const uuid = `${url.pathname}${url.search}`.match(UUID_PATTERN);
  if (uuid) {
    return { listingId: uuid[0].toLowerCase(), provenance: 'url_uuid' };
  }

  const numeric = url.pathname.match(NUMERIC_ID_PATTERN);
  if (numeric) {
    return { listingId: numeric[0], provenance: 'url_numeric' };
  }

  for (const key of config.idQueryKeys) {
    const value = url.searchParams.get(key);
    const usable = value === null ? null : usableCandidate(value);
    if (usable) {
      return { listingId: usable, provenance: 'url_query' };
    }
  }

  return null;
}

export interface IdentityResolver {
  resolveId(candidateAttributes: readonly string[], sourceUrl: string | null | undefined): ResolvedId;
}

/**
 * Derives a stable listing ID. Order: native ID candidates from markup,
 * IDs embedded in the URL, then a SHA-256 of the canonical URL.
 * Pure: the same inputs give the same ID across runs.
 */
export function createIdentityResolver(config: IdentityConfig = DEFAULT_IDENTITY_CONFIG): IdentityResolver {
  return {
    resolveId(candidateAttributes, sourceUrl) {
      for (const candidate of candidateAttributes) {
        const usable = usableCandidate(candidate);
        if (usable) {
          return { listingId: usable, provenance: 'candidate' };
        }
      }

      const url = parseUrl(sourceUrl);
      if (!url) {
        throw new IdentityError(
          sourceUrl ? `No listing ID candidates and unparseable URL: ${sourceUrl}` : 'No listing ID candidates and no source URL',
          sourceUrl ?? null,
        );
      }

      const canonical = canonicalizeUrl(url.toString(), config);
      const fromUrl = idFromUrl(new URL(canonical), config);
      if (fromUrl) {
        return fromUrl;
      }

      return { listingId: hashUrl(canonical), provenance: 'url_hash' };
    },
  };
}
