import type { SearchConfig } from '@statejobs/source-sdk';

/**
 * Build the search URL for one result page with the sector and
 * open-listings filters applied. Pages are 1-based.
 */
export function buildSearchUrl(search: SearchConfig, page: number): string {
  const url = new URL(search.baseUrl);
  const { paramNames } = search;

  if (hasSectorFilter(search)) {
    url.searchParams.set(paramNames.sector, search.sectorValue);
  }
  url.searchParams.set(paramNames.openOnly, search.openOnly ? 'true' : 'false');
  url.searchParams.set(paramNames.page, String(Math.max(1, Math.floor(page))));

  if (search.query) {
    url.searchParams.set(paramNames.query, search.query);
  }

  for (const [key, value] of Object.entries(search.extraParams ?? {})) {
    url.searchParams.set(key, value);
  }

  return url.toString();
}

/**
 * Same search without the sector filter, for runs that scan every sector and
 * rely on employer matching alone.
 */
export function withoutSectorFilter(search: SearchConfig): SearchConfig {
  return {
    ...search,
    sectorValue: '',
  };
}

export function hasSectorFilter(search: SearchConfig): boolean {
  return search.sectorValue.trim().length > 0;
}
