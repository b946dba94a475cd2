export { HttpFetcher, FetchCircuitOpenError } from './client.js';
export type { HttpFetcherOptions } from './client.js';
export { buildSearchUrl, withoutSectorFilter, hasSectorFilter } from './search.js';
export { createCheerioExtractor, extractListItems, extractDetailFields, hasNextPage, splitLocations } from './extract.js';
export { createDefaultSiteProfile } from './profile.js';
