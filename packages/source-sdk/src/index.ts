export type {
  RawListItem,
  RawDetailFields,
  FetchResult,
  Fetcher,
  Extractor,
  ListSelectors,
  DetailSelectors,
  SearchParamNames,
  SearchConfig,
  SiteProfile,
} from './types.js';
export { FetchError, TransientFetchError, PermanentFetchError, isPermanentFetchError } from './errors.js';
export type { FetchErrorKind } from './errors.js';
export { defineSiteProfile } from './factory.js';
export { rawListItemSchema, rawDetailFieldsSchema, siteProfileSchema, validateListItems, parseSiteProfile } from './schema.js';
export type { ValidatedListItem, ValidateListItemsOptions } from './schema.js';
