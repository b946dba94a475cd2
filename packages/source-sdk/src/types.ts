/**
 * One result card from a search/list page, before an ID is assigned.
 */
export interface RawListItem {
  sourceUrl: string;
  idCandidates: string[];
  publishedAt: string | null;
  updatedAt: string | null;
}

/**
 * Detail page fields as extracted by selectors. A selector that finds nothing
 * yields null, never an exception.
 */
export interface RawDetailFields {
  title: string | null;
  jobTitle: string | null;
  employer: string | null;
  locations: string[] | null;
  employmentType: string | null;
  extent: string | null;
  salaryText: string | null;
  jobCodeText: string | null;
  description: string | null;
  publishedAt: string | null;
  updatedAt: string | null;
  applyDeadline: string | null;
}

export interface FetchResult {
  url: string;
  status: number;
  body: string;
}

/**
 * Retries transient failures internally; anything it gives up on surfaces as
 * a PermanentFetchError.
 */
export interface Fetcher {
  fetch(url: string): Promise<FetchResult>;
}

export interface Extractor {
  extractListItems(html: string, pageUrl: string): RawListItem[];
  extractDetailFields(html: string): RawDetailFields;
  hasNextPage(html: string): boolean;
}

export interface ListSelectors {
  item: string;
  link: string;
  publishedAt?: string;
  updatedAt?: string;
  /** Attributes on the item (or link) that carry a site-native listing ID, in priority order. */
  idAttributes: string[];
  nextPage?: string;
}

export interface DetailSelectors {
  title?: string;
  jobTitle?: string;
  employer?: string;
  locations?: string;
  employmentType?: string;
  extent?: string;
  salaryText?: string;
  jobCodeBlocks?: string;
  description?: string;
  publishedAt?: string;
  updatedAt?: string;
  applyDeadline?: string;
}

export interface SearchParamNames {
  sector: string;
  openOnly: string;
  page: string;
  query: string;
}

export interface SearchConfig {
  baseUrl: string;
  paramNames: SearchParamNames;
  sectorValue: string;
  openOnly: boolean;
  query?: string;
  extraParams?: Record<string, string>;
}

export interface SiteProfile {
  id: string;
  name: string;
  search: SearchConfig;
  list: ListSelectors;
  detail: DetailSelectors;
}
