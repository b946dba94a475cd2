export interface OrgTagConfig {
  /** Canonical tag emitted on a match. */
  tag: string;
  /** Normalized primary name; exact equality matches. */
  primaryName: string;
  /** Normalized aliases and abbreviations, matched as whole-token phrases. */
  synonyms: readonly string[];
  /** Employer tokens starting with one of these match. */
  tokenPrefixes: readonly string[];
  /** Allow the prefix rule on the title when the search is sector-filtered. */
  titleFallback: boolean;
}

export interface OrgMatcherConfig {
  tags: readonly OrgTagConfig[];
}

export interface IdentityConfig {
  /** Query keys that carry a site-native ID. */
  idQueryKeys: readonly string[];
  /** Query keys dropped before hashing, in addition to `utm_*`. */
  trackingQueryKeys: readonly string[];
}

export interface JobCodeConfig {
  /** Words that introduce a job code, matched case-insensitively. */
  markers: readonly string[];
}

export interface SalaryConfig {
  /** Word stems marking a text block as a salary phrase. */
  keywords: readonly string[];
  /** Phrases that state a salary without amounts. */
  qualitativePhrases: readonly string[];
  /** Smallest amount read as an annual salary; smaller numbers are codes, steps or percentages. */
  minAnnualAmount: number;
  /** Largest amount read as an annual salary; larger numbers are digit runs glued together. */
  maxAnnualAmount: number;
}

export interface IngestionConfig {
  orgs: OrgMatcherConfig;
  identity: IdentityConfig;
  jobCodes: JobCodeConfig;
  salary: SalaryConfig;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }

  return value;
}

export const DEFAULT_ORG_CONFIG: OrgMatcherConfig = deepFreeze({
  tags: [
    {
      tag: 'forsvar',
      primaryName: 'forsvar',
      synonyms: [],
      tokenPrefixes: ['forsvar'],
      titleFallback: true,
    },
    {
      tag: 'pst',
      primaryName: 'pst',
      synonyms: ['politiets sikkerhetstjeneste'],
      tokenPrefixes: [],
      titleFallback: false,
    },
    {
      tag: 'nsm',
      primaryName: 'nsm',
      synonyms: ['nasjonal sikkerhetsmyndighet'],
      tokenPrefixes: [],
      titleFallback: false,
    },
  ],
});

export const DEFAULT_IDENTITY_CONFIG: IdentityConfig = deepFreeze({
  idQueryKeys: ['id', 'jobId', 'job_id', 'listingId', 'listing_id', 'uuid'],
  trackingQueryKeys: ['gclid', 'fbclid', 'mc_cid', 'mc_eid', 'ref', 'src'],
});

export const DEFAULT_JOB_CODE_CONFIG: JobCodeConfig = deepFreeze({
  markers: ['stillingskode', 'kode', 'sko'],
});

export const DEFAULT_SALARY_CONFIG: SalaryConfig = deepFreeze({
  keywords: ['lønn', 'lonn', 'avlønn', 'salary'],
  qualitativePhrases: ['etter avtale', 'etter nærmere avtale', 'by agreement', 'negotiable'],
  minAnnualAmount: 100_000,
  maxAnnualAmount: 10_000_000,
});

export const DEFAULT_INGESTION_CONFIG: IngestionConfig = deepFreeze({
  orgs: DEFAULT_ORG_CONFIG,
  identity: DEFAULT_IDENTITY_CONFIG,
  jobCodes: DEFAULT_JOB_CODE_CONFIG,
  salary: DEFAULT_SALARY_CONFIG,
});

export interface IngestionConfigOverrides {
  orgs?: OrgMatcherConfig;
  identity?: Partial<IdentityConfig>;
  jobCodes?: Partial<JobCodeConfig>;
  salary?: Partial<SalaryConfig>;
}

/**
 * Build an immutable configuration from the defaults plus overrides.
 */
export function createIngestionConfig(overrides: IngestionConfigOverrides = {}): IngestionConfig {
  return deepFreeze({
    orgs: overrides.orgs ?? DEFAULT_ORG_CONFIG,
    identity: { ...DEFAULT_IDENTITY_CONFIG, ...overrides.identity },
    jobCodes: { ...DEFAULT_JOB_CODE_CONFIG, ...overrides.jobCodes },
    salary: { ...DEFAULT_SALARY_CONFIG, ...overrides.salary },
  });
}
