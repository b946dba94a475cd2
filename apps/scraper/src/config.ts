import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { errorMessage } from '@statejobs/ingestion';
import { createDefaultSiteProfile, withoutSectorFilter } from '@statejobs/site-web';
import { parseSiteProfile, type SiteProfile } from '@statejobs/source-sdk';

export type Env = Record<string, string | undefined>;

const DEFAULT_USER_AGENT = 'statejobs-scraper/0.1 (+https://example.org/statejobs)';
const DEFAULT_MAX_PAGES = 20;
const DEFAULT_OUTPUT_DIR = 'output';

/**
 * Missing or malformed configuration. The only error that makes the CLI
 * exit non-zero before a run starts.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function readRequiredEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`${name} environment variable is required`);
  }

  return value;
}

export function readIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

export function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

function parsePositiveInt(raw: string, source: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${source} must be a positive integer, got "${raw}"`);
  }

  return parsed;
}

function parseThreshold(raw: string, source: string): number {
  const parsed = Number(raw);
  if (raw.trim().length === 0 || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigError(`${source} must be a number between 0 and 1, got "${raw}"`);
  }

  return parsed;
}

export interface CliFlags {
  full: boolean;
  debug: boolean;
  dryRun: boolean;
  noSectorFilter: boolean;
  outDir?: string;
  maxPages?: string;
  fuzzyThreshold?: string;
}

export function parseCliFlags(argv: string[]): CliFlags {
  try {
    const { values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        full: { type: 'boolean', default: false },
        debug: { type: 'boolean', default: false },
        'dry-run': { type: 'boolean', default: false },
        'no-sector-filter': { type: 'boolean', default: false },
        'out-dir': { type: 'string' },
        'max-pages': { type: 'string' },
        'fuzzy-threshold': { type: 'string' },
      },
    });

    return {
      full: values.full === true,
      debug: values.debug === true,
      dryRun: values['dry-run'] === true,
      noSectorFilter: values['no-sector-filter'] === true,
      outDir: values['out-dir'],
      maxPages: values['max-pages'],
      fuzzyThreshold: values['fuzzy-threshold'],
    };
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }
}

export type ReadTextFile = (path: string) => string;

const readUtf8: ReadTextFile = (path) => readFileSync(path, 'utf8');

/**
 * The built-in profile, or the JSON profile at SITE_PROFILE_PATH.
 * SEARCH_BASE_URL always wins over the profile's base URL.
 */
export function loadSiteProfile(env: Env, readFile: ReadTextFile = readUtf8): SiteProfile {
  const baseUrl = readRequiredEnv(env, 'SEARCH_BASE_URL');
  try {
    new URL(baseUrl);
  } catch {
    throw new ConfigError(`SEARCH_BASE_URL is not an absolute URL: ${baseUrl}`);
  }

  const profilePath = env.SITE_PROFILE_PATH?.trim();
  if (!profilePath) {
    return createDefaultSiteProfile(baseUrl);
  }

  let profile: SiteProfile;
  try {
    profile = parseSiteProfile(JSON.parse(readFile(profilePath)));
  } catch (error) {
    throw new ConfigError(`Invalid site profile at ${profilePath}: ${errorMessage(error)}`);
  }

  return {
    ...profile,
    search: { ...profile.search, baseUrl },
  };
}

export interface FetcherSettings {
  userAgent: string;
  minDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  maxRetries: number;
  circuitFailureThreshold: number;
  circuitOpenMs: number;
}

export interface ScraperConfig {
  /** Null on dry runs, which keep state in memory. */
  databaseUrl: string | null;
  databasePoolMax: number;
  profile: SiteProfile;
  sectorFilterEnabled: boolean;
  fullRefresh: boolean;
  dryRun: boolean;
  debug: boolean;
  maxPages: number;
  fuzzyThreshold?: number;
  outputDir: string;
  fetcher: FetcherSettings;
}

export function loadConfig(argv: string[], env: Env, readFile: ReadTextFile = readUtf8): ScraperConfig {
  const flags = parseCliFlags(argv);
  const databaseUrl = flags.dryRun ? null : readRequiredEnv(env, 'DATABASE_URL');
  const baseProfile = loadSiteProfile(env, readFile);
  const sectorFilterEnabled = !flags.noSectorFilter && readBoolEnv(env, 'SCRAPER_SECTOR_FILTER', true);
  const profile = sectorFilterEnabled
    ? baseProfile
    : { ...baseProfile, search: withoutSectorFilter(baseProfile.search) };

  const maxPages =
    flags.maxPages !== undefined
      ? parsePositiveInt(flags.maxPages, '--max-pages')
      : readIntEnv(env, 'SCRAPER_MAX_PAGES', DEFAULT_MAX_PAGES);

  const rawThreshold = flags.fuzzyThreshold ?? env.ORG_FUZZY_THRESHOLD;
  const thresholdSource = flags.fuzzyThreshold !== undefined ? '--fuzzy-threshold' : 'ORG_FUZZY_THRESHOLD';
  const fuzzyThreshold = rawThreshold ? parseThreshold(rawThreshold, thresholdSource) : undefined;

  const minDelayMs = readIntEnv(env, 'SCRAPER_MIN_DELAY_MS', 1000);

  return {
    databaseUrl,
    databasePoolMax: readIntEnv(env, 'DATABASE_POOL_MAX', 2),
    profile,
    sectorFilterEnabled,
    fullRefresh: flags.full,
    dryRun: flags.dryRun,
    debug: flags.debug,
    maxPages,
    fuzzyThreshold,
    outputDir: flags.outDir?.trim() || env.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    fetcher: {
      userAgent: env.SCRAPER_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
      minDelayMs,
      maxDelayMs: Math.max(minDelayMs, readIntEnv(env, 'SCRAPER_MAX_DELAY_MS', 2500)),
      timeoutMs: readIntEnv(env, 'SCRAPER_TIMEOUT_MS', 15_000),
      maxRetries: readIntEnv(env, 'SCRAPER_MAX_RETRIES', 3),
      circuitFailureThreshold: readIntEnv(env, 'SCRAPER_CIRCUIT_FAILURE_THRESHOLD', 5),
      circuitOpenMs: readIntEnv(env, 'SCRAPER_CIRCUIT_OPEN_MS', 5 * 60 * 1000),
    },
  };
}
