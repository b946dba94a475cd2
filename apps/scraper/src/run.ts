import { runIncremental, summarizeRows, type RowMetrics, type RunResult, type StateStore } from '@statejobs/ingestion';
import { HttpFetcher, buildSearchUrl, createCheerioExtractor, hasSectorFilter } from '@statejobs/site-web';
import type { Fetcher } from '@statejobs/source-sdk';
import type { Logger } from 'pino';
import type { ScraperConfig } from './config.js';
import { createIngestionLogger } from './observability/ingestion-logger.js';
import { withRunLogger } from './observability/with-logger.js';
import { writeRunCsv, type CsvOutput } from './sink/csv.js';

export interface HarvestDeps {
  config: ScraperConfig;
  logger: Logger;
  store: StateStore;
  fetcher?: Fetcher;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface HarvestResult {
  run: RunResult;
  metrics: RowMetrics;
  output: CsvOutput;
}

/**
 * One harvest: discovery, incremental detail fetches, row explosion and the
 * CSV sink. The caller owns the store and closes it.
 */
export async function runHarvest({ config, logger, store, fetcher, signal, now }: HarvestDeps): Promise<HarvestResult> {
  const { profile } = config;
  const sectorFilterApplied = hasSectorFilter(profile.search);

  return withRunLogger({
    logger,
    context: {
      profile: profile.id,
      fullRefresh: config.fullRefresh,
      dryRun: config.dryRun,
      sectorFilterApplied,
      maxPages: config.maxPages,
    },
    summary: ({ run, metrics, output }) => ({
      ...run.stats,
      errors: run.errors.length,
      cancelled: run.cancelled,
      ...metrics,
      explodedPath: output.explodedPath,
      listingsPath: output.listingsPath,
    }),
    run: async () => {
      const run = await runIncremental(
        {
          store,
          fetcher: fetcher ?? new HttpFetcher(config.fetcher),
          extractor: createCheerioExtractor(profile),
          searchPageUrl: (page) => buildSearchUrl(profile.search, page),
          logger: createIngestionLogger(logger),
          now,
        },
        {
          fullRefresh: config.fullRefresh,
          sectorFilterApplied,
          fuzzyThreshold: config.fuzzyThreshold,
          maxPages: config.maxPages,
          signal,
        },
      );

      const metrics = summarizeRows(run.rows);
      const output = writeRunCsv(config.outputDir, run.rows, run.listings);
      return { run, metrics, output };
    },
  });
}
