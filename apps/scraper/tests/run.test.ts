import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EXPLODED_COLUMNS, createMemoryStateStore } from '@statejobs/ingestion';
import { buildSearchUrl, createDefaultSiteProfile } from '@statejobs/site-web';
import { PermanentFetchError, type Fetcher } from '@statejobs/source-sdk';
import type { Logger } from 'pino';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ScraperConfig } from '../src/config.js';
import { runHarvest } from '../src/run.js';

const profile = createDefaultSiteProfile('https://jobs.example.org/search');

const LIST_HTML = `
<ul>
  <li class="result-item" data-listing-id="4711">
    <a class="result-link" href="/stilling/4711">Førstekonsulent</a>
  </li>
</ul>`;

const DETAIL_HTML = `
<h1 class="job-title">Førstekonsulent og rådgiver</h1>
<div class="employer-name">Forsvarsbygg</div>
<div class="job-locations">Oslo</div>
<div class="salary">Lønn: kr 600 000 - 700 000</div>
<div class="job-codes">
  <p>Stillingskode 1408 – Førstekonsulent</p>
  <p>Stillingskode 1434 – Rådgiver</p>
</div>`;

function createLoggerMock(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

function createFetcher(pages: Map<string, string>): Fetcher {
  return {
    fetch: vi.fn(async (url: string) => {
      const body = pages.get(url);
      if (body === undefined) {
        throw new PermanentFetchError(`Request to ${url} returned 404`, url, 404);
      }
      return { url, status: 200, body };
    }),
  };
}

describe('runHarvest', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  function createConfig(): ScraperConfig {
    const outputDir = mkdtempSync(join(tmpdir(), 'statejobs-run-'));
    dirs.push(outputDir);

    return {
      databaseUrl: null,
      databasePoolMax: 2,
      profile,
      sectorFilterEnabled: true,
      fullRefresh: false,
      dryRun: true,
      debug: false,
      maxPages: 1,
      outputDir,
      fetcher: {
        userAgent: 'test-agent',
        minDelayMs: 0,
        maxDelayMs: 0,
        timeoutMs: 1000,
        maxRetries: 0,
        circuitFailureThreshold: 5,
        circuitOpenMs: 1000,
      },
    };
  }

  const pages = new Map([
    [buildSearchUrl(profile.search, 1), LIST_HTML],
    ['https://jobs.example.org/stilling/4711', DETAIL_HTML],
  ]);

  it('explodes matched listings and writes the CSV files', async () => {
    const config = createConfig();
    const logger = createLoggerMock();
    const store = createMemoryStateStore();

    const result = await runHarvest({
      config,
      logger,
      store,
      fetcher: createFetcher(pages),
      now: () => new Date('2026-10-19T08:00:00.000Z'),
    });

    expect(result.run.stats.detailsFetched).toBe(1);
    expect(result.run.rows.map((row) => [row.job_code, row.matched_org_tag, row.salary_min, row.is_shared_salary])).toEqual([
      ['1408', 'forsvar', 600000, true],
      ['1434', 'forsvar', 600000, true],
    ]);
    expect(result.metrics).toEqual({
      totalRows: 2,
      codesPresent: 2,
      codesRatio: 1,
      salaryPresent: 2,
      salaryRatio: 1,
    });

    const exploded = readFileSync(result.output.explodedPath, 'utf-8').split('\n');
    expect(exploded[0]).toBe(EXPLODED_COLUMNS.join(','));
    expect(exploded).toHaveLength(4);

    const [completedPayload] = vi.mocked(logger.info).mock.calls.at(-1) ?? [];
    expect(completedPayload).toMatchObject({ event: 'run_completed', rowsEmitted: 2, totalRows: 2, errors: 0 });
  });

  it('shares a salary printed below line-broken job codes', async () => {
    const brokenLines = new Map([
      [buildSearchUrl(profile.search, 1), LIST_HTML],
      [
        'https://jobs.example.org/stilling/4711',
        `<h1 class="job-title">Førstekonsulent og rådgiver</h1>
<div class="employer-name">Forsvarsbygg</div>
<div class="job-codes">Stillingskode 1408 – Førstekonsulent<br>Stillingskode 1434 – Rådgiver<br>Lønn: kr 600 000 - 700 000</div>`,
      ],
    ]);

    const result = await runHarvest({
      config: createConfig(),
      logger: createLoggerMock(),
      store: createMemoryStateStore(),
      fetcher: createFetcher(brokenLines),
    });

    expect(
      result.run.rows.map((row) => [row.job_code, row.job_title, row.salary_min, row.salary_max, row.is_shared_salary]),
    ).toEqual([
      ['1408', 'Førstekonsulent', 600000, 700000, true],
      ['1434', 'Rådgiver', 600000, 700000, true],
    ]);
  });

  it('skips unchanged listings on the next run', async () => {
    const store = createMemoryStateStore();
    const fetcher = createFetcher(pages);

    await runHarvest({ config: createConfig(), logger: createLoggerMock(), store, fetcher });
    const second = await runHarvest({ config: createConfig(), logger: createLoggerMock(), store, fetcher });

    expect(second.run.stats.detailsFetched).toBe(0);
    expect(second.run.rows).toEqual([]);
    expect(readFileSync(second.output.explodedPath, 'utf-8')).toBe(`${EXPLODED_COLUMNS.join(',')}\n`);
    expect(vi.mocked(fetcher.fetch)).toHaveBeenCalledTimes(3);
  });

  it('reports failed detail fetches without failing the run', async () => {
    const logger = createLoggerMock();
    const listOnly = new Map([[buildSearchUrl(profile.search, 1), LIST_HTML]]);

    const result = await runHarvest({
      config: createConfig(),
      logger,
      store: createMemoryStateStore(),
      fetcher: createFetcher(listOnly),
    });

    expect(result.run.stats.detailFailures).toBe(1);
    expect(result.run.errors).toEqual(['4711: Request to https://jobs.example.org/stilling/4711 returned 404']);
    expect(vi.mocked(logger.error)).not.toHaveBeenCalled();
  });
});
