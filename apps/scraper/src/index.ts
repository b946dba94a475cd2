import { closeDatabase, createDatabase, type Database } from '@statejobs/db';
import { createDrizzleStateStore, createMemoryStateStore, type StateStore } from '@statejobs/ingestion';
import { ConfigError, loadConfig } from './config.js';
import { loadEnvFiles } from './env.js';
import { createScraperLogger } from './observability/logger.js';
import { serializeError } from './observability/with-logger.js';
import { runHarvest } from './run.js';

interface RuntimeState {
  db: Database | null;
}

const runtimeState: RuntimeState = {
  db: null,
};

async function closeDbConnection(state: RuntimeState): Promise<void> {
  if (!state.db) {
    return;
  }

  const { db } = state;
  state.db = null;
  await closeDatabase(db);
}

async function run(): Promise<void> {
  loadEnvFiles();
  const config = loadConfig(process.argv.slice(2), process.env);
  const logger = createScraperLogger({ debug: config.debug });

  let store: StateStore;
  if (config.databaseUrl) {
    runtimeState.db = createDatabase(config.databaseUrl, { maxConnections: config.databasePoolMax });
    store = createDrizzleStateStore(runtimeState.db);
  } else {
    store = createMemoryStateStore();
    logger.warn({ event: 'dry_run' }, 'Dry run: listing state is kept in memory and discarded');
  }

  const controller = new AbortController();
  const abort = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      return;
    }
    logger.warn({ event: 'shutdown_requested', signal }, 'Stopping after the current listing');
    controller.abort();
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    await runHarvest({ config, logger, store, signal: controller.signal });
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    await closeDbConnection(runtimeState);
  }
}

run().catch(async (error: unknown) => {
  await Promise.allSettled([closeDbConnection(runtimeState)]);
  const logger = createScraperLogger();
  logger.error(
    {
      event: error instanceof ConfigError ? 'config_error' : 'scraper_fatal_error',
      error: serializeError(error),
    },
    error instanceof ConfigError ? 'Invalid configuration' : 'Scraper fatal error',
  );
  process.exit(1);
});
