import type { IngestionLogger } from '@statejobs/ingestion';
import type { Logger } from 'pino';

export function createIngestionLogger(logger: Logger): IngestionLogger {
  return {
    debug: (message) => logger.debug({ event: 'ingestion_stage' }, message),
    info: (message) => logger.info({ event: 'ingestion_stage' }, message),
    warn: (message) => logger.warn({ event: 'ingestion_stage' }, message),
    error: (message) => logger.error({ event: 'ingestion_stage' }, message),
  };
}
