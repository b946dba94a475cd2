import pino, { type LevelWithSilent, type Logger } from 'pino';
import type { Env } from '../config.js';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'statejobs-scraper';
const VALID_LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

function readLogLevel(env: Env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw || !isLogLevel(raw)) {
    return DEFAULT_LOG_LEVEL;
  }

  return raw;
}

export interface ScraperLoggerOptions {
  env?: Env;
  /** `--debug` forces debug level regardless of LOG_LEVEL. */
  debug?: boolean;
}

export function createScraperLogger(options: ScraperLoggerOptions = {}): Logger {
  const env = options.env ?? process.env;
  const service = env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;

  return pino({
    level: options.debug ? 'debug' : readLogLevel(env),
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'message',
  });
}
