import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

export interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export interface WithRunLoggerOptions<TResult> {
  logger: Logger;
  runId?: string;
  context?: Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: (runId: string) => Promise<TResult>;
}

/**
 * Wrap one harvest run in `run_started` / `run_completed` / `run_failed`
 * events sharing a run ID. A missing or blank `runId` gets a fresh UUID.
 */
export async function withRunLogger<TResult>({
  logger,
  runId,
  context,
  summary,
  run,
}: WithRunLoggerOptions<TResult>): Promise<TResult> {
  const resolvedRunId = runId?.trim() ? runId : randomUUID();
  const startedAt = Date.now();
  const common = {
    runId: resolvedRunId,
    ...context,
  };

  logger.info({ event: 'run_started', ...common }, 'Run started');

  try {
    const result = await run(resolvedRunId);
    logger.info(
      {
        event: 'run_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Run completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'run_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Run failed',
    );
    throw error;
  }
}
