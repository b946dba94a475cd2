import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { serializeError, withRunLogger } from '../../src/observability/with-logger.js';

function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

describe('withRunLogger', () => {
  it('logs start/completion and returns handler result', async () => {
    const logger = createLoggerMock();
    const run = vi.fn(async (runId: string) => ({ runId, rows: 4 }));

    const result = await withRunLogger({
      logger,
      runId: 'run-1',
      context: { profile: 'public-index' },
      summary: (value) => ({ rowsEmitted: value.rows }),
      run,
    });

    expect(result).toEqual({ runId: 'run-1', rows: 4 });
    expect(run).toHaveBeenCalledWith('run-1');
    expect(vi.mocked(logger.info)).toHaveBeenCalledTimes(2);

    const [startPayload, startMessage] = vi.mocked(logger.info).mock.calls[0]!;
    expect(startPayload).toEqual({ event: 'run_started', runId: 'run-1', profile: 'public-index' });
    expect(startMessage).toBe('Run started');

    const [completedPayload] = vi.mocked(logger.info).mock.calls[1]!;
    expect(completedPayload).toMatchObject({
      event: 'run_completed',
      runId: 'run-1',
      profile: 'public-index',
      rowsEmitted: 4,
    });
  });

  it('generates a run id when none is given', async () => {
    const logger = createLoggerMock();

    const runId = await withRunLogger({ logger, run: async (id) => id });

    expect(runId).toMatch(/^[0-9a-f-]{36}$/i);
  });

  it('replaces a blank run id and tags every event with it', async () => {
    const logger = createLoggerMock();

    const runId = await withRunLogger({ logger, runId: '   ', run: async (id) => id });

    expect(runId).toMatch(/^[0-9a-f-]{36}$/i);
    const [startPayload] = vi.mocked(logger.info).mock.calls[0] ?? [];
    const [completedPayload] = vi.mocked(logger.info).mock.calls[1] ?? [];
    expect(startPayload).toMatchObject({ event: 'run_started', runId });
    expect(completedPayload).toMatchObject({ event: 'run_completed', runId });
  });

  it('logs failure and rethrows', async () => {
    const logger = createLoggerMock();

    await expect(
      withRunLogger({
        logger,
        runId: 'run-2',
        run: async () => {
          throw new Error('boom');
        },
      }),
    ).rejects.toThrow('boom');

    expect(vi.mocked(logger.error)).toHaveBeenCalledTimes(1);
    const [errorPayload] = vi.mocked(logger.error).mock.calls[0]!;
    expect(errorPayload).toMatchObject({
      event: 'run_failed',
      runId: 'run-2',
      error: { name: 'Error', message: 'boom' },
    });
  });
});

describe('serializeError', () => {
  it('keeps name and message of errors', () => {
    const error = new RangeError('out of range');

    expect(serializeError(error)).toMatchObject({ name: 'RangeError', message: 'out of range' });
  });

  it('stringifies non-errors', () => {
    expect(serializeError(42)).toEqual({ message: '42' });
  });
});
