import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError, StoreError } from '@shelfscan/scraper-sdk';
import { serializeError, withLogger } from '../../src/observability/with-logger.js';
import { stub } from '../test-helpers.js';

function createLoggerMock(): Logger {
  return stub<Logger>({
    info: vi.fn(),
    error: vi.fn(),
  });
}

function createJob(overrides: Partial<Job<{ traceId?: string; sourceId: string }>> = {}): Job<{ traceId?: string; sourceId: string }> {
  return stub<Job<{ traceId?: string; sourceId: string }>>({
    id: 'job-1',
    name: 'books-scrape',
    attemptsMade: 0,
    timestamp: Date.now() - 250,
    data: { sourceId: 'books-toscrape' },
    updateData: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  });
}

describe('withLogger', () => {
  it('logs start/completion and returns handler result', async () => {
    const logger = createLoggerMock();
    const job = createJob();
    const run = vi.fn(async (traceId: string) => ({ runId: traceId, persisted: 5 }));

    const result = await withLogger({
      logger,
      queue: 'books.scrape',
      job,
      context: () => ({ sourceId: job.data.sourceId }),
      summary: (value) => ({ persisted: value.persisted }),
      run,
    });

    expect(job.data.traceId).toBeTruthy();
    expect(result).toEqual({ runId: job.data.traceId, persisted: 5 });
    expect(vi.mocked(logger.info)).toHaveBeenCalledTimes(2);

    const [startPayload] = vi.mocked(logger.info).mock.calls[0]!;
    expect(startPayload).toMatchObject({
      event: 'job_started',
      queue: 'books.scrape',
      jobId: 'job-1',
      attempt: 1,
      sourceId: 'books-toscrape',
      traceId: job.data.traceId,
    });

    const [completedPayload] = vi.mocked(logger.info).mock.calls[1]!;
    expect(completedPayload).toMatchObject({
      event: 'job_completed',
      queue: 'books.scrape',
      persisted: 5,
    });
  });

  it('logs failure and rethrows', async () => {
    const logger = createLoggerMock();
    const job = createJob({ id: 'job-2', attemptsMade: 1, data: { sourceId: 'books-toscrape', traceId: 'trace-9' } });

    await expect(
      withLogger({
        logger,
        queue: 'books.scrape',
        job,
        run: async () => {
          throw new Error('boom');
        },
      }),
    ).rejects.toThrow('boom');

    expect(vi.mocked(logger.error)).toHaveBeenCalledTimes(1);
    const [errorPayload] = vi.mocked(logger.error).mock.calls[0]!;
    expect(errorPayload).toMatchObject({
      event: 'job_failed',
      queue: 'books.scrape',
      attempt: 2,
      traceId: 'trace-9',
      error: { name: 'Error', message: 'boom' },
    });
  });
});

describe('serializeError', () => {
  it('keeps store error codes and configuration issues', () => {
    expect(serializeError(new StoreError('fatal', 'permission denied', '42501'))).toMatchObject({
      name: 'StoreError',
      message: 'permission denied',
      code: '42501',
    });
    expect(serializeError(new ConfigurationError(['workerCount: too small']))).toMatchObject({
      name: 'ConfigurationError',
      issues: ['workerCount: too small'],
    });
  });

  it('stringifies non-errors', () => {
    expect(serializeError('plain')).toEqual({ message: 'plain' });
  });
});
