import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { ConfigurationError, StoreError } from '@shelfscan/scraper-sdk';
import { withTrace } from './with-trace.js';

interface TraceableData {
  traceId?: string;
}

export interface SerializedError {
  name?: string;
  message: string;
  code?: string;
  issues?: string[];
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error instanceof StoreError && error.code !== undefined) {
    serialized.code = error.code;
  }
  if (error instanceof ConfigurationError) {
    serialized.issues = error.issues;
  }
  return serialized;
}

function computeWaitMs(timestamp: number): number | undefined {
  if (!Number.isFinite(timestamp) || timestamp <= 0) {
    return undefined;
  }

  return Math.max(0, Date.now() - timestamp);
}

export interface WithLoggerOptions<TData extends TraceableData, TResult> {
  logger: Logger;
  queue: string;
  job: Job<TData>;
  context?: (traceId: string) => Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: (traceId: string) => Promise<TResult>;
}

/**
 * Wrap a job processor with job_started / job_completed / job_failed events.
 * Errors are logged and rethrown so BullMQ applies the job's retry policy.
 */
export async function withLogger<TData extends TraceableData, TResult>({
  logger,
  queue,
  job,
  context,
  summary,
  run,
}: WithLoggerOptions<TData, TResult>): Promise<TResult> {
  const traceId = await withTrace(job);
  const common = {
    queue,
    jobName: job.name,
    jobId: String(job.id ?? 'unknown'),
    attempt: job.attemptsMade + 1,
    traceId,
    ...(context ? context(traceId) : {}),
  };
  const startedAt = Date.now();

  logger.info({ event: 'job_started', ...common, waitMs: computeWaitMs(job.timestamp) }, 'Job started');

  try {
    const result = await run(traceId);
    logger.info(
      {
        event: 'job_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Job completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'job_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Job failed',
    );
    throw error;
  }
}
