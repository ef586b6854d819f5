import { StoreError, type BookRecord } from '@shelfscan/scraper-sdk';
import { sleep } from './sleep.js';
import type { IngestionLogger, PageFailure, UpsertResult, UpsertSink } from './types.js';

export interface FlushOptions {
  retryCount: number;
  retryBackoffMs: number;
  logger?: IngestionLogger;
  sleep?: (ms: number) => Promise<void>;
  /** Once aborted, pending attempts and backoffs are given up and the batch is recorded as `abandoned`. */
  signal?: AbortSignal;
}

export interface FlushResult {
  persisted: BookRecord[];
  failures: PageFailure[];
  /** Set when the store reported itself unusable; the run must stop. */
  fatal?: StoreError;
}

class FlushAbandonedError extends Error {
  constructor() {
    super('flush abandoned');
    this.name = 'FlushAbandonedError';
  }
}

/**
 * Settle with `promise`, or reject with FlushAbandonedError as soon as the
 * signal aborts. A late settlement of `promise` is observed and dropped.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new FlushAbandonedError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function abandoned(batch: readonly BookRecord[]): FlushResult {
  return {
    persisted: [],
    failures: batch.map((record) =>
      persistFailure(record, 'abandoned', 'store did not answer before the stopped run gave up on it'),
    ),
  };
}

function toStoreError(error: unknown): StoreError {
  if (error instanceof StoreError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new StoreError('transient', message, undefined, { cause: error });
}

function persistFailure(record: BookRecord, code: string, reason: string): PageFailure {
  return { url: record.sourceUrl, stage: 'persist', code, reason };
}

function failAll(batch: readonly BookRecord[], error: StoreError): PageFailure[] {
  const code = error.code ?? `store_${error.kind}`;
  return batch.map((record) => persistFailure(record, code, error.message));
}

/**
 * Deliver one batch to the sink.
 *
 * Whole-batch errors: transient ones (and unclassified ones) are retried with
 * exponential backoff, permanent ones fail every record at once, fatal ones
 * fail every record and are surfaced in `fatal`. Per-record results are
 * matched back by key. An aborted `signal` ends the flush with every record
 * failed as `abandoned`.
 */
export async function flushBatch(
  batch: readonly BookRecord[],
  sink: UpsertSink,
  options: FlushOptions,
): Promise<FlushResult> {
  if (batch.length === 0) {
    return { persisted: [], failures: [] };
  }

  const { signal } = options;
  if (signal?.aborted) {
    return abandoned(batch);
  }

  const attempts = Math.max(1, options.retryCount);
  const wait = options.sleep ?? ((ms: number) => sleep(ms, signal));
  let lastError: StoreError | undefined;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      const results = await untilAborted(sink.upsert(batch), signal);
      return matchResults(batch, results);
    } catch (error) {
      if (error instanceof FlushAbandonedError) {
        return abandoned(batch);
      }

      const storeError = toStoreError(error);
      lastError = storeError;

      if (storeError.kind === 'fatal') {
        return { persisted: [], failures: failAll(batch, storeError), fatal: storeError };
      }
      if (storeError.kind === 'permanent') {
        return { persisted: [], failures: failAll(batch, storeError) };
      }

      if (attempt + 1 < attempts) {
        const delay = options.retryBackoffMs * 2 ** attempt;
        options.logger?.warn(`[flush] upsert of ${batch.length} records failed, retrying in ${delay}ms`, {
          stage: 'persist',
          attempt: attempt + 1,
          attempts,
          error: storeError.message,
        });
        try {
          await untilAborted(wait(delay), signal);
        } catch (error) {
          if (error instanceof FlushAbandonedError) {
            return abandoned(batch);
          }
          throw error;
        }
      }
    }
  }

  const exhausted = lastError ?? new StoreError('transient', `upsert failed after ${attempts} attempts`);
  return {
    persisted: [],
    failures: batch.map((record) =>
      persistFailure(record, 'retries_exhausted', `after ${attempts} attempts: ${exhausted.message}`),
    ),
  };
}

function matchResults(batch: readonly BookRecord[], results: readonly UpsertResult[]): FlushResult {
  const byKey = new Map(results.map((entry) => [entry.key, entry.result]));
  const persisted: BookRecord[] = [];
  const failures: PageFailure[] = [];
  let fatal: StoreError | undefined;

  for (const record of batch) {
    const result = byKey.get(record.key);
    if (!result) {
      failures.push(persistFailure(record, 'missing_result', `store returned no result for key ${record.key}`));
      continue;
    }

    if (result.ok) {
      persisted.push(record);
      continue;
    }

    if (result.error.kind === 'fatal') {
      fatal ??= result.error;
    }
    failures.push(persistFailure(record, result.error.code ?? `store_${result.error.kind}`, result.error.message));
  }

  return fatal ? { persisted, failures, fatal } : { persisted, failures };
}
