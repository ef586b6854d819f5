import { randomUUID } from 'node:crypto';
import { FetchError, type BookRecord, type CatalogSource, type StoreError } from '@shelfscan/scraper-sdk';
import { Channel } from './channel.js';
import { resolveRunOptions, type RunOptions, type RunSettings } from './config.js';
import { enumerateBookUrls } from './enumerate.js';
import { flushBatch } from './flush.js';
import { RunReportBuilder } from './report.js';
import { validate } from './validate.js';
import { WorkQueue } from './work-queue.js';
import type { Fetcher, IngestionLogger, PageFailure, PageOutcome, RunDependencies, RunReport } from './types.js';

export const defaultLogger: IngestionLogger = {
  debug: () => {},
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

type StopReason = 'timeout' | 'signal' | 'fatal';

interface RunState {
  stopReason?: StopReason;
  fatal?: StoreError;
  accumulationError?: { error: unknown };
  persistTimer?: NodeJS.Timeout;
}

interface InFlightPage {
  url: string;
  controller: AbortController;
  abandoned: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function fetchFailureCode(error: unknown): string {
  if (!(error instanceof FetchError)) return 'fetch_error';
  return error.status !== undefined ? `http_${error.status}` : `fetch_${error.kind}`;
}

function runAborted(record: BookRecord, cause: StoreError): PageFailure {
  return { url: record.sourceUrl, stage: 'persist', code: 'run_aborted', reason: `run aborted: ${cause.message}` };
}

function failed(url: string, failure: Omit<PageFailure, 'url'>): PageOutcome {
  return { status: 'failed', url, failure: { url, ...failure } };
}

/**
 * Drive one URL through fetch → extract → validate. Never throws; every
 * problem becomes a failed outcome attributed to its stage.
 */
export async function processPage(
  url: string,
  source: Pick<CatalogSource, 'extract'>,
  fetcher: Fetcher,
  signal?: AbortSignal,
): Promise<PageOutcome> {
  let raw: string;
  try {
    raw = await fetcher.fetch(url, { signal });
  } catch (error) {
    return failed(url, { stage: 'fetch', code: fetchFailureCode(error), reason: errorMessage(error) });
  }

  let extracted: ReturnType<CatalogSource['extract']>;
  try {
    extracted = source.extract(raw, url);
  } catch (error) {
    return failed(url, { stage: 'extract', code: 'extract_error', reason: errorMessage(error) });
  }
  if (!extracted.ok) {
    return failed(url, { stage: 'extract', code: extracted.error.kind, reason: extracted.error.message });
  }

  const validated = validate({ ...extracted.value, sourceUrl: extracted.value.sourceUrl ?? url });
  if (!validated.ok) {
    return failed(url, { stage: 'validate', code: validated.error.kind, reason: validated.error.message });
  }

  return { status: 'validated', url, record: validated.value };
}

/**
 * One scrape run: enumerate book URLs from the entry points, process them on
 * a bounded pool of workers and persist validated records in batches.
 *
 * Throws ConfigurationError before any work on invalid settings and
 * EnumerationError when the first entry point cannot be read. Everything
 * else ends up in the returned report.
 */
export async function run(
  entryPoints: readonly string[],
  settings: RunSettings,
  deps: RunDependencies,
): Promise<RunReport> {
  const options: RunOptions = resolveRunOptions({ ...settings, entryPoints: [...entryPoints] });
  const { source, fetcher, sink, logger = defaultLogger } = deps;
  const runId = deps.runId ?? randomUUID();
  const sourceId = source.manifest.id;
  const report = new RunReportBuilder(runId);

  const runController = new AbortController();
  // Workers get graceMs after a stop; the store gets graceMs more for what they produced.
  const persistDeadline = new AbortController();
  const state: RunState = {};
  const stop = (reason: StopReason): void => {
    if (runController.signal.aborted) return;
    state.stopReason = reason;
    runController.abort(reason);
    state.persistTimer = setTimeout(() => persistDeadline.abort(), 2 * options.graceMs);
    logger.warn(`[run:${sourceId}] stopping (${reason})`, { runId, reason });
  };

  const onCallerAbort = (): void => stop('signal');
  if (deps.signal?.aborted) {
    stop('signal');
  } else {
    deps.signal?.addEventListener('abort', onCallerAbort, { once: true });
  }
  const runTimer = setTimeout(() => stop('timeout'), options.runTimeoutMs);

  logger.info(`[run:${sourceId}] starting with ${options.workerCount} workers`, {
    runId,
    entryPoints: options.entryPoints,
    workerCount: options.workerCount,
    batchSize: options.batchSize,
  });

  const queue = new WorkQueue(
    enumerateBookUrls(options.entryPoints, {
      fetcher,
      source,
      maxPagesPerSource: options.maxPagesPerSource,
      logger,
      signal: runController.signal,
      onWarning: (warning) => {
        report.recordWarning(warning);
        logger.warn(`[enumerate] ${warning.pageUrl}: ${warning.reason}`, { stage: 'enumerate', runId, ...warning });
      },
    })[Symbol.asyncIterator](),
    runController.signal,
  );

  const channel = new Channel<PageOutcome>(2 * options.workerCount);
  const inFlight = new Map<number, InFlightPage>();
  const pendingDeliveries = new Set<Promise<boolean>>();

  const deliver = async (outcome: PageOutcome): Promise<void> => {
    const delivery = channel.send(outcome);
    pendingDeliveries.add(delivery);
    try {
      await delivery;
    } finally {
      pendingDeliveries.delete(delivery);
    }
  };

  const work = async (workerId: number): Promise<void> => {
    for (;;) {
      const url = await queue.take();
      if (url === undefined) return;

      const page: InFlightPage = { url, controller: new AbortController(), abandoned: false };
      inFlight.set(workerId, page);
      const outcome = await processPage(url, source, fetcher, page.controller.signal);
      inFlight.delete(workerId);

      if (page.abandoned) return;
      await deliver(outcome);
    }
  };

  const persist = async (batch: BookRecord[]): Promise<void> => {
    const result = await flushBatch(batch, sink, {
      retryCount: options.retryCount,
      retryBackoffMs: options.retryBackoffMs,
      logger,
      signal: persistDeadline.signal,
    });

    report.recordPersisted(result.persisted.length);
    for (const failure of result.failures) {
      report.recordPersistFailure(failure);
    }
    logger.debug(`[persist] ${result.persisted.length}/${batch.length} records stored`, {
      stage: 'persist',
      runId,
      persisted: result.persisted.length,
      failed: result.failures.length,
    });

    if (result.fatal && !state.fatal) {
      state.fatal = result.fatal;
      logger.error(`[run:${sourceId}] store unusable: ${result.fatal.message}`, { runId, code: result.fatal.code });
      stop('fatal');
    }
  };

  const accumulate = async (): Promise<void> => {
    let batch: BookRecord[] = [];

    for await (const outcome of channel) {
      report.recordDiscovered();
      report.recordOutcome(outcome);

      if (outcome.status === 'failed') {
        logger.debug(`[${outcome.failure.stage}] ${outcome.url}: ${outcome.failure.reason}`, {
          stage: outcome.failure.stage,
          url: outcome.url,
          outcome: 'failed',
          code: outcome.failure.code,
        });
        continue;
      }

      logger.debug(`[validate] ${outcome.url}`, { stage: 'validate', url: outcome.url, outcome: 'ok' });

      if (state.fatal) {
        report.recordPersistFailure(runAborted(outcome.record, state.fatal));
        continue;
      }

      batch.push(outcome.record);
      if (batch.length >= options.batchSize) {
        const full = batch;
        batch = [];
        await persist(full);
      }
    }

    if (batch.length > 0) {
      const { fatal } = state;
      if (fatal) {
        for (const record of batch) {
          report.recordPersistFailure(runAborted(record, fatal));
        }
      } else {
        await persist(batch);
      }
    }
  };

  const accumulation = accumulate().catch((error: unknown) => {
    state.accumulationError = { error };
    channel.close();
    stop('fatal');
  });
  const workersDone = Promise.all(Array.from({ length: options.workerCount }, (_, id) => work(id)));

  let graceTimer: NodeJS.Timeout | undefined;
  try {
    const stopped = new Promise<'stopped'>((resolve) => {
      if (runController.signal.aborted) resolve('stopped');
      runController.signal.addEventListener('abort', () => resolve('stopped'), { once: true });
    });

    const first = await Promise.race([workersDone.then(() => 'drained' as const), stopped]);

    if (first === 'stopped') {
      const grace = new Promise<'expired'>((resolve) => {
        graceTimer = setTimeout(() => resolve('expired'), options.graceMs);
      });
      const settled = await Promise.race([workersDone.then(() => 'drained' as const), grace]);

      if (settled === 'expired') {
        const abandoned = [...inFlight.values()];
        for (const page of abandoned) {
          page.abandoned = true;
          page.controller.abort();
        }
        inFlight.clear();

        for (const page of abandoned) {
          logger.warn(`[fetch] ${page.url}: abandoned after ${options.graceMs}ms grace`, {
            stage: 'fetch',
            url: page.url,
            outcome: 'abandoned',
            runId,
          });
          await deliver(
            failed(page.url, {
              stage: 'fetch',
              code: 'abandoned',
              reason: `still in flight ${options.graceMs}ms after the run was stopped`,
            }),
          );
        }
        await Promise.all(pendingDeliveries);
      }
    }
  } finally {
    clearTimeout(graceTimer);
    channel.close();
  }

  // The run timeout also bounds the final flush.
  await accumulation;
  clearTimeout(runTimer);
  clearTimeout(state.persistTimer);
  deps.signal?.removeEventListener('abort', onCallerAbort);
  if (state.accumulationError) {
    throw state.accumulationError.error;
  }

  if (queue.failure !== undefined) {
    logger.error(`[run:${sourceId}] enumeration failed: ${errorMessage(queue.failure)}`, { runId });
    throw queue.failure;
  }

  const status = state.fatal ? 'aborted' : state.stopReason ? 'cancelled' : 'completed';
  const result = report.finish(status, state.fatal?.message);
  const { counts } = result;

  logger.info(
    `[run:${sourceId}] ${status}: ${counts.discovered} discovered, ${counts.validatedOk} valid, ${counts.persistedOk} stored, ${result.failures.length} failures`,
    { runId, status, counts, durationMs: result.durationMs },
  );

  return result;
}
