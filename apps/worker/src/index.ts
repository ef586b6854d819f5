import { Worker, type Job } from 'bullmq';
import { closeDatabase, createDatabase, type Database } from '@shelfscan/db';
import {
  DrizzleBookSink,
  HttpFetcher,
  readFetcherSettingsFromEnv,
  readRunOptionsFromEnv,
  type RunSummary,
} from '@shelfscan/ingestion';
import { readWorkerEnv } from './env.js';
import { handleScrapeRunJob } from './jobs/scrape-run.js';
import { createWorkerLogger } from './observability/logger.js';
import { withLogger } from './observability/with-logger.js';
import { closeQueues, createQueues, SCRAPE_QUEUE, type Queues, type ScrapeRunJobData } from './queues.js';
import { createRedisConnection } from './redis.js';
import { scheduleAllSources } from './scheduler.js';

interface RuntimeState {
  db: Database | null;
  redis: ReturnType<typeof createRedisConnection> | null;
  queues: Queues | null;
  workers: Worker[];
  shutdown: AbortController;
}

const runtimeState: RuntimeState = {
  db: null,
  redis: null,
  queues: null,
  workers: [],
  shutdown: new AbortController(),
};

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  // In-flight runs stop, flush what they have and return a cancelled report.
  state.shutdown.abort();
  await Promise.allSettled(state.workers.map((worker) => worker.close()));

  if (state.queues) {
    await Promise.allSettled([closeQueues(state.queues)]);
  }

  if (state.redis) {
    await Promise.allSettled([state.redis.quit()]);
  }

  if (state.db) {
    await Promise.allSettled([closeDatabase(state.db)]);
  }
}

async function main(): Promise<void> {
  const logger = createWorkerLogger();
  const env = readWorkerEnv();
  const { entryPoints: _entryPoints, ...settings } = readRunOptionsFromEnv();

  const db = createDatabase(env.DATABASE_URL);
  runtimeState.db = db;
  const redis = createRedisConnection(env.REDIS_URL);
  runtimeState.redis = redis;
  const queues = createQueues(redis);
  runtimeState.queues = queues;

  const fetcher = new HttpFetcher(readFetcherSettingsFromEnv());

  const scrapeWorker = new Worker<ScrapeRunJobData, RunSummary>(
    SCRAPE_QUEUE,
    (job: Job<ScrapeRunJobData>) =>
      withLogger({
        logger,
        queue: SCRAPE_QUEUE,
        job,
        context: () => ({ sourceId: job.data.sourceId }),
        summary: (result: RunSummary) => ({
          runId: result.runId,
          status: result.status,
          ...result.counts,
          warnings: result.warnings.length,
          failures: result.counts.fetchFailed + result.counts.extractedFailed + result.counts.validatedFailed,
        }),
        run: () =>
          handleScrapeRunJob(job, {
            sinkFor: (sourceId) => new DrizzleBookSink({ db, sourceId }),
            fetcher,
            logger,
            settings,
            signal: runtimeState.shutdown.signal,
          }),
      }),
    {
      connection: redis,
      concurrency: env.WORKER_CONCURRENCY,
    },
  );
  runtimeState.workers.push(scrapeWorker);

  scrapeWorker.on('error', (error) => {
    logger.error(
      {
        event: 'worker_runtime_error',
        queue: scrapeWorker.name,
        error,
      },
      'Worker runtime error',
    );
  });

  const schedulerResult = await scheduleAllSources(queues);
  if (schedulerResult.errors.length === 0) {
    logger.info(
      {
        event: 'scheduler_configured',
        scheduledSources: schedulerResult.scheduledSources,
      },
      'Scheduler configured',
    );
  } else {
    logger.warn(
      {
        event: 'scheduler_partially_configured',
        scheduledSources: schedulerResult.scheduledSources,
        errors: schedulerResult.errors,
      },
      'Scheduler partially configured: source scheduling failed',
    );
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info(
      {
        event: 'shutdown_requested',
        signal,
      },
      'Shutdown requested',
    );

    await cleanupRuntimeState(runtimeState);

    logger.info(
      {
        event: 'shutdown_completed',
        signal,
      },
      'Shutdown completed',
    );

    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logger.info(
    {
      event: 'worker_started',
      queue: SCRAPE_QUEUE,
      concurrency: env.WORKER_CONCURRENCY,
    },
    'Worker started',
  );
}

main().catch(async (error: unknown) => {
  await cleanupRuntimeState(runtimeState);
  const logger = createWorkerLogger();
  logger.error(
    {
      event: 'worker_fatal_error',
      error,
    },
    'Worker fatal error',
  );
  process.exit(1);
});
