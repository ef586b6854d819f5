import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { run, summarizeRunReport, type Fetcher, type RunSettings, type RunSummary, type UpsertSink } from '@shelfscan/ingestion';
import { SCRAPE_QUEUE, type ScrapeRunJobData } from '../queues.js';
import { getSourceById } from '../sources/catalog.js';
import type { ScrapeSourceDefinition } from '../sources/types.js';
import { createIngestionLogger } from '../observability/ingestion-logger.js';

export interface SourceRunDeps {
  /** Sink for the given source; the worker shares one database across sources. */
  sinkFor: (sourceId: string) => UpsertSink;
  fetcher: Fetcher;
  logger: Logger;
  /** Environment-level settings, layered between the source's and the caller's. */
  settings?: RunSettings;
  signal?: AbortSignal;
}

export interface SourceRunRequest {
  runId: string;
  entryPoints?: string[];
  settings?: RunSettings;
  queue?: string;
}

/**
 * One scrape of one source. Settings precedence, lowest first: source
 * definition, deps.settings, request.settings.
 */
export async function runSource(
  definition: ScrapeSourceDefinition,
  request: SourceRunRequest,
  deps: SourceRunDeps,
): Promise<RunSummary> {
  const entryPoints = request.entryPoints?.length ? request.entryPoints : definition.entryPoints;
  const logger = createIngestionLogger(
    deps.logger.child({
      ...(request.queue ? { queue: request.queue } : {}),
      sourceId: definition.id,
      traceId: request.runId,
    }),
  );

  const report = await run(
    entryPoints,
    { ...definition.settings, ...deps.settings, ...request.settings },
    {
      source: definition.source,
      fetcher: deps.fetcher,
      sink: deps.sinkFor(definition.id),
      logger,
      signal: deps.signal,
      runId: request.runId,
    },
  );

  return summarizeRunReport(report);
}

export async function handleScrapeRunJob(job: Job<ScrapeRunJobData>, deps: SourceRunDeps): Promise<RunSummary> {
  const definition = getSourceById(job.data.sourceId);
  const summary = await runSource(
    definition,
    {
      runId: job.data.traceId ?? String(job.id ?? job.name),
      entryPoints: job.data.entryPoints,
      queue: SCRAPE_QUEUE,
    },
    deps,
  );

  // Aborted runs go back to BullMQ so the job's retry policy applies.
  if (summary.fatal) {
    throw new Error(`[${SCRAPE_QUEUE}:${definition.id}] run ${summary.runId} aborted: ${summary.fatalError ?? 'unknown'}`);
  }

  return summary;
}
