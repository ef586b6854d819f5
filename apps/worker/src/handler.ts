import { z } from 'zod';
import { createDatabase } from '@shelfscan/db';
import {
  DrizzleBookSink,
  HttpFetcher,
  readFetcherSettingsFromEnv,
  readRunOptionsFromEnv,
  type RunSummary,
} from '@shelfscan/ingestion';
import { ConfigurationError, EnumerationError } from '@shelfscan/scraper-sdk';
import { runSource, type SourceRunDeps } from './jobs/scrape-run.js';
import { createWorkerLogger } from './observability/logger.js';
import { ensureTraceId } from './observability/trace.js';
import { serializeError } from './observability/with-logger.js';
import { booksToScrapeDefinition } from './sources/books-toscrape.js';
import { getSourceById, hasSource } from './sources/catalog.js';

const settingValue = z.union([z.number(), z.string()]);

const scrapeRequestSchema = z
  .object({
    sourceId: z.string().trim().min(1).optional(),
    entryPoints: z.array(z.string()).min(1).optional(),
    options: z
      .object({
        workerCount: settingValue.optional(),
        batchSize: settingValue.optional(),
        maxPagesPerSource: settingValue.optional(),
        runTimeoutMs: settingValue.optional(),
        retryCount: settingValue.optional(),
        retryBackoffMs: settingValue.optional(),
        graceMs: settingValue.optional(),
      })
      .strict()
      .optional(),
    traceId: z.string().optional(),
  })
  .strict();

export type ScrapeRequest = z.infer<typeof scrapeRequestSchema>;

/**
 * Either an API-gateway style event carrying a JSON `body`, or the request object itself.
 */
export type ScrapeEvent = { body?: string | null } | ScrapeRequest | null | undefined;

export interface ScrapeResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

interface ErrorBody {
  error: string;
  message: string;
  traceId?: string;
  issues?: string[];
}

function respond(statusCode: number, body: RunSummary | ErrorBody): ScrapeResponse {
  return {
    statusCode,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}

function readRequestBody(event: ScrapeEvent): unknown {
  if (event && 'body' in event && (typeof event.body === 'string' || event.body === null)) {
    return event.body ? JSON.parse(event.body) : {};
  }

  return event ?? {};
}

/**
 * Run one scrape and map the outcome onto an HTTP-style response: 400 for a
 * malformed request, 500 for a fatal outcome, 200 otherwise (including
 * cancelled runs, whose summary says so).
 */
export async function handleScrapeRequest(event: ScrapeEvent, deps: SourceRunDeps): Promise<ScrapeResponse> {
  let raw: unknown;
  try {
    raw = readRequestBody(event);
  } catch (error) {
    return respond(400, { error: 'invalid_request', message: `body is not valid JSON: ${serializeError(error).message}` });
  }

  const parsed = scrapeRequestSchema.safeParse(raw);
  if (!parsed.success) {
    return respond(400, {
      error: 'invalid_request',
      message: 'request does not match the expected shape',
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`),
    });
  }

  const request = parsed.data;
  const sourceId = request.sourceId ?? booksToScrapeDefinition.id;
  if (!hasSource(sourceId)) {
    return respond(400, { error: 'unknown_source', message: `Unknown source id: ${sourceId}` });
  }

  const traceId = ensureTraceId(request.traceId);
  deps.logger.info({ event: 'scrape_request_received', sourceId, traceId }, 'Scrape request received');

  try {
    const summary = await runSource(
      getSourceById(sourceId),
      { runId: traceId, entryPoints: request.entryPoints, settings: request.options },
      deps,
    );
    return respond(summary.fatal ? 500 : 200, summary);
  } catch (error) {
    deps.logger.error({ event: 'scrape_request_failed', sourceId, traceId, error: serializeError(error) }, 'Scrape failed');

    if (error instanceof ConfigurationError) {
      return respond(500, { error: 'configuration_error', message: error.message, issues: error.issues, traceId });
    }
    if (error instanceof EnumerationError) {
      return respond(500, { error: 'enumeration_failed', message: error.message, traceId });
    }
    return respond(500, { error: 'internal_error', message: serializeError(error).message, traceId });
  }
}

let runtime: SourceRunDeps | undefined;

function getRuntime(env: NodeJS.ProcessEnv): SourceRunDeps {
  if (runtime) {
    return runtime;
  }

  const databaseUrl = env.DATABASE_URL?.trim();
  if (!databaseUrl) {
    throw new ConfigurationError(['DATABASE_URL: environment variable is required']);
  }

  const db = createDatabase(databaseUrl);
  const { entryPoints: _entryPoints, ...settings } = readRunOptionsFromEnv(env);
  runtime = {
    sinkFor: (sourceId) => new DrizzleBookSink({ db, sourceId }),
    fetcher: new HttpFetcher(readFetcherSettingsFromEnv(env)),
    logger: createWorkerLogger({ LOG_SERVICE_NAME: 'shelfscan-handler', ...env }),
    settings,
  };
  return runtime;
}

/**
 * Serverless entry point. The database pool is created on first use and
 * reused by warm invocations.
 */
export async function handler(event: ScrapeEvent): Promise<ScrapeResponse> {
  let deps: SourceRunDeps;
  try {
    deps = getRuntime(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return respond(500, { error: 'configuration_error', message: error.message, issues: error.issues });
    }
    throw error;
  }

  return handleScrapeRequest(event, deps);
}
