import type { BookRecord, CatalogSource, Result, StoreError } from '@shelfscan/scraper-sdk';

export type PipelineStage = 'fetch' | 'extract' | 'validate' | 'persist';

/**
 * One non-success, attributed to the stage that produced it.
 */
export interface PageFailure {
  url: string;
  stage: PipelineStage;
  code: string;
  reason: string;
}

export interface EnumerationWarning {
  entryPoint: string;
  pageUrl: string;
  reason: string;
}

/**
 * Per-stage counts. For a finished run,
 * discovered = fetchFailed + extractedFailed + validatedFailed + validatedOk.
 */
export interface RunCounts {
  discovered: number;
  fetchFailed: number;
  extractedOk: number;
  extractedFailed: number;
  validatedOk: number;
  validatedFailed: number;
  persistedOk: number;
  persistedFailed: number;
}

export type RunStatus = 'completed' | 'cancelled' | 'aborted';

export interface RunReport {
  runId: string;
  status: RunStatus;
  fatalError?: string;
  counts: RunCounts;
  failures: PageFailure[];
  warnings: EnumerationWarning[];
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

/**
 * Outcome of driving one URL through fetch → extract → validate.
 */
export type PageOutcome =
  | { status: 'validated'; url: string; record: BookRecord }
  | { status: 'failed'; url: string; failure: PageFailure };

export interface FetchRequestOptions {
  signal?: AbortSignal;
}

/**
 * Capability: fetch(url) → raw page content. Throws FetchError.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchRequestOptions): Promise<string>;
}

export interface UpsertResult {
  key: string;
  result: Result<void, StoreError>;
}

/**
 * Persistent store contract: one result per input record, idempotent per key.
 * Batches are sets; no ordering between or within them is assumed.
 */
export interface UpsertSink {
  upsert(batch: readonly BookRecord[]): Promise<UpsertResult[]>;
}

export type LogFields = Record<string, unknown>;

/**
 * Minimal logger interface; the runner falls back to console.
 */
export interface IngestionLogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface RunDependencies {
  source: CatalogSource;
  fetcher: Fetcher;
  sink: UpsertSink;
  logger?: IngestionLogger;
  signal?: AbortSignal;
  runId?: string;
}
