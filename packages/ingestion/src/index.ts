// Runner
export { run, processPage, defaultLogger } from './pipeline.js';

// Stages
export { enumerateBookUrls } from './enumerate.js';
export type { EnumerateOptions } from './enumerate.js';
export { validate } from './validate.js';
export { computeBookKey, canonicalizeUrl } from './fingerprint.js';
export { flushBatch } from './flush.js';
export type { FlushOptions, FlushResult } from './flush.js';

// Concurrency primitives
export { Channel } from './channel.js';
export { WorkQueue } from './work-queue.js';

// Report
export { RunReportBuilder, summarizeRunReport, DEFAULT_SUMMARY_FAILURE_LIMIT } from './report.js';
export type { RunSummary } from './report.js';

// Configuration
export {
  runOptionsSchema,
  resolveRunOptions,
  readRunOptionsFromEnv,
  readFetcherSettingsFromEnv,
  DEFAULT_WORKER_COUNT,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_PAGES_PER_SOURCE,
  DEFAULT_RUN_TIMEOUT_MS,
  DEFAULT_RETRY_COUNT,
  DEFAULT_RETRY_BACKOFF_MS,
  DEFAULT_GRACE_MS,
} from './config.js';
export type { RunOptions, RunOptionsInput, RunSettings, EnvRunOptions, FetcherSettings } from './config.js';

// Collaborators
export { HttpFetcher, DEFAULT_USER_AGENT } from './fetcher.js';
export type { HttpFetcherOptions } from './fetcher.js';
export { DrizzleBookSink, classifyStoreError, computeContentHash } from './store.js';
export type { DrizzleBookSinkOptions } from './store.js';
export { MemoryBookSink } from './memory-sink.js';

// Types
export type {
  PipelineStage,
  PageFailure,
  PageOutcome,
  EnumerationWarning,
  RunCounts,
  RunStatus,
  RunReport,
  Fetcher,
  FetchRequestOptions,
  UpsertSink,
  UpsertResult,
  RunDependencies,
  IngestionLogger,
  LogFields,
} from './types.js';
