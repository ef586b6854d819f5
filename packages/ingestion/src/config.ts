import { z } from 'zod';
import { ConfigurationError } from '@shelfscan/scraper-sdk';

export const DEFAULT_WORKER_COUNT = 5;
export const DEFAULT_BATCH_SIZE = 25;
export const DEFAULT_MAX_PAGES_PER_SOURCE = 50;
export const DEFAULT_RUN_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_RETRY_COUNT = 3;
export const DEFAULT_RETRY_BACKOFF_MS = 500;
export const DEFAULT_GRACE_MS = 10_000;

const entryPointSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'entry point must be an http(s) URL');

export const runOptionsSchema = z.object({
  entryPoints: z.array(entryPointSchema).min(1, 'at least one entry point is required'),
  workerCount: z.coerce.number().int().positive().default(DEFAULT_WORKER_COUNT),
  batchSize: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
  maxPagesPerSource: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES_PER_SOURCE),
  runTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_RUN_TIMEOUT_MS),
  retryCount: z.coerce.number().int().nonnegative().default(DEFAULT_RETRY_COUNT),
  retryBackoffMs: z.coerce.number().int().nonnegative().default(DEFAULT_RETRY_BACKOFF_MS),
  graceMs: z.coerce.number().int().nonnegative().default(DEFAULT_GRACE_MS),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;
export type RunOptionsInput = z.input<typeof runOptionsSchema>;

/**
 * Apply defaults and validate. Invalid configuration never starts a run.
 */
export function resolveRunOptions(input: unknown): RunOptions {
  const parsed = runOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`),
    );
  }

  return parsed.data;
}

type NumericOption = Exclude<keyof RunOptions, 'entryPoints'>;

/**
 * Run options other than entry points, as numbers or as the strings
 * environment variables and request bodies carry. Coerced by resolveRunOptions.
 */
export type RunSettings = Partial<Record<NumericOption, number | string>>;

const ENV_KEYS: ReadonlyArray<readonly [NumericOption, string]> = [
  ['workerCount', 'WORKER_COUNT'],
  ['batchSize', 'BATCH_SIZE'],
  ['maxPagesPerSource', 'MAX_PAGES_PER_SOURCE'],
  ['runTimeoutMs', 'RUN_TIMEOUT_MS'],
  ['retryCount', 'RETRY_COUNT'],
  ['retryBackoffMs', 'RETRY_BACKOFF_MS'],
  ['graceMs', 'GRACE_MS'],
];

export type EnvRunOptions = RunSettings & { entryPoints?: string[] };

/**
 * Read run options from the environment. Unset or blank variables are left
 * out so schema defaults apply; set ones are validated by resolveRunOptions.
 */
export function readRunOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): EnvRunOptions {
  const options: EnvRunOptions = {};

  const entryPoints = env.ENTRY_POINTS?.split(',')
    .map((value) => value.trim())
    .filter(Boolean);
  if (entryPoints && entryPoints.length > 0) {
    options.entryPoints = entryPoints;
  }

  for (const [option, envKey] of ENV_KEYS) {
    const raw = env[envKey]?.trim();
    if (raw) {
      options[option] = raw;
    }
  }

  return options;
}

const optionalInt = (min: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.coerce.number().int().min(min).optional());

const fetcherEnvSchema = z.object({
  FETCH_TIMEOUT_MS: optionalInt(1),
  FETCH_MAX_RETRIES: optionalInt(0),
  FETCH_MIN_INTERVAL_MS: optionalInt(0),
  FETCH_USER_AGENT: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
});

export interface FetcherSettings {
  timeoutMs?: number;
  maxRetries?: number;
  minIntervalMs?: number;
  userAgent?: string;
}

/**
 * HTTP fetcher settings from FETCH_* variables; unset ones keep the fetcher's defaults.
 */
export function readFetcherSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): FetcherSettings {
  const parsed = fetcherEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const { FETCH_TIMEOUT_MS, FETCH_MAX_RETRIES, FETCH_MIN_INTERVAL_MS, FETCH_USER_AGENT } = parsed.data;
  const settings: FetcherSettings = {};
  if (FETCH_TIMEOUT_MS !== undefined) settings.timeoutMs = FETCH_TIMEOUT_MS;
  if (FETCH_MAX_RETRIES !== undefined) settings.maxRetries = FETCH_MAX_RETRIES;
  if (FETCH_MIN_INTERVAL_MS !== undefined) settings.minIntervalMs = FETCH_MIN_INTERVAL_MS;
  if (FETCH_USER_AGENT !== undefined) settings.userAgent = FETCH_USER_AGENT;
  return settings;
}
