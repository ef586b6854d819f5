import { z } from 'zod';
import { ConfigurationError } from '@shelfscan/scraper-sdk';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';

const workerEnvSchema = z.object({
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL environment variable is required'),
  REDIS_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || DEFAULT_REDIS_URL),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(1),
});

export type WorkerEnv = z.infer<typeof workerEnvSchema>;

export function readWorkerEnv(env: NodeJS.ProcessEnv = process.env): WorkerEnv {
  const parsed = workerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  return parsed.data;
}

/**
 * SOURCE_SCHEDULE_<ID>, with the id upper-cased and non-alphanumerics as `_`.
 */
export function sourceScheduleEnvKey(sourceId: string): string {
  return `SOURCE_SCHEDULE_${sourceId.replaceAll(/[^a-z0-9]/gi, '_').toUpperCase()}`;
}
