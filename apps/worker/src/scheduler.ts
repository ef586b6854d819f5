import { sourceScheduleEnvKey } from './env.js';
import type { Queues, ScrapeRunJobData } from './queues.js';
import { getAllSources } from './sources/catalog.js';
import type { ScrapeSourceDefinition } from './sources/types.js';

export interface SchedulerOptions {
  /** Per-source cron overrides; win over SOURCE_SCHEDULE_<ID> and the manifest. */
  sourceSchedules?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
}

export interface SchedulerError {
  sourceId: string;
  error: string;
}

export interface SchedulerResult {
  scheduledSources: number;
  errors: SchedulerError[];
}

export function scrapeJobId(sourceId: string): string {
  return `books-scrape-${sourceId}`;
}

export function resolveSourceSchedule(
  source: ScrapeSourceDefinition,
  sourceSchedules: Record<string, string> | undefined,
  env: NodeJS.ProcessEnv,
): string | undefined {
  const configOverride = sourceSchedules?.[source.id]?.trim();
  if (configOverride) {
    return configOverride;
  }

  const envOverride = env[sourceScheduleEnvKey(source.id)]?.trim();
  if (envOverride) {
    return envOverride;
  }

  return source.schedule?.trim() || source.source.manifest.schedule.trim() || undefined;
}

async function scheduleSource(queues: Queues, source: ScrapeSourceDefinition, pattern: string): Promise<void> {
  const data: ScrapeRunJobData = { sourceId: source.id };

  await queues.scrapeQueue.add('books-scrape', data, {
    jobId: scrapeJobId(source.id),
    repeat: {
      pattern,
    },
    attempts: source.runtime.attempts,
    backoff: {
      type: 'exponential',
      delay: source.runtime.backoffMs,
    },
    removeOnComplete: true,
    removeOnFail: 1000,
  });
}

/**
 * Register one repeatable scrape job per catalog source. A source that
 * cannot be scheduled is reported and does not stop the others.
 */
export async function scheduleAllSources(queues: Queues, options: SchedulerOptions = {}): Promise<SchedulerResult> {
  const env = options.env ?? process.env;
  const errors: SchedulerError[] = [];
  let scheduledSources = 0;

  for (const source of getAllSources()) {
    const pattern = resolveSourceSchedule(source, options.sourceSchedules, env);
    if (!pattern) {
      errors.push({ sourceId: source.id, error: `Source ${source.id} has no schedule configured` });
      continue;
    }

    try {
      await scheduleSource(queues, source, pattern);
      scheduledSources += 1;
    } catch (error) {
      errors.push({ sourceId: source.id, error: error instanceof Error ? error.message : String(error) });
    }
  }

  return { scheduledSources, errors };
}
