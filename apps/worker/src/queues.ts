import { Queue } from 'bullmq';
import type { Redis } from 'ioredis';

export const SCRAPE_QUEUE = 'books.scrape';

export interface ScrapeRunJobData {
  sourceId: string;
  /** Overrides the source's default entry points for this run only. */
  entryPoints?: string[];
  traceId?: string;
}

export interface Queues {
  scrapeQueue: Queue<ScrapeRunJobData>;
}

export function createQueues(connection: Redis): Queues {
  return {
    scrapeQueue: new Queue<ScrapeRunJobData>(SCRAPE_QUEUE, { connection }),
  };
}

export async function closeQueues(queues: Queues): Promise<void> {
  await queues.scrapeQueue.close();
}
