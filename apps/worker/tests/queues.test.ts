import { describe, expect, it, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { closeQueues, createQueues, SCRAPE_QUEUE } from '../src/queues.js';
import { stub } from './test-helpers.js';

const { queueClose, constructed } = vi.hoisted(() => ({
  queueClose: vi.fn(async () => {}),
  constructed: [] as Array<{ name: string; options: unknown }>,
}));

vi.mock('bullmq', () => ({
  Queue: class {
    close = queueClose;

    constructor(name: string, options: unknown) {
      constructed.push({ name, options });
    }
  },
}));

describe('createQueues', () => {
  it('opens the scrape queue on the shared connection and closes it again', async () => {
    const connection = stub<Redis>({});

    const queues = createQueues(connection);
    await closeQueues(queues);

    expect(constructed).toEqual([{ name: SCRAPE_QUEUE, options: { connection } }]);
    expect(queueClose).toHaveBeenCalledTimes(1);
  });
});
