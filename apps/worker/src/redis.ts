import { Redis } from 'ioredis';

/**
 * BullMQ workers block on Redis, so per-request retries must be disabled.
 */
export function createRedisConnection(redisUrl: string, connectionName = 'shelfscan-worker'): Redis {
  return new Redis(redisUrl, {
    connectionName,
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
}
