import { Redis } from 'ioredis';

/**
 * Creates a lazily-connected ioredis client; the caller decides when to
 * `connect()` and is responsible for `quit()`.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
