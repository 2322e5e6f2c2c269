/**
 * Redis Replay Store
 *
 * ReplayStore over ioredis. SET NX is Redis-atomic, which is what makes the
 * at-most-one-claim guarantee hold across gateway processes.
 *
 * The client is created with the offline queue disabled so that an
 * unreachable Redis fails the command immediately (→ redis_error) instead of
 * parking the request until reconnect.
 */

import { Redis } from 'ioredis';
import type { ReplayStore } from '../submission/index.js';

export class RedisReplayStore implements ReplayStore {
  private redis: Redis;

  constructor(redis: Redis) {
    this.redis = redis;
  }

  async setIfAbsent(key: string): Promise<boolean> {
    const result = await this.redis.set(key, '1', 'NX');
    return result === 'OK';
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    await this.redis.expire(key, ttlSeconds);
  }
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
  });
}
