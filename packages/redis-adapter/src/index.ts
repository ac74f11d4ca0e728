import type { SessionStateAdapter } from '@order-saga/core';
import type { Redis } from 'ioredis';

/**
 * Redis-backed implementation of {@link SessionStateAdapter}.
 *
 * Each session is one string key holding the encoded session.  Expiry is
 * native Redis TTL: writes use `SET … EX` and reads use `GETEX … EX`, so every
 * access pushes the expiry back.
 *
 * Key namespacing is the {@link SessionStore}'s job (`keyPrefix` there); this
 * adapter stores keys exactly as given.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { SessionStore } from '@order-saga/core';
 * import { RedisSessionAdapter } from '@order-saga/redis-adapter';
 *
 * const redis = new Redis('redis://localhost:6379');
 * const store = new SessionStore({ adapter: new RedisSessionAdapter(redis) });
 * ```
 */
export class RedisSessionAdapter implements SessionStateAdapter {
  private readonly _redis: Redis;

  constructor(redis: Redis) {
    this._redis = redis;
  }

  async saveState(key: string, payload: string, ttlSeconds: number): Promise<void> {
    await this._redis.set(key, payload, 'EX', ttlSeconds);
  }

  async loadState(key: string, ttlSeconds: number): Promise<string | undefined> {
    const value = await this._redis.getex(key, 'EX', ttlSeconds);
    if (value === null) {
      return undefined;
    }
    return value;
  }

  async deleteState(key: string): Promise<boolean> {
    const removed = await this._redis.del(key);
    return removed > 0;
  }
}
