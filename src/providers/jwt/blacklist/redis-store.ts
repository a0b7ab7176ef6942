import type { Redis } from 'ioredis';
import { normalizeTtl, type TokenBlacklistStore } from './types.js';

/**
 * The handful of Redis operations the blacklist needs.
 */
export interface BlacklistRedisClient {
  /** SET key value EX ttl */
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** SET key value EX ttl NX, true when the key was written */
  setWithExpiryIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Adapt an ioredis connection to {@link BlacklistRedisClient}.
 */
export function createRedisBlacklistClient(redis: Redis): BlacklistRedisClient {
  return {
    async setWithExpiry(key, value, ttlSeconds) {
      await redis.set(key, value, 'EX', ttlSeconds);
    },

    async setWithExpiryIfAbsent(key, value, ttlSeconds) {
      const result = await redis.set(key, value, 'EX', ttlSeconds, 'NX');
      return result === 'OK';
    },

    async exists(key) {
      return (await redis.exists(key)) > 0;
    },

    async close() {
      // A lazy connection that never sent a command has nothing to QUIT.
      if (redis.status === 'wait') {
        redis.disconnect();
        return;
      }
      await redis.quit();
    },
  };
}

/**
 * Blacklist shared across processes. Expiry is left to Redis key TTLs, so no
 * sweeping happens here.
 */
export class RedisTokenBlacklistStore implements TokenBlacklistStore {
  constructor(
    private readonly client: BlacklistRedisClient,
    private readonly keyPrefix: string = 'jwt:blacklist:'
  ) {}

  async add(key: string, ttlSeconds: number): Promise<void> {
    await this.client.setWithExpiry(this.namespaced(key), '1', normalizeTtl(ttlSeconds));
  }

  async isBlacklisted(key: string): Promise<boolean> {
    return this.client.exists(this.namespaced(key));
  }

  async addIfAbsent(key: string, ttlSeconds: number): Promise<boolean> {
    return this.client.setWithExpiryIfAbsent(this.namespaced(key), '1', normalizeTtl(ttlSeconds));
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private namespaced(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}
