/**
 * RedisTokenBlacklistStore Tests
 *
 * Uses an in-process fake of BlacklistRedisClient with SET EX / NX semantics,
 * so no Redis server is needed.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Redis } from 'ioredis';
import {
  RedisTokenBlacklistStore,
  createRedisBlacklistClient,
  type BlacklistRedisClient,
} from '../../../../src/providers/jwt/blacklist/redis-store.js';
import { createBlacklistStore } from '../../../../src/providers/jwt/blacklist/factory.js';
import { InMemoryTokenBlacklistStore } from '../../../../src/providers/jwt/blacklist/memory-store.js';
import { BlacklistSettingsSchema } from '../../../../src/config/schemas/auth.js';
import { ManualClock } from '../../../../src/testing/index.js';

class FakeRedisClient implements BlacklistRedisClient {
  readonly keys = new Map<string, { value: string; expiresAt: number }>();
  readonly ttls = new Map<string, number>();
  closed = false;

  constructor(private readonly clock: ManualClock) {}

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.keys.set(key, { value, expiresAt: this.clock.now().getTime() + ttlSeconds * 1000 });
    this.ttls.set(key, ttlSeconds);
  }

  async setWithExpiryIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (await this.exists(key)) {
      return false;
    }
    await this.setWithExpiry(key, value, ttlSeconds);
    return true;
  }

  async exists(key: string): Promise<boolean> {
    const entry = this.keys.get(key);
    if (!entry) {
      return false;
    }
    // Redis expires a key once its TTL reaches zero
    if (this.clock.now().getTime() >= entry.expiresAt) {
      this.keys.delete(key);
      return false;
    }
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('RedisTokenBlacklistStore', () => {
  let clock: ManualClock;
  let client: FakeRedisClient;
  let store: RedisTokenBlacklistStore;

  beforeEach(() => {
    clock = new ManualClock();
    client = new FakeRedisClient(clock);
    store = new RedisTokenBlacklistStore(client);
  });

  it('should write namespaced keys with the default prefix', async () => {
    await store.add('abc', 30);

    expect([...client.keys.keys()]).toEqual(['jwt:blacklist:abc']);
    expect(client.keys.get('jwt:blacklist:abc')?.value).toBe('1');
  });

  it('should honor a custom key prefix', async () => {
    store = new RedisTokenBlacklistStore(client, 'app:revoked:');

    await store.add('abc', 30);

    expect(client.keys.has('app:revoked:abc')).toBe(true);
    expect(await store.isBlacklisted('abc')).toBe(true);
  });

  it('should pass whole-second TTLs of at least one second', async () => {
    await store.add('zero', 0);
    await store.add('fraction', 1.5);

    expect(client.ttls.get('jwt:blacklist:zero')).toBe(1);
    expect(client.ttls.get('jwt:blacklist:fraction')).toBe(2);
  });

  it('should report keys as absent once Redis expires them', async () => {
    await store.add('abc', 2);
    expect(await store.isBlacklisted('abc')).toBe(true);

    clock.advanceSeconds(2);

    expect(await store.isBlacklisted('abc')).toBe(false);
  });

  it('should claim a key only once with addIfAbsent', async () => {
    expect(await store.addIfAbsent('refresh-1', 60)).toBe(true);
    expect(await store.addIfAbsent('refresh-1', 60)).toBe(false);
  });

  it('should close the underlying client', async () => {
    await store.close();

    expect(client.closed).toBe(true);
  });
});

describe('createRedisBlacklistClient', () => {
  let redis: Redis;

  beforeEach(() => {
    redis = new Redis('redis://localhost:6379/0', { lazyConnect: true });
  });

  afterEach(() => {
    redis.disconnect();
  });

  it('should write with SET key value EX ttl', async () => {
    const set = vi.spyOn(redis, 'set').mockResolvedValue('OK');

    await createRedisBlacklistClient(redis).setWithExpiry('jwt:blacklist:a', '1', 600);

    expect(set).toHaveBeenCalledWith('jwt:blacklist:a', '1', 'EX', 600);
  });

  it('should claim with SET key value EX ttl NX and report whether it wrote', async () => {
    const set = vi.spyOn(redis, 'set').mockResolvedValueOnce('OK').mockResolvedValueOnce(null);
    const client = createRedisBlacklistClient(redis);

    expect(await client.setWithExpiryIfAbsent('jwt:blacklist:r', '1', 3600)).toBe(true);
    expect(await client.setWithExpiryIfAbsent('jwt:blacklist:r', '1', 3600)).toBe(false);

    expect(set).toHaveBeenCalledTimes(2);
    expect(set).toHaveBeenNthCalledWith(1, 'jwt:blacklist:r', '1', 'EX', 3600, 'NX');
    expect(set).toHaveBeenNthCalledWith(2, 'jwt:blacklist:r', '1', 'EX', 3600, 'NX');
  });

  it('should map EXISTS counts to booleans', async () => {
    const exists = vi.spyOn(redis, 'exists').mockResolvedValueOnce(1).mockResolvedValueOnce(0);
    const client = createRedisBlacklistClient(redis);

    expect(await client.exists('jwt:blacklist:a')).toBe(true);
    expect(await client.exists('jwt:blacklist:b')).toBe(false);
    expect(exists).toHaveBeenNthCalledWith(1, 'jwt:blacklist:a');
    expect(exists).toHaveBeenNthCalledWith(2, 'jwt:blacklist:b');
  });

  it('should make refresh claims single use through the store', async () => {
    vi.spyOn(redis, 'set').mockResolvedValueOnce('OK').mockResolvedValueOnce(null);
    const store = new RedisTokenBlacklistStore(createRedisBlacklistClient(redis));

    const results = await Promise.all([store.addIfAbsent('jti-1', 60), store.addIfAbsent('jti-1', 60)]);

    expect(results).toEqual([true, false]);
  });

  it('should disconnect a lazy connection that never connected instead of sending QUIT', async () => {
    const disconnect = vi.spyOn(redis, 'disconnect');
    const quit = vi.spyOn(redis, 'quit');

    await createRedisBlacklistClient(redis).close();

    expect(disconnect).toHaveBeenCalledTimes(1);
    expect(quit).not.toHaveBeenCalled();
  });
});

describe('createBlacklistStore', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('should build the in-memory store by default', () => {
    const store = createBlacklistStore(BlacklistSettingsSchema.parse({}));

    expect(store).toBeInstanceOf(InMemoryTokenBlacklistStore);
  });

  it('should build a Redis store without connecting', async () => {
    const store = createBlacklistStore(
      BlacklistSettingsSchema.parse({ backend: 'redis', redisUrl: 'redis://localhost:6379/0' })
    );

    expect(store).toBeInstanceOf(RedisTokenBlacklistStore);
    await store.close();
  });

  it('should require a Redis URL for the redis backend', () => {
    const result = BlacklistSettingsSchema.safeParse({ backend: 'redis' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['redisUrl']);
    }
  });
});
