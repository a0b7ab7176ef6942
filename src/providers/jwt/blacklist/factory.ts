import { Redis } from 'ioredis';
import { systemClock, type Clock } from '../../../core/clock.js';
import type { BlacklistSettings } from '../../../config/schemas/auth.js';
import { ConfigurationError } from '../../../utils/errors.js';
import { InMemoryTokenBlacklistStore } from './memory-store.js';
import { RedisTokenBlacklistStore, createRedisBlacklistClient } from './redis-store.js';
import type { TokenBlacklistStore } from './types.js';

/**
 * Build the blacklist backend selected in settings.
 *
 * The Redis connection is lazy: nothing is dialled until the first command.
 */
export function createBlacklistStore(
  settings: BlacklistSettings,
  clock: Clock = systemClock
): TokenBlacklistStore {
  if (settings.backend === 'redis') {
    if (!settings.redisUrl) {
      throw new ConfigurationError('jwt.blacklist.redisUrl is required for the redis backend');
    }

    const redis = new Redis(settings.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 3 });
    console.log('[BlacklistFactory] Using redis token blacklist', { keyPrefix: settings.keyPrefix });
    return new RedisTokenBlacklistStore(createRedisBlacklistClient(redis), settings.keyPrefix);
  }

  console.log('[BlacklistFactory] Using in-memory token blacklist (single instance only)');
  return new InMemoryTokenBlacklistStore({
    cleanupThreshold: settings.cleanupThreshold,
    clock,
  });
}
