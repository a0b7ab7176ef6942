export type { TokenBlacklistStore } from './types.js';
export { normalizeTtl } from './types.js';
export { InMemoryTokenBlacklistStore, type InMemoryBlacklistOptions } from './memory-store.js';
export {
  RedisTokenBlacklistStore,
  createRedisBlacklistClient,
  type BlacklistRedisClient,
} from './redis-store.js';
export { createBlacklistStore } from './factory.js';
