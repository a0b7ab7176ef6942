/**
 * Revocation store for token ids.
 *
 * An entry added with a TTL of T seconds is reported as blacklisted for the
 * next T seconds and as absent afterwards, without any manual cleanup.
 */
export interface TokenBlacklistStore {
  add(key: string, ttlSeconds: number): Promise<void>;

  isBlacklisted(key: string): Promise<boolean>;

  /**
   * Atomically add the key unless a live entry already exists.
   *
   * @returns true when this call created the entry
   */
  addIfAbsent(key: string, ttlSeconds: number): Promise<boolean>;

  /** Release connections or memory held by the store */
  close(): Promise<void>;
}

/** TTLs are whole seconds, at least one. */
export function normalizeTtl(ttlSeconds: number): number {
  if (!Number.isFinite(ttlSeconds)) {
    throw new RangeError(`Invalid blacklist TTL: ${ttlSeconds}`);
  }
  return Math.max(1, Math.ceil(ttlSeconds));
}
