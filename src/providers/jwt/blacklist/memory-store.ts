import { systemClock, type Clock } from '../../../core/clock.js';
import { normalizeTtl, type TokenBlacklistStore } from './types.js';

export interface InMemoryBlacklistOptions {
  /** Entry count above which add() sweeps every expired entry (default: 1000) */
  cleanupThreshold?: number;
  clock?: Clock;
}

/**
 * Process-local blacklist.
 *
 * Expired entries are removed lazily when checked, and in bulk once the map
 * grows past the cleanup threshold. Not shared between processes.
 */
export class InMemoryTokenBlacklistStore implements TokenBlacklistStore {
  /** key -> absolute expiry in epoch milliseconds */
  private readonly entries = new Map<string, number>();
  private readonly cleanupThreshold: number;
  private readonly clock: Clock;

  constructor(options: InMemoryBlacklistOptions = {}) {
    this.cleanupThreshold = options.cleanupThreshold ?? 1000;
    this.clock = options.clock ?? systemClock;
  }

  async add(key: string, ttlSeconds: number): Promise<void> {
    this.store(key, ttlSeconds);
  }

  async isBlacklisted(key: string): Promise<boolean> {
    return this.isLive(key);
  }

  async addIfAbsent(key: string, ttlSeconds: number): Promise<boolean> {
    // No await between the check and the write.
    if (this.isLive(key)) {
      return false;
    }
    this.store(key, ttlSeconds);
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /** Number of entries currently held, expired ones included */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Remove every expired entry.
   *
   * @returns number of entries removed
   */
  sweep(): number {
    const now = this.clock.now().getTime();
    let removed = 0;

    for (const [key, expiresAt] of this.entries) {
      if (now > expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      console.log('[InMemoryTokenBlacklistStore] Swept expired entries', {
        removed,
        remaining: this.entries.size,
      });
    }
    return removed;
  }

  private store(key: string, ttlSeconds: number): void {
    const expiresAt = this.clock.now().getTime() + normalizeTtl(ttlSeconds) * 1000;
    this.entries.set(key, expiresAt);

    if (this.entries.size > this.cleanupThreshold) {
      this.sweep();
    }
  }

  private isLive(key: string): boolean {
    const expiresAt = this.entries.get(key);
    if (expiresAt === undefined) {
      return false;
    }

    if (this.clock.now().getTime() > expiresAt) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }
}
