/**
 * Audit Service - Security event trail with Null Object Pattern
 *
 * Disabled by default: every component calls `audit.log(...)` unconditionally
 * and a disabled service simply drops the entry.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum entries kept by the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Invoked with a copy of all entries before the oldest one is discarded */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Write-only storage for audit entries. Querying belongs to whatever indexed
 * store a deployment plugs in here.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      if (this.onOverflow) {
        this.onOverflow([...this.entries]);
      }
      this.entries.shift();
    }
  }

  /**
   * Get all entries (for tests and diagnostics)
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service (Null Object Pattern)
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const audit = new AuditService();            // disabled, log() is a no-op
 * const audit = new AuditService({ enabled: true, onOverflow: flush });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Get internal storage (for testing only)
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}
