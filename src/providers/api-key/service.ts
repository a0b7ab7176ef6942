/**
 * API key lifecycle: creation under a per-owner quota, listing, owner and
 * admin deletion, and validation of presented keys.
 */

import { AuditService } from '../../core/audit-service.js';
import { systemClock, type Clock } from '../../core/clock.js';
import {
  APIKeyConflictError,
  APIKeyExpiredError,
  APIKeyLimitExceededError,
  APIKeyNotFoundError,
  InvalidAPIKeyError,
  RepositoryIntegrityError,
  RepositoryNotFoundError,
  sanitizeError,
} from '../../utils/errors.js';
import type { APIKeyHasher } from './hasher.js';
import type { APIKeyRecord, APIKeyRepository } from './repository.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface APIKeyServiceOptions {
  /** Default: 5 */
  maxPerOwner?: number;
  /** Default: 30 */
  defaultExpirationDays?: number;
  clock?: Clock;
  auditService?: AuditService;
}

/** Key metadata safe to return to the owner; never includes the hash. */
export type APIKeySummary = Omit<APIKeyRecord, 'keyHash'>;

export interface CreatedAPIKey {
  /** Plaintext key. Returned exactly once. */
  secretKey: string;
  key: APIKeySummary;
}

export interface ValidatedAPIKey {
  ownerId: string;
  keyId: number;
}

function toSummary(record: APIKeyRecord): APIKeySummary {
  const { keyHash: _keyHash, ...summary } = record;
  return summary;
}

export class APIKeyService {
  readonly maxPerOwner: number;
  readonly defaultExpirationDays: number;
  private readonly clock: Clock;
  private readonly auditService: AuditService;

  constructor(
    private readonly repository: APIKeyRepository,
    private readonly hasher: APIKeyHasher,
    options: APIKeyServiceOptions = {}
  ) {
    this.maxPerOwner = options.maxPerOwner ?? 5;
    this.defaultExpirationDays = options.defaultExpirationDays ?? 30;
    this.clock = options.clock ?? systemClock;
    this.auditService = options.auditService ?? new AuditService();
  }

  /**
   * Generate and store a new key for `ownerId`.
   *
   * @throws APIKeyLimitExceededError when the owner already holds maxPerOwner keys
   * @throws APIKeyConflictError when the generated prefix collides with a stored key
   */
  async createKey(ownerId: string, name: string, expiresInDays?: number): Promise<CreatedAPIKey> {
    // Cheap early exit before paying for a bcrypt hash; create() re-checks atomically.
    if ((await this.repository.countByOwner(ownerId)) >= this.maxPerOwner) {
      throw new APIKeyLimitExceededError(this.maxPerOwner);
    }

    const generated = await this.hasher.generateKey();
    const days = expiresInDays ?? this.defaultExpirationDays;

    let record: APIKeyRecord | null;
    try {
      record = await this.repository.create(
        {
          ownerId,
          name,
          keyHash: generated.hash,
          keyPrefix: generated.prefix,
          expiresAt: new Date(this.clock.now().getTime() + days * DAY_MS),
        },
        this.maxPerOwner
      );
    } catch (error) {
      if (error instanceof RepositoryIntegrityError) {
        console.warn('[APIKeyService] Key prefix collision', { ownerId });
        throw new APIKeyConflictError();
      }
      throw error;
    }

    if (!record) {
      throw new APIKeyLimitExceededError(this.maxPerOwner);
    }

    await this.audit('create', true, ownerId, { keyId: record.id, keyPrefix: record.keyPrefix });
    return { secretKey: generated.plaintext, key: toSummary(record) };
  }

  async listKeys(ownerId: string): Promise<APIKeySummary[]> {
    const records = await this.repository.getByOwner(ownerId);
    return records.map(toSummary);
  }

  /**
   * Delete one of the owner's keys. A key that does not exist and a key owned
   * by someone else are reported identically.
   */
  async deleteKey(keyId: number, ownerId: string): Promise<void> {
    const record = await this.repository.getById(keyId);
    if (!record || record.ownerId !== ownerId) {
      throw new APIKeyNotFoundError();
    }

    await this.remove(keyId);
    await this.audit('delete', true, ownerId, { keyId });
  }

  /**
   * Delete any key regardless of owner.
   */
  async deleteKeyAdmin(keyId: number, adminId: string): Promise<void> {
    const record = await this.repository.getById(keyId);
    if (!record) {
      throw new APIKeyNotFoundError();
    }

    await this.remove(keyId);
    await this.audit('delete_admin', true, adminId, { keyId, ownerId: record.ownerId });
  }

  /**
   * Check a presented key.
   *
   * 1. format gate, no I/O
   * 2. lookup by prefix
   * 3. expiry, before any hash work
   * 4. hash comparison
   * 5. best-effort last_used_at update
   *
   * @throws InvalidAPIKeyError for malformed, unknown or mismatching keys
   * @throws APIKeyExpiredError for expired keys
   */
  async validateKey(candidate: string): Promise<ValidatedAPIKey> {
    if (!this.hasher.isWellFormed(candidate)) {
      throw new InvalidAPIKeyError('Invalid API key format');
    }

    const record = await this.repository.getByPrefix(this.hasher.extractPrefix(candidate));
    if (!record) {
      throw new InvalidAPIKeyError();
    }

    const now = this.clock.now();
    if (record.expiresAt && record.expiresAt.getTime() < now.getTime()) {
      throw new APIKeyExpiredError();
    }

    if (!(await this.hasher.verifyKey(candidate, record.keyHash))) {
      console.warn('[APIKeyService] Hash mismatch for key prefix', { keyPrefix: record.keyPrefix });
      throw new InvalidAPIKeyError();
    }

    await this.touch(record.id, now);
    return { ownerId: record.ownerId, keyId: record.id };
  }

  private async remove(keyId: number): Promise<void> {
    try {
      await this.repository.delete(keyId);
    } catch (error) {
      // Deleted concurrently between lookup and delete.
      if (error instanceof RepositoryNotFoundError) {
        throw new APIKeyNotFoundError();
      }
      throw error;
    }
  }

  private async touch(keyId: number, usedAt: Date): Promise<void> {
    try {
      await this.repository.updateLastUsed(keyId, usedAt);
    } catch (error) {
      // Usage tracking never fails authentication.
      console.warn('[APIKeyService] Failed to update last_used_at', {
        keyId,
        error: sanitizeError(error),
      });
    }
  }

  private async audit(
    action: string,
    success: boolean,
    userId: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.auditService.log({
      timestamp: this.clock.now(),
      source: 'auth:api-key',
      userId,
      action: `api_key:${action}`,
      success,
      metadata,
    });
  }
}
