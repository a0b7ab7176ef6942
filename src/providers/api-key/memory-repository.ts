import { systemClock, type Clock } from '../../core/clock.js';
import { RepositoryIntegrityError, RepositoryNotFoundError } from '../../utils/errors.js';
import type { APIKeyRecord, APIKeyRepository, NewAPIKeyRecord } from './repository.js';

/**
 * Map-backed repository for tests and single-process deployments.
 *
 * Every method body runs without an intermediate await, so count-and-insert
 * in create() cannot interleave with another request.
 */
export class InMemoryAPIKeyRepository implements APIKeyRepository {
  private readonly records = new Map<number, APIKeyRecord>();
  private nextId = 1;

  constructor(private readonly clock: Clock = systemClock) {}

  async create(record: NewAPIKeyRecord, maxPerOwner: number): Promise<APIKeyRecord | null> {
    if (this.count(record.ownerId) >= maxPerOwner) {
      return null;
    }

    for (const existing of this.records.values()) {
      if (existing.keyPrefix === record.keyPrefix) {
        throw new RepositoryIntegrityError('Duplicate API key prefix');
      }
    }

    const stored: APIKeyRecord = {
      ...record,
      id: this.nextId++,
      lastUsedAt: null,
      createdAt: this.clock.now(),
    };
    this.records.set(stored.id, stored);
    return { ...stored };
  }

  async getById(id: number): Promise<APIKeyRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async getByPrefix(prefix: string): Promise<APIKeyRecord | null> {
    for (const record of this.records.values()) {
      if (record.keyPrefix === prefix) {
        return { ...record };
      }
    }
    return null;
  }

  async getByOwner(ownerId: string): Promise<APIKeyRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.ownerId === ownerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map((record) => ({ ...record }));
  }

  async countByOwner(ownerId: string): Promise<number> {
    return this.count(ownerId);
  }

  async updateLastUsed(id: number, usedAt: Date): Promise<void> {
    const record = this.records.get(id);
    if (!record) {
      throw new RepositoryNotFoundError('APIKey', id);
    }
    record.lastUsedAt = usedAt;
  }

  async delete(id: number): Promise<void> {
    if (!this.records.delete(id)) {
      throw new RepositoryNotFoundError('APIKey', id);
    }
  }

  private count(ownerId: string): number {
    let total = 0;
    for (const record of this.records.values()) {
      if (record.ownerId === ownerId) {
        total++;
      }
    }
    return total;
  }
}
