/**
 * API key persistence contract
 *
 * Implementations translate storage failures into the repository taxonomy:
 * RepositoryNotFoundError, RepositoryIntegrityError (duplicate prefix) and
 * RepositoryTransientError (connectivity). Lookups return null when nothing
 * matches.
 */

export interface APIKeyRecord {
  id: number;
  /** Canonical string form of the owning principal's id */
  ownerId: string;
  name: string;
  keyHash: string;
  /** First 12 characters of the plaintext key; globally unique */
  keyPrefix: string;
  expiresAt: Date | null;
  lastUsedAt: Date | null;
  createdAt: Date;
}

export type NewAPIKeyRecord = Pick<
  APIKeyRecord,
  'ownerId' | 'name' | 'keyHash' | 'keyPrefix' | 'expiresAt'
>;

export interface APIKeyRepository {
  /**
   * Insert a key unless the owner already holds `maxPerOwner` keys. The count
   * and the insert are atomic per owner.
   *
   * @returns the stored record, or null when the owner is at quota
   */
  create(record: NewAPIKeyRecord, maxPerOwner: number): Promise<APIKeyRecord | null>;

  getById(id: number): Promise<APIKeyRecord | null>;

  getByPrefix(prefix: string): Promise<APIKeyRecord | null>;

  /** Newest first */
  getByOwner(ownerId: string): Promise<APIKeyRecord[]>;

  countByOwner(ownerId: string): Promise<number>;

  updateLastUsed(id: number, usedAt: Date): Promise<void>;

  /** @throws RepositoryNotFoundError when no record has this id */
  delete(id: number): Promise<void>;
}
