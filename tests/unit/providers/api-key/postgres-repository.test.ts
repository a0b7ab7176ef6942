/**
 * PostgresAPIKeyRepository Tests
 *
 * Runs against a scripted in-process stand-in for pg.Pool; asserts the SQL
 * issued, transaction handling and error mapping.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { QueryResultRow } from 'pg';
import {
  PostgresAPIKeyRepository,
  mapDatabaseError,
  type SqlClient,
  type SqlPool,
  type SqlResult,
} from '../../../../src/providers/api-key/postgres-repository.js';
import {
  RepositoryError,
  RepositoryIntegrityError,
  RepositoryNotFoundError,
  RepositoryTransientError,
} from '../../../../src/utils/errors.js';

const CREATED_AT = new Date('2026-01-01T00:00:00Z');

const ROW: QueryResultRow = {
  id: 7,
  owner_id: '42',
  name: 'ci',
  key_hash: '$2b$04$placeholderhash',
  key_prefix: 'sk_abcdef123',
  expires_at: null,
  last_used_at: null,
  created_at: CREATED_AT,
};

interface ExecutedQuery {
  text: string;
  values: unknown[];
}

class FakePool implements SqlPool {
  readonly executed: ExecutedQuery[] = [];
  released = 0;
  ownerCount = 0;
  rows: QueryResultRow[] = [ROW];
  rowCount = 1;
  failures = new Map<string, unknown>();
  connectError: unknown;

  async query(text: string, values: unknown[] = []): Promise<SqlResult> {
    const normalized = text.replace(/\s+/g, ' ').trim();
    this.executed.push({ text: normalized, values });

    for (const [prefix, error] of this.failures) {
      if (normalized.startsWith(prefix)) {
        throw error;
      }
    }

    if (normalized.startsWith('SELECT COUNT')) {
      return { rows: [{ total: String(this.ownerCount) }], rowCount: 1 };
    }
    if (normalized.startsWith('INSERT') || normalized.startsWith('SELECT id')) {
      return { rows: this.rows, rowCount: this.rows.length };
    }
    if (normalized.startsWith('UPDATE') || normalized.startsWith('DELETE')) {
      return { rows: [], rowCount: this.rowCount };
    }
    return { rows: [], rowCount: null };
  }

  async connect(): Promise<SqlClient> {
    if (this.connectError) {
      throw this.connectError;
    }
    return {
      query: (text, values) => this.query(text, values),
      release: () => {
        this.released++;
      },
    };
  }

  statements(): string[] {
    return this.executed.map((q) => q.text.split(' ').slice(0, 2).join(' '));
  }
}

const NEW_RECORD = {
  ownerId: '42',
  name: 'ci',
  keyHash: '$2b$04$placeholderhash',
  keyPrefix: 'sk_abcdef123',
  expiresAt: null,
};

describe('PostgresAPIKeyRepository', () => {
  let pool: FakePool;
  let repository: PostgresAPIKeyRepository;

  beforeEach(() => {
    pool = new FakePool();
    repository = new PostgresAPIKeyRepository(pool);
  });

  describe('create', () => {
    it('should count and insert inside one advisory-locked transaction', async () => {
      const record = await repository.create(NEW_RECORD, 5);

      expect(pool.statements()).toEqual([
        'BEGIN',
        'SELECT pg_advisory_xact_lock(hashtext($1))',
        'SELECT COUNT(*)',
        'INSERT INTO',
        'COMMIT',
      ]);
      expect(pool.executed[1].values).toEqual(['42']);
      expect(pool.executed[3].values).toEqual(['42', 'ci', '$2b$04$placeholderhash', 'sk_abcdef123', null]);
      expect(record).toEqual({
        id: 7,
        ownerId: '42',
        name: 'ci',
        keyHash: '$2b$04$placeholderhash',
        keyPrefix: 'sk_abcdef123',
        expiresAt: null,
        lastUsedAt: null,
        createdAt: CREATED_AT,
      });
      expect(pool.released).toBe(1);
    });

    it('should roll back and return null when the owner is at quota', async () => {
      pool.ownerCount = 5;

      expect(await repository.create(NEW_RECORD, 5)).toBeNull();

      expect(pool.statements()).toEqual([
        'BEGIN',
        'SELECT pg_advisory_xact_lock(hashtext($1))',
        'SELECT COUNT(*)',
        'ROLLBACK',
      ]);
      expect(pool.released).toBe(1);
    });

    it('should map a unique violation to RepositoryIntegrityError and roll back', async () => {
      pool.failures.set('INSERT', { code: '23505', message: 'duplicate key value' });

      await expect(repository.create(NEW_RECORD, 5)).rejects.toBeInstanceOf(RepositoryIntegrityError);

      expect(pool.statements().at(-1)).toBe('ROLLBACK');
      expect(pool.released).toBe(1);
    });

    it('should still release the client when rollback fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      pool.failures.set('INSERT', { code: '23505' });
      pool.failures.set('ROLLBACK', new Error('connection lost'));

      await expect(repository.create(NEW_RECORD, 5)).rejects.toBeInstanceOf(RepositoryIntegrityError);
      expect(pool.released).toBe(1);
    });

    it('should map connection failures to RepositoryTransientError', async () => {
      pool.connectError = { code: 'ECONNREFUSED' };

      await expect(repository.create(NEW_RECORD, 5)).rejects.toBeInstanceOf(RepositoryTransientError);
    });
  });

  describe('queries', () => {
    it('should map rows to records', async () => {
      const record = await repository.getById(7);

      expect(record?.keyPrefix).toBe('sk_abcdef123');
      expect(pool.executed[0].values).toEqual([7]);
    });

    it('should return null when no row matches', async () => {
      pool.rows = [];

      expect(await repository.getByPrefix('sk_000000000')).toBeNull();
    });

    it('should list by owner newest first', async () => {
      await repository.getByOwner('42');

      expect(pool.executed[0].text).toContain('ORDER BY created_at DESC, id DESC');
    });

    it('should parse bigint counts', async () => {
      pool.ownerCount = 3;

      expect(await repository.countByOwner('42')).toBe(3);
    });

    it('should reject rows of an unexpected shape', async () => {
      pool.rows = [{ id: 'seven' }];

      await expect(repository.getById(7)).rejects.toThrow('Unexpected api_keys row shape');
    });
  });

  describe('mutations', () => {
    it('should update last use', async () => {
      const usedAt = new Date('2026-02-01T00:00:00Z');

      await repository.updateLastUsed(7, usedAt);

      expect(pool.executed[0].values).toEqual([7, usedAt]);
    });

    it('should raise RepositoryNotFoundError when nothing was updated or deleted', async () => {
      pool.rowCount = 0;

      await expect(repository.updateLastUsed(7, CREATED_AT)).rejects.toBeInstanceOf(
        RepositoryNotFoundError
      );
      await expect(repository.delete(7)).rejects.toBeInstanceOf(RepositoryNotFoundError);
    });
  });

  describe('ensureSchema', () => {
    it('should run the api_keys migration', async () => {
      await repository.ensureSchema();

      expect(pool.executed[0].text).toContain('CREATE TABLE IF NOT EXISTS api_keys');
    });
  });
});

describe('mapDatabaseError', () => {
  it('should classify connectivity SQLSTATEs as transient', () => {
    expect(mapDatabaseError({ code: '08006' })).toBeInstanceOf(RepositoryTransientError);
    expect(mapDatabaseError({ code: '57P01' })).toBeInstanceOf(RepositoryTransientError);
    expect(mapDatabaseError({ code: '53300' })).toBeInstanceOf(RepositoryTransientError);
  });

  it('should keep the original error', () => {
    const original = { code: '23505' };

    expect(mapDatabaseError(original).originalError).toBe(original);
  });

  it('should fall back to a generic database error', () => {
    const mapped = mapDatabaseError(new Error('syntax error'));

    expect(mapped).toBeInstanceOf(RepositoryError);
    expect(mapped.code).toBe('DATABASE_ERROR');
    expect(mapped.statusCode).toBe(500);
  });

  it('should pass repository errors through unchanged', () => {
    const error = new RepositoryNotFoundError('APIKey', 1);

    expect(mapDatabaseError(error)).toBe(error);
  });
});
