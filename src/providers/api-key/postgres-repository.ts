/**
 * PostgreSQL API key repository
 *
 * Table layout lives in migrations/001_create_api_keys.sql. The quota-checked
 * insert runs in a transaction holding a per-owner advisory lock, so two
 * concurrent creators cannot both take the last slot.
 */

import { readFile } from 'node:fs/promises';
import pg from 'pg';
import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import {
  RepositoryError,
  RepositoryIntegrityError,
  RepositoryNotFoundError,
  RepositoryTransientError,
} from '../../utils/errors.js';
import type { APIKeyRecord, APIKeyRepository, NewAPIKeyRecord } from './repository.js';

const { Pool } = pg;

// ============================================================================
// Client seam
// ============================================================================

export interface SqlResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  release(): void;
}

/** The subset of pg.Pool this repository uses */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  connect(): Promise<SqlClient>;
}

export interface PostgresConnectionConfig {
  connectionString: string;
  /** Maximum pool size (default: 10) */
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

export function createPostgresPool(config: PostgresConnectionConfig): pg.Pool {
  return new Pool({
    connectionString: config.connectionString,
    max: config.max ?? 10,
    idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5000,
  });
}

// ============================================================================
// Row mapping
// ============================================================================

// pg returns timestamptz columns as Date and SERIAL as number
const APIKeyRowSchema = z.object({
  id: z.number().int(),
  owner_id: z.string(),
  name: z.string(),
  key_hash: z.string(),
  key_prefix: z.string(),
  expires_at: z.date().nullable(),
  last_used_at: z.date().nullable(),
  created_at: z.date(),
});

// COUNT(*) is a bigint, which pg hands back as a string
const CountRowSchema = z.object({ total: z.coerce.number().int() });

const COLUMNS = 'id, owner_id, name, key_hash, key_prefix, expires_at, last_used_at, created_at';

function toRecord(raw: QueryResultRow): APIKeyRecord {
  const parsed = APIKeyRowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RepositoryError('Unexpected api_keys row shape');
  }
  const row = parsed.data;
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    keyHash: row.key_hash,
    keyPrefix: row.key_prefix,
    expiresAt: row.expires_at,
    lastUsedAt: row.last_used_at,
    createdAt: row.created_at,
  };
}

function toCount(result: SqlResult): number {
  const parsed = CountRowSchema.safeParse(result.rows[0] ?? { total: 0 });
  if (!parsed.success) {
    throw new RepositoryError('Unexpected count row shape');
  }
  return parsed.data.total;
}

// SQLSTATE classes/codes that mean "try again later"
const TRANSIENT_SQLSTATE = /^(08|53|57P0[1-3])/;
const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Translate a pg/driver error into the repository taxonomy.
 */
export function mapDatabaseError(error: unknown): RepositoryError {
  if (error instanceof RepositoryError) {
    return error;
  }

  const code = errorCode(error);
  if (code === '23505') {
    return new RepositoryIntegrityError('Duplicate API key prefix', error);
  }
  if (code && (TRANSIENT_SQLSTATE.test(code) || TRANSIENT_NODE_CODES.has(code))) {
    return new RepositoryTransientError(undefined, error);
  }
  return new RepositoryError(undefined, undefined, undefined, error);
}

// ============================================================================
// Repository
// ============================================================================

export class PostgresAPIKeyRepository implements APIKeyRepository {
  constructor(private readonly pool: SqlPool) {}

  /**
   * Apply the table migration. Safe to run repeatedly.
   */
  async ensureSchema(): Promise<void> {
    const sql = await readFile(
      new URL('../../../migrations/001_create_api_keys.sql', import.meta.url),
      'utf-8'
    );
    await this.run(sql);
  }

  async create(record: NewAPIKeyRecord, maxPerOwner: number): Promise<APIKeyRecord | null> {
    let client: SqlClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw mapDatabaseError(error);
    }

    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [record.ownerId]);

      const counted = await client.query(
        'SELECT COUNT(*) AS total FROM api_keys WHERE owner_id = $1',
        [record.ownerId]
      );
      if (toCount(counted) >= maxPerOwner) {
        await client.query('ROLLBACK');
        return null;
      }

      const inserted = await client.query(
        `INSERT INTO api_keys (owner_id, name, key_hash, key_prefix, expires_at)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${COLUMNS}`,
        [record.ownerId, record.name, record.keyHash, record.keyPrefix, record.expiresAt]
      );
      const created = toRecord(inserted.rows[0]);
      await client.query('COMMIT');
      return created;
    } catch (error) {
      await this.rollback(client);
      throw mapDatabaseError(error);
    } finally {
      client.release();
    }
  }

  async getById(id: number): Promise<APIKeyRecord | null> {
    const result = await this.run(`SELECT ${COLUMNS} FROM api_keys WHERE id = $1`, [id]);
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
  }

  async getByPrefix(prefix: string): Promise<APIKeyRecord | null> {
    const result = await this.run(
      `SELECT ${COLUMNS} FROM api_keys WHERE key_prefix = $1`,
      [prefix]
    );
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
  }

  async getByOwner(ownerId: string): Promise<APIKeyRecord[]> {
    const result = await this.run(
      `SELECT ${COLUMNS} FROM api_keys WHERE owner_id = $1 ORDER BY created_at DESC, id DESC`,
      [ownerId]
    );
    return result.rows.map(toRecord);
  }

  async countByOwner(ownerId: string): Promise<number> {
    const result = await this.run(
      'SELECT COUNT(*) AS total FROM api_keys WHERE owner_id = $1',
      [ownerId]
    );
    return toCount(result);
  }

  async updateLastUsed(id: number, usedAt: Date): Promise<void> {
    const result = await this.run('UPDATE api_keys SET last_used_at = $2 WHERE id = $1', [
      id,
      usedAt,
    ]);
    if (result.rowCount === 0) {
      throw new RepositoryNotFoundError('APIKey', id);
    }
  }

  async delete(id: number): Promise<void> {
    const result = await this.run('DELETE FROM api_keys WHERE id = $1', [id]);
    if (result.rowCount === 0) {
      throw new RepositoryNotFoundError('APIKey', id);
    }
  }

  private async run(text: string, values?: unknown[]): Promise<SqlResult> {
    try {
      return await this.pool.query(text, values);
    } catch (error) {
      throw mapDatabaseError(error);
    }
  }

  private async rollback(client: SqlClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error) {
      console.error('[PostgresAPIKeyRepository] Rollback failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
