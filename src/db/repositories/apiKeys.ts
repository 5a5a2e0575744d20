/**
 * API Key Repository
 *
 * Persistent record of API keys. Keys are soft-deleted by clearing is_active;
 * every read that serves authentication filters on is_active at this boundary.
 */

import type { Queryable } from '../pool.js';
import type { ApiKey, NewApiKey } from '../../types/api.js';

export interface ApiKeyStore {
  insert(key: NewApiKey): Promise<ApiKey>;
  findActiveByHash(keyHash: string): Promise<ApiKey | null>;
  findActiveById(id: string): Promise<ApiKey | null>;
  /** Audit lookup that also returns deactivated keys */
  findByIdIncludingInactive(id: string): Promise<ApiKey | null>;
  /**
   * Atomically increments usage_count and sets last_used_at on an active key.
   * Returns the updated key, or null when no active key has this id.
   */
  recordUse(id: string, usedAt: Date): Promise<ApiKey | null>;
  /** Returns true when an active key was deactivated */
  deactivate(id: string): Promise<boolean>;
}

export class DuplicateApiKeyError extends Error {
  constructor(field: 'id' | 'key_hash') {
    super(`An API key with this ${field} already exists`);
    this.name = 'DuplicateApiKeyError';
  }
}

interface ApiKeyRow {
  id: string;
  key_hash: string;
  name: string;
  description: string;
  is_active: boolean;
  rate_limit: number;
  usage_count: number;
  created_at: Date;
  last_used_at: Date | null;
}

function mapRowToApiKey(row: ApiKeyRow): ApiKey {
  return {
    id: row.id,
    keyHash: row.key_hash,
    name: row.name,
    description: row.description,
    isActive: row.is_active,
    rateLimit: row.rate_limit,
    usageCount: row.usage_count,
    createdAt: row.created_at,
    lastUsedAt: row.last_used_at,
  };
}

export class PgApiKeyStore implements ApiKeyStore {
  constructor(private readonly db: Queryable) {}

  async insert(key: NewApiKey): Promise<ApiKey> {
    const result = await this.db.query<ApiKeyRow>(
      `INSERT INTO api_keys (id, key_hash, name, description, rate_limit, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [key.id, key.keyHash, key.name, key.description, key.rateLimit, key.createdAt]
    );
    return mapRowToApiKey(result.rows[0]);
  }

  async findActiveByHash(keyHash: string): Promise<ApiKey | null> {
    const result = await this.db.query<ApiKeyRow>(
      'SELECT * FROM api_keys WHERE key_hash = $1 AND is_active = TRUE',
      [keyHash]
    );
    return result.rows.length > 0 ? mapRowToApiKey(result.rows[0]) : null;
  }

  async findActiveById(id: string): Promise<ApiKey | null> {
    const result = await this.db.query<ApiKeyRow>(
      'SELECT * FROM api_keys WHERE id = $1 AND is_active = TRUE',
      [id]
    );
    return result.rows.length > 0 ? mapRowToApiKey(result.rows[0]) : null;
  }

  async findByIdIncludingInactive(id: string): Promise<ApiKey | null> {
    const result = await this.db.query<ApiKeyRow>(
      'SELECT * FROM api_keys WHERE id = $1',
      [id]
    );
    return result.rows.length > 0 ? mapRowToApiKey(result.rows[0]) : null;
  }

  async recordUse(id: string, usedAt: Date): Promise<ApiKey | null> {
    // single-statement increment; the row lock serializes concurrent uses
    const result = await this.db.query<ApiKeyRow>(
      `UPDATE api_keys
       SET usage_count = usage_count + 1, last_used_at = $2
       WHERE id = $1 AND is_active = TRUE
       RETURNING *`,
      [id, usedAt]
    );
    return result.rows.length > 0 ? mapRowToApiKey(result.rows[0]) : null;
  }

  async deactivate(id: string): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE api_keys SET is_active = FALSE WHERE id = $1 AND is_active = TRUE',
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }
}

/**
 * Process-local store for development without DATABASE_URL, and for tests
 */
export class InMemoryApiKeyStore implements ApiKeyStore {
  private readonly keys = new Map<string, ApiKey>();
  private readonly idsByHash = new Map<string, string>();

  async insert(key: NewApiKey): Promise<ApiKey> {
    if (this.keys.has(key.id)) {
      throw new DuplicateApiKeyError('id');
    }
    if (this.idsByHash.has(key.keyHash)) {
      throw new DuplicateApiKeyError('key_hash');
    }

    const record: ApiKey = {
      ...key,
      isActive: true,
      usageCount: 0,
      lastUsedAt: null,
    };
    this.keys.set(record.id, record);
    this.idsByHash.set(record.keyHash, record.id);
    return { ...record };
  }

  async findActiveByHash(keyHash: string): Promise<ApiKey | null> {
    const id = this.idsByHash.get(keyHash);
    return id === undefined ? null : this.findActiveById(id);
  }

  async findActiveById(id: string): Promise<ApiKey | null> {
    const record = this.keys.get(id);
    return record && record.isActive ? { ...record } : null;
  }

  async findByIdIncludingInactive(id: string): Promise<ApiKey | null> {
    const record = this.keys.get(id);
    return record ? { ...record } : null;
  }

  async recordUse(id: string, usedAt: Date): Promise<ApiKey | null> {
    const record = this.keys.get(id);
    if (!record || !record.isActive) {
      return null;
    }
    record.usageCount += 1;
    record.lastUsedAt = usedAt;
    return { ...record };
  }

  async deactivate(id: string): Promise<boolean> {
    const record = this.keys.get(id);
    if (!record || !record.isActive) {
      return false;
    }
    record.isActive = false;
    return true;
  }
}
