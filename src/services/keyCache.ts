/**
 * API Key Cache
 *
 * Advisory fast path in front of the key store, keyed by secret hash with a
 * bounded TTL. An entry only records the key id and its liveness; the store
 * stays authoritative for everything else.
 */

import { systemClock, type Clock } from '../types/api.js';

// Default cache TTL in seconds (1 hour)
export const DEFAULT_KEY_CACHE_TTL = 3600;

const KEY_CACHE_PREFIX = 'api_key:';

export interface CachedKeyState {
  id: string;
  name: string;
  isActive: boolean;
}

export interface KeyCache {
  get(keyHash: string): Promise<CachedKeyState | null>;
  set(keyHash: string, state: CachedKeyState, ttlSeconds: number): Promise<void>;
  delete(keyHash: string): Promise<void>;
}

/**
 * Generate cache key for a secret hash
 */
export function getKeyCacheKey(keyHash: string): string {
  return `${KEY_CACHE_PREFIX}${keyHash}`;
}

/**
 * Parse a cached entry; anything malformed counts as a miss
 */
export function parseCachedKeyState(raw: string): CachedKeyState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('id' in parsed && typeof parsed.id === 'string') ||
    !('name' in parsed && typeof parsed.name === 'string') ||
    !('isActive' in parsed && typeof parsed.isActive === 'boolean')
  ) {
    return null;
  }
  return { id: parsed.id, name: parsed.name, isActive: parsed.isActive };
}

/**
 * The subset of the ioredis client the cache uses
 */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

export class RedisKeyCache implements KeyCache {
  constructor(private readonly redis: RedisLike) {}

  async get(keyHash: string): Promise<CachedKeyState | null> {
    const value = await this.redis.get(getKeyCacheKey(keyHash));
    return value === null ? null : parseCachedKeyState(value);
  }

  async set(keyHash: string, state: CachedKeyState, ttlSeconds: number): Promise<void> {
    await this.redis.setex(getKeyCacheKey(keyHash), ttlSeconds, JSON.stringify(state));
  }

  async delete(keyHash: string): Promise<void> {
    await this.redis.del(getKeyCacheKey(keyHash));
  }
}

interface MemoryEntry {
  state: CachedKeyState;
  expiresAt: number;
}

/**
 * Process-local cache used when REDIS_URL is not configured
 */
export class InMemoryKeyCache implements KeyCache {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get(keyHash: string): Promise<CachedKeyState | null> {
    const entry = this.entries.get(keyHash);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.clock().getTime()) {
      this.entries.delete(keyHash);
      return null;
    }
    return { ...entry.state };
  }

  async set(keyHash: string, state: CachedKeyState, ttlSeconds: number): Promise<void> {
    this.entries.set(keyHash, {
      state: { ...state },
      expiresAt: this.clock().getTime() + ttlSeconds * 1000,
    });
  }

  async delete(keyHash: string): Promise<void> {
    this.entries.delete(keyHash);
  }
}
