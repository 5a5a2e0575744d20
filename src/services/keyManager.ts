/**
 * API Key Manager
 *
 * Issues API keys, verifies presented secrets (cache first, then store) and
 * counts verified uses. Secrets are shown once at creation and stored only as
 * SHA-256 hashes.
 */

import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type { ApiKeyStore } from '../db/repositories/apiKeys.js';
import { DEFAULT_KEY_CACHE_TTL, type CachedKeyState, type KeyCache } from './keyCache.js';
import { ForbiddenError, InvalidKeyError, NotFoundError } from './errors.js';
import { defaultLogger, describeError, type Logger } from './logger.js';
import { systemClock, type ApiKey, type Clock, type CreatedApiKey } from '../types/api.js';

export const DEFAULT_API_KEY_PREFIX = 'llm-router-';
export const DEFAULT_RATE_LIMIT = 1000;

const KEY_ENTROPY_BYTES = 32; // 256 bits

export interface KeyManagerOptions {
  store: ApiKeyStore;
  cache?: KeyCache;
  prefix?: string;
  defaultRateLimit?: number;
  cacheTtlSeconds?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Generates a cryptographically secure API key
 * Format: <prefix><base64url random>
 */
export function generateApiKeyToken(prefix: string = DEFAULT_API_KEY_PREFIX): string {
  return `${prefix}${crypto.randomBytes(KEY_ENTROPY_BYTES).toString('base64url')}`;
}

/**
 * Computes SHA-256 hash of an API key for storage
 */
export function hashApiKey(key: string): string {
  return crypto.createHash('sha256').update(key).digest('hex');
}

/**
 * Generates a stable key identifier, e.g. ak_3f2a9c0d1b4e5f67
 */
export function generateKeyId(): string {
  return `ak_${uuidv4().replace(/-/g, '').slice(0, 16)}`;
}

/**
 * Extracts an API key from a header value. Accepts "Bearer <key>", a bare
 * prefixed key, or a value with the prefixed key somewhere inside it.
 * Returns null when no prefixed key is present.
 */
export function extractApiKey(
  headerValue: string | undefined,
  prefix: string = DEFAULT_API_KEY_PREFIX
): string | null {
  if (!headerValue) {
    return null;
  }

  const value = headerValue.trim();

  if (value.startsWith('Bearer ')) {
    const candidate = value.slice(7).trim();
    if (candidate.startsWith(prefix)) {
      return candidate;
    }
  }

  if (value.startsWith(prefix)) {
    return value;
  }

  const start = value.indexOf(prefix);
  if (start === -1) {
    return null;
  }
  return value.slice(start).trim();
}

export class KeyManager {
  private readonly store: ApiKeyStore;
  private readonly cache: KeyCache | undefined;
  private readonly clock: Clock;
  private readonly logger: Logger;
  readonly prefix: string;
  readonly defaultRateLimit: number;
  readonly cacheTtlSeconds: number;

  constructor(options: KeyManagerOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.prefix = options.prefix ?? DEFAULT_API_KEY_PREFIX;
    this.defaultRateLimit = options.defaultRateLimit ?? DEFAULT_RATE_LIMIT;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? DEFAULT_KEY_CACHE_TTL;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'keyManager' });
  }

  /**
   * Creates a new API key. The raw key in the result is never retrievable again.
   */
  async create(name: string, description = ''): Promise<CreatedApiKey> {
    const key = generateApiKeyToken(this.prefix);
    const keyHash = hashApiKey(key);

    const apiKey = await this.store.insert({
      id: generateKeyId(),
      keyHash,
      name,
      description,
      rateLimit: this.defaultRateLimit,
      createdAt: this.clock(),
    });

    await this.writeCache(keyHash, apiKey);
    this.logger.info('API key created', { apiKeyId: apiKey.id });

    return { key, apiKey };
  }

  /**
   * Verifies a raw secret and returns its active key.
   * Unknown and deactivated keys fail identically with InvalidKeyError.
   */
  async verify(rawSecret: string): Promise<ApiKey> {
    if (!rawSecret.startsWith(this.prefix)) {
      throw new InvalidKeyError();
    }

    const keyHash = hashApiKey(rawSecret);
    const cached = await this.readCache(keyHash);

    if (cached) {
      if (!cached.isActive) {
        throw new InvalidKeyError();
      }
      const apiKey = await this.store.findActiveById(cached.id);
      if (!apiKey || apiKey.keyHash !== keyHash) {
        await this.dropCache(keyHash);
        throw new InvalidKeyError();
      }
      return apiKey;
    }

    const apiKey = await this.store.findActiveByHash(keyHash);
    if (!apiKey) {
      throw new InvalidKeyError();
    }

    await this.writeCache(keyHash, apiKey);
    return apiKey;
  }

  /**
   * Records one use of a verified key. The increment happens in the store.
   */
  async touch(apiKey: ApiKey): Promise<ApiKey> {
    const updated = await this.store.recordUse(apiKey.id, this.clock());
    if (!updated) {
      // deactivated between verify and touch
      throw new InvalidKeyError();
    }
    return updated;
  }

  /**
   * Verify then touch: the path every API-key-authenticated request takes
   */
  async authenticate(rawSecret: string): Promise<ApiKey> {
    const apiKey = await this.verify(rawSecret);
    return this.touch(apiKey);
  }

  /**
   * Deactivates a key. A caller may only revoke the key it authenticated with.
   */
  async revoke(keyId: string, requester: ApiKey): Promise<void> {
    if (keyId !== requester.id) {
      throw new ForbiddenError('You can only deactivate your own API key');
    }

    const deactivated = await this.store.deactivate(keyId);
    if (!deactivated) {
      throw new NotFoundError('API key not found or already deactivated', 'key_not_found');
    }

    await this.writeCache(requester.keyHash, { ...requester, isActive: false });
    this.logger.info('API key deactivated', { apiKeyId: keyId });
  }

  // Cache access is advisory: failures are logged and treated as a miss

  private async readCache(keyHash: string): Promise<CachedKeyState | null> {
    if (!this.cache) {
      return null;
    }
    try {
      return await this.cache.get(keyHash);
    } catch (error) {
      this.logger.warn('Key cache read failed', { error: describeError(error) });
      return null;
    }
  }

  private async writeCache(keyHash: string, apiKey: Pick<ApiKey, 'id' | 'name' | 'isActive'>): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.set(
        keyHash,
        { id: apiKey.id, name: apiKey.name, isActive: apiKey.isActive },
        this.cacheTtlSeconds
      );
    } catch (error) {
      this.logger.warn('Key cache write failed', { apiKeyId: apiKey.id, error: describeError(error) });
    }
  }

  private async dropCache(keyHash: string): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.delete(keyHash);
    } catch (error) {
      this.logger.warn('Key cache delete failed', { error: describeError(error) });
    }
  }
}
