import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import jwt from 'jsonwebtoken';
import { TokenManager, looksLikeToken } from './tokenManager.js';
import { KeyManager } from './keyManager.js';
import { InMemoryApiKeyStore } from '../db/repositories/apiKeys.js';
import {
  InvalidTokenError,
  KeyInactiveError,
  KeyNotFoundError,
  KeyRevokedError,
} from './errors.js';
import type { ApiKey } from '../types/api.js';

const SECRET = 'test-secret';

describe('TokenManager', () => {
  let now: Date;
  const clock = () => now;
  let store: InMemoryApiKeyStore;
  let tokens: TokenManager;
  let alice: ApiKey;

  beforeEach(async () => {
    now = new Date('2025-01-15T12:00:00Z');
    store = new InMemoryApiKeyStore();
    tokens = new TokenManager({ store, secretKey: SECRET, clock });
    const keys = new KeyManager({ store, clock });
    alice = (await keys.create('alice')).apiKey;
  });

  async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
    try {
      await promise;
    } catch (error) {
      return error;
    }
    throw new Error('expected rejection');
  }

  it('should issue a token with the default lifetime', async () => {
    const issued = await tokens.issue(alice.id);

    expect(issued.tokenType).toBe('bearer');
    expect(issued.expiresIn).toBe(24 * 3600);
    expect(issued.expiresAt).toEqual(new Date('2025-01-16T12:00:00Z'));
    expect(issued.apiKeyId).toBe(alice.id);
    expect(issued.apiKeyName).toBe('alice');
    expect(issued.tokenId).toMatch(/^[0-9a-f]{32}$/);
    expect(looksLikeToken(issued.accessToken)).toBe(true);
  });

  it('should embed the subject claims', async () => {
    const issued = await tokens.issue(alice.id, 2);
    const decoded = jwt.decode(issued.accessToken);

    expect(decoded).toMatchObject({
      sub: alice.id,
      name: 'alice',
      type: 'access',
      jti: issued.tokenId,
      iat: 1736942400,
      exp: 1736942400 + 7200,
    });
  });

  it('should clamp lifetimes into the configured bounds', () => {
    fc.assert(
      fc.property(fc.integer({ min: -1000, max: 1000 }), (hours) => {
        const clamped = tokens.clampTtlHours(hours);
        return clamped >= 1 && clamped <= 168 && (hours < 1 || hours > 168 || clamped === hours);
      }),
      { numRuns: 100 }
    );
  });

  it('should refuse to issue for unknown or inactive keys', async () => {
    await expect(tokens.issue('ak_missing')).rejects.toBeInstanceOf(KeyNotFoundError);

    await store.deactivate(alice.id);
    await expect(tokens.issue(alice.id)).rejects.toBeInstanceOf(KeyInactiveError);
  });

  it('should verify its own tokens', async () => {
    const issued = await tokens.issue(alice.id);
    const verified = await tokens.verify(issued.accessToken);

    expect(verified.claims.sub).toBe(alice.id);
    expect(verified.apiKey.id).toBe(alice.id);
    expect(verified.expiresAt).toEqual(issued.expiresAt);
  });

  it('should report expiry as an invalid token', async () => {
    const issued = await tokens.issue(alice.id, 1);
    now = new Date(now.getTime() + 3601 * 1000);

    const error = await rejectionOf(tokens.verify(issued.accessToken));
    expect(error).toBeInstanceOf(InvalidTokenError);
    expect(error).toMatchObject({ reason: 'expired', message: 'Invalid or expired token' });
  });

  it('should distinguish a bad signature internally', async () => {
    const other = new TokenManager({ store, secretKey: 'other-test-secret', clock });
    const issued = await other.issue(alice.id);

    const error = await rejectionOf(tokens.verify(issued.accessToken));
    expect(error).toMatchObject({ reason: 'bad_signature', message: 'Invalid or expired token' });
  });

  it('should treat garbage as malformed', async () => {
    const error = await rejectionOf(tokens.verify('not.a.token'));
    expect(error).toMatchObject({ reason: 'malformed' });
  });

  it('should reject a correctly signed token without the access type', async () => {
    const iat = Math.floor(now.getTime() / 1000);
    const forged = jwt.sign(
      { sub: alice.id, name: 'alice', iat, exp: iat + 60, jti: 'abc', type: 'refresh' },
      SECRET
    );

    const error = await rejectionOf(tokens.verify(forged));
    expect(error).toMatchObject({ reason: 'malformed' });
  });

  it('should raise KeyRevoked once the subject key is deactivated', async () => {
    const issued = await tokens.issue(alice.id);
    await store.deactivate(alice.id);

    await expect(tokens.verify(issued.accessToken)).rejects.toBeInstanceOf(KeyRevokedError);
  });

  it('should refresh with a later expiry and keep the old token valid', async () => {
    const issued = await tokens.issue(alice.id, 1);
    now = new Date(now.getTime() + 30 * 60 * 1000);

    const refreshed = await tokens.refresh(issued.accessToken);

    expect(refreshed.expiresIn).toBe(24 * 3600);
    expect(refreshed.expiresAt.getTime()).toBeGreaterThan(now.getTime());
    expect(refreshed.tokenId).not.toBe(issued.tokenId);
    await expect(tokens.verify(issued.accessToken)).resolves.toMatchObject({ apiKey: { id: alice.id } });
  });

  it('should leave a revoked token usable until it expires', async () => {
    const issued = await tokens.issue(alice.id);

    const revoked = await tokens.revoke(issued.accessToken);
    expect(revoked.claims.jti).toBe(issued.tokenId);

    await expect(tokens.verify(issued.accessToken)).resolves.toMatchObject({ apiKey: { id: alice.id } });
  });
});

describe('looksLikeToken', () => {
  it('should accept three non-empty segments only', () => {
    expect(looksLikeToken('a.b.c')).toBe(true);
    expect(looksLikeToken('a.b')).toBe(false);
    expect(looksLikeToken('a..c')).toBe(false);
    expect(looksLikeToken('llm-router-abc')).toBe(false);
  });
});
