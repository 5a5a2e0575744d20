/**
 * Bearer Token Manager
 *
 * Exchanges API keys for short-lived HS256 tokens. Tokens are stateless:
 * validity is signature plus expiry, with one live check that the subject
 * key is still active. There is no server-side revocation list, so revoke()
 * only confirms a token is valid; it stays usable until it expires.
 */

import crypto from 'crypto';
import jwt from 'jsonwebtoken';
import type { ApiKeyStore } from '../db/repositories/apiKeys.js';
import {
  InvalidTokenError,
  KeyInactiveError,
  KeyNotFoundError,
  KeyRevokedError,
  type TokenFailureReason,
} from './errors.js';
import { defaultLogger, type Logger } from './logger.js';
import { systemClock, type ApiKey, type Clock } from '../types/api.js';
import type { TokenSettings } from '../config.js';

export const TOKEN_ALGORITHM = 'HS256';
export const TOKEN_TYPE = 'access';

export const DEFAULT_TOKEN_SETTINGS: TokenSettings = {
  defaultTtlHours: 24,
  minTtlHours: 1,
  maxTtlHours: 168,
};

export interface TokenClaims {
  /** API key id */
  sub: string;
  /** API key name at issue time */
  name: string;
  iat: number;
  exp: number;
  jti: string;
  type: typeof TOKEN_TYPE;
}

export interface BearerToken {
  accessToken: string;
  tokenType: 'bearer';
  /** Seconds until expiry */
  expiresIn: number;
  expiresAt: Date;
  apiKeyId: string;
  apiKeyName: string;
  tokenId: string;
}

export interface VerifiedToken {
  claims: TokenClaims;
  apiKey: ApiKey;
  expiresAt: Date;
}

export interface TokenManagerOptions {
  store: ApiKeyStore;
  secretKey: string;
  settings?: TokenSettings;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Three non-empty dot-separated segments, the shape of a signed token
 */
export function looksLikeToken(value: string): boolean {
  const parts = value.split('.');
  return parts.length === 3 && parts.every(part => part.length > 0);
}

function parseClaims(decoded: string | jwt.JwtPayload): TokenClaims | null {
  if (typeof decoded === 'string') {
    return null;
  }
  const { sub, name, iat, exp, jti, type } = decoded;
  if (
    typeof sub !== 'string' ||
    typeof name !== 'string' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number' ||
    typeof jti !== 'string' ||
    type !== TOKEN_TYPE
  ) {
    return null;
  }
  return { sub, name, iat, exp, jti, type };
}

function classifyVerifyError(error: unknown): TokenFailureReason {
  if (error instanceof jwt.TokenExpiredError) {
    return 'expired';
  }
  if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
    return 'bad_signature';
  }
  return 'malformed';
}

export class TokenManager {
  private readonly store: ApiKeyStore;
  private readonly secretKey: string;
  private readonly clock: Clock;
  private readonly logger: Logger;
  readonly settings: TokenSettings;

  constructor(options: TokenManagerOptions) {
    this.store = options.store;
    this.secretKey = options.secretKey;
    this.settings = options.settings ?? DEFAULT_TOKEN_SETTINGS;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'tokenManager' });
  }

  /**
   * Clamp a requested lifetime into the configured bounds
   */
  clampTtlHours(ttlHours: number): number {
    return Math.min(this.settings.maxTtlHours, Math.max(this.settings.minTtlHours, ttlHours));
  }

  /**
   * Issue a token for an active key
   */
  async issue(apiKeyId: string, ttlHours: number = this.settings.defaultTtlHours): Promise<BearerToken> {
    const apiKey = await this.store.findByIdIncludingInactive(apiKeyId);
    if (!apiKey) {
      throw new KeyNotFoundError();
    }
    if (!apiKey.isActive) {
      throw new KeyInactiveError();
    }

    const expiresIn = this.clampTtlHours(ttlHours) * 3600;
    const iat = Math.floor(this.clock().getTime() / 1000);
    const claims: TokenClaims = {
      sub: apiKey.id,
      name: apiKey.name,
      iat,
      exp: iat + expiresIn,
      jti: crypto.randomBytes(16).toString('hex'),
      type: TOKEN_TYPE,
    };

    const accessToken = jwt.sign(claims, this.secretKey, { algorithm: TOKEN_ALGORITHM });
    this.logger.info('Bearer token issued', { apiKeyId: apiKey.id, tokenId: claims.jti, expiresIn });

    return {
      accessToken,
      tokenType: 'bearer',
      expiresIn,
      expiresAt: new Date(claims.exp * 1000),
      apiKeyId: apiKey.id,
      apiKeyName: apiKey.name,
      tokenId: claims.jti,
    };
  }

  /**
   * Verify signature, expiry and shape, then check the subject key is still active.
   * Throws InvalidTokenError (same message for every reason) or KeyRevokedError.
   */
  async verify(token: string): Promise<VerifiedToken> {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secretKey, {
        algorithms: [TOKEN_ALGORITHM],
        clockTimestamp: Math.floor(this.clock().getTime() / 1000),
      });
    } catch (error) {
      const reason = classifyVerifyError(error);
      this.logger.debug('Token rejected', { reason });
      throw new InvalidTokenError(reason);
    }

    const claims = parseClaims(decoded);
    if (!claims) {
      throw new InvalidTokenError('malformed');
    }

    const apiKey = await this.store.findActiveById(claims.sub);
    if (!apiKey) {
      throw new KeyRevokedError();
    }

    return { claims, apiKey, expiresAt: new Date(claims.exp * 1000) };
  }

  /**
   * Issue a fresh token with the default lifetime. The old token is not invalidated.
   */
  async refresh(oldToken: string): Promise<BearerToken> {
    const { claims } = await this.verify(oldToken);
    return this.issue(claims.sub);
  }

  /**
   * Verify-only: confirms the token is currently valid. Nothing is recorded,
   * and the token keeps working until its natural expiry.
   */
  async revoke(token: string): Promise<VerifiedToken> {
    const verified = await this.verify(token);
    this.logger.info('Token revocation requested; token remains valid until expiry', {
      apiKeyId: verified.apiKey.id,
      tokenId: verified.claims.jti,
    });
    return verified;
  }
}
