/**
 * Token Routes
 *
 * Exchange an API key for a bearer token, refresh and inspect tokens.
 * Tokens cannot be revoked server-side: /auth/revoke only confirms validity
 * and the token keeps working until it expires.
 */

import express, { Router, type Request, type Response, type NextFunction, type IRouter } from 'express';
import { parseTokenBody, parseTokenExchangeRequest } from './validation.js';
import type { KeyManager } from '../services/keyManager.js';
import type { BearerToken, TokenManager } from '../services/tokenManager.js';

export const REVOCATION_NOTE =
  'Tokens cannot be revoked before they expire; use short expiry times for security';

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
  expires_at: string;
  api_key_id: string;
  api_key_name: string;
}

export function toTokenResponse(token: BearerToken): TokenResponse {
  return {
    access_token: token.accessToken,
    token_type: token.tokenType,
    expires_in: token.expiresIn,
    expires_at: token.expiresAt.toISOString(),
    api_key_id: token.apiKeyId,
    api_key_name: token.apiKeyName,
  };
}

export interface AuthRouterDependencies {
  keys: KeyManager;
  tokens: TokenManager;
}

export function createAuthRouter(deps: AuthRouterDependencies): IRouter {
  const router: IRouter = Router();
  const { keys, tokens } = deps;

  async function exchange(body: unknown): Promise<TokenResponse> {
    const input = parseTokenExchangeRequest(body, tokens.settings);
    // counts as a use of the key
    const apiKey = await keys.authenticate(input.apiKey);
    return toTokenResponse(await tokens.issue(apiKey.id, input.expiresInHours));
  }

  router.post('/auth/token', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await exchange(req.body));
    } catch (error) {
      next(error);
    }
  });

  router.post(
    '/auth/token/form',
    express.urlencoded({ extended: false }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(await exchange(req.body));
      } catch (error) {
        next(error);
      }
    }
  );

  router.post('/auth/refresh', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toTokenResponse(await tokens.refresh(parseTokenBody(req.body))));
    } catch (error) {
      next(error);
    }
  });

  router.post('/auth/verify', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const verified = await tokens.verify(parseTokenBody(req.body));
      res.json({
        valid: true,
        api_key_id: verified.apiKey.id,
        api_key_name: verified.apiKey.name,
        token_id: verified.claims.jti,
        expires_at: verified.expiresAt.toISOString(),
        message: 'Token is valid',
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/auth/revoke', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const verified = await tokens.revoke(parseTokenBody(req.body));
      res.json({
        message: 'Token is valid and remains usable until it expires',
        revoked: false,
        token_id: verified.claims.jti,
        expires_at: verified.expiresAt.toISOString(),
        note: REVOCATION_NOTE,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
