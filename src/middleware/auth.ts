/**
 * Authentication Middleware
 *
 * Resolves the caller from an API key or a bearer token (Authorization first,
 * x-api-key only when Authorization is absent) and attaches the AuthContext to the request. Failures go to the error
 * handler as 401s that never say whether a key exists.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CompletionGateway } from '../services/gateway.js';
import { UnauthorizedError } from '../services/errors.js';
import type { AuthContext } from '../types/api.js';
import { getRequestLogger } from './logging.js';

// Extend Express Request to include auth context
declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

export const API_KEY_HEADER = 'x-api-key';

/**
 * Authentication middleware bound to a gateway
 */
export function createAuthMiddleware(gateway: CompletionGateway): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      req.auth = await gateway.authenticate({
        authorization: req.get('authorization'),
        apiKey: req.get(API_KEY_HEADER),
      });
      getRequestLogger(req).debug('Caller authenticated', {
        apiKeyId: req.auth.apiKey.id,
        method: req.auth.method,
      });
      next();
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        getRequestLogger(req).warn('Authentication failed', { code: error.code });
      }
      next(error);
    }
  };
}

/**
 * The auth context of a request that passed the auth middleware
 */
export function requireAuthContext(req: Request): AuthContext {
  if (!req.auth) {
    throw new UnauthorizedError();
  }
  return req.auth;
}
