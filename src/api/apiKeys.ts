/**
 * API Key Routes
 *
 * Creation is open; every other operation is scoped to the caller's own key.
 */

import { Router, type Request, type Response, type NextFunction, type IRouter, type RequestHandler } from 'express';
import { requireAuthContext } from '../middleware/auth.js';
import { parseCreateApiKeyRequest } from './validation.js';
import type { KeyManager } from '../services/keyManager.js';
import type { ApiKey } from '../types/api.js';

export interface ApiKeyInfo {
  id: string;
  name: string;
  description: string;
  created_at: string;
  last_used_at: string | null;
  rate_limit: number;
  usage_count: number;
}

export interface ApiKeyCreatedResponse extends ApiKeyInfo {
  /** Shown once */
  key: string;
}

export function toApiKeyInfo(apiKey: ApiKey): ApiKeyInfo {
  return {
    id: apiKey.id,
    name: apiKey.name,
    description: apiKey.description,
    created_at: apiKey.createdAt.toISOString(),
    last_used_at: apiKey.lastUsedAt ? apiKey.lastUsedAt.toISOString() : null,
    rate_limit: apiKey.rateLimit,
    usage_count: apiKey.usageCount,
  };
}

export interface ApiKeysRouterDependencies {
  keys: KeyManager;
  authenticate: RequestHandler;
}

export function createApiKeysRouter(deps: ApiKeysRouterDependencies): IRouter {
  const router: IRouter = Router();
  const { keys, authenticate } = deps;

  router.post('/v1/api-keys', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseCreateApiKeyRequest(req.body);
      const { key, apiKey } = await keys.create(input.name, input.description);
      const body: ApiKeyCreatedResponse = { ...toApiKeyInfo(apiKey), key };
      res.status(201).json(body);
    } catch (error) {
      next(error);
    }
  });

  // Only the caller's own key is ever listed
  router.get('/v1/api-keys', authenticate, (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json([toApiKeyInfo(requireAuthContext(req).apiKey)]);
    } catch (error) {
      next(error);
    }
  });

  router.get('/v1/api-keys/current', authenticate, (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toApiKeyInfo(requireAuthContext(req).apiKey));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/v1/api-keys/:keyId', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const auth = requireAuthContext(req);
      await keys.revoke(req.params.keyId, auth.apiKey);
      res.json({ message: 'API key deactivated successfully' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
