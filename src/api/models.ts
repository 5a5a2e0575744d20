/**
 * Model Routes
 *
 * Introspection over the provider registry.
 */

import { Router, type Request, type Response, type IRouter, type RequestHandler, type NextFunction } from 'express';
import { NotFoundError } from '../services/errors.js';
import type { ProviderRegistry } from '../services/providerRegistry.js';

export interface ModelInfo {
  id: string;
  object: 'model';
  provider: string;
  owned_by: string;
}

export interface ModelsRouterDependencies {
  registry: ProviderRegistry;
  authenticate: RequestHandler;
}

function toModelInfo(id: string, provider: string): ModelInfo {
  return { id, object: 'model', provider, owned_by: provider };
}

export function createModelsRouter(deps: ModelsRouterDependencies): IRouter {
  const router: IRouter = Router();
  const { registry, authenticate } = deps;

  router.get('/v1/models', authenticate, (_req: Request, res: Response) => {
    const data: ModelInfo[] = [];
    for (const [provider, models] of Object.entries(registry.listModels())) {
      for (const model of models) {
        data.push(toModelInfo(model, provider));
      }
    }
    res.json({ object: 'list', data });
  });

  // registered before /:modelId so "providers" is not read as a model id
  router.get('/v1/models/providers', authenticate, (_req: Request, res: Response) => {
    const data: Record<string, unknown> = {};
    for (const [name, status] of Object.entries(registry.listProviders())) {
      data[name] = {
        name: status.name,
        enabled: status.enabled,
        models: status.models,
        model_count: status.modelCount,
        base_url: status.baseUrl,
      };
    }
    res.json({ object: 'list', data });
  });

  router.get('/v1/models/:modelId', authenticate, (req: Request, res: Response, next: NextFunction) => {
    const modelId = req.params.modelId;
    const provider = registry.getModelProvider(modelId);
    if (!provider) {
      next(new NotFoundError(`Model '${modelId}' not found`, 'model_not_found', registry.getAllModels()));
      return;
    }
    res.json(toModelInfo(modelId, provider));
  });

  return router;
}
