import express, { type Express } from 'express';
import { createCoreRouter } from './api/routes.js';
import { createApiKeysRouter } from './api/apiKeys.js';
import { createAuthRouter } from './api/auth.js';
import { createModelsRouter } from './api/models.js';
import { createUsageRouter } from './api/usage.js';
import { createAuthMiddleware, errorHandler, loggingMiddleware, notFoundHandler } from './middleware/index.js';
import type { CompletionGateway } from './services/gateway.js';
import type { HealthService } from './services/health.js';
import type { KeyManager } from './services/keyManager.js';
import type { TokenManager } from './services/tokenManager.js';
import type { ProviderRegistry } from './services/providerRegistry.js';
import type { UsageMeter } from './services/usage.js';

export interface AppDependencies {
  keys: KeyManager;
  tokens: TokenManager;
  registry: ProviderRegistry;
  usage: UsageMeter;
  gateway: CompletionGateway;
  health: HealthService;
}

/**
 * Build the express application. Startup concerns (config, stores, listening)
 * live in index.ts so tests can wire in-memory services.
 */
export function createApp(deps: AppDependencies): Express {
  const app: Express = express();
  const authenticate = createAuthMiddleware(deps.gateway);

  app.disable('x-powered-by');
  app.use(loggingMiddleware);
  app.use(express.json({ limit: '1mb' }));

  app.use(createCoreRouter({ gateway: deps.gateway, health: deps.health, authenticate }));
  app.use(createAuthRouter({ keys: deps.keys, tokens: deps.tokens }));
  app.use(createApiKeysRouter({ keys: deps.keys, authenticate }));
  app.use(createModelsRouter({ registry: deps.registry, authenticate }));
  app.use(createUsageRouter({ usage: deps.usage, authenticate }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
