import type { Server } from 'http';
import { createApp } from './app.js';
import { loadConfigFromEnvironment, DEFAULT_SECRET_KEY, type GatewayConfig } from './config.js';
import { createDatabase, type Database } from './db/pool.js';
import { createRedisClient } from './db/redis.js';
import { migrate } from './db/migrate.js';
import { InMemoryApiKeyStore, PgApiKeyStore, type ApiKeyStore } from './db/repositories/apiKeys.js';
import { InMemoryUsageStore, PgUsageStore, type UsageStore } from './db/repositories/usageRecords.js';
import { configureLogger, defaultLogger, describeError } from './services/logger.js';
import { InMemoryKeyCache, RedisKeyCache, type KeyCache } from './services/keyCache.js';
import { KeyManager } from './services/keyManager.js';
import { TokenManager } from './services/tokenManager.js';
import { UsageMeter } from './services/usage.js';
import { createProviderRegistry } from './services/providerRegistry.js';
import { CompletionGateway } from './services/gateway.js';
import { HealthService, type HealthProbe } from './services/health.js';

const logger = defaultLogger.child({ component: 'server' });

interface Backends {
  keyStore: ApiKeyStore;
  usageStore: UsageStore;
  cache: KeyCache;
  databaseProbe?: HealthProbe;
  redisProbe?: HealthProbe;
  close(): Promise<void>;
}

async function connectBackends(config: GatewayConfig): Promise<Backends> {
  let db: Database | null = null;
  let keyStore: ApiKeyStore;
  let usageStore: UsageStore;

  if (config.databaseUrl) {
    db = createDatabase(config.databaseUrl, logger);
    await migrate(db);
    keyStore = new PgApiKeyStore(db);
    usageStore = new PgUsageStore(db);
  } else {
    logger.warn('DATABASE_URL not set, keys and usage are kept in memory and lost on restart');
    keyStore = new InMemoryApiKeyStore();
    usageStore = new InMemoryUsageStore();
  }

  const redis = config.redisUrl ? createRedisClient(config.redisUrl, logger) : null;
  const cache: KeyCache = redis ? new RedisKeyCache(redis) : new InMemoryKeyCache();

  const database = db;
  return {
    keyStore,
    usageStore,
    cache,
    databaseProbe: database ? () => database.query('SELECT 1') : undefined,
    redisProbe: redis ? () => redis.ping() : undefined,
    async close() {
      if (redis) {
        redis.disconnect();
      }
      if (database) {
        await database.close();
      }
    },
  };
}

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  configureLogger({
    level: config.logLevel,
    silent: config.logSilent,
    logDir: config.logDir,
    pretty: config.logPretty,
  });

  if (config.secretKey === DEFAULT_SECRET_KEY) {
    logger.warn('SECRET_KEY is not set, bearer tokens are signed with the default secret');
  }

  const backends = await connectBackends(config);

  const keys = new KeyManager({
    store: backends.keyStore,
    cache: backends.cache,
    prefix: config.apiKeyPrefix,
    defaultRateLimit: config.defaultRateLimit,
    cacheTtlSeconds: config.keyCacheTtlSeconds,
  });
  const tokens = new TokenManager({
    store: backends.keyStore,
    secretKey: config.secretKey,
    settings: config.token,
  });
  const usage = new UsageMeter({ store: backends.usageStore });
  const registry = createProviderRegistry(config.providers);
  const gateway = new CompletionGateway({ keys, tokens, registry, usage });
  const health = new HealthService({
    registry,
    database: backends.databaseProbe,
    redis: backends.redisProbe,
  });

  if (config.providers.length === 0) {
    logger.warn('No provider API keys configured, every completion request will fail');
  }

  const app = createApp({ keys, tokens, registry, usage, gateway, health });

  const server: Server = app.listen(config.port, () => {
    logger.info('LLM router listening', {
      port: config.port,
      providers: registry.getProviderNames(),
      models: registry.getAllModels().length,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close((error?: Error) => {
      if (error) {
        logger.error('Error closing server', { error: error.message });
      }
      backends.close().then(
        () => process.exit(error ? 1 : 0),
        (closeError: unknown) => {
          logger.error('Error closing backends', { error: describeError(closeError) });
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start', { error: describeError(error) });
  process.exit(1);
});
