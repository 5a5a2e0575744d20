/**
 * Configuration
 *
 * Reads settings from the environment (and a .env file via dotenv) into a
 * typed, validated GatewayConfig. Invalid values fail fast at startup.
 */

import dotenv from 'dotenv';
import { getAllTemplates } from './providers/templates/index.js';
import type { ProviderConfig } from './types/providers.js';
import type { LogLevel } from './services/logger.js';

export const DEFAULT_SECRET_KEY = 'change-this-secret-key-in-production';

export interface TokenSettings {
  defaultTtlHours: number;
  minTtlHours: number;
  maxTtlHours: number;
}

export interface GatewayConfig {
  port: number;
  databaseUrl: string | null;
  redisUrl: string | null;
  secretKey: string;
  apiKeyPrefix: string;
  defaultRateLimit: number;
  keyCacheTtlSeconds: number;
  token: TokenSettings;
  upstreamTimeoutMs: number;
  providers: ProviderConfig[];
  logLevel: LogLevel;
  logDir: string | null;
  logSilent: boolean;
  /** Colorized console output, on when NODE_ENV=development */
  logPretty: boolean;
}

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = (readString(env, 'LOG_LEVEL') ?? 'info').toLowerCase();
  const level = LOG_LEVELS.find(candidate => candidate === raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${raw}'`);
  }
  return level;
}

/**
 * Providers are enabled by the presence of their API key, e.g. OPENAI_API_KEY.
 * The base URL may be overridden with OPENAI_BASE_URL.
 */
export function loadProviderConfigs(env: Env, timeoutMs: number): ProviderConfig[] {
  const providers: ProviderConfig[] = [];

  for (const template of getAllTemplates()) {
    const envPrefix = template.id.toUpperCase();
    const apiKey = readString(env, `${envPrefix}_API_KEY`);
    if (!apiKey) {
      continue;
    }
    providers.push({
      name: template.id,
      baseUrl: readString(env, `${envPrefix}_BASE_URL`) ?? template.baseUrl,
      apiKey,
      models: [...template.models],
      timeoutMs,
    });
  }

  return providers;
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const token: TokenSettings = {
    defaultTtlHours: readInt(env, 'TOKEN_DEFAULT_TTL_HOURS', 24, 1),
    minTtlHours: readInt(env, 'TOKEN_MIN_TTL_HOURS', 1, 1),
    maxTtlHours: readInt(env, 'TOKEN_MAX_TTL_HOURS', 168, 1),
  };
  if (token.minTtlHours > token.maxTtlHours) {
    throw new ConfigError('TOKEN_MIN_TTL_HOURS must not exceed TOKEN_MAX_TTL_HOURS');
  }
  if (token.defaultTtlHours < token.minTtlHours || token.defaultTtlHours > token.maxTtlHours) {
    throw new ConfigError('TOKEN_DEFAULT_TTL_HOURS must lie within the token TTL bounds');
  }

  const apiKeyPrefix = readString(env, 'API_KEY_PREFIX') ?? 'llm-router-';
  if (apiKeyPrefix.includes('.')) {
    // dots would make keys indistinguishable from signed tokens
    throw new ConfigError('API_KEY_PREFIX must not contain dots');
  }

  const upstreamTimeoutMs = readInt(env, 'UPSTREAM_TIMEOUT_MS', 60000, 1);

  return {
    port: readInt(env, 'PORT', 8000, 1),
    databaseUrl: readString(env, 'DATABASE_URL'),
    redisUrl: readString(env, 'REDIS_URL'),
    secretKey: readString(env, 'SECRET_KEY') ?? DEFAULT_SECRET_KEY,
    apiKeyPrefix,
    defaultRateLimit: readInt(env, 'DEFAULT_RATE_LIMIT', 1000, 0),
    keyCacheTtlSeconds: readInt(env, 'KEY_CACHE_TTL_SECONDS', 3600, 1),
    token,
    upstreamTimeoutMs,
    providers: loadProviderConfigs(env, upstreamTimeoutMs),
    logLevel: readLogLevel(env),
    logDir: readString(env, 'LOG_DIR'),
    logSilent: readString(env, 'LOG_SILENT') === 'true',
    logPretty: readString(env, 'NODE_ENV') === 'development',
  };
}

/**
 * Load .env into process.env, then read the configuration
 */
export function loadConfigFromEnvironment(): GatewayConfig {
  dotenv.config();
  return loadConfig(process.env);
}
