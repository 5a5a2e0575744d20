import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_SECRET_KEY, loadConfig, loadProviderConfigs } from './config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.databaseUrl).toBeNull();
    expect(config.redisUrl).toBeNull();
    expect(config.secretKey).toBe(DEFAULT_SECRET_KEY);
    expect(config.apiKeyPrefix).toBe('llm-router-');
    expect(config.defaultRateLimit).toBe(1000);
    expect(config.keyCacheTtlSeconds).toBe(3600);
    expect(config.token).toEqual({ defaultTtlHours: 24, minTtlHours: 1, maxTtlHours: 168 });
    expect(config.upstreamTimeoutMs).toBe(60000);
    expect(config.providers).toEqual([]);
    expect(config.logLevel).toBe('info');
    expect(config.logPretty).toBe(false);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '9000',
      DATABASE_URL: 'postgres://localhost/router',
      SECRET_KEY: 'test-secret',
      LOG_LEVEL: 'DEBUG',
      NODE_ENV: 'development',
    });

    expect(config.port).toBe(9000);
    expect(config.databaseUrl).toBe('postgres://localhost/router');
    expect(config.secretKey).toBe('test-secret');
    expect(config.logLevel).toBe('debug');
    expect(config.logPretty).toBe(true);
  });

  it.each([
    [{ PORT: 'eighty' }],
    [{ PORT: '0' }],
    [{ LOG_LEVEL: 'verbose' }],
    [{ TOKEN_MIN_TTL_HOURS: '10', TOKEN_MAX_TTL_HOURS: '5' }],
    [{ TOKEN_DEFAULT_TTL_HOURS: '200' }],
    [{ API_KEY_PREFIX: 'my.prefix-' }],
  ])('rejects %o', (env) => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
  });
});

describe('loadProviderConfigs', () => {
  it('enables only providers with an API key, in catalog order', () => {
    const providers = loadProviderConfigs({ GROQ_API_KEY: 'test-groq', OPENAI_API_KEY: 'test-openai' }, 5000);

    expect(providers.map(p => p.name)).toEqual(['openai', 'groq']);
    expect(providers[0].baseUrl).toBe('https://api.openai.com/v1');
    expect(providers[0].models).toContain('gpt-4');
    expect(providers[1].timeoutMs).toBe(5000);
  });

  it('honours base URL overrides', () => {
    const [gemini] = loadProviderConfigs(
      { GEMINI_API_KEY: 'test-gemini', GEMINI_BASE_URL: 'http://localhost:9999/v1' },
      1000
    );

    expect(gemini.name).toBe('gemini');
    expect(gemini.baseUrl).toBe('http://localhost:9999/v1');
  });
});
