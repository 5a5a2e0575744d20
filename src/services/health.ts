/**
 * Health Check Service
 *
 * Reports provider/model counts and the reachability of the backing stores.
 * Stores that are not configured report 'disabled' (in-memory fallback).
 */

import type { ProviderRegistry } from './providerRegistry.js';
import { describeError } from './logger.js';
import { systemClock, type Clock } from '../types/api.js';

/**
 * Health status for a component
 */
export interface ComponentHealth {
  status: 'healthy' | 'unhealthy' | 'disabled';
  latencyMs?: number;
  error?: string;
}

/**
 * Overall system health response
 */
export interface HealthResponse {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  uptime: number;
  providers: number;
  models: number;
  components: {
    database: ComponentHealth;
    redis: ComponentHealth;
  };
}

/** Resolves when the component answers */
export type HealthProbe = () => Promise<unknown>;

export interface HealthServiceOptions {
  registry: ProviderRegistry;
  database?: HealthProbe;
  redis?: HealthProbe;
  clock?: Clock;
}

async function check(probe: HealthProbe | undefined, clock: Clock): Promise<ComponentHealth> {
  if (!probe) {
    return { status: 'disabled' };
  }
  const start = clock().getTime();
  try {
    await probe();
    return { status: 'healthy', latencyMs: clock().getTime() - start };
  } catch (error) {
    return {
      status: 'unhealthy',
      latencyMs: clock().getTime() - start,
      error: describeError(error),
    };
  }
}

/**
 * Determine overall status from component statuses
 */
export function determineOverallStatus(components: HealthResponse['components']): HealthResponse['status'] {
  if (components.database.status === 'unhealthy') {
    return 'unhealthy';
  }
  // the key cache is advisory: losing it degrades, it does not fail
  if (components.redis.status === 'unhealthy') {
    return 'degraded';
  }
  return 'healthy';
}

export class HealthService {
  private readonly registry: ProviderRegistry;
  private readonly database: HealthProbe | undefined;
  private readonly redis: HealthProbe | undefined;
  private readonly clock: Clock;
  private readonly startedAt: number;

  constructor(options: HealthServiceOptions) {
    this.registry = options.registry;
    this.database = options.database;
    this.redis = options.redis;
    this.clock = options.clock ?? systemClock;
    this.startedAt = this.clock().getTime();
  }

  async getHealthStatus(): Promise<HealthResponse> {
    const [database, redis] = await Promise.all([
      check(this.database, this.clock),
      check(this.redis, this.clock),
    ]);
    const components = { database, redis };
    const now = this.clock();

    return {
      status: determineOverallStatus(components),
      timestamp: now.toISOString(),
      uptime: Math.floor((now.getTime() - this.startedAt) / 1000),
      providers: this.registry.getProviderNames().length,
      models: this.registry.getAllModels().length,
      components,
    };
  }
}
