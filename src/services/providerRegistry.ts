/**
 * Provider Registry
 *
 * Built once from configuration. Maps each model id to the provider that
 * serves it and answers introspection queries. When two providers list the
 * same model, the one registered last wins; registration follows the catalog
 * order so resolution is deterministic.
 */

import { createAdapter, type ProviderAdapter } from '../adapters/index.js';
import {
  ProviderNotConfiguredError,
  UnknownModelError,
  UnsupportedModelForProviderError,
} from './errors.js';
import type { ProviderConfig, ProviderStatus } from '../types/providers.js';

export interface ResolvedProvider {
  adapter: ProviderAdapter;
  provider: string;
}

export class ProviderRegistry {
  private readonly providers = new Map<string, ProviderAdapter>();
  private readonly modelIndex = new Map<string, string>();

  constructor(adapters: ProviderAdapter[]) {
    for (const adapter of adapters) {
      this.providers.set(adapter.providerId, adapter);
      for (const model of adapter.models) {
        this.modelIndex.set(model, adapter.providerId);
      }
    }
  }

  /**
   * Pick the provider for a model. A preferred provider must be configured
   * and must list the model.
   */
  resolve(modelId: string, preferredProvider?: string): ResolvedProvider {
    if (preferredProvider) {
      const adapter = this.providers.get(preferredProvider);
      if (!adapter) {
        throw new ProviderNotConfiguredError(preferredProvider, this.getProviderNames());
      }
      if (!adapter.models.includes(modelId)) {
        throw new UnsupportedModelForProviderError(modelId, preferredProvider, [...adapter.models]);
      }
      return { adapter, provider: preferredProvider };
    }

    const provider = this.modelIndex.get(modelId);
    const adapter = provider === undefined ? undefined : this.providers.get(provider);
    if (provider === undefined || !adapter) {
      throw new UnknownModelError(modelId, this.getAllModels());
    }
    return { adapter, provider };
  }

  /**
   * provider -> model ids
   */
  listModels(): Record<string, string[]> {
    const models: Record<string, string[]> = {};
    for (const [name, adapter] of this.providers) {
      models[name] = [...adapter.models];
    }
    return models;
  }

  listProviders(): Record<string, ProviderStatus> {
    const statuses: Record<string, ProviderStatus> = {};
    for (const [name, adapter] of this.providers) {
      statuses[name] = {
        name,
        enabled: true,
        models: [...adapter.models],
        modelCount: adapter.models.length,
        baseUrl: adapter.baseUrl,
      };
    }
    return statuses;
  }

  /**
   * Provider that serves a model without a preference, or null if unknown
   */
  getModelProvider(modelId: string): string | null {
    return this.modelIndex.get(modelId) ?? null;
  }

  getProviderNames(): string[] {
    return [...this.providers.keys()];
  }

  /**
   * Every model id served by some provider, in registration order
   */
  getAllModels(): string[] {
    return [...this.modelIndex.keys()];
  }
}

export function createProviderRegistry(configs: ProviderConfig[]): ProviderRegistry {
  return new ProviderRegistry(configs.map(createAdapter));
}
